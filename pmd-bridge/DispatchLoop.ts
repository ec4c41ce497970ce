/**
 * Dispatch Loop
 * Sole reader of the transport's notification sequence. Control responses
 * close the outstanding exchange; data is decoded and handed to the event
 * handler. A corrupt notification is reported and skipped, never fatal.
 */

import { MEASUREMENT_NAMES, formatBytes, isMeasurementType } from './PmdConstants';
import {
  BATTERY_STREAM,
  HEART_RATE_STREAM,
  LoopOutcome,
  LoopStopReason,
  StreamKind,
  pmdStream,
  streamKey,
} from './PmdTypes';
import { DecodeError, ProtocolError, TransportError } from './PmdErrors';
import {
  DEFAULT_FRAME_LAYOUTS,
  FrameLayouts,
  decodeBatteryLevel,
  decodeControlResponse,
  decodeDataFrame,
  decodeHeartRate,
} from './PmdDataParser';
import { PmdLogger, pmdLogger } from './PmdLogger';
import { PmdNotification, PmdTransport } from './interfaces/IPmdTransport';
import { PmdEventHandler, PmdSensorHandle } from './interfaces/IPmdEventHandler';
import { RequestTracker } from './RequestTracker';
import { SessionRegistry } from '../pmd-management/SessionRegistry';

const ABORTED = Symbol('aborted');

interface Counters {
  notifications: number;
  frames: number;
  decodeErrors: number;
}

function whenAborted(signal: AbortSignal): { promise: Promise<typeof ABORTED>; dispose: () => void } {
  let listener = (): void => undefined;
  const promise = new Promise<typeof ABORTED>(resolve => {
    listener = () => resolve(ABORTED);
    signal.addEventListener('abort', listener, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', listener) };
}

export interface DispatchLoopOptions {
  transport: PmdTransport;
  registry: SessionRegistry;
  requests: RequestTracker;
  handler: PmdEventHandler;
  sensor: PmdSensorHandle;
  frameLayouts?: FrameLayouts;
  logger?: PmdLogger;
}

export class DispatchLoop {
  private readonly transport: PmdTransport;
  private readonly registry: SessionRegistry;
  private readonly requests: RequestTracker;
  private readonly handler: PmdEventHandler;
  private readonly sensor: PmdSensorHandle;
  private readonly frameLayouts: FrameLayouts;
  private readonly logger: PmdLogger;

  private iterator: AsyncIterator<PmdNotification> | null = null;
  // A read left waiting by a cancelled run; the next run picks it up
  private heldNext: Promise<IteratorResult<PmdNotification>> | null = null;
  private running = false;
  private linkLost = false;

  constructor(options: DispatchLoopOptions) {
    this.transport = options.transport;
    this.registry = options.registry;
    this.requests = options.requests;
    this.handler = options.handler;
    this.sensor = options.sensor;
    this.frameLayouts = options.frameLayouts ?? DEFAULT_FRAME_LAYOUTS;
    this.logger = options.logger ?? pmdLogger;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Processes notifications until the link is lost, the handler asks to stop
   * or the signal aborts.
   * @throws ProtocolError LoopAlreadyRunning if another run is in progress
   */
  async run(signal?: AbortSignal): Promise<LoopOutcome> {
    if (this.running) {
      throw new ProtocolError('LoopAlreadyRunning', 'The dispatch loop is already consuming notifications');
    }

    const counters: Counters = { notifications: 0, frames: 0, decodeErrors: 0 };
    const finish = (reason: LoopStopReason): LoopOutcome => {
      this.logger.info(`Dispatch loop ended: ${reason}`, counters, 'DISPATCH');
      return { reason, ...counters };
    };

    if (this.linkLost) return finish('linkLost');
    if (signal?.aborted) return finish('cancelled');

    this.running = true;
    const abort = signal ? whenAborted(signal) : null;
    this.logger.info('Dispatch loop started', { streams: this.registry.subscribedStreams().map(streamKey) }, 'DISPATCH');

    try {
      for (;;) {
        const next = this.nextNotification();
        const result = abort ? await Promise.race([next, abort.promise]) : await next;
        if (result === ABORTED) {
          return finish('cancelled');
        }
        this.heldNext = null;

        if (result.done) {
          this.handleLinkLoss();
          return finish('linkLost');
        }

        counters.notifications++;
        this.dispatch(result.value, counters);

        if (signal?.aborted) {
          return finish('cancelled');
        }
        if (this.handler.shouldStop?.()) {
          return finish('handlerStopped');
        }
      }
    } finally {
      abort?.dispose();
      this.running = false;
    }
  }

  private nextNotification(): Promise<IteratorResult<PmdNotification>> {
    if (!this.heldNext) {
      if (!this.iterator) {
        this.iterator = this.transport.notifications()[Symbol.asyncIterator]();
      }
      this.heldNext = this.iterator.next();
    }
    return this.heldNext;
  }

  private handleLinkLoss(): void {
    this.linkLost = true;
    this.logger.warn('Link lost, resetting all sessions', undefined, 'DISPATCH');
    this.requests.rejectAll(new TransportError('Link lost while awaiting a control response'));
    this.registry.reset();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Dispatch
  // ───────────────────────────────────────────────────────────────────────────

  private dispatch(notification: PmdNotification, counters: Counters): void {
    const { source, data } = notification;
    if (this.logger.isEnabled('debug')) {
      this.logger.debug(`${source} ${formatBytes(data)}`, undefined, 'DISPATCH');
    }

    try {
      switch (source) {
        case 'pmdControl':
          this.handleControlResponse(data);
          break;
        case 'pmdData':
          this.handlePmdData(data);
          counters.frames++;
          break;
        case 'heartRate':
          this.handleHeartRate(data);
          counters.frames++;
          break;
        case 'battery':
          this.handleBattery(data);
          counters.frames++;
          break;
      }
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      const decodeError = error;

      counters.decodeErrors++;
      this.logger.warn(`Dropped ${source} notification: ${decodeError.message}`, { data: formatBytes(data) }, 'DISPATCH');
      this.invoke('onDecodeError', () => this.handler.onDecodeError?.({ source, data }, decodeError));
    }
  }

  private handleControlResponse(data: Uint8Array): void {
    const response = decodeControlResponse(data);
    const token = this.registry.outstanding();
    if (!token) {
      this.logger.warn('Unsolicited control response dropped', { status: response.status.name }, 'DISPATCH');
      return;
    }

    try {
      this.registry.completeRequest(token, response);
    } catch (error) {
      if (error instanceof ProtocolError && error.reason === 'Mismatch') {
        this.logger.warn(`Control response dropped: ${error.message}`, undefined, 'DISPATCH');
        return;
      }
      throw error;
    }

    if (response.moreAvailable) {
      this.logger.debug('Device reports more settings available', undefined, 'DISPATCH');
    }
    this.requests.settle(token, response);
  }

  private handlePmdData(data: Uint8Array): void {
    if (data.length === 0) {
      throw new DecodeError('Truncated', 'Data notification is empty');
    }
    const measurement = data[0];
    if (!isMeasurementType(measurement)) {
      throw new DecodeError('UnknownMeasurementType', `Measurement type 0x${measurement.toString(16)}`);
    }

    const kind = pmdStream(measurement);
    const frame = decodeDataFrame(kind, data, this.frameLayouts);
    if (!this.deliverable(kind)) return;

    this.invoke(`onPmd(${MEASUREMENT_NAMES[measurement]})`, () => this.handler.onPmd?.(kind, frame, this.sensor));
  }

  private handleHeartRate(data: Uint8Array): void {
    const { beatsPerMinute, rrIntervals } = decodeHeartRate(data);
    if (!this.deliverable(HEART_RATE_STREAM)) return;

    this.invoke('onHeartRate', () => this.handler.onHeartRate?.(beatsPerMinute, rrIntervals, this.sensor));
  }

  private handleBattery(data: Uint8Array): void {
    const level = decodeBatteryLevel(data);
    if (!this.deliverable(BATTERY_STREAM)) return;

    this.invoke('onBattery', () => this.handler.onBattery?.(level, this.sensor));
  }

  private deliverable(kind: StreamKind): boolean {
    if (this.registry.isSubscribed(kind)) return true;
    this.logger.debug(`${streamKey(kind)} is not subscribed, notification dropped`, undefined, 'DISPATCH');
    return false;
  }

  // Callbacks run without being awaited; failures are logged
  private invoke(name: string, callback: () => unknown): void {
    try {
      const result = callback();
      if (result instanceof Promise) {
        void result.catch((error: unknown) => this.logger.logFailure(`Handler ${name} rejected`, error, 'DISPATCH'));
      }
    } catch (error) {
      this.logger.logFailure(`Handler ${name} threw`, error, 'DISPATCH');
    }
  }
}
