/**
 * PMD Sensor
 * Command facade over one connected sensor: subscriptions, control exchanges
 * and the entry point of the dispatch loop. Owns the session registry and the
 * transport for its lifetime.
 */

import { MeasurementType, MEASUREMENT_NAMES } from './PmdConstants';
import {
  ControlCommand,
  ControlResponse,
  DeviceInfo,
  LoopOutcome,
  MeasurementSetting,
  SessionState,
  SettingSelection,
  StreamKind,
  pmdStream,
  streamKey,
} from './PmdTypes';
import { PmdError, ProtocolError, TransportError } from './PmdErrors';
import { PmdCommands } from './PmdCommands';
import { FrameLayouts, PmdDataParser } from './PmdDataParser';
import { PmdLogger, pmdLogger } from './PmdLogger';
import { DEFAULT_PMD_CONFIG } from './PmdConfig';
import { NotificationSource, PmdTransport, ReadableCharacteristic } from './interfaces/IPmdTransport';
import { PmdEventHandler, PmdSensorHandle } from './interfaces/IPmdEventHandler';
import { DispatchLoop } from './DispatchLoop';
import { RequestTracker } from './RequestTracker';
import { SessionRegistry } from '../pmd-management/SessionRegistry';

export interface PmdSensorOptions {
  transport: PmdTransport;
  handler: PmdEventHandler;
  requestTimeoutMs?: number;
  // Defaults plus any firmware-specific frame types; DEFAULT_FRAME_LAYOUTS when omitted
  frameLayouts?: FrameLayouts;
  logger?: PmdLogger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

const STANDARD_SOURCES: Record<'battery' | 'heartRate', NotificationSource> = {
  battery: 'battery',
  heartRate: 'heartRate',
};

const DEVICE_INFO_STRINGS = [
  'modelNumber',
  'manufacturerName',
  'hardwareRevision',
  'firmwareRevision',
  'softwareRevision',
  'serialNumber',
] as const satisfies readonly ReadableCharacteristic[];

export class PmdSensor implements PmdSensorHandle {
  readonly registry: SessionRegistry;

  private readonly transport: PmdTransport;
  private readonly requests: RequestTracker;
  private readonly loop: DispatchLoop;
  private readonly logger: PmdLogger;
  private readonly requestTimeoutMs: number;
  private controlNotifying = false;
  private dataNotifying = false;

  constructor(options: PmdSensorOptions) {
    this.transport = options.transport;
    this.logger = options.logger ?? pmdLogger;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_PMD_CONFIG.requestTimeoutMs;
    this.registry = new SessionRegistry({ logger: this.logger });
    this.requests = new RequestTracker(this.logger);
    this.loop = new DispatchLoop({
      transport: this.transport,
      registry: this.registry,
      requests: this.requests,
      handler: options.handler,
      sensor: this,
      frameLayouts: options.frameLayouts,
      logger: this.logger,
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────────

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  isSubscribed(kind: StreamKind): boolean {
    return this.registry.isSubscribed(kind);
  }

  activeStreams(): StreamKind[] {
    return this.registry.activeStreams();
  }

  subscribedStreams(): StreamKind[] {
    return this.registry.subscribedStreams();
  }

  sessionState(kind: StreamKind): SessionState {
    return this.registry.sessionState(kind);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Subscriptions
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * HeartRate and Battery turn their notifications on. PMD types only record
   * intent; the device streams once a Start is accepted.
   */
  async subscribe(kind: StreamKind): Promise<void> {
    if (this.registry.isSubscribed(kind)) return;

    if (kind.type === 'pmd') {
      await this.ensureControlNotifications();
      if (!this.dataNotifying) {
        await this.transport.setNotify('pmdData', true);
        this.dataNotifying = true;
      }
    } else {
      await this.transport.setNotify(STANDARD_SOURCES[kind.type], true);
    }

    this.registry.subscribe(kind);
    this.logger.info(`Subscribed to ${streamKey(kind)}`, undefined, 'SENSOR');
  }

  /**
   * A streaming PMD type is stopped first. PMD notifications are turned off
   * with the last PMD subscription.
   */
  async unsubscribe(kind: StreamKind): Promise<void> {
    if (!this.registry.isSubscribed(kind)) return;

    if (kind.type === 'pmd') {
      await this.stopMeasurement(kind.measurement);
      this.registry.unsubscribe(kind);

      const pmdLeft = this.registry.subscribedStreams().some(stream => stream.type === 'pmd');
      if (!pmdLeft && this.dataNotifying) {
        await this.transport.setNotify('pmdData', false);
        this.dataNotifying = false;
      }
    } else {
      await this.transport.setNotify(STANDARD_SOURCES[kind.type], false);
      this.registry.unsubscribe(kind);
    }

    this.logger.info(`Unsubscribed from ${streamKey(kind)}`, undefined, 'SENSOR');
  }

  private async ensureControlNotifications(): Promise<void> {
    if (this.controlNotifying) return;
    await this.transport.setNotify('pmdControl', true);
    this.controlNotifying = true;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Control exchanges
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Asks the device which settings it supports for a measurement type.
   * @throws DeviceStatusError if the device refuses
   * @throws ProtocolError Timeout if no response arrives in time
   */
  async requestSettings(measurement: MeasurementType): Promise<MeasurementSetting[]> {
    await this.ensureControlNotifications();
    const response = await this.exchange(PmdCommands.getSettings(measurement));
    return response.settings.map(setting => ({ kind: setting.kind, values: [...setting.values] }));
  }

  /**
   * Starts a measurement with one chosen value per setting kind. Each value
   * must be one the device advertised in its last settings reply.
   * @throws ProtocolError NotSubscribed or UnsupportedSetting before anything is written
   */
  async startMeasurement(measurement: MeasurementType, selections: readonly SettingSelection[]): Promise<void> {
    const name = MEASUREMENT_NAMES[measurement];
    if (!this.registry.isSubscribed(pmdStream(measurement))) {
      throw new ProtocolError('NotSubscribed', `${name} must be subscribed before it is started`);
    }

    const advertised = this.registry.advertisedSettings(measurement);
    if (!advertised) {
      throw new ProtocolError('UnsupportedSetting', `No settings known for ${name}, request them first`);
    }

    const settings: MeasurementSetting[] = [];
    for (const selection of selections) {
      const setting = advertised.find(candidate => candidate.kind === selection.kind);
      if (!setting || !setting.values.includes(selection.value)) {
        throw new ProtocolError(
          'UnsupportedSetting',
          `${name} does not support value ${selection.value} for setting 0x${selection.kind.toString(16)}`
        );
      }
      if (settings.some(chosen => chosen.kind === selection.kind)) {
        throw new ProtocolError('UnsupportedSetting', `${name} setting 0x${selection.kind.toString(16)} chosen twice`);
      }
      settings.push({ kind: setting.kind, values: setting.values, selected: selection.value });
    }

    await this.exchange(PmdCommands.start(measurement, settings));
    this.logger.info(`${name} streaming`, { settings: selections }, 'SENSOR');
  }

  /**
   * Stops a measurement. Resolves at once, without contacting the device,
   * when the measurement is not running.
   */
  async stopMeasurement(measurement: MeasurementType): Promise<void> {
    if (this.registry.sessionState(pmdStream(measurement)) === SessionState.IDLE) {
      this.logger.debug(`${MEASUREMENT_NAMES[measurement]} already idle, stop skipped`, undefined, 'SENSOR');
      return;
    }

    await this.exchange(PmdCommands.stop(measurement));
    this.logger.info(`${MEASUREMENT_NAMES[measurement]} stopped`, undefined, 'SENSOR');
  }

  // Stops every streaming PMD type, one exchange at a time
  async stopAll(): Promise<void> {
    for (const kind of this.registry.activeStreams()) {
      if (kind.type === 'pmd') {
        await this.stopMeasurement(kind.measurement);
      }
    }
  }

  private async exchange(command: ControlCommand): Promise<ControlResponse> {
    const bytes = PmdCommands.encode(command);
    const token = this.registry.beginRequest(command);
    const response = this.requests.track(token, this.requestTimeoutMs, expired => {
      this.registry.abandonRequest(expired);
    });

    const write = async (): Promise<void> => {
      try {
        await this.transport.write(bytes);
      } catch (error) {
        const failure = error instanceof PmdError ? error : new TransportError('Control point write failed', error);
        this.registry.abandonRequest(token);
        this.requests.cancel(token, failure);
        throw failure;
      }
    };

    const [, result] = await Promise.all([write(), response]);
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Event loop
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Runs the dispatch loop until link loss, the handler's stop condition or
   * the signal. Cancelling does not stop measurements on the device.
   * @throws ProtocolError NoSubscriptions if nothing is subscribed
   */
  async runEventLoop(options: RunOptions = {}): Promise<LoopOutcome> {
    if (this.registry.subscribedStreams().length === 0) {
      throw new ProtocolError('NoSubscriptions', 'Subscribe to at least one stream before running the event loop');
    }
    return this.loop.run(options.signal);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Device information
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Reads the Device Information strings, the System ID and the body sensor location.
   * Characteristics the device does not expose come back as null.
   * @throws TransportError if the transport cannot read characteristics
   */
  async readDeviceInfo(): Promise<DeviceInfo> {
    const read = this.transport.read?.bind(this.transport);
    if (!read) {
      throw new TransportError('Transport does not support characteristic reads');
    }

    const readOptional = async <T>(name: ReadableCharacteristic, decode: (data: Uint8Array) => T): Promise<T | null> => {
      try {
        return decode(await read(name));
      } catch (error) {
        this.logger.debug(`Could not read ${name}`, { error: error instanceof Error ? error.message : String(error) }, 'SENSOR');
        return null;
      }
    };

    const info: DeviceInfo = {
      modelNumber: null,
      manufacturerName: null,
      hardwareRevision: null,
      firmwareRevision: null,
      softwareRevision: null,
      serialNumber: null,
      systemId: await readOptional('systemId', PmdDataParser.decodeSystemId),
      bodySensorLocation: await readOptional('bodySensorLocation', PmdDataParser.decodeBodySensorLocation),
    };
    for (const name of DEVICE_INFO_STRINGS) {
      info[name] = await readOptional(name, PmdDataParser.decodeText);
    }

    this.logger.info('Device information', info, 'SENSOR');
    return info;
  }

  /**
   * Closes the link. Pending requests fail with TransportError and every
   * session is reset.
   */
  async disconnect(): Promise<void> {
    await this.transport.disconnect();
    this.requests.rejectAll(new TransportError('Disconnected'));
    this.registry.reset();
    this.controlNotifying = false;
    this.dataNotifying = false;
  }
}
