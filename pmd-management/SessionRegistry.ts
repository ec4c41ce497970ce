/**
 * Session Registry
 * Single source of truth for what is subscribed, what is streaming and which
 * control exchange, if any, is outstanding on the shared PMD control point
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ControlOpcode, MeasurementType, MEASUREMENT_NAMES, OPCODE_NAMES } from '../pmd-bridge/PmdConstants';
import {
  ControlCommand,
  ControlResponse,
  MeasurementSetting,
  RequestToken,
  StreamKind,
  pmdStream,
  streamKey,
} from '../pmd-bridge/PmdTypes';
import { ProtocolError } from '../pmd-bridge/PmdErrors';
import { PmdLogger, pmdLogger } from '../pmd-bridge/PmdLogger';
import {
  OutstandingRequest,
  REQUEST_STATES,
  RegistrySnapshot,
  Session,
  SessionState,
  SessionStateChange,
  SubscriptionChange,
  TRANSITION_RULES,
} from './types';

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

export interface RegistryEvents {
  sessionStateChanged: (change: SessionStateChange) => void;
  subscriptionChanged: (change: SubscriptionChange) => void;
  reset: () => void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export class InvalidTransitionError extends Error {
  constructor(
    public readonly kind: StreamKind,
    public readonly fromState: SessionState,
    public readonly toState: SessionState
  ) {
    super(`Invalid transition for ${streamKey(kind)}: ${fromState} → ${toState}`);
    this.name = 'InvalidTransitionError';
  }
}

export interface SessionRegistryOptions {
  logger?: PmdLogger;
  now?: () => number;
}

const copySettings = (settings: readonly MeasurementSetting[]): MeasurementSetting[] =>
  settings.map(setting => ({ ...setting, values: [...setting.values] }));

const describe = (opcode: ControlOpcode, measurement: MeasurementType): string =>
  `${OPCODE_NAMES[opcode]} ${MEASUREMENT_NAMES[measurement]}`;

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export class SessionRegistry extends EventEmitter {
  private sessions = new Map<string, Session>();
  private pending: OutstandingRequest | null = null;
  private readonly logger: PmdLogger;
  private readonly now: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    super();
    this.logger = options.logger ?? pmdLogger;
    this.now = options.now ?? Date.now;
  }

  private emitEvent<K extends keyof RegistryEvents>(event: K, ...args: Parameters<RegistryEvents[K]>): void {
    this.emit(event, ...args);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // State Machine
  // ───────────────────────────────────────────────────────────────────────────

  validateTransition(from: SessionState, to: SessionState): boolean {
    return TRANSITION_RULES[from].includes(to);
  }

  private session(kind: StreamKind): Session {
    const key = streamKey(kind);
    let session = this.sessions.get(key);
    if (!session) {
      session = {
        kind,
        subscribed: false,
        state: SessionState.IDLE,
        advertisedSettings: null,
        selectedSettings: null,
        stateChangedAt: this.now(),
      };
      this.sessions.set(key, session);
    }
    return session;
  }

  /**
   * @throws InvalidTransitionError if transition is not valid
   */
  private transition(session: Session, newState: SessionState): void {
    const previousState = session.state;
    if (previousState === newState) return;

    if (!this.validateTransition(previousState, newState)) {
      throw new InvalidTransitionError(session.kind, previousState, newState);
    }

    const timestamp = this.now();
    session.state = newState;
    session.stateChangedAt = timestamp;

    this.logger.debug(`${streamKey(session.kind)}: ${previousState} → ${newState}`, undefined, 'REGISTRY');
    this.emitEvent('sessionStateChanged', { kind: session.kind, previousState, newState, timestamp });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Control Exchanges
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Opens a control exchange for the command's measurement type.
   * @throws ProtocolError Busy if any exchange is outstanding, or the session
   * is not in the state the opcode is issued from
   */
  beginRequest(command: ControlCommand): RequestToken {
    if (this.pending) {
      const { token } = this.pending;
      throw new ProtocolError(
        'Busy',
        `${describe(token.opcode, token.measurement)} is outstanding, cannot issue ${describe(command.opcode, command.measurement)}`
      );
    }

    const session = this.session(pmdStream(command.measurement));
    const rule = REQUEST_STATES[command.opcode];
    if (session.state !== rule.from) {
      throw new ProtocolError(
        'Busy',
        `${streamKey(session.kind)} is ${session.state}, ${OPCODE_NAMES[command.opcode]} needs ${rule.from}`
      );
    }

    const token: RequestToken = Object.freeze({
      id: uuidv4(),
      opcode: command.opcode,
      measurement: command.measurement,
      issuedAt: this.now(),
    });

    this.pending = { token, command, previousState: session.state };
    this.transition(session, rule.pending);
    return token;
  }

  /**
   * Closes the outstanding exchange with the device's answer. Cached settings
   * and streaming state change only on Success.
   * @throws ProtocolError Mismatch if the token is not outstanding or the
   * response echoes a different opcode or measurement type
   */
  completeRequest(token: RequestToken, response: ControlResponse): void {
    const pending = this.pending;
    if (!pending || pending.token.id !== token.id) {
      throw new ProtocolError('Mismatch', `Request ${token.id} is not outstanding`);
    }
    if (response.opcode !== token.opcode || response.measurement !== token.measurement) {
      throw new ProtocolError(
        'Mismatch',
        `Got ${describe(response.opcode, response.measurement)} response, awaiting ${describe(token.opcode, token.measurement)}`
      );
    }

    this.pending = null;
    const session = this.session(pmdStream(token.measurement));
    const rule = REQUEST_STATES[token.opcode];

    if (response.status.name !== 'Success') {
      this.logger.warn(`${describe(token.opcode, token.measurement)} failed: ${response.status.name}`, undefined, 'REGISTRY');
      this.transition(session, rule.onFailure);
      return;
    }

    if (token.opcode === ControlOpcode.GetSettings) {
      session.advertisedSettings = copySettings(response.settings);
    } else if (token.opcode === ControlOpcode.Start) {
      session.selectedSettings = copySettings(pending.command.settings);
    }
    this.transition(session, rule.onSuccess);
  }

  /**
   * Drops the outstanding exchange (e.g. after a timeout) and restores the
   * state it was issued from.
   * @returns false if the token was not outstanding
   */
  abandonRequest(token: RequestToken): boolean {
    const pending = this.pending;
    if (!pending || pending.token.id !== token.id) return false;

    this.pending = null;
    this.transition(this.session(pmdStream(token.measurement)), pending.previousState);
    this.logger.debug(`Abandoned ${describe(token.opcode, token.measurement)}`, { id: token.id }, 'REGISTRY');
    return true;
  }

  outstanding(): RequestToken | null {
    return this.pending?.token ?? null;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Subscriptions
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Marks a stream subscribed. HeartRate and Battery start streaming at once;
   * PMD types wait for an accepted Start.
   * @returns false if already subscribed
   */
  subscribe(kind: StreamKind): boolean {
    const session = this.session(kind);
    if (session.subscribed) return false;

    session.subscribed = true;
    if (kind.type !== 'pmd') {
      this.transition(session, SessionState.STREAMING);
    }
    this.emitEvent('subscriptionChanged', { kind, subscribed: true });
    return true;
  }

  /**
   * @returns false if not subscribed
   */
  unsubscribe(kind: StreamKind): boolean {
    const session = this.sessions.get(streamKey(kind));
    if (!session || !session.subscribed) return false;

    session.subscribed = false;
    if (kind.type !== 'pmd') {
      this.transition(session, SessionState.IDLE);
    }
    this.emitEvent('subscriptionChanged', { kind, subscribed: false });
    return true;
  }

  isSubscribed(kind: StreamKind): boolean {
    return this.sessions.get(streamKey(kind))?.subscribed ?? false;
  }

  subscribedStreams(): StreamKind[] {
    return Array.from(this.sessions.values())
      .filter(session => session.subscribed)
      .map(session => session.kind);
  }

  // Streams the device is currently delivering
  activeStreams(): StreamKind[] {
    return Array.from(this.sessions.values())
      .filter(session => session.state === SessionState.STREAMING)
      .map(session => session.kind);
  }

  sessionState(kind: StreamKind): SessionState {
    return this.sessions.get(streamKey(kind))?.state ?? SessionState.IDLE;
  }

  advertisedSettings(measurement: MeasurementType): MeasurementSetting[] | null {
    const settings = this.sessions.get(streamKey(pmdStream(measurement)))?.advertisedSettings;
    return settings ? copySettings(settings) : null;
  }

  selectedSettings(measurement: MeasurementType): MeasurementSetting[] | null {
    const settings = this.sessions.get(streamKey(pmdStream(measurement)))?.selectedSettings;
    return settings ? copySettings(settings) : null;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Utility
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Link loss: every session back to idle and unsubscribed, the outstanding
   * exchange dropped, cached settings forgotten.
   */
  reset(): void {
    this.pending = null;
    for (const session of this.sessions.values()) {
      session.subscribed = false;
      this.transition(session, SessionState.IDLE);
    }
    this.sessions.clear();

    this.logger.info('Session registry reset', undefined, 'REGISTRY');
    this.emitEvent('reset');
  }

  getSnapshot(): RegistrySnapshot {
    return {
      sessions: Array.from(this.sessions.values()).map(session => ({
        ...session,
        advertisedSettings: session.advertisedSettings ? copySettings(session.advertisedSettings) : null,
        selectedSettings: session.selectedSettings ? copySettings(session.selectedSettings) : null,
      })),
      outstanding: this.outstanding(),
    };
  }
}
