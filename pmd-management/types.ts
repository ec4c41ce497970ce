/**
 * Session Management Types
 * Lifecycle of one stream kind and the control exchanges that move it
 */

import { ControlOpcode } from '../pmd-bridge/PmdConstants';
import {
  ControlCommand,
  MeasurementSetting,
  RequestToken,
  SessionState,
  StreamKind,
} from '../pmd-bridge/PmdTypes';

export { SessionState };

// ─────────────────────────────────────────────────────────────────────────────
// State Machine Transitions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Valid state transitions
 * Any transition not in this map is invalid and will throw
 */
export const TRANSITION_RULES: Record<SessionState, SessionState[]> = {
  [SessionState.IDLE]: [
    SessionState.SETTINGS_REQUESTED,
    SessionState.START_REQUESTED,
    SessionState.STREAMING,  // HeartRate/Battery subscribe
  ],
  [SessionState.SETTINGS_REQUESTED]: [
    SessionState.IDLE,
  ],
  [SessionState.START_REQUESTED]: [
    SessionState.STREAMING,
    SessionState.IDLE,
  ],
  [SessionState.STREAMING]: [
    SessionState.STOP_REQUESTED,
    SessionState.IDLE,       // HeartRate/Battery unsubscribe
  ],
  [SessionState.STOP_REQUESTED]: [
    SessionState.IDLE,
    SessionState.STREAMING,
  ],
};

/**
 * State each opcode may be issued from, the state held while the device
 * answers, and where the session lands on Success or on any other status.
 */
export interface RequestStates {
  from: SessionState;
  pending: SessionState;
  onSuccess: SessionState;
  onFailure: SessionState;
}

export const REQUEST_STATES: Record<ControlOpcode, RequestStates> = {
  [ControlOpcode.GetSettings]: {
    from: SessionState.IDLE,
    pending: SessionState.SETTINGS_REQUESTED,
    onSuccess: SessionState.IDLE,
    onFailure: SessionState.IDLE,
  },
  [ControlOpcode.Start]: {
    from: SessionState.IDLE,
    pending: SessionState.START_REQUESTED,
    onSuccess: SessionState.STREAMING,
    onFailure: SessionState.IDLE,
  },
  [ControlOpcode.Stop]: {
    from: SessionState.STREAMING,
    pending: SessionState.STOP_REQUESTED,
    onSuccess: SessionState.IDLE,
    onFailure: SessionState.STREAMING,
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Session
// ─────────────────────────────────────────────────────────────────────────────

export interface Session {
  kind: StreamKind;
  subscribed: boolean;
  state: SessionState;
  advertisedSettings: MeasurementSetting[] | null;  // Last GetSettings Success (PMD only)
  selectedSettings: MeasurementSetting[] | null;    // Last accepted Start (PMD only)
  stateChangedAt: number;
}

export interface OutstandingRequest {
  token: RequestToken;
  command: ControlCommand;
  previousState: SessionState;
}

export interface SessionStateChange {
  kind: StreamKind;
  previousState: SessionState;
  newState: SessionState;
  timestamp: number;
}

export interface SubscriptionChange {
  kind: StreamKind;
  subscribed: boolean;
}

export interface RegistrySnapshot {
  sessions: Session[];
  outstanding: RequestToken | null;
}
