/**
 * PMD Bridge - client-side engine for sensors speaking Polar Measurement Data
 *
 * Public API exports for commanding a connected sensor and consuming its streams
 */

// ─────────────────────────────────────────────────────────────────────────────
// Command facade (main export)
// ─────────────────────────────────────────────────────────────────────────────

export { PmdSensor } from './PmdSensor';
export type { PmdSensorOptions, RunOptions } from './PmdSensor';

export { DispatchLoop } from './DispatchLoop';
export type { DispatchLoopOptions } from './DispatchLoop';
export { RequestTracker } from './RequestTracker';

export { SessionRegistry, InvalidTransitionError, TRANSITION_RULES, REQUEST_STATES } from '../pmd-management';
export type { RegistryEvents, SessionStateChange, SubscriptionChange, RegistrySnapshot } from '../pmd-management';

// ─────────────────────────────────────────────────────────────────────────────
// Codec
// ─────────────────────────────────────────────────────────────────────────────

export { PmdCommands, encodeCommand } from './PmdCommands';
export {
  PmdDataParser,
  decodeControlResponse,
  decodeDataFrame,
  decodeHeartRate,
  decodeBatteryLevel,
  FrameLayouts,
  DEFAULT_FRAME_LAYOUTS,
} from './PmdDataParser';
export type { FieldWidth, FrameLayout } from './PmdDataParser';

export {
  PMD_UUIDS,
  ControlOpcode,
  MeasurementType,
  SettingKind,
  CONTROL_STATUS_NAMES,
  MEASUREMENT_NAMES,
  TIMING,
  formatBytes,
} from './PmdConstants';

export {
  BATTERY_STREAM,
  HEART_RATE_STREAM,
  SessionState,
  pmdStream,
  streamKey,
  sameStream,
} from './PmdTypes';

export type {
  StreamKind,
  MeasurementSetting,
  SettingSelection,
  ControlCommand,
  ControlStatus,
  ControlStatusName,
  ControlResponse,
  Triple,
  Sample,
  HeartRateSample,
  DataFrame,
  RequestToken,
  LoopStopReason,
  LoopOutcome,
  DeviceInfo,
} from './PmdTypes';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  PmdError,
  TransportError,
  DecodeError,
  EncodeError,
  ProtocolError,
  DeviceStatusError,
  isPmdError,
} from './PmdErrors';

export type { DecodeErrorReason, EncodeErrorReason, ProtocolErrorReason } from './PmdErrors';

// ─────────────────────────────────────────────────────────────────────────────
// Interfaces
// ─────────────────────────────────────────────────────────────────────────────

export type {
  PmdTransport,
  PmdNotification,
  NotificationSource,
  ReadableCharacteristic,
} from './interfaces/IPmdTransport';

export type {
  PmdEventHandler,
  PmdSensorHandle,
  DecodeErrorContext,
} from './interfaces/IPmdEventHandler';

// ─────────────────────────────────────────────────────────────────────────────
// Transports
// ─────────────────────────────────────────────────────────────────────────────

export { NotificationChannel } from './transports/NotificationChannel';
export { MockPmdTransport } from './transports/MockPmdTransport';
export { NoblePmdTransport } from './transports/NoblePmdTransport';

// ─────────────────────────────────────────────────────────────────────────────
// Logging & configuration
// ─────────────────────────────────────────────────────────────────────────────

export { PmdLogger, pmdLogger } from './PmdLogger';
export type { LogLevel, PmdLoggerOptions } from './PmdLogger';
export { loadPmdConfig, configureFromEnvironment, DEFAULT_PMD_CONFIG, PmdConfigError } from './PmdConfig';
export type { PmdConfig } from './PmdConfig';
