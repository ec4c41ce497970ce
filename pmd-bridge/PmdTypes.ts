/**
 * PMD Bridge Types - commands, responses, frames and samples
 */

import {
  ControlOpcode,
  MeasurementType,
  SettingKind,
  CONTROL_STATUS_NAMES,
  MEASUREMENT_NAMES,
} from './PmdConstants';

// ─────────────────────────────────────────────────────────────────────────────
// Stream identification
// ─────────────────────────────────────────────────────────────────────────────

export type StreamKind =
  | { type: 'battery' }
  | { type: 'heartRate' }
  | { type: 'pmd'; measurement: MeasurementType };

export const BATTERY_STREAM: StreamKind = { type: 'battery' };
export const HEART_RATE_STREAM: StreamKind = { type: 'heartRate' };

export function pmdStream(measurement: MeasurementType): StreamKind {
  return { type: 'pmd', measurement };
}

// Equality by tag only
export function streamKey(kind: StreamKind): string {
  return kind.type === 'pmd' ? `pmd:${MEASUREMENT_NAMES[kind.measurement]}` : kind.type;
}

export function sameStream(a: StreamKind, b: StreamKind): boolean {
  return streamKey(a) === streamKey(b);
}

// ─────────────────────────────────────────────────────────────────────────────
// Settings
// ─────────────────────────────────────────────────────────────────────────────

export interface MeasurementSetting {
  kind: SettingKind;
  values: readonly number[];  // As advertised by the device
  selected?: number;          // Only for Start requests
}

// Caller's choice for a start request, e.g. { kind: SettingKind.SampleRate, value: 250 }
export interface SettingSelection {
  kind: SettingKind;
  value: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Control point messages
// ─────────────────────────────────────────────────────────────────────────────

export interface ControlCommand {
  readonly opcode: ControlOpcode;
  readonly measurement: MeasurementType;
  readonly settings: readonly MeasurementSetting[];
}

export type ControlStatusName = (typeof CONTROL_STATUS_NAMES)[number] | 'Unknown';

export interface ControlStatus {
  name: ControlStatusName;
  code: number;  // Raw byte, kept for Unknown
}

export interface ControlResponse {
  opcode: ControlOpcode;
  measurement: MeasurementType;
  status: ControlStatus;
  moreAvailable: boolean;
  settings: MeasurementSetting[];  // GetSettings replies only
}

// ─────────────────────────────────────────────────────────────────────────────
// Samples & frames
// ─────────────────────────────────────────────────────────────────────────────

export type Triple = [number, number, number];

export type Sample =
  | { type: 'heartRate'; beatsPerMinute: number; rrIntervals: number[] }
  | { type: 'ecg'; microvolts: number[] }
  | { type: 'accelerometer'; triples: Triple[] }
  | { type: 'gyroscope'; triples: Triple[] }
  | { type: 'magnetometer'; triples: Triple[] }
  | { type: 'ppg'; channels: number[][] }
  | { type: 'ppi'; hr: number; ppiMs: number; errorEstimate: number; blockerFlags: number };

export type HeartRateSample = Extract<Sample, { type: 'heartRate' }>;

export interface DataFrame {
  kind: StreamKind;
  timestamp: bigint;  // Device clock, nanoseconds
  frameType: number;
  samples: Sample[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Session lifecycle
// ─────────────────────────────────────────────────────────────────────────────

export enum SessionState {
  IDLE = 'idle',
  SETTINGS_REQUESTED = 'settings_requested',
  START_REQUESTED = 'start_requested',
  STREAMING = 'streaming',
  STOP_REQUESTED = 'stop_requested',
}

export interface RequestToken {
  readonly id: string;
  readonly opcode: ControlOpcode;
  readonly measurement: MeasurementType;
  readonly issuedAt: number;
}

// Terminal result of the dispatch loop
export type LoopStopReason = 'linkLost' | 'handlerStopped' | 'cancelled';

export interface LoopOutcome {
  reason: LoopStopReason;
  notifications: number;
  frames: number;
  decodeErrors: number;
}

export interface DeviceInfo {
  modelNumber: string | null;
  manufacturerName: string | null;
  hardwareRevision: string | null;
  firmwareRevision: string | null;
  softwareRevision: string | null;
  serialNumber: string | null;
  systemId: string | null;
  bodySensorLocation: string | null;
}
