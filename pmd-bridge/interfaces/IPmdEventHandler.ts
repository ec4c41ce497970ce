/**
 * Event handler capability, implemented by the application
 */

import type { DataFrame, MeasurementSetting, SettingSelection, StreamKind } from '../PmdTypes';
import type { MeasurementType } from '../PmdConstants';
import type { DecodeError } from '../PmdErrors';
import type { NotificationSource } from './IPmdTransport';

/**
 * Non-owning view of the sensor handed to callbacks, so a handler can issue
 * commands without holding on to the sensor itself.
 */
export interface PmdSensorHandle {
  isConnected(): boolean;
  isSubscribed(kind: StreamKind): boolean;
  activeStreams(): StreamKind[];
  subscribe(kind: StreamKind): Promise<void>;
  unsubscribe(kind: StreamKind): Promise<void>;
  requestSettings(measurement: MeasurementType): Promise<MeasurementSetting[]>;
  startMeasurement(measurement: MeasurementType, selections: readonly SettingSelection[]): Promise<void>;
  stopMeasurement(measurement: MeasurementType): Promise<void>;
}

export interface DecodeErrorContext {
  source: NotificationSource;
  data: Uint8Array;
}

// Callbacks may be async; the dispatch loop does not wait for them
type MaybePromise = void | Promise<void>;

export interface PmdEventHandler {
  onBattery?(level: number, sensor: PmdSensorHandle): MaybePromise;
  onHeartRate?(beatsPerMinute: number, rrIntervals: number[], sensor: PmdSensorHandle): MaybePromise;
  onPmd?(kind: StreamKind, frame: DataFrame, sensor: PmdSensorHandle): MaybePromise;
  onDecodeError?(context: DecodeErrorContext, error: DecodeError): MaybePromise;

  // Polled once per notification; true ends the loop
  shouldStop?(): boolean;
}
