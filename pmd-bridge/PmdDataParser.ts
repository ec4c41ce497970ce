/**
 * PmdDataParser.ts
 *
 * Decodes control point responses, PMD data frames and the standard heart rate
 * and battery notifications. Every decoder consumes its payload exactly; any
 * byte left over is reported rather than ignored.
 *
 * Data frame layout: [measurement_type][timestamp:8 LE][frame_type][records...]
 * Frame types are looked up in a FrameLayouts table; callers extend the
 * defaults with FrameLayouts.with() and pass the result in.
 */

import {
  ControlOpcode,
  MeasurementType,
  BODY_SENSOR_LOCATIONS,
  CONTROL_RESPONSE_MARKER,
  CONTROL_RESPONSE_HEADER_SIZE,
  CONTROL_STATUS_NAMES,
  DATA_FRAME_HEADER_SIZE,
  HEART_RATE_FLAGS,
  MEASUREMENT_NAMES,
  RR_UNITS_PER_SECOND,
  isControlOpcode,
  isMeasurementType,
  isSettingKind,
} from './PmdConstants';
import {
  ControlResponse,
  ControlStatus,
  DataFrame,
  HeartRateSample,
  MeasurementSetting,
  Sample,
  StreamKind,
  Triple,
  streamKey,
} from './PmdTypes';
import { DecodeError } from './PmdErrors';

// ─────────────────────────────────────────────────────────────────────────────
// Frame layouts
// ─────────────────────────────────────────────────────────────────────────────

export type FieldWidth = 1 | 2 | 3 | 4;

/**
 * Fixed-width record layout: one entry per field of a reading, all fields
 * little-endian. Records repeat back to back until the payload ends.
 */
export interface FrameLayout {
  readonly fields: readonly FieldWidth[];
  readonly signed: boolean;
}

const channels = (count: number, width: FieldWidth): FrameLayout => ({
  fields: Array.from({ length: count }, () => width),
  signed: true,
});

// Field count each measurement type's samples are built from
const FIELD_COUNT: Record<MeasurementType, number | null> = {
  [MeasurementType.Ecg]: 1,
  [MeasurementType.Ppg]: null, // any channel count
  [MeasurementType.Accelerometer]: 3,
  [MeasurementType.Ppi]: 4,
  [MeasurementType.Gyroscope]: 3,
  [MeasurementType.Magnetometer]: 3,
};

const layoutKey = (measurement: MeasurementType, frameType: number): string => `${measurement}:${frameType}`;

/**
 * Immutable table of frame layouts keyed by measurement type and frame type
 * byte. with() returns a new table; existing entries are never replaced.
 */
export class FrameLayouts {
  private constructor(private readonly entries: ReadonlyMap<string, FrameLayout>) {}

  static empty(): FrameLayouts {
    return new FrameLayouts(new Map());
  }

  /**
   * @throws RangeError if the frame type already has a layout, or the field
   * count cannot form the measurement's samples
   */
  with(measurement: MeasurementType, frameType: number, layout: FrameLayout): FrameLayouts {
    const name = `${MEASUREMENT_NAMES[measurement]} frame 0x${frameType.toString(16)}`;
    const key = layoutKey(measurement, frameType);
    if (this.entries.has(key)) {
      throw new RangeError(`${name} already has a layout`);
    }

    const expected = FIELD_COUNT[measurement];
    if (layout.fields.length === 0 || (expected !== null && layout.fields.length !== expected)) {
      throw new RangeError(`${name} needs ${expected ?? 'at least 1'} fields, got ${layout.fields.length}`);
    }

    const entries = new Map(this.entries);
    entries.set(key, Object.freeze({ fields: Object.freeze([...layout.fields]), signed: layout.signed }));
    return new FrameLayouts(entries);
  }

  get(measurement: MeasurementType, frameType: number): FrameLayout | undefined {
    return this.entries.get(layoutKey(measurement, frameType));
  }
}

export const DEFAULT_FRAME_LAYOUTS = FrameLayouts.empty()
  .with(MeasurementType.Ecg, 0x00, channels(1, 3))                // µV, int24
  .with(MeasurementType.Ppg, 0x00, channels(4, 3))                // 3 channels + ambient, int24
  .with(MeasurementType.Accelerometer, 0x00, channels(3, 1))      // mG, int8
  .with(MeasurementType.Accelerometer, 0x01, channels(3, 2))      // mG, int16
  .with(MeasurementType.Accelerometer, 0x02, channels(3, 3))      // mG, int24
  .with(MeasurementType.Gyroscope, 0x01, channels(3, 2))
  .with(MeasurementType.Gyroscope, 0x02, channels(3, 3))
  .with(MeasurementType.Magnetometer, 0x01, channels(3, 2))
  .with(MeasurementType.Magnetometer, 0x02, channels(3, 3))
  .with(MeasurementType.Ppi, 0x00, { fields: [1, 2, 2, 1], signed: false }); // hr, ppi, error, flags

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

// Little-endian integer of 1..4 bytes, sign-extended when requested
function readLE(data: Uint8Array, offset: number, width: FieldWidth, signed: boolean): number {
  let value = 0;
  for (let i = 0; i < width; i++) {
    value += data[offset + i] * 2 ** (8 * i);
  }
  if (signed && value >= 2 ** (8 * width - 1)) {
    value -= 2 ** (8 * width);
  }
  return value;
}

const toTriple = (r: number[]): Triple => [r[0], r[1], r[2]];

function toStatus(code: number): ControlStatus {
  const name = code < CONTROL_STATUS_NAMES.length ? CONTROL_STATUS_NAMES[code] : 'Unknown';
  return { name, code };
}

// ─────────────────────────────────────────────────────────────────────────────
// Decoders
// ─────────────────────────────────────────────────────────────────────────────

export class PmdDataParser {
  /**
   * Decodes a control point response:
   * [0xF0][opcode][type][status][more_available][settings...]
   */
  static decodeControlResponse(data: Uint8Array): ControlResponse {
    if (data.length < CONTROL_RESPONSE_HEADER_SIZE) {
      throw new DecodeError('Truncated', `Control response has ${data.length} bytes, header needs ${CONTROL_RESPONSE_HEADER_SIZE}`);
    }
    if (data[0] !== CONTROL_RESPONSE_MARKER) {
      throw new DecodeError('UnexpectedMarker', `Control response starts with 0x${data[0].toString(16)}`);
    }

    const opcode = data[1];
    const measurement = data[2];
    if (!isControlOpcode(opcode)) {
      throw new DecodeError('UnknownOpcode', `Opcode 0x${opcode.toString(16)}`);
    }
    if (!isMeasurementType(measurement)) {
      throw new DecodeError('UnknownMeasurementType', `Measurement type 0x${measurement.toString(16)}`);
    }

    const status = toStatus(data[3]);
    const moreAvailable = data[4] !== 0;

    let settings: MeasurementSetting[] = [];
    if (opcode === ControlOpcode.GetSettings && status.name === 'Success') {
      settings = PmdDataParser.decodeSettings(data, CONTROL_RESPONSE_HEADER_SIZE);
      if (settings.length === 0) {
        throw new DecodeError('MalformedSettings', `${MEASUREMENT_NAMES[measurement]} settings reply advertises nothing`);
      }
    }

    return { opcode, measurement, status, moreAvailable, settings };
  }

  /**
   * Decodes repeated [kind][count][count x uint16 LE] blocks up to the end of data
   */
  static decodeSettings(data: Uint8Array, start: number): MeasurementSetting[] {
    const settings: MeasurementSetting[] = [];
    let offset = start;

    while (offset < data.length) {
      if (offset + 2 > data.length) {
        throw new DecodeError('MalformedSettings', `Setting block at byte ${offset} has no value count`);
      }

      const kind = data[offset];
      const count = data[offset + 1];
      offset += 2;

      if (!isSettingKind(kind)) {
        throw new DecodeError('MalformedSettings', `Unknown setting kind 0x${kind.toString(16)} at byte ${offset - 2}`);
      }
      if (offset + count * 2 > data.length) {
        throw new DecodeError('MalformedSettings', `Setting 0x${kind.toString(16)} declares ${count} values past the end of the buffer`);
      }

      const values: number[] = [];
      for (let i = 0; i < count; i++) {
        values.push(readLE(data, offset, 2, false));
        offset += 2;
      }
      settings.push({ kind, values });
    }

    return settings;
  }

  /**
   * Decodes a PMD data frame. The hint names the stream the caller expects;
   * the type byte embedded in the frame must agree with it.
   */
  static decodeDataFrame(hint: StreamKind, data: Uint8Array, layouts: FrameLayouts = DEFAULT_FRAME_LAYOUTS): DataFrame {
    if (data.length < DATA_FRAME_HEADER_SIZE) {
      throw new DecodeError('Truncated', `Data frame has ${data.length} bytes, header needs ${DATA_FRAME_HEADER_SIZE}`);
    }

    const measurement = data[0];
    if (!isMeasurementType(measurement)) {
      throw new DecodeError('UnknownMeasurementType', `Measurement type 0x${measurement.toString(16)}`);
    }
    if (hint.type !== 'pmd' || hint.measurement !== measurement) {
      throw new DecodeError('TypeMismatch', `Frame carries ${MEASUREMENT_NAMES[measurement]}, expected ${streamKey(hint)}`);
    }

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const timestamp = view.getBigUint64(1, true);
    const frameType = data[9];

    const layout = layouts.get(measurement, frameType);
    if (!layout) {
      throw new DecodeError('UnknownFrameType', `${MEASUREMENT_NAMES[measurement]} frame type 0x${frameType.toString(16)}`);
    }

    const recordSize = layout.fields.reduce<number>((sum, width) => sum + width, 0);
    const payloadSize = data.length - DATA_FRAME_HEADER_SIZE;
    if (payloadSize % recordSize !== 0) {
      throw new DecodeError(
        'TrailingBytes',
        `${payloadSize % recordSize} bytes left after ${Math.floor(payloadSize / recordSize)} ${MEASUREMENT_NAMES[measurement]} records of ${recordSize} bytes`
      );
    }

    const readings: number[][] = [];
    for (let offset = DATA_FRAME_HEADER_SIZE; offset < data.length; offset += recordSize) {
      const reading: number[] = [];
      let fieldOffset = offset;
      for (const width of layout.fields) {
        reading.push(readLE(data, fieldOffset, width, layout.signed));
        fieldOffset += width;
      }
      readings.push(reading);
    }

    return {
      kind: hint,
      timestamp,
      frameType,
      samples: PmdDataParser.toSamples(measurement, readings),
    };
  }

  private static toSamples(measurement: MeasurementType, readings: number[][]): Sample[] {
    if (readings.length === 0) {
      return [];
    }

    switch (measurement) {
      case MeasurementType.Ecg:
        return [{ type: 'ecg', microvolts: readings.map(r => r[0]) }];
      case MeasurementType.Ppg:
        return [{ type: 'ppg', channels: readings }];
      case MeasurementType.Accelerometer:
        return [{ type: 'accelerometer', triples: readings.map(toTriple) }];
      case MeasurementType.Gyroscope:
        return [{ type: 'gyroscope', triples: readings.map(toTriple) }];
      case MeasurementType.Magnetometer:
        return [{ type: 'magnetometer', triples: readings.map(toTriple) }];
      case MeasurementType.Ppi:
        return readings.map((r): Sample => ({ type: 'ppi', hr: r[0], ppiMs: r[1], errorEstimate: r[2], blockerFlags: r[3] }));
    }
  }

  /**
   * Decodes a Heart Rate Measurement notification:
   * [flags][bpm: uint8 | uint16 LE][energy: uint16?][rr: uint16 LE...]
   * RR intervals are converted from 1/1024 s to milliseconds.
   */
  static decodeHeartRate(data: Uint8Array): HeartRateSample {
    if (data.length < 2) {
      throw new DecodeError('Truncated', `Heart rate needs at least 2 bytes, got ${data.length}`);
    }

    const flags = data[0];
    let offset = 1;

    const wideValue = (flags & HEART_RATE_FLAGS.VALUE_UINT16) !== 0;
    const bpmWidth = wideValue ? 2 : 1;
    const energyWidth = (flags & HEART_RATE_FLAGS.ENERGY_EXPENDED) !== 0 ? 2 : 0;
    if (data.length < offset + bpmWidth + energyWidth) {
      throw new DecodeError('Truncated', `Heart rate flags 0x${flags.toString(16)} need ${1 + bpmWidth + energyWidth} bytes, got ${data.length}`);
    }

    const beatsPerMinute = readLE(data, offset, bpmWidth, false);
    offset += bpmWidth + energyWidth;

    const rrIntervals: number[] = [];
    if ((flags & HEART_RATE_FLAGS.RR_INTERVAL) !== 0) {
      for (; offset + 2 <= data.length; offset += 2) {
        const raw = readLE(data, offset, 2, false);
        rrIntervals.push(Math.round((raw * 1000) / RR_UNITS_PER_SECOND));
      }
    }

    if (offset !== data.length) {
      throw new DecodeError('TrailingBytes', `${data.length - offset} bytes left after heart rate measurement`);
    }

    return { type: 'heartRate', beatsPerMinute, rrIntervals };
  }

  /**
   * Decodes a Battery Level notification (one byte, percent)
   */
  static decodeBatteryLevel(data: Uint8Array): number {
    if (data.length < 1) {
      throw new DecodeError('Truncated', 'Battery level notification is empty');
    }
    if (data.length > 1) {
      throw new DecodeError('TrailingBytes', `${data.length - 1} bytes left after battery level`);
    }
    return data[0];
  }

  /**
   * Decodes a Device Information string; trailing NUL padding is dropped
   */
  static decodeText(data: Uint8Array): string {
    return Buffer.from(data).toString('utf8').replace(/\0+$/, '');
  }

  /**
   * Decodes the System ID characteristic as colon-separated hex bytes in wire order
   */
  static decodeSystemId(data: Uint8Array): string {
    if (data.length === 0) {
      throw new DecodeError('Truncated', 'System ID is empty');
    }
    return Array.from(data, byte => byte.toString(16).padStart(2, '0').toUpperCase()).join(':');
  }

  static decodeBodySensorLocation(data: Uint8Array): string {
    if (data.length < 1) {
      throw new DecodeError('Truncated', 'Body sensor location is empty');
    }
    if (data.length > 1) {
      throw new DecodeError('TrailingBytes', `${data.length - 1} bytes left after body sensor location`);
    }
    return BODY_SENSOR_LOCATIONS[data[0]] ?? `Unknown (0x${data[0].toString(16).padStart(2, '0')})`;
  }
}

export const decodeControlResponse = (data: Uint8Array): ControlResponse => PmdDataParser.decodeControlResponse(data);
export const decodeDataFrame = (hint: StreamKind, data: Uint8Array, layouts?: FrameLayouts): DataFrame =>
  PmdDataParser.decodeDataFrame(hint, data, layouts);
export const decodeHeartRate = (data: Uint8Array): HeartRateSample => PmdDataParser.decodeHeartRate(data);
export const decodeBatteryLevel = (data: Uint8Array): number => PmdDataParser.decodeBatteryLevel(data);
