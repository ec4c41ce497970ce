/**
 * PMD Bridge Constants - Polar Measurement Data protocol
 */

export const PMD_UUIDS = {
  // Polar Measurement Data service
  SERVICE: 'fb005c80-02e7-f387-1cad-8acd2d8df0c8',
  CONTROL_POINT: 'fb005c81-02e7-f387-1cad-8acd2d8df0c8', // Read | Write | Indicate
  DATA: 'fb005c82-02e7-f387-1cad-8acd2d8df0c8',          // Notify

  // Standard GATT services / characteristics (16-bit short form)
  HEART_RATE_SERVICE: '180d',
  HEART_RATE_MEASUREMENT: '2a37',
  BODY_SENSOR_LOCATION: '2a38',
  BATTERY_SERVICE: '180f',
  BATTERY_LEVEL: '2a19',
  DEVICE_INFORMATION_SERVICE: '180a',
  SYSTEM_ID: '2a23',
  MODEL_NUMBER: '2a24',
  SERIAL_NUMBER: '2a25',
  FIRMWARE_REVISION: '2a26',
  HARDWARE_REVISION: '2a27',
  SOFTWARE_REVISION: '2a28',
  MANUFACTURER_NAME: '2a29',
} as const;

export enum ControlOpcode {
  GetSettings = 0x01,
  Start = 0x02,
  Stop = 0x03,
}

export enum MeasurementType {
  Ecg = 0x00,
  Ppg = 0x01,
  Accelerometer = 0x02,
  Ppi = 0x03,
  Gyroscope = 0x05,
  Magnetometer = 0x06,
}

export enum SettingKind {
  SampleRate = 0x00,
  Resolution = 0x01,
  Range = 0x02,
  RangeMilliunit = 0x03,
  Channels = 0x04,
}

export const CONTROL_RESPONSE_MARKER = 0xf0;

// [marker][opcode][type][status][more_available]
export const CONTROL_RESPONSE_HEADER_SIZE = 5;

// [type][timestamp:8][frame_type]
export const DATA_FRAME_HEADER_SIZE = 10;

export const CONTROL_STATUS_NAMES = [
  'Success',
  'InvalidOpCode',
  'InvalidMeasurementType',
  'NotSupported',
  'InvalidLength',
  'InvalidParameter',
  'AlreadyInState',
  'InvalidResolution',
  'InvalidSampleRate',
  'InvalidRange',
  'InvalidMtu',
  'InvalidNumberOfChannels',
  'DeviceInCharacteristicReadState',
  'DeviceInCharger',
] as const;

export const MEASUREMENT_NAMES: Record<MeasurementType, string> = {
  [MeasurementType.Ecg]: 'ECG',
  [MeasurementType.Ppg]: 'PPG',
  [MeasurementType.Accelerometer]: 'ACC',
  [MeasurementType.Ppi]: 'PPI',
  [MeasurementType.Gyroscope]: 'GYRO',
  [MeasurementType.Magnetometer]: 'MAG',
};

export const OPCODE_NAMES: Record<ControlOpcode, string> = {
  [ControlOpcode.GetSettings]: 'GetSettings',
  [ControlOpcode.Start]: 'Start',
  [ControlOpcode.Stop]: 'Stop',
};

// Heart Rate Measurement flag bits (GATT Heart Rate profile)
export const HEART_RATE_FLAGS = {
  VALUE_UINT16: 0x01,
  ENERGY_EXPENDED: 0x08,
  RR_INTERVAL: 0x10,
} as const;

// RR intervals arrive in 1/1024 s units
export const RR_UNITS_PER_SECOND = 1024;

export const TIMING = {
  REQUEST_TIMEOUT: 5000, // Control point round trip
} as const;

export const BODY_SENSOR_LOCATIONS: Record<number, string> = {
  0: 'Other',
  1: 'Chest',
  2: 'Wrist',
  3: 'Finger',
  4: 'Hand',
  5: 'Ear Lobe',
  6: 'Foot',
};

export function isMeasurementType(value: number): value is MeasurementType {
  return value in MEASUREMENT_NAMES;
}

export function isControlOpcode(value: number): value is ControlOpcode {
  return value in OPCODE_NAMES;
}

export function isSettingKind(value: number): value is SettingKind {
  return value >= SettingKind.SampleRate && value <= SettingKind.Channels;
}

export function formatBytes(data: Uint8Array): string {
  return `[${Array.from(data).map(b => '0x' + b.toString(16).padStart(2, '0')).join(', ')}]`;
}
