/**
 * PMD error taxonomy
 *
 * TransportError    - link level, surfaced to the caller
 * DecodeError       - malformed payload, reported and skipped by the dispatch loop
 * EncodeError       - command could not be built
 * ProtocolError     - caller-facing misuse or lifecycle violation
 * DeviceStatusError - device answered with a non-Success status
 */

import type { ControlResponse, ControlStatus } from './PmdTypes';
import { OPCODE_NAMES, MEASUREMENT_NAMES } from './PmdConstants';

export abstract class PmdError extends Error {
  abstract readonly reason: string;
}

export class TransportError extends PmdError {
  readonly reason = 'Transport';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

export type DecodeErrorReason =
  | 'Truncated'
  | 'MalformedSettings'
  | 'TypeMismatch'
  | 'TrailingBytes'
  | 'UnexpectedMarker'
  | 'UnknownOpcode'
  | 'UnknownMeasurementType'
  | 'UnknownFrameType';

export class DecodeError extends PmdError {
  constructor(public readonly reason: DecodeErrorReason, message: string) {
    super(`${reason}: ${message}`);
    this.name = 'DecodeError';
  }
}

export type EncodeErrorReason = 'EmptySettingList' | 'ValueOutOfRange';

export class EncodeError extends PmdError {
  constructor(public readonly reason: EncodeErrorReason, message: string) {
    super(`${reason}: ${message}`);
    this.name = 'EncodeError';
  }
}

export type ProtocolErrorReason =
  | 'Busy'
  | 'Mismatch'
  | 'UnsupportedSetting'
  | 'NoSubscriptions'
  | 'NotSubscribed'
  | 'Timeout'
  | 'LoopAlreadyRunning';

export class ProtocolError extends PmdError {
  constructor(public readonly reason: ProtocolErrorReason, message: string) {
    super(`${reason}: ${message}`);
    this.name = 'ProtocolError';
  }
}

export class DeviceStatusError extends PmdError {
  readonly reason = 'DeviceStatus';
  readonly status: ControlStatus;

  constructor(public readonly response: ControlResponse) {
    super(
      `${OPCODE_NAMES[response.opcode]} ${MEASUREMENT_NAMES[response.measurement]} rejected by device: ` +
      `${response.status.name} (0x${response.status.code.toString(16).padStart(2, '0')})`
    );
    this.name = 'DeviceStatusError';
    this.status = response.status;
  }
}

export function isPmdError(error: unknown): error is PmdError {
  return error instanceof PmdError;
}
