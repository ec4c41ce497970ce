/**
 * Mock PMD Transport
 * In-process stand-in for a connected sensor: records every write and lets
 * the caller inject notifications, control responses and link loss.
 */

import {
  NotificationSource,
  PmdNotification,
  PmdTransport,
  ReadableCharacteristic,
} from '../interfaces/IPmdTransport';
import { NotificationChannel } from './NotificationChannel';
import { TransportError } from '../PmdErrors';
import { CONTROL_RESPONSE_MARKER, ControlOpcode, MeasurementType } from '../PmdConstants';

export type WriteListener = (data: Uint8Array, transport: MockPmdTransport) => void;

export class MockPmdTransport implements PmdTransport {
  readonly writes: Uint8Array[] = [];
  readonly notifyChanges: Array<{ source: NotificationSource; enabled: boolean }> = [];

  private channel = new NotificationChannel<PmdNotification>();
  private connected = true;
  private enabledSources = new Set<NotificationSource>();
  private characteristics = new Map<ReadableCharacteristic, Uint8Array>();
  private writeListener: WriteListener | null = null;
  private writeFailure: Error | null = null;

  // ───────────────────────────────────────────────────────────────────────────
  // PmdTransport
  // ───────────────────────────────────────────────────────────────────────────

  async write(data: Uint8Array): Promise<void> {
    if (!this.connected) {
      throw new TransportError('Mock: write on a lost link');
    }
    if (this.writeFailure) {
      throw new TransportError('Mock: write rejected', this.writeFailure);
    }

    const copy = Uint8Array.from(data);
    this.writes.push(copy);
    this.writeListener?.(copy, this);
  }

  notifications(): AsyncIterable<PmdNotification> {
    return this.channel;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async disconnect(): Promise<void> {
    this.loseLink();
  }

  async setNotify(source: NotificationSource, enabled: boolean): Promise<void> {
    if (!this.connected) {
      throw new TransportError(`Mock: cannot change ${source} notifications on a lost link`);
    }
    this.notifyChanges.push({ source, enabled });
    if (enabled) {
      this.enabledSources.add(source);
    } else {
      this.enabledSources.delete(source);
    }
  }

  async read(characteristic: ReadableCharacteristic): Promise<Uint8Array> {
    const value = this.characteristics.get(characteristic);
    if (!value) {
      throw new TransportError(`Mock: ${characteristic} is not readable`);
    }
    return Uint8Array.from(value);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Test controls
  // ───────────────────────────────────────────────────────────────────────────

  // Called synchronously after each accepted write, e.g. to answer commands
  onWrite(listener: WriteListener | null): void {
    this.writeListener = listener;
  }

  failWrites(error: Error | null): void {
    this.writeFailure = error;
  }

  isNotifying(source: NotificationSource): boolean {
    return this.enabledSources.has(source);
  }

  setCharacteristic(characteristic: ReadableCharacteristic, value: Uint8Array | string): void {
    this.characteristics.set(
      characteristic,
      typeof value === 'string' ? new TextEncoder().encode(value) : Uint8Array.from(value)
    );
  }

  notify(source: NotificationSource, data: Uint8Array | number[]): void {
    this.channel.push({ source, data: Uint8Array.from(data) });
  }

  /**
   * Queues a control point response:
   * [0xF0][opcode][type][status][more_available][settings...]
   */
  respond(
    opcode: ControlOpcode,
    measurement: MeasurementType,
    status: number = 0,
    settings: number[] = [],
    moreAvailable: boolean = false
  ): void {
    this.notify('pmdControl', [CONTROL_RESPONSE_MARKER, opcode, measurement, status, moreAvailable ? 1 : 0, ...settings]);
  }

  // Ends the notification sequence; buffered notifications are still delivered
  loseLink(): void {
    this.connected = false;
    this.channel.close();
  }
}
