/**
 * Noble PMD Transport
 * Adapts an already-connected @abandonware/noble peripheral to PmdTransport.
 * Scanning and connecting stay with the caller.
 */

import type { Characteristic, Peripheral } from '@abandonware/noble';
import {
  NotificationSource,
  PmdNotification,
  PmdTransport,
  ReadableCharacteristic,
} from '../interfaces/IPmdTransport';
import { NotificationChannel } from './NotificationChannel';
import { PMD_UUIDS, formatBytes } from '../PmdConstants';
import { TransportError } from '../PmdErrors';
import { PmdLogger, pmdLogger } from '../PmdLogger';

// Noble reports UUIDs lowercase without dashes
const nobleUuid = (uuid: string): string => uuid.replace(/-/g, '').toLowerCase();

const NOTIFY_UUIDS: Record<NotificationSource, string> = {
  pmdControl: PMD_UUIDS.CONTROL_POINT,
  pmdData: PMD_UUIDS.DATA,
  heartRate: PMD_UUIDS.HEART_RATE_MEASUREMENT,
  battery: PMD_UUIDS.BATTERY_LEVEL,
};

const READ_UUIDS: Record<ReadableCharacteristic, string> = {
  modelNumber: PMD_UUIDS.MODEL_NUMBER,
  manufacturerName: PMD_UUIDS.MANUFACTURER_NAME,
  hardwareRevision: PMD_UUIDS.HARDWARE_REVISION,
  firmwareRevision: PMD_UUIDS.FIRMWARE_REVISION,
  softwareRevision: PMD_UUIDS.SOFTWARE_REVISION,
  serialNumber: PMD_UUIDS.SERIAL_NUMBER,
  systemId: PMD_UUIDS.SYSTEM_ID,
  bodySensorLocation: PMD_UUIDS.BODY_SENSOR_LOCATION,
};

export class NoblePmdTransport implements PmdTransport {
  private channel = new NotificationChannel<PmdNotification>();
  private dataHandlers = new Map<NotificationSource, (data: Buffer) => void>();
  private connected: boolean;

  private constructor(
    private readonly peripheral: Peripheral,
    private readonly characteristics: Map<string, Characteristic>,
    private readonly logger: PmdLogger
  ) {
    this.connected = peripheral.state === 'connected';
    this.peripheral.once('disconnect', () => this.handleDisconnect());
  }

  /**
   * Discovers the PMD, heart rate, battery and device information
   * characteristics of a connected peripheral.
   * @throws TransportError if the peripheral is not connected or lacks the PMD characteristics
   */
  static async fromPeripheral(peripheral: Peripheral, logger: PmdLogger = pmdLogger): Promise<NoblePmdTransport> {
    if (peripheral.state !== 'connected') {
      throw new TransportError(`Peripheral ${peripheral.id} is ${peripheral.state}`);
    }

    const serviceUuids = [
      PMD_UUIDS.SERVICE,
      PMD_UUIDS.HEART_RATE_SERVICE,
      PMD_UUIDS.BATTERY_SERVICE,
      PMD_UUIDS.DEVICE_INFORMATION_SERVICE,
    ].map(nobleUuid);
    const characteristicUuids = [...Object.values(NOTIFY_UUIDS), ...Object.values(READ_UUIDS)].map(nobleUuid);

    let discovered: Characteristic[];
    try {
      const startTime = Date.now();
      const result = await peripheral.discoverSomeServicesAndCharacteristicsAsync(serviceUuids, characteristicUuids);
      discovered = result.characteristics;
      logger.debug(`Characteristic discovery took ${Date.now() - startTime}ms`, { count: discovered.length }, 'TRANSPORT');
    } catch (error) {
      throw new TransportError(`Characteristic discovery failed on ${peripheral.id}`, error);
    }

    const characteristics = new Map(discovered.map(c => [nobleUuid(c.uuid), c] as const));
    for (const required of [PMD_UUIDS.CONTROL_POINT, PMD_UUIDS.DATA]) {
      if (!characteristics.has(nobleUuid(required))) {
        throw new TransportError(
          `Required PMD characteristic ${required} not found. Available: ${Array.from(characteristics.keys()).join(', ')}`
        );
      }
    }

    return new NoblePmdTransport(peripheral, characteristics, logger);
  }

  private characteristic(uuid: string): Characteristic {
    const characteristic = this.characteristics.get(nobleUuid(uuid));
    if (!characteristic) {
      throw new TransportError(`Characteristic ${uuid} not available on ${this.peripheral.id}`);
    }
    return characteristic;
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this.connected) {
      throw new TransportError('Write on a disconnected peripheral');
    }
    try {
      await this.characteristic(PMD_UUIDS.CONTROL_POINT).writeAsync(Buffer.from(data), false);
      this.logger.debug(`Wrote ${formatBytes(data)}`, undefined, 'TRANSPORT');
    } catch (error) {
      throw new TransportError('Control point write failed', error);
    }
  }

  notifications(): AsyncIterable<PmdNotification> {
    return this.channel;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async setNotify(source: NotificationSource, enabled: boolean): Promise<void> {
    const characteristic = this.characteristic(NOTIFY_UUIDS[source]);

    try {
      if (enabled && !this.dataHandlers.has(source)) {
        const handler = (data: Buffer) => {
          this.channel.push({ source, data: Uint8Array.from(data) });
        };
        characteristic.on('data', handler);
        this.dataHandlers.set(source, handler);
        await characteristic.subscribeAsync();
      } else if (!enabled) {
        const handler = this.dataHandlers.get(source);
        if (handler) {
          characteristic.removeListener('data', handler);
          this.dataHandlers.delete(source);
        }
        await characteristic.unsubscribeAsync();
      }
    } catch (error) {
      throw new TransportError(`Could not ${enabled ? 'enable' : 'disable'} ${source} notifications`, error);
    }
  }

  async read(name: ReadableCharacteristic): Promise<Uint8Array> {
    try {
      return Uint8Array.from(await this.characteristic(READ_UUIDS[name]).readAsync());
    } catch (error) {
      throw new TransportError(`Read of ${name} failed`, error);
    }
  }

  async disconnect(): Promise<void> {
    if (this.peripheral.state === 'connected') {
      try {
        await this.peripheral.disconnectAsync();
      } catch (error) {
        throw new TransportError(`Disconnect of ${this.peripheral.id} failed`, error);
      }
    }
    this.handleDisconnect();
  }

  private handleDisconnect(): void {
    if (!this.connected && this.channel.isClosed()) return;

    this.connected = false;
    for (const [source, handler] of this.dataHandlers) {
      this.characteristics.get(nobleUuid(NOTIFY_UUIDS[source]))?.removeListener('data', handler);
    }
    this.dataHandlers.clear();
    this.channel.close();
    this.logger.info(`Peripheral ${this.peripheral.id} disconnected`, undefined, 'TRANSPORT');
  }
}
