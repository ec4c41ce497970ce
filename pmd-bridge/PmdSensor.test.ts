/**
 * PMD Sensor Tests
 *
 * Drives the facade and the dispatch loop against the in-process mock
 * transport: settings negotiation, streaming, the single outstanding
 * exchange, loop termination and link loss.
 */

import { PmdSensor } from './PmdSensor';
import { MockPmdTransport } from './transports/MockPmdTransport';
import { PmdLogger } from './PmdLogger';
import { DEFAULT_FRAME_LAYOUTS } from './PmdDataParser';
import { ControlOpcode, MeasurementType, SettingKind } from './PmdConstants';
import {
  BATTERY_STREAM,
  DataFrame,
  HEART_RATE_STREAM,
  SessionState,
  StreamKind,
  pmdStream,
} from './PmdTypes';
import { DecodeError, EncodeError, TransportError } from './PmdErrors';
import { PmdTransport } from './interfaces/IPmdTransport';
import { DecodeErrorContext, PmdEventHandler, PmdSensorHandle } from './interfaces/IPmdEventHandler';

// ─────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────

const ECG = pmdStream(MeasurementType.Ecg);
const ACC = pmdStream(MeasurementType.Accelerometer);

// Sample rate {130, 250}, resolution {14}
const SETTINGS_BYTES = [0x00, 0x02, 0x82, 0x00, 0xfa, 0x00, 0x01, 0x01, 0x0e, 0x00];

const ECG_HEADER = [0x00, 0, 0, 0, 0, 0, 0, 0, 0, 0x00];

// Let every queued notification reach the handler
const flush = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

function createSensor(handler: PmdEventHandler = {}, requestTimeoutMs: number = 1000) {
  const transport = new MockPmdTransport();
  const logger = new PmdLogger({ level: 'silent' });
  const sensor = new PmdSensor({ transport, handler, logger, requestTimeoutMs });
  return { transport, logger, sensor };
}

// Answers each command; GetSettings replies advertise SETTINGS_BYTES on Success
function autoRespond(transport: MockPmdTransport, statusFor: (opcode: number) => number = () => 0): void {
  transport.onWrite((data, mock) => {
    const [opcode, measurement] = data;
    const status = statusFor(opcode);
    const settings = opcode === ControlOpcode.GetSettings && status === 0 ? SETTINGS_BYTES : [];
    mock.notify('pmdControl', [0xf0, opcode, measurement, status, 0x00, ...settings]);
  });
}

async function startEcgAt250(sensor: PmdSensor): Promise<void> {
  await sensor.requestSettings(MeasurementType.Ecg);
  await sensor.startMeasurement(MeasurementType.Ecg, [
    { kind: SettingKind.SampleRate, value: 250 },
    { kind: SettingKind.Resolution, value: 14 },
  ]);
}

describe('PmdSensor', () => {
  let controller: AbortController;

  beforeEach(() => {
    controller = new AbortController();
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('ECG session', () => {
    test('settings, start and frames', async () => {
      const onPmd = jest.fn<void, [StreamKind, DataFrame, PmdSensorHandle]>();
      const { transport, sensor } = createSensor({ onPmd });
      autoRespond(transport);

      await sensor.subscribe(ECG);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      await expect(sensor.requestSettings(MeasurementType.Ecg)).resolves.toEqual([
        { kind: SettingKind.SampleRate, values: [130, 250] },
        { kind: SettingKind.Resolution, values: [14] },
      ]);

      await expect(
        sensor.startMeasurement(MeasurementType.Ecg, [{ kind: SettingKind.SampleRate, value: 500 }])
      ).rejects.toMatchObject({ name: 'ProtocolError', reason: 'UnsupportedSetting' });
      expect(transport.writes).toHaveLength(1);

      await sensor.startMeasurement(MeasurementType.Ecg, [
        { kind: SettingKind.SampleRate, value: 250 },
        { kind: SettingKind.Resolution, value: 14 },
      ]);
      expect(transport.writes[1]).toEqual(Uint8Array.from([0x02, 0x00, 0x00, 0x01, 0xfa, 0x00, 0x01, 0x01, 0x0e, 0x00]));
      expect(sensor.sessionState(ECG)).toBe(SessionState.STREAMING);
      expect(sensor.activeStreams()).toEqual([ECG]);

      transport.notify('pmdData', [...ECG_HEADER, 0x64, 0x00, 0x00, 0x9c, 0xff, 0xff]);
      transport.notify('pmdData', [...ECG_HEADER, 0xc8, 0x00, 0x00, 0x38, 0xff, 0xff]);
      await flush();

      expect(onPmd).toHaveBeenCalledTimes(2);
      expect(onPmd.mock.calls.map(([, frame]) => frame.samples)).toEqual([
        [{ type: 'ecg', microvolts: [100, -100] }],
        [{ type: 'ecg', microvolts: [200, -200] }],
      ]);
      expect(onPmd.mock.calls[0][0]).toEqual(ECG);
      expect(onPmd.mock.calls[0][2]).toBe(sensor);

      controller.abort();
      await expect(loop).resolves.toEqual({ reason: 'cancelled', notifications: 4, frames: 2, decodeErrors: 0 });
    });

    test('concurrent GetSettings: the second fails Busy, the first completes', async () => {
      const { transport, sensor } = createSensor();
      await sensor.subscribe(ACC);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      const first = sensor.requestSettings(MeasurementType.Accelerometer);
      const second = sensor.requestSettings(MeasurementType.Ecg);

      await expect(second).rejects.toMatchObject({ name: 'ProtocolError', reason: 'Busy' });
      expect(transport.writes).toEqual([Uint8Array.from([0x01, 0x02])]);

      transport.respond(ControlOpcode.GetSettings, MeasurementType.Accelerometer, 0, [0x00, 0x01, 0x34, 0x00]);
      await expect(first).resolves.toEqual([{ kind: SettingKind.SampleRate, values: [52] }]);

      controller.abort();
      await loop;
    });

    test('stop twice without a start succeeds both times without writing', async () => {
      const { transport, sensor } = createSensor();

      await sensor.stopMeasurement(MeasurementType.Ecg);
      await sensor.stopMeasurement(MeasurementType.Ecg);

      expect(transport.writes).toHaveLength(0);
      expect(sensor.sessionState(ECG)).toBe(SessionState.IDLE);
    });

    test('a second stop after a stopped stream does not contact the device', async () => {
      const { transport, sensor } = createSensor();
      autoRespond(transport);
      await sensor.subscribe(ECG);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      await startEcgAt250(sensor);
      await sensor.stopMeasurement(MeasurementType.Ecg);
      await sensor.stopMeasurement(MeasurementType.Ecg);

      expect(transport.writes).toHaveLength(3);
      expect(transport.writes[2]).toEqual(Uint8Array.from([0x03, 0x00]));
      expect(sensor.sessionState(ECG)).toBe(SessionState.IDLE);

      controller.abort();
      await loop;
    });

    test('a refused Start rejects with the device status', async () => {
      const { transport, sensor } = createSensor();
      autoRespond(transport, opcode => (opcode === ControlOpcode.Start ? 0x0d : 0));
      await sensor.subscribe(ECG);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      await expect(startEcgAt250(sensor)).rejects.toMatchObject({
        name: 'DeviceStatusError',
        status: { name: 'DeviceInCharger', code: 13 },
      });
      expect(sensor.sessionState(ECG)).toBe(SessionState.IDLE);

      controller.abort();
      await loop;
    });

    test('stopAll stops every streaming measurement in turn', async () => {
      const { transport, sensor } = createSensor();
      autoRespond(transport);
      await sensor.subscribe(ECG);
      await sensor.subscribe(ACC);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      await startEcgAt250(sensor);
      await sensor.requestSettings(MeasurementType.Accelerometer);
      await sensor.startMeasurement(MeasurementType.Accelerometer, [{ kind: SettingKind.SampleRate, value: 130 }]);
      expect(sensor.activeStreams()).toEqual([ECG, ACC]);

      await sensor.stopAll();

      expect(transport.writes.slice(-2)).toEqual([Uint8Array.from([0x03, 0x00]), Uint8Array.from([0x03, 0x02])]);
      expect(sensor.activeStreams()).toEqual([]);

      controller.abort();
      await loop;
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('Start validation', () => {
    test('an unsubscribed type fails NotSubscribed without writing', async () => {
      const { transport, sensor } = createSensor();

      await expect(
        sensor.startMeasurement(MeasurementType.Ppg, [{ kind: SettingKind.SampleRate, value: 135 }])
      ).rejects.toMatchObject({ reason: 'NotSubscribed' });
      expect(transport.writes).toHaveLength(0);
    });

    test('unknown settings fail UnsupportedSetting without writing', async () => {
      const { transport, sensor } = createSensor();
      await sensor.subscribe(ECG);

      await expect(
        sensor.startMeasurement(MeasurementType.Ecg, [{ kind: SettingKind.SampleRate, value: 130 }])
      ).rejects.toMatchObject({ reason: 'UnsupportedSetting' });
      expect(transport.writes).toHaveLength(0);
    });

    test('an empty selection fails EmptySettingList and leaves the session idle', async () => {
      const { transport, sensor } = createSensor();
      autoRespond(transport);
      await sensor.subscribe(ECG);
      const loop = sensor.runEventLoop({ signal: controller.signal });
      await sensor.requestSettings(MeasurementType.Ecg);

      const attempt = sensor.startMeasurement(MeasurementType.Ecg, []);

      await expect(attempt).rejects.toBeInstanceOf(EncodeError);
      await expect(attempt).rejects.toMatchObject({ reason: 'EmptySettingList' });
      expect(sensor.sessionState(ECG)).toBe(SessionState.IDLE);
      expect(sensor.registry.outstanding()).toBeNull();

      controller.abort();
      await loop;
    });

    test('a rejected write fails with TransportError and closes the exchange', async () => {
      const { transport, sensor } = createSensor();
      transport.failWrites(new Error('gatt busy'));

      await expect(sensor.requestSettings(MeasurementType.Ecg)).rejects.toThrow('Mock: write rejected');
      expect(sensor.registry.outstanding()).toBeNull();
      expect(sensor.sessionState(ECG)).toBe(SessionState.IDLE);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('Subscriptions', () => {
    test('PMD notifications follow the first and last PMD subscription', async () => {
      const { transport, sensor } = createSensor();

      await sensor.subscribe(ECG);
      await sensor.subscribe(ACC);
      expect(transport.notifyChanges).toEqual([
        { source: 'pmdControl', enabled: true },
        { source: 'pmdData', enabled: true },
      ]);

      await sensor.unsubscribe(ECG);
      expect(transport.isNotifying('pmdData')).toBe(true);

      await sensor.unsubscribe(ACC);
      expect(transport.isNotifying('pmdData')).toBe(false);
      expect(sensor.subscribedStreams()).toEqual([]);
      expect(transport.writes).toHaveLength(0);
    });

    test('Battery toggles its own notifications', async () => {
      const { transport, sensor } = createSensor();

      await sensor.subscribe(BATTERY_STREAM);
      expect(transport.isNotifying('battery')).toBe(true);
      expect(sensor.sessionState(BATTERY_STREAM)).toBe(SessionState.STREAMING);

      await sensor.unsubscribe(BATTERY_STREAM);
      expect(transport.isNotifying('battery')).toBe(false);
      expect(sensor.isSubscribed(BATTERY_STREAM)).toBe(false);
    });

    test('unsubscribing a streaming type stops it first', async () => {
      const { transport, sensor } = createSensor();
      autoRespond(transport);
      await sensor.subscribe(ECG);
      await sensor.subscribe(BATTERY_STREAM);
      const loop = sensor.runEventLoop({ signal: controller.signal });
      await startEcgAt250(sensor);

      await sensor.unsubscribe(ECG);

      expect(transport.writes[transport.writes.length - 1]).toEqual(Uint8Array.from([0x03, 0x00]));
      expect(sensor.sessionState(ECG)).toBe(SessionState.IDLE);
      expect(transport.isNotifying('pmdData')).toBe(false);

      controller.abort();
      await loop;
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('Heart rate and battery', () => {
    test('heart rate values arrive with and without RR intervals', async () => {
      const onHeartRate = jest.fn<void, [number, number[], PmdSensorHandle]>();
      const { transport, sensor } = createSensor({ onHeartRate });
      await sensor.subscribe(HEART_RATE_STREAM);
      expect(transport.notifyChanges).toEqual([{ source: 'heartRate', enabled: true }]);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      transport.notify('heartRate', [0x01, 0x48, 0x00]);
      transport.notify('heartRate', [0x11, 0x48, 0x00, 0x00, 0x04]);
      await flush();

      expect(onHeartRate).toHaveBeenNthCalledWith(1, 72, [], sensor);
      expect(onHeartRate).toHaveBeenNthCalledWith(2, 72, [1000], sensor);

      controller.abort();
      await expect(loop).resolves.toEqual({ reason: 'cancelled', notifications: 2, frames: 2, decodeErrors: 0 });
    });

    test('a callback can issue commands through the sensor handle', async () => {
      const onBattery = jest.fn((_level: number, handle: PmdSensorHandle) => handle.subscribe(HEART_RATE_STREAM));
      const { transport, sensor } = createSensor({ onBattery });
      await sensor.subscribe(BATTERY_STREAM);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      transport.notify('battery', [0x55]);
      await flush();

      expect(onBattery).toHaveBeenCalledWith(85, sensor);
      expect(sensor.isSubscribed(HEART_RATE_STREAM)).toBe(true);

      controller.abort();
      await loop;
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('Dispatch loop', () => {
    test('corrupt notifications are reported and skipped', async () => {
      const onHeartRate = jest.fn<void, [number, number[], PmdSensorHandle]>();
      const onDecodeError = jest.fn<void, [DecodeErrorContext, DecodeError]>();
      const { transport, sensor } = createSensor({ onHeartRate, onDecodeError });
      await sensor.subscribe(HEART_RATE_STREAM);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      transport.notify('heartRate', [0x00]);
      transport.notify('heartRate', [0x00, 0x3c]);
      await flush();

      expect(onDecodeError).toHaveBeenCalledTimes(1);
      const [context, error] = onDecodeError.mock.calls[0];
      expect(context).toEqual({ source: 'heartRate', data: Uint8Array.from([0x00]) });
      expect(error).toBeInstanceOf(DecodeError);
      expect(error.reason).toBe('Truncated');
      expect(onHeartRate).toHaveBeenCalledWith(60, [], sensor);

      controller.abort();
      await expect(loop).resolves.toEqual({ reason: 'cancelled', notifications: 2, frames: 1, decodeErrors: 1 });
    });

    test('malformed PMD data is reported by reason', async () => {
      const onDecodeError = jest.fn<void, [DecodeErrorContext, DecodeError]>();
      const { transport, sensor } = createSensor({ onDecodeError });
      await sensor.subscribe(ECG);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      transport.notify('pmdData', []);
      transport.notify('pmdData', [0x04, 0, 0, 0, 0, 0, 0, 0, 0, 0x00]);
      transport.notify('pmdData', [...ECG_HEADER, 0x01]);
      transport.notify('pmdControl', [0xf0, 0x01]);
      await flush();

      expect(onDecodeError.mock.calls.map(([, error]) => error.reason)).toEqual([
        'Truncated',
        'UnknownMeasurementType',
        'TrailingBytes',
        'Truncated',
      ]);

      controller.abort();
      await expect(loop).resolves.toMatchObject({ notifications: 4, frames: 0, decodeErrors: 4 });
    });

    test('frames of unsubscribed streams are not delivered', async () => {
      const onPmd = jest.fn<void, [StreamKind, DataFrame, PmdSensorHandle]>();
      const { transport, sensor } = createSensor({ onPmd });
      await sensor.subscribe(ECG);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      transport.notify('pmdData', [0x02, 0, 0, 0, 0, 0, 0, 0, 0, 0x01, 0x01, 0x00, 0x02, 0x00, 0x03, 0x00]);
      await flush();

      expect(onPmd).not.toHaveBeenCalled();

      controller.abort();
      await loop;
    });

    test('frame layouts given to the sensor decode extra frame types', async () => {
      const onPmd = jest.fn<void, [StreamKind, DataFrame, PmdSensorHandle]>();
      const transport = new MockPmdTransport();
      const sensor = new PmdSensor({
        transport,
        handler: { onPmd },
        frameLayouts: DEFAULT_FRAME_LAYOUTS.with(MeasurementType.Accelerometer, 0x7f, { fields: [4, 4, 4], signed: true }),
        logger: new PmdLogger({ level: 'silent' }),
      });
      await sensor.subscribe(ACC);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      transport.notify('pmdData', [0x02, 0, 0, 0, 0, 0, 0, 0, 0, 0x7f, 0x01, 0, 0, 0, 0xff, 0xff, 0xff, 0xff, 0x02, 0, 0, 0]);
      await flush();

      expect(onPmd).toHaveBeenCalledTimes(1);
      expect(onPmd.mock.calls[0][1].samples).toEqual([{ type: 'accelerometer', triples: [[1, -1, 2]] }]);

      controller.abort();
      await expect(loop).resolves.toMatchObject({ frames: 1, decodeErrors: 0 });
    });

    test('an unsolicited control response is dropped', async () => {
      const { transport, sensor } = createSensor();
      await sensor.subscribe(ECG);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      transport.respond(ControlOpcode.Stop, MeasurementType.Ecg);
      await flush();

      expect(sensor.sessionState(ECG)).toBe(SessionState.IDLE);

      controller.abort();
      await expect(loop).resolves.toEqual({ reason: 'cancelled', notifications: 1, frames: 0, decodeErrors: 0 });
    });

    test('handler rejections are logged and the loop carries on', async () => {
      const onHeartRate = jest.fn().mockRejectedValue(new Error('handler failed'));
      const { transport, sensor, logger } = createSensor({ onHeartRate });
      const logFailure = jest.spyOn(logger, 'logFailure');
      await sensor.subscribe(HEART_RATE_STREAM);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      transport.notify('heartRate', [0x00, 0x3c]);
      transport.notify('heartRate', [0x00, 0x3d]);
      await flush();

      expect(onHeartRate).toHaveBeenCalledTimes(2);
      expect(logFailure).toHaveBeenCalledTimes(2);
      expect(logFailure).toHaveBeenCalledWith('Handler onHeartRate rejected', expect.any(Error), 'DISPATCH');

      controller.abort();
      await loop;
    });

    test('the stop predicate ends the loop, which can be run again', async () => {
      const shouldStop = jest.fn(() => true);
      const { transport, sensor } = createSensor({ shouldStop });
      await sensor.subscribe(BATTERY_STREAM);

      const first = sensor.runEventLoop();
      transport.notify('battery', [0x50]);
      await expect(first).resolves.toEqual({ reason: 'handlerStopped', notifications: 1, frames: 1, decodeErrors: 0 });

      const second = sensor.runEventLoop();
      transport.notify('battery', [0x4f]);
      await expect(second).resolves.toEqual({ reason: 'handlerStopped', notifications: 1, frames: 1, decodeErrors: 0 });
      expect(shouldStop).toHaveBeenCalledTimes(2);
    });

    test('a cancelled loop resumes with the notification it was waiting for', async () => {
      const onBattery = jest.fn<void, [number, PmdSensorHandle]>();
      const { transport, sensor } = createSensor({ onBattery });
      await sensor.subscribe(BATTERY_STREAM);

      const first = sensor.runEventLoop({ signal: controller.signal });
      controller.abort();
      await expect(first).resolves.toMatchObject({ reason: 'cancelled', notifications: 0 });

      const next = new AbortController();
      const second = sensor.runEventLoop({ signal: next.signal });
      transport.notify('battery', [0x40]);
      await flush();
      expect(onBattery).toHaveBeenCalledWith(64, sensor);

      next.abort();
      await expect(second).resolves.toMatchObject({ reason: 'cancelled', notifications: 1 });
    });

    test('an already aborted signal returns at once', async () => {
      const { sensor } = createSensor();
      await sensor.subscribe(BATTERY_STREAM);
      controller.abort();

      await expect(sensor.runEventLoop({ signal: controller.signal })).resolves.toEqual({
        reason: 'cancelled',
        notifications: 0,
        frames: 0,
        decodeErrors: 0,
      });
    });

    test('fails fast without subscriptions', async () => {
      const { sensor } = createSensor();

      await expect(sensor.runEventLoop()).rejects.toMatchObject({ name: 'ProtocolError', reason: 'NoSubscriptions' });
    });

    test('only one loop runs at a time', async () => {
      const { sensor } = createSensor();
      await sensor.subscribe(BATTERY_STREAM);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      await expect(sensor.runEventLoop()).rejects.toMatchObject({ reason: 'LoopAlreadyRunning' });

      controller.abort();
      await loop;
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('Link loss and teardown', () => {
    test('link loss fails pending requests and resets every session', async () => {
      const { transport, sensor } = createSensor();
      await sensor.subscribe(ECG);
      await sensor.subscribe(HEART_RATE_STREAM);
      const loop = sensor.runEventLoop();

      const pending = sensor.requestSettings(MeasurementType.Ecg);
      const rejection = expect(pending).rejects.toThrow('Link lost while awaiting a control response');
      await flush();
      expect(transport.writes).toHaveLength(1);

      transport.loseLink();

      await rejection;
      await expect(loop).resolves.toEqual({ reason: 'linkLost', notifications: 0, frames: 0, decodeErrors: 0 });
      expect(sensor.subscribedStreams()).toEqual([]);
      expect(sensor.sessionState(ECG)).toBe(SessionState.IDLE);
      expect(sensor.sessionState(HEART_RATE_STREAM)).toBe(SessionState.IDLE);
      expect(sensor.isConnected()).toBe(false);
    });

    test('a request times out and a late answer is ignored', async () => {
      const { transport, sensor } = createSensor({}, 20);
      await sensor.subscribe(ECG);
      const loop = sensor.runEventLoop({ signal: controller.signal });

      await expect(sensor.requestSettings(MeasurementType.Ecg)).rejects.toMatchObject({ reason: 'Timeout' });
      expect(sensor.sessionState(ECG)).toBe(SessionState.IDLE);
      expect(sensor.registry.outstanding()).toBeNull();

      transport.respond(ControlOpcode.GetSettings, MeasurementType.Ecg, 0, SETTINGS_BYTES);
      await flush();
      expect(sensor.registry.advertisedSettings(MeasurementType.Ecg)).toBeNull();

      autoRespond(transport);
      await expect(sensor.requestSettings(MeasurementType.Ecg)).resolves.toHaveLength(2);

      controller.abort();
      await expect(loop).resolves.toEqual({ reason: 'cancelled', notifications: 2, frames: 0, decodeErrors: 0 });
    });

    test('disconnect fails pending requests and resets sessions', async () => {
      const { transport, sensor } = createSensor();
      await sensor.subscribe(ECG);

      const pending = sensor.requestSettings(MeasurementType.Ecg);
      const rejection = expect(pending).rejects.toBeInstanceOf(TransportError);
      await flush();

      await sensor.disconnect();

      await rejection;
      await expect(pending).rejects.toThrow('Disconnected');
      expect(transport.isConnected()).toBe(false);
      expect(sensor.subscribedStreams()).toEqual([]);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  describe('Device information', () => {
    test('reads strings, System ID and body location, missing ones as null', async () => {
      const { transport, sensor } = createSensor();
      transport.setCharacteristic('modelNumber', 'PMD-TEST-1');
      transport.setCharacteristic('manufacturerName', 'Test Manufacturer');
      transport.setCharacteristic('firmwareRevision', '5.0.0\0');
      transport.setCharacteristic('systemId', Uint8Array.from([0x0a, 0x1b, 0x2c, 0xfe, 0xff, 0x3d, 0x4e, 0x5f]));
      transport.setCharacteristic('bodySensorLocation', Uint8Array.from([0x01]));

      await expect(sensor.readDeviceInfo()).resolves.toEqual({
        modelNumber: 'PMD-TEST-1',
        manufacturerName: 'Test Manufacturer',
        hardwareRevision: null,
        firmwareRevision: '5.0.0',
        softwareRevision: null,
        serialNumber: null,
        systemId: '0A:1B:2C:FE:FF:3D:4E:5F',
        bodySensorLocation: 'Chest',
      });
    });

    test('needs a transport that can read', async () => {
      const transport = new MockPmdTransport();
      const readless: PmdTransport = {
        write: data => transport.write(data),
        notifications: () => transport.notifications(),
        isConnected: () => transport.isConnected(),
        disconnect: () => transport.disconnect(),
        setNotify: (source, enabled) => transport.setNotify(source, enabled),
      };
      const sensor = new PmdSensor({ transport: readless, handler: {}, logger: new PmdLogger({ level: 'silent' }) });

      await expect(sensor.readDeviceInfo()).rejects.toBeInstanceOf(TransportError);
    });
  });
});
