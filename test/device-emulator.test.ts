// test/device-emulator.test.ts

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NotConnectedError, ValidationError } from '../src/errors.js';
import { MassDeviceEmulator } from '../src/device-emulator/device-emulator.js';
import { DefaultSampleGenerator } from '../src/samples/sample-generator.js';
import { encodeText } from '../src/utils/utils.js';
import { DeviceState } from '../src/device-state/device-state.js';
import {
  FakeTransport,
  FIXED_NOW_TEXT,
  TEST_METER,
  createState,
  encodeRequest,
  fixedClock,
  quietLogger,
} from './helpers.js';

const INBOUND = 'mass/server/to_device';
const OUTBOUND = 'mass/device/to_server';

let transport: FakeTransport;
let state: DeviceState;
let emulator: MassDeviceEmulator;

beforeEach(async () => {
  transport = new FakeTransport();
  state = createState();
  emulator = new MassDeviceEmulator({
    transport,
    state,
    samples: new DefaultSampleGenerator(7),
    clock: fixedClock,
    logger: quietLogger(),
  });
  await emulator.start();
  await vi.waitFor(() => expect(transport.published).toHaveLength(1));
});

afterEach(async () => {
  await emulator.stop();
});

describe('MassDeviceEmulator', () => {
  it('subscribes and announces itself on connect', () => {
    expect(transport.subscriptions).toEqual([INBOUND]);
    const [identification] = transport.envelopes();
    expect(identification).toMatchObject({
      function: 'identification',
      device: { flag: 'XYZ', serialNumber: '0123456789ABCDE' },
      notification: { registered: false, deviceDate: FIXED_NOW_TEXT },
    });
    expect(transport.published[0]?.topic).toBe(OUTBOUND);
  });

  it('announces itself again after a reconnect', async () => {
    transport.clear();
    transport.setOpen(false);
    transport.setOpen(true);
    await vi.waitFor(() => expect(transport.published).toHaveLength(1));
    expect(transport.envelopes()[0]?.function).toBe('identification');
    expect(transport.subscriptions).toEqual([INBOUND, INBOUND]);
  });

  it('acknowledges a request before answering it', async () => {
    transport.clear();
    await emulator.handleFrame(INBOUND, encodeRequest({ function: 'heartbeat', referenceId: 'h1' }));
    const envelopes = transport.envelopes();
    expect(envelopes.map(envelope => envelope.function)).toEqual(['ack', 'heartbeat']);
    expect(envelopes.every(envelope => envelope.referenceId === 'h1')).toBe(true);
    expect(envelopes[1]?.response).toEqual({ signal: 13, deviceDate: FIXED_NOW_TEXT, cpuTemp: 17 });
  });

  it('publishes routing properties with every frame', async () => {
    transport.clear();
    await emulator.handleFrame(INBOUND, encodeRequest({ function: 'heartbeat', referenceId: 'h2' }));
    expect(transport.published[1]?.metadata.userProperties).toEqual({
      'device.flag': 'XYZ',
      'device.serialNumber': '0123456789ABCDE',
      function: 'heartbeat',
      referenceId: 'h2',
    });
  });

  it('registers the unit through configuration', async () => {
    transport.clear();
    await emulator.handleFrame(
      INBOUND,
      encodeRequest({
        device: { flag: 'XYZ', serialNumber: '0123456789ABCDE' },
        function: 'configuration',
        referenceId: 'c1',
        request: { registered: true },
      })
    );
    expect(transport.envelopes().map(envelope => envelope.function)).toEqual([
      'ack',
      'notification',
      'configuration',
    ]);
    expect((await emulator.getSnapshot()).telemetry.registered).toBe(true);
  });

  it('drops a malformed frame without replying', async () => {
    transport.clear();
    await emulator.handleFrame(INBOUND, encodeText('#99${}'));
    await emulator.handleFrame(INBOUND, encodeText('not a frame'));
    expect(transport.published).toEqual([]);
  });

  it('ignores frames on other topics', async () => {
    transport.clear();
    await emulator.handleFrame('some/other/topic', encodeRequest({ function: 'heartbeat', referenceId: 'x' }));
    expect(transport.published).toEqual([]);
  });

  it('handles frames delivered by the transport', async () => {
    transport.clear();
    transport.deliver(INBOUND, encodeRequest({ function: 'directive', referenceId: 'd1' }));
    await vi.waitFor(() => expect(transport.published).toHaveLength(2));
    expect(transport.envelopes()[1]?.response).toEqual({ status: 'accepted' });
  });

  it('survives a failing publish', async () => {
    transport.failPublishes = true;
    await expect(
      emulator.handleFrame(INBOUND, encodeRequest({ function: 'heartbeat', referenceId: 'h3' }))
    ).resolves.toBeUndefined();
  });

  it('pushes an alarm as one message under a fresh id', async () => {
    transport.clear();
    const [pushed] = await emulator.triggerAlarm({
      type: 'danger',
      level: 'critical',
      incidentCode: 278,
      description: 'cover opened',
    });
    const envelopes = transport.envelopes();
    expect(envelopes).toHaveLength(1);
    expect(envelopes[0]).toMatchObject({
      function: 'alarm',
      messageStatus: 'success',
      referenceId: pushed?.referenceId,
      notification: [{ type: 'danger', level: 'critical', incidentCode: 278, date: FIXED_NOW_TEXT }],
    });
    expect(pushed?.referenceId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('publishes nothing for an invalid trigger', async () => {
    transport.clear();
    await expect(emulator.triggerRelay({ id: 4, state: 'on' })).rejects.toBeInstanceOf(ValidationError);
    await expect(emulator.triggerAlarm({})).rejects.toBeInstanceOf(ValidationError);
    expect(transport.published).toEqual([]);
  });

  it('changes state without publishing', async () => {
    transport.clear();
    await emulator.addMeter(TEST_METER);
    expect(await emulator.applyTelemetry({ cpuTemp: 40 })).toEqual(['cpuTemp']);
    const snapshot = await emulator.getSnapshot();
    expect(snapshot.meters).toEqual([TEST_METER]);
    expect(snapshot.telemetry.cpuTemp).toBe(40);
    expect(transport.published).toEqual([]);
  });

  it('refuses to push while disconnected', async () => {
    await emulator.stop();
    expect(emulator.isConnected()).toBe(false);
    await expect(emulator.triggerHeartbeat()).rejects.toBeInstanceOf(NotConnectedError);
  });

  it('writes through an attached meter', async () => {
    await emulator.addMeter(TEST_METER);
    transport.clear();
    await emulator.triggerWrite({ meter: { serialNumber: '12345678' }, obisCode: '0.9.1', value: '12:00:00' });
    expect(transport.envelopes()[0]?.notification).toMatchObject({ obisCode: '0.9.1', result: 'success' });
  });

  it.each([-1, 2_147_483_648])('rejects a response delay of %sms', responseDelay => {
    expect(
      () =>
        new MassDeviceEmulator({
          transport: new FakeTransport(),
          state: createState(),
          responseDelay,
          logger: quietLogger(),
        })
    ).toThrow(RangeError);
  });
});
