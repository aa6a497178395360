// test/function-router.test.ts

import { beforeEach, describe, expect, it } from 'vitest';
import { DuplicateHandlerError, UnknownFunctionError, ValidationError } from '../src/errors.js';
import { DeviceState } from '../src/device-state/device-state.js';
import { FunctionRouter } from '../src/functions/function-router.js';
import { registerDefaultHandlers } from '../src/functions/handlers.js';
import { heartbeatHandler } from '../src/functions/heartbeat.js';
import { DefaultSampleGenerator } from '../src/samples/sample-generator.js';
import { FIXED_NOW_TEXT, createState, fixedClock, quietLogger } from './helpers.js';

const device = { flag: 'XYZ', serialNumber: '0123456789ABCDE' };

let state: DeviceState;
let router: FunctionRouter;

beforeEach(() => {
  state = createState();
  router = registerDefaultHandlers(
    new FunctionRouter({
      state,
      samples: new DefaultSampleGenerator(7),
      clock: fixedClock,
      logger: quietLogger(),
    })
  );
});

describe('FunctionRouter.dispatch', () => {
  it('acknowledges identification and answers under the same id', async () => {
    const { ack, replies } = await router.dispatch({ function: 'identification', referenceId: 'r1' });
    expect(ack).toEqual({ device, function: 'ack', referenceId: 'r1', streaming: false });
    expect(replies).toHaveLength(1);
    expect(replies[0]).toMatchObject({
      device,
      function: 'identification',
      referenceId: 'r1',
      streaming: false,
      response: { registered: false, deviceDate: FIXED_NOW_TEXT },
    });
  });

  it('emits ack, notification and response for configuration', async () => {
    const { ack, replies } = await router.dispatch({
      device,
      function: 'configuration',
      referenceId: 'r2',
      request: { registered: true },
    });
    expect(ack?.function).toBe('ack');
    expect(replies.map(reply => [reply.function, reply.referenceId])).toEqual([
      ['notification', 'r2'],
      ['configuration', 'r2'],
    ]);
    expect(replies[0]?.notification).toMatchObject({ fields: ['registered'] });
    expect(replies[1]?.response).toEqual({ updated: ['registered'] });

    const next = await router.dispatch({ function: 'identification', referenceId: 'r3' });
    expect(next.replies[0]?.response).toMatchObject({ registered: true });
  });

  it('registers the unit and sets its clock in one request', async () => {
    const { ack, replies } = await router.dispatch({
      device,
      function: 'configuration',
      referenceId: 'r2',
      request: { registered: true, deviceDate: '2024-10-21 10:30:00' },
    });
    expect(ack?.referenceId).toBe('r2');
    expect(replies[0]?.notification).toEqual({
      type: 'info',
      message: 'Configuration updated',
      fields: ['registered', 'deviceDate'],
      ignored: [],
      date: '2024-10-21 10:30:00',
    });
    const snapshot = await state.getSnapshot();
    expect(snapshot.telemetry.registered).toBe(true);
    expect(snapshot.deviceDate).toBe('2024-10-21 10:30:00');
  });

  it('addresses replies with the identity the handler set', async () => {
    const { ack, replies } = await router.dispatch({
      function: 'configuration',
      referenceId: 'r4',
      request: { flag: 'ABC' },
    });
    expect(ack?.device.flag).toBe('XYZ');
    expect(replies.every(reply => reply.device.flag === 'ABC')).toBe(true);
  });

  it('only acknowledges an unknown function', async () => {
    const result = await router.dispatch({ function: 'selfDestruct', referenceId: 'r5' });
    expect(result.ack?.referenceId).toBe('r5');
    expect(result.replies).toEqual([]);
  });

  it('treats alarm from the server as unknown', async () => {
    const result = await router.dispatch({
      function: 'alarm',
      referenceId: 'r6',
      request: { type: 'alarm', level: 'info', incidentCode: 1, description: 'x' },
    });
    expect(result.replies).toEqual([]);
  });

  it('turns a validation failure into a fail reply', async () => {
    const { replies } = await router.dispatch({
      function: 'read',
      referenceId: 'r7',
      request: { directive: 'readout', meter: { serialNumber: '404' } },
    });
    expect(replies).toEqual([
      {
        device,
        function: 'read',
        referenceId: 'r7',
        streaming: false,
        messageStatus: 'fail',
        response: { failCode: 104, failDescrition: 'meter 404 is not attached' },
      },
    ]);
  });

  it('reports a duplicate entry with its own code', async () => {
    const request = { operation: 'add', schedules: [{ id: 1 }] };
    await router.dispatch({ function: 'schedule', referenceId: 'r8', request });
    const { replies } = await router.dispatch({ function: 'schedule', referenceId: 'r9', request });
    expect(replies[0]?.response).toEqual({ failCode: 103, failDescrition: 'schedules entry 1 already exists' });
  });

  it('maps unexpected handler errors to an internal error', async () => {
    router.register({
      name: 'explode',
      handle() {
        throw new Error('boom');
      },
    });
    const { replies } = await router.dispatch({ function: 'explode', referenceId: 'r10' });
    expect(replies[0]?.response).toEqual({ failCode: 199, failDescrition: 'Internal device error' });
  });

  it('produces nothing for an acknowledgment from the server', async () => {
    expect(await router.dispatch({ function: 'ack', referenceId: 'r11' })).toEqual({ ack: null, replies: [] });
  });
});

describe('FunctionRouter.register', () => {
  it('refuses a second handler for the same function', () => {
    expect(() => router.register(heartbeatHandler)).toThrow(DuplicateHandlerError);
  });

  it('knows every protocol function', () => {
    expect(router.functionNames().sort()).toEqual(
      [
        'alarm',
        'configuration',
        'directive',
        'firmwareUpdate',
        'heartbeat',
        'identification',
        'log',
        'notification',
        'profile',
        'read',
        'relay',
        'reset',
        'schedule',
        'write',
      ].sort()
    );
  });
});

describe('FunctionRouter.invoke', () => {
  it('pushes under a fresh id as a notification', async () => {
    const [first] = await router.invoke('heartbeat');
    const [second] = await router.invoke('heartbeat');
    expect(first?.notification).toEqual({ signal: 13, deviceDate: FIXED_NOW_TEXT, cpuTemp: 17 });
    expect(first?.response).toBeUndefined();
    expect(first?.referenceId).not.toBe(second?.referenceId);
  });

  it('shares one id across a multi-message push', async () => {
    const envelopes = await router.invoke('configuration', { signal: 5 });
    expect(envelopes).toHaveLength(2);
    expect(envelopes[0]?.referenceId).toBe(envelopes[1]?.referenceId);
  });

  it('raises validation errors instead of replying', async () => {
    await expect(router.invoke('alarm', { type: 'alarm' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('raises for an unregistered function', async () => {
    await expect(router.invoke('nothing')).rejects.toBeInstanceOf(UnknownFunctionError);
  });
});
