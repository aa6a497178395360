// test/message-builder.test.ts

import { describe, expect, it } from 'vitest';
import {
  createAck,
  createEnvelope,
  createFailMessage,
  createHeader,
  createRoutingProperties,
  newReferenceId,
} from '../src/message-builder.js';
import { MassFailCode } from '../src/constants/constants.js';

const device = { flag: 'XYZ', serialNumber: '0123456789ABCDE' };

describe('message builder', () => {
  it('echoes the given reference id', () => {
    expect(createHeader(device, 'read', 'r1')).toEqual({
      device,
      function: 'read',
      referenceId: 'r1',
      streaming: false,
    });
  });

  it('mints distinct UUIDs for pushes', () => {
    const a = createHeader(device, 'heartbeat');
    const b = createHeader(device, 'heartbeat');
    expect(a.referenceId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(a.referenceId).not.toBe(b.referenceId);
    expect(newReferenceId()).not.toBe(newReferenceId());
  });

  it('copies the device block', () => {
    const source = { ...device };
    const header = createHeader(source, 'read', 'r1');
    source.flag = 'ABC';
    expect(header.device.flag).toBe('XYZ');
  });

  it('builds a bare acknowledgment', () => {
    expect(createAck(device, 'r2')).toEqual({
      device,
      function: 'ack',
      referenceId: 'r2',
      streaming: false,
    });
  });

  it('places bodies under response or notification', () => {
    const response = createEnvelope(device, { function: 'log', kind: 'response', body: [] }, 'r3');
    expect(response.response).toEqual([]);
    expect(response.notification).toBeUndefined();

    const notification = createEnvelope(
      device,
      { function: 'reset', kind: 'notification', body: { type: 'info' } },
      'r4'
    );
    expect(notification.notification).toEqual({ type: 'info' });
    expect(notification.response).toBeUndefined();
  });

  it('builds a fail reply with the wire spelling of failDescrition', () => {
    const envelope = createEnvelope(device, createFailMessage('read', MassFailCode.UNKNOWN_METER), 'r5');
    expect(envelope).toEqual({
      device,
      function: 'read',
      referenceId: 'r5',
      streaming: false,
      messageStatus: 'fail',
      response: { failCode: 104, failDescrition: 'Unknown meter' },
    });
  });

  it('derives MQTT user properties from the header', () => {
    expect(createRoutingProperties(createHeader(device, 'alarm', 'r6'))).toEqual({
      'device.flag': 'XYZ',
      'device.serialNumber': '0123456789ABCDE',
      function: 'alarm',
      referenceId: 'r6',
    });
  });
});
