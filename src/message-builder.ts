// src/message-builder.ts

import { v4 as uuidv4 } from 'uuid';
import { FUNCTION_NAMES, MassFailCode, MASS_FAIL_MESSAGES } from './constants/constants.js';
import {
  DeviceAddress,
  Envelope,
  EnvelopeHeader,
  OutboundMessage,
  RoutingProperties,
} from './types/mass-types.js';

/**
 * Mints a fresh correlation id for an unsolicited push.
 */
export function newReferenceId(): string {
  return uuidv4();
}

/**
 * Builds the header fields shared by every outbound envelope.
 * The device block is copied so later identity changes never leak into
 * an envelope that was already built.
 */
export function createHeader(
  device: DeviceAddress,
  fn: string,
  referenceId: string = newReferenceId(),
  streaming: boolean = false
): EnvelopeHeader {
  return {
    device: { flag: device.flag, serialNumber: device.serialNumber },
    function: fn,
    referenceId,
    streaming,
  };
}

export function createAck(device: DeviceAddress, referenceId: string): Envelope {
  return createHeader(device, FUNCTION_NAMES.ACK, referenceId);
}

/**
 * Wraps a handler payload into a full envelope under its `response` or `notification` key.
 */
export function createEnvelope(
  device: DeviceAddress,
  message: OutboundMessage,
  referenceId: string
): Envelope {
  const envelope: Envelope = createHeader(device, message.function, referenceId);
  if (message.messageStatus) envelope.messageStatus = message.messageStatus;
  if (message.kind === 'notification') {
    envelope.notification = message.body;
  } else {
    envelope.response = message.body;
  }
  return envelope;
}

/**
 * Fail reply: `messageStatus: "fail"` and a `{failCode, failDescrition}` body.
 * The field spelling `failDescrition` is the one clients expect on the wire.
 */
export function createFailMessage(
  fn: string,
  failCode: MassFailCode,
  description: string = MASS_FAIL_MESSAGES[failCode]
): OutboundMessage {
  return {
    function: fn,
    kind: 'response',
    messageStatus: 'fail',
    body: { failCode, failDescrition: description },
  };
}

/**
 * MQTT v5 user properties published alongside a frame.
 */
export function createRoutingProperties(envelope: EnvelopeHeader): RoutingProperties {
  return {
    'device.flag': envelope.device.flag,
    'device.serialNumber': envelope.device.serialNumber,
    function: envelope.function,
    referenceId: envelope.referenceId,
  };
}
