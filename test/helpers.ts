// test/helpers.ts

import Logger from '../src/logger.js';
import { NotConnectedError } from '../src/errors.js';
import { EnvelopeCodec } from '../src/framers/envelope-codec.js';
import { DeviceState, DeviceStore } from '../src/device-state/device-state.js';
import { DefaultSampleGenerator } from '../src/samples/sample-generator.js';
import { HandlerContext } from '../src/functions/function-handler.js';
import {
  ConnectionStateHandler,
  DeviceIdentity,
  InboundEnvelope,
  MessageHandler,
  MessageTransport,
  MeterDescriptor,
  PublishMetadata,
} from '../src/types/mass-types.js';

export const FIXED_NOW = new Date(Date.UTC(2024, 9, 21, 10, 0, 0));
export const FIXED_NOW_TEXT = '2024-10-21 10:00:00';
export const fixedClock = () => new Date(FIXED_NOW.getTime());

export const TEST_IDENTITY: DeviceIdentity = {
  flag: 'XYZ',
  serialNumber: '0123456789ABCDE',
  brand: 'SimulatorBrand',
  model: 'SimV1.0',
  protocolVersion: '1.0.0',
  firmware: '1.01',
  manufactureDate: '2023-05-23',
};

export const TEST_METER: MeterDescriptor = {
  protocol: 'IEC62056-21',
  type: 'electricity',
  brand: 'EMH',
  serialNumber: '12345678',
  serialPort: 'rs485-1',
  initBaud: 300,
  fixBaud: false,
  frame: '7E1',
};

export function quietLogger(): Logger {
  const logger = new Logger();
  logger.disableColors();
  logger.disable();
  return logger;
}

export function createStore(): DeviceStore {
  return new DeviceStore({ identity: TEST_IDENTITY, clock: fixedClock });
}

export function createState(): DeviceState {
  return new DeviceState({ identity: TEST_IDENTITY, clock: fixedClock });
}

export function createContext(): HandlerContext {
  return {
    clock: fixedClock,
    samples: new DefaultSampleGenerator(7),
    logger: quietLogger().createLogger('test'),
  };
}

export interface PublishedMessage {
  topic: string;
  payload: Uint8Array;
  metadata: PublishMetadata;
}

/**
 * In-process stand-in for the broker connection.
 */
export class FakeTransport implements MessageTransport {
  published: PublishedMessage[] = [];
  subscriptions: string[] = [];
  failPublishes: boolean = false;
  private open: boolean = false;
  private messageHandler: MessageHandler | null = null;
  private connectionStateHandler: ConnectionStateHandler | null = null;
  private readonly codec = new EnvelopeCodec();

  get isOpen(): boolean {
    return this.open;
  }

  async connect(): Promise<void> {
    this.setOpen(true);
  }

  async disconnect(): Promise<void> {
    this.setOpen(false);
  }

  async subscribe(topic: string): Promise<void> {
    if (!this.open) throw new NotConnectedError('subscribe');
    this.subscriptions.push(topic);
  }

  async publish(topic: string, payload: Uint8Array, metadata: PublishMetadata = {}): Promise<void> {
    if (!this.open) throw new NotConnectedError();
    if (this.failPublishes) throw new Error('broker rejected publish');
    this.published.push({ topic, payload, metadata });
  }

  setMessageHandler(handler: MessageHandler): void {
    this.messageHandler = handler;
  }

  setConnectionStateHandler(handler: ConnectionStateHandler): void {
    this.connectionStateHandler = handler;
  }

  setOpen(open: boolean): void {
    if (this.open === open) return;
    this.open = open;
    this.connectionStateHandler?.(open);
  }

  deliver(topic: string, payload: Uint8Array): void {
    this.messageHandler?.(topic, payload, {});
  }

  envelopes(): InboundEnvelope[] {
    return this.published.map(message => this.codec.decode(message.payload));
  }

  clear(): void {
    this.published = [];
  }
}

export function encodeRequest(envelope: Record<string, unknown>): Uint8Array {
  const body = new TextEncoder().encode(JSON.stringify(envelope));
  const header = new TextEncoder().encode(`#${body.length}$`);
  const frame = new Uint8Array(header.length + body.length);
  frame.set(header, 0);
  frame.set(body, header.length);
  return frame;
}
