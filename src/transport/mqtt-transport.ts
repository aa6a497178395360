// src/transport/mqtt-transport.ts

import { connect, IClientOptions, MqttClient } from 'mqtt';
import Logger from '../logger.js';
import { NotConnectedError, TransportError } from '../errors.js';
import {
  ConnectionStateHandler,
  LoggerInstance,
  MessageHandler,
  MessageTransport,
  MqttQos,
  PublishMetadata,
  RoutingProperties,
} from '../types/mass-types.js';

export interface MqttTransportOptions {
  url: string;
  clientId: string;
  username?: string;
  password?: string;
  /** Keepalive, seconds */
  keepalive?: number;
  qos?: MqttQos;
  /** Pause between reconnect attempts, ms */
  reconnectPeriod?: number;
  /** Give up on the first connection after this long, ms */
  connectTimeout?: number;
  logger?: Logger;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Flattens MQTT v5 user properties; repeated keys are joined with commas.
 */
function flattenUserProperties(
  properties: Record<string, string | string[]> | undefined
): RoutingProperties {
  const flat: RoutingProperties = {};
  if (!properties) return flat;
  for (const [key, value] of Object.entries(properties)) {
    flat[key] = Array.isArray(value) ? value.join(',') : value;
  }
  return flat;
}

/**
 * MQTT v5 implementation of {@link MessageTransport}. Reconnects are left to
 * the client library; subscriptions are re-issued by the owner on every
 * connection-state change.
 */
export class MqttTransport implements MessageTransport {
  private client: MqttClient | null = null;
  private messageHandler: MessageHandler | null = null;
  private connectionStateHandler: ConnectionStateHandler | null = null;
  private connected: boolean = false;
  private readonly options: Required<Omit<MqttTransportOptions, 'username' | 'password' | 'logger'>> &
    Pick<MqttTransportOptions, 'username' | 'password'>;
  private readonly logger: LoggerInstance;

  constructor(options: MqttTransportOptions) {
    this.options = {
      url: options.url,
      clientId: options.clientId,
      username: options.username,
      password: options.password,
      keepalive: options.keepalive ?? 60,
      qos: options.qos ?? 1,
      reconnectPeriod: options.reconnectPeriod ?? 2000,
      connectTimeout: options.connectTimeout ?? 30_000,
    };
    this.logger = (options.logger ?? new Logger()).createLogger('MqttTransport');
  }

  get isOpen(): boolean {
    return this.connected;
  }

  setMessageHandler(handler: MessageHandler): void {
    this.messageHandler = handler;
  }

  setConnectionStateHandler(handler: ConnectionStateHandler): void {
    this.connectionStateHandler = handler;
  }

  /**
   * Resolves on the first CONNACK.
   * @throws TransportError if the broker cannot be reached before the first connection
   */
  connect(): Promise<void> {
    if (this.client) return Promise.resolve();

    const clientOptions: IClientOptions = {
      clientId: this.options.clientId,
      protocolVersion: 5,
      keepalive: this.options.keepalive,
      reconnectPeriod: this.options.reconnectPeriod,
      connectTimeout: this.options.connectTimeout,
      clean: true,
    };
    if (this.options.username) {
      clientOptions.username = this.options.username;
      clientOptions.password = this.options.password;
    }

    this.logger.info(`Connecting to ${this.options.url}`, { clientId: this.options.clientId });
    const client = connect(this.options.url, clientOptions);
    this.client = client;

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const fail = (reason: string) => {
        if (settled) return;
        settled = true;
        this.client = null;
        client.end(true);
        reject(new TransportError('connect', reason));
      };

      client.on('connect', () => {
        this.logger.info('Connected to broker');
        this.setConnected(true);
        if (!settled) {
          settled = true;
          resolve();
        }
      });

      client.on('reconnect', () => {
        this.logger.debug('Reconnecting to broker');
      });

      client.on('close', () => {
        this.setConnected(false);
      });

      client.on('offline', () => {
        this.setConnected(false);
        fail('broker unreachable');
      });

      client.on('error', (err: Error) => {
        this.logger.error(`MQTT error: ${err.message}`);
        fail(err.message);
      });

      client.on('message', (topic, payload, packet) => {
        const metadata: PublishMetadata = {
          userProperties: flattenUserProperties(packet.properties?.userProperties),
        };
        this.logger.trace(`Message received (${payload.length} bytes)`, { topic });
        this.messageHandler?.(topic, payload, metadata);
      });
    });
  }

  private setConnected(connected: boolean): void {
    if (this.connected === connected) return;
    this.connected = connected;
    if (!connected) this.logger.warn('Disconnected from broker');
    this.connectionStateHandler?.(connected);
  }

  /**
   * @throws NotConnectedError while the broker connection is down
   */
  async subscribe(topic: string): Promise<void> {
    const client = this.requireClient('subscribe');
    try {
      await client.subscribeAsync(topic, { qos: this.options.qos });
      this.logger.info('Subscribed', { topic });
    } catch (err: unknown) {
      throw new TransportError('subscribe', errorMessage(err));
    }
  }

  /**
   * @throws NotConnectedError while the broker connection is down
   */
  async publish(topic: string, payload: Uint8Array, metadata: PublishMetadata = {}): Promise<void> {
    const client = this.requireClient('publish');
    try {
      await client.publishAsync(topic, Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength), {
        qos: this.options.qos,
        properties: metadata.userProperties ? { userProperties: metadata.userProperties } : undefined,
      });
    } catch (err: unknown) {
      throw new TransportError('publish', errorMessage(err));
    }
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    try {
      await client.endAsync();
    } catch (err: unknown) {
      throw new TransportError('disconnect', errorMessage(err));
    } finally {
      this.setConnected(false);
    }
    this.logger.info('Disconnected');
  }

  private requireClient(operation: 'subscribe' | 'publish'): MqttClient {
    if (!this.client || !this.connected) throw new NotConnectedError(operation);
    return this.client;
  }
}
