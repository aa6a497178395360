// src/device-emulator/device-emulator.ts

import Logger from '../logger.js';
import {
  DEFAULT_TOPIC_FROM_SERVER,
  DEFAULT_TOPIC_TO_SERVER,
  FUNCTION_NAMES,
  MAX_TIMER_DELAY_MS,
} from '../constants/constants.js';
import { FramingError, NotConnectedError } from '../errors.js';
import { EnvelopeCodec } from '../framers/envelope-codec.js';
import { DeviceState } from '../device-state/device-state.js';
import { FunctionRouter } from '../functions/function-router.js';
import { registerDefaultHandlers } from '../functions/handlers.js';
import { HeartbeatScheduler } from '../heartbeat-scheduler.js';
import { createRoutingProperties } from '../message-builder.js';
import { SampleGenerator } from '../samples/sample-generator.js';
import { sleep } from '../utils/utils.js';
import {
  Clock,
  DeviceSnapshot,
  Envelope,
  HeartbeatStats,
  InboundEnvelope,
  LoggerInstance,
  MessageTransport,
  MeterDescriptor,
  TelemetryUpdate,
} from '../types/mass-types.js';

export interface EmulatorTopics {
  /** server -> device */
  inbound: string;
  /** device -> server */
  outbound: string;
}

export interface MassDeviceEmulatorOptions {
  transport: MessageTransport;
  state: DeviceState;
  /** Defaults to a router with every built-in handler registered */
  router?: FunctionRouter;
  samples?: SampleGenerator;
  clock?: Clock;
  topics?: Partial<EmulatorTopics>;
  /** Heartbeat interval, ms; no scheduler when omitted */
  heartbeatInterval?: number;
  /** Pause between an acknowledgment and the replies that follow it, ms */
  responseDelay?: number;
  codec?: EnvelopeCodec;
  logger?: Logger;
}

/**
 * The simulated communication unit: ties the transport, the router, the
 * heartbeat scheduler and the trigger surface to one device state.
 */
export class MassDeviceEmulator {
  private readonly transport: MessageTransport;
  private readonly state: DeviceState;
  private readonly router: FunctionRouter;
  private readonly codec: EnvelopeCodec;
  private readonly topics: EmulatorTopics;
  private readonly responseDelay: number;
  private readonly scheduler: HeartbeatScheduler | null;
  private readonly logger: LoggerInstance;
  private started: boolean = false;

  constructor(options: MassDeviceEmulatorOptions) {
    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('DeviceEmulator');
    this.transport = options.transport;
    this.state = options.state;
    this.router =
      options.router ??
      registerDefaultHandlers(
        new FunctionRouter({
          state: options.state,
          samples: options.samples,
          clock: options.clock,
          logger: loggerInstance,
        })
      );
    this.codec = options.codec ?? new EnvelopeCodec();
    this.topics = {
      inbound: options.topics?.inbound ?? DEFAULT_TOPIC_FROM_SERVER,
      outbound: options.topics?.outbound ?? DEFAULT_TOPIC_TO_SERVER,
    };
    this.responseDelay = options.responseDelay ?? 0;
    if (!(this.responseDelay >= 0 && this.responseDelay <= MAX_TIMER_DELAY_MS)) {
      throw new RangeError(`Response delay must be 0..${MAX_TIMER_DELAY_MS}ms, got ${this.responseDelay}`);
    }
    this.scheduler =
      options.heartbeatInterval !== undefined
        ? new HeartbeatScheduler({
            interval: options.heartbeatInterval,
            beat: async () => {
              await this.triggerHeartbeat();
            },
            logger: loggerInstance,
          })
        : null;

    this.transport.setMessageHandler((topic, payload) => {
      this.handleFrame(topic, payload).then(undefined, (err: unknown) =>
        this.logger.error(`Inbound frame handling crashed: ${String(err)}`, { topic })
      );
    });
    this.transport.setConnectionStateHandler(connected => {
      if (!connected) {
        this.logger.warn('Transport connection lost');
        return;
      }
      this.onConnected().then(undefined, (err: unknown) =>
        this.logger.error(`Connection setup failed: ${err instanceof Error ? err.message : String(err)}`)
      );
    });
  }

  /**
   * Connects the transport and starts the heartbeat.
   * @throws TransportError if the first connection fails
   */
  async start(): Promise<void> {
    if (this.started) return;
    await this.transport.connect();
    this.started = true;
    this.scheduler?.start();
    this.logger.info('Emulator started', this.topics);
  }

  async stop(): Promise<void> {
    this.scheduler?.stop();
    if (!this.started) return;
    this.started = false;
    await this.transport.disconnect();
    this.logger.info('Emulator stopped');
  }

  isConnected(): boolean {
    return this.transport.isOpen;
  }

  getHeartbeatStats(): HeartbeatStats | null {
    return this.scheduler?.getStats() ?? null;
  }

  /**
   * Subscribes the inbound topic and announces the device. Runs on every (re)connect.
   */
  private async onConnected(): Promise<void> {
    await this.transport.subscribe(this.topics.inbound);
    await this.push(FUNCTION_NAMES.IDENTIFICATION);
    this.logger.info('Identification sent', { fn: FUNCTION_NAMES.IDENTIFICATION });
  }

  /**
   * Processes one inbound frame: acknowledgment first, then the replies.
   * Malformed frames are logged and dropped; publish failures are logged.
   */
  async handleFrame(topic: string, payload: Uint8Array): Promise<void> {
    if (topic !== this.topics.inbound) {
      this.logger.debug('Ignoring message on foreign topic', { topic });
      return;
    }

    let envelope: InboundEnvelope;
    try {
      envelope = this.codec.decode(payload);
    } catch (err: unknown) {
      if (err instanceof FramingError) {
        this.logger.warn(`Dropped frame: ${err.message}`, { topic, reason: err.reason });
        return;
      }
      throw err;
    }

    const context = { fn: envelope.function, ref: envelope.referenceId };
    this.logger.info('Request received', context);

    const { ack, replies } = await this.router.dispatch(envelope);
    if (ack) await this.publishSafely(ack);
    if (replies.length > 0 && this.responseDelay > 0) await sleep(this.responseDelay);
    for (const reply of replies) {
      await this.publishSafely(reply);
    }
  }

  /**
   * Encodes and publishes one envelope with its routing properties.
   * @throws TransportError on publish failure
   */
  async publish(envelope: Envelope): Promise<void> {
    const frame = this.codec.encode(envelope);
    await this.transport.publish(this.topics.outbound, frame, {
      userProperties: createRoutingProperties(envelope),
    });
    this.logger.debug('Published', {
      fn: envelope.function,
      ref: envelope.referenceId,
      topic: this.topics.outbound,
    });
  }

  private async publishSafely(envelope: Envelope): Promise<void> {
    try {
      await this.publish(envelope);
    } catch (err: unknown) {
      this.logger.error(`Publish failed: ${err instanceof Error ? err.message : String(err)}`, {
        fn: envelope.function,
        ref: envelope.referenceId,
      });
    }
  }

  /**
   * Runs a handler as a device-initiated push and publishes its output.
   * @throws NotConnectedError when the transport is down
   * @throws ValidationError when the payload is invalid
   */
  private async push(fn: string, request?: unknown): Promise<Envelope[]> {
    if (!this.transport.isOpen) throw new NotConnectedError();
    const envelopes = await this.router.invoke(fn, request);
    for (const envelope of envelopes) {
      await this.publish(envelope);
    }
    return envelopes;
  }

  // !=============================================================================
  // ! Trigger surface
  // !=============================================================================

  triggerHeartbeat(): Promise<Envelope[]> {
    return this.push(FUNCTION_NAMES.HEARTBEAT);
  }

  triggerAlarm(alarm: unknown): Promise<Envelope[]> {
    return this.push(FUNCTION_NAMES.ALARM, alarm);
  }

  triggerWrite(request: unknown): Promise<Envelope[]> {
    return this.push(FUNCTION_NAMES.WRITE, request);
  }

  triggerReset(request: unknown = {}): Promise<Envelope[]> {
    return this.push(FUNCTION_NAMES.RESET, request);
  }

  triggerRelay(request: unknown): Promise<Envelope[]> {
    return this.push(FUNCTION_NAMES.RELAY, request);
  }

  triggerConfiguration(request: unknown): Promise<Envelope[]> {
    return this.push(FUNCTION_NAMES.CONFIGURATION, request);
  }

  /**
   * Attaches a meter. Publishes nothing.
   * @throws DuplicateKeyError if the serial number is already attached
   */
  async addMeter(descriptor: MeterDescriptor): Promise<void> {
    await this.state.addMeter(descriptor);
    this.logger.info(`Meter added: ${descriptor.serialNumber}`);
  }

  /**
   * Partial telemetry update. Publishes nothing.
   */
  async applyTelemetry(update: TelemetryUpdate): Promise<string[]> {
    const applied = await this.state.updateTelemetry(update);
    this.logger.info(`Telemetry updated: ${applied.join(', ') || 'nothing'}`);
    return applied;
  }

  getSnapshot(): Promise<DeviceSnapshot> {
    return this.state.getSnapshot();
  }
}
