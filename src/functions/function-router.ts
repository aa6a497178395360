// src/functions/function-router.ts

import Logger from '../logger.js';
import { FUNCTION_NAMES, MassFailCode } from '../constants/constants.js';
import { DuplicateHandlerError, UnknownFunctionError, ValidationError } from '../errors.js';
import { DeviceState } from '../device-state/device-state.js';
import { createAck, createEnvelope, createFailMessage, newReferenceId } from '../message-builder.js';
import { DefaultSampleGenerator, SampleGenerator } from '../samples/sample-generator.js';
import { Clock, Envelope, InboundEnvelope, LoggerInstance, OutboundMessage } from '../types/mass-types.js';
import { FunctionHandler, HandlerContext } from './function-handler.js';

export interface FunctionRouterOptions {
  state: DeviceState;
  samples?: SampleGenerator;
  clock?: Clock;
  logger?: Logger;
}

export interface RegisterOptions {
  /** When false the handler is reachable through {@link FunctionRouter.invoke} only */
  inbound?: boolean;
}

export interface DispatchResult {
  /** Acknowledgment correlated to the request; null for an inbound ack */
  ack: Envelope | null;
  replies: Envelope[];
}

interface HandlerEntry {
  handler: FunctionHandler;
  inbound: boolean;
}

/**
 * Maps function names to handlers and turns an inbound envelope into
 * the acknowledgment plus the handler's replies, all under the request's id.
 */
export class FunctionRouter {
  private readonly handlers: Map<string, HandlerEntry> = new Map();
  private readonly state: DeviceState;
  private readonly context: HandlerContext;
  private readonly logger: LoggerInstance;

  constructor(options: FunctionRouterOptions) {
    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('FunctionRouter');
    this.state = options.state;
    this.context = {
      clock: options.clock ?? (() => new Date()),
      samples: options.samples ?? new DefaultSampleGenerator(),
      logger: loggerInstance.createLogger('Handler'),
    };
  }

  /**
   * @throws DuplicateHandlerError if the function already has a handler
   */
  register(handler: FunctionHandler, options: RegisterOptions = {}): this {
    if (this.handlers.has(handler.name)) {
      throw new DuplicateHandlerError(handler.name);
    }
    this.handlers.set(handler.name, { handler, inbound: options.inbound ?? true });
    return this;
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  functionNames(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Routes one inbound envelope. Never throws for handler failures: a
   * ValidationError becomes a fail reply, anything else INTERNAL_ERROR.
   */
  async dispatch(envelope: InboundEnvelope): Promise<DispatchResult> {
    const fn = envelope.function;
    const ref = envelope.referenceId;

    if (fn === FUNCTION_NAMES.ACK) {
      this.logger.debug('Server acknowledgment received', { fn, ref });
      return { ack: null, replies: [] };
    }

    const entry = this.handlers.get(fn);

    return this.state.transaction(store => {
      const ack = createAck(store.address(), ref);

      if (!entry || !entry.inbound) {
        this.logger.warn(new UnknownFunctionError(fn).message, { fn, ref });
        return { ack, replies: [] };
      }

      let messages: OutboundMessage[];
      try {
        messages = entry.handler.handle(store, envelope.request, this.context);
      } catch (err: unknown) {
        messages = [this.failMessage(fn, ref, err)];
      }

      // identity may have changed inside the handler
      const address = store.address();
      return {
        ack,
        replies: messages.map(message => createEnvelope(address, message, ref)),
      };
    });
  }

  /**
   * Runs a handler for a push: one fresh reference id, bodies under `notification`.
   * @throws UnknownFunctionError if nothing is registered under `fn`
   * @throws ValidationError if the payload is invalid; nothing is published then
   */
  async invoke(fn: string, request?: unknown): Promise<Envelope[]> {
    const entry = this.handlers.get(fn);
    if (!entry) throw new UnknownFunctionError(fn);

    const ref = newReferenceId();
    return this.state.transaction(store => {
      const messages = entry.handler.handle(store, request, this.context);
      const address = store.address();
      return messages.map(message =>
        createEnvelope(address, { ...message, kind: 'notification' }, ref)
      );
    });
  }

  private failMessage(fn: string, ref: string, err: unknown): OutboundMessage {
    if (err instanceof ValidationError) {
      this.logger.warn(`Request rejected: ${err.message}`, { fn, ref, failCode: err.failCode });
      return createFailMessage(fn, err.failCode, err.description);
    }
    const message = err instanceof Error ? err.message : String(err);
    this.logger.error(`Handler failed: ${message}`, { fn, ref });
    return createFailMessage(fn, MassFailCode.INTERNAL_ERROR);
  }
}
