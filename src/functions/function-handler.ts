// src/functions/function-handler.ts

import { z } from 'zod';
import { MassFailCode } from '../constants/constants.js';
import { ValidationError } from '../errors.js';
import { DeviceStore } from '../device-state/device-state.js';
import { SampleGenerator } from '../samples/sample-generator.js';
import { parseDeviceDate } from '../utils/utils.js';
import { Clock, LoggerInstance, OutboundMessage } from '../types/mass-types.js';

/**
 * Collaborators a handler may use besides the device store
 */
export interface HandlerContext {
  clock: Clock;
  samples: SampleGenerator;
  logger: LoggerInstance;
}

/**
 * One protocol function: validates the request, mutates the store as needed
 * and returns the outbound payloads in emission order.
 * Runs synchronously inside the device-state lock.
 */
export interface FunctionHandler {
  readonly name: string;
  handle(store: DeviceStore, request: unknown, ctx: HandlerContext): OutboundMessage[];
}

/**
 * Maps a zod failure to a fail code: an absent field is MISSING_PARAMETER,
 * anything else INVALID_PARAMETER.
 */
export function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue) return new ValidationError(MassFailCode.INVALID_PARAMETER);

  const path = issue.path.length > 0 ? issue.path.join('.') : 'request';
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    return new ValidationError(MassFailCode.MISSING_PARAMETER, `${path} is required`);
  }
  // refinements that require one of several fields mark themselves with `missing`
  if (issue.code === z.ZodIssueCode.custom && issue.params?.['missing'] === true) {
    return new ValidationError(MassFailCode.MISSING_PARAMETER, issue.message);
  }
  return new ValidationError(MassFailCode.INVALID_PARAMETER, `${path}: ${issue.message}`);
}

/**
 * @throws ValidationError if the request does not match the schema
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, request: unknown): z.output<S> {
  const result = schema.safeParse(request);
  if (!result.success) throw toValidationError(result.error);
  return result.data;
}

export function defineHandler<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  fn: (store: DeviceStore, request: z.output<S>, ctx: HandlerContext) => OutboundMessage[]
): FunctionHandler {
  return {
    name,
    handle(store, request, ctx) {
      return fn(store, parseRequest(schema, request), ctx);
    },
  };
}

// !=============================================================================
// ! Shared request fragments
// !=============================================================================

/** `YYYY-MM-DD HH:MM:SS` string, parsed to a Date */
export const deviceDateSchema = z.string().transform((text, ctx) => {
  const date = parseDeviceDate(text);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected YYYY-MM-DD HH:MM:SS' });
    return z.NEVER;
  }
  return date;
});

export const meterSelectorSchema = z.object({ serialNumber: z.string().min(1) });

/** A request that carries no parameters; any body is ignored */
export const emptyRequestSchema = z.unknown();
