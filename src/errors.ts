// src/errors.ts

import { MassFailCode, MASS_FAIL_MESSAGES } from './constants/constants.js';

/**
 * Base class for all simulator errors
 */
export class MassError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MassError';
  }
}

// --- Errors for Message Format ---

export type FramingFailure =
  | 'missing-start'
  | 'missing-length'
  | 'invalid-length'
  | 'missing-separator'
  | 'truncated'
  | 'trailing-bytes'
  | 'invalid-body';

/**
 * Error class for a malformed wire frame. No correlation id can be recovered from it.
 */
export class FramingError extends MassError {
  readonly reason: FramingFailure;

  constructor(reason: FramingFailure, detail: string) {
    super(`Malformed frame (${reason}): ${detail}`);
    this.name = 'FramingError';
    this.reason = reason;
  }
}

// --- Errors for Dispatch ---

/**
 * Error class for a function name with no registered handler
 */
export class UnknownFunctionError extends MassError {
  readonly functionName: string;

  constructor(functionName: string) {
    super(`Unhandled function: ${functionName}`);
    this.name = 'UnknownFunctionError';
    this.functionName = functionName;
  }
}

/**
 * Error class for registering a second handler under the same function name
 */
export class DuplicateHandlerError extends MassError {
  constructor(functionName: string) {
    super(`Handler already registered for function: ${functionName}`);
    this.name = 'DuplicateHandlerError';
  }
}

// --- Errors for Data Validation ---

/**
 * Error class for a recognized function whose request is malformed or incomplete.
 * Surfaced to the client as a fail response carrying `failCode`.
 */
export class ValidationError extends MassError {
  readonly failCode: MassFailCode;
  readonly description: string;

  constructor(failCode: MassFailCode, description?: string) {
    const label = MASS_FAIL_MESSAGES[failCode];
    super(description ? `${label}: ${description}` : label);
    this.name = 'ValidationError';
    this.failCode = failCode;
    this.description = description ?? label;
  }
}

/**
 * Error class for adding an entry whose key is already present in a keyed collection
 */
export class DuplicateKeyError extends ValidationError {
  readonly collection: string;
  readonly key: string;

  constructor(collection: string, key: string | number) {
    super(MassFailCode.DUPLICATE_ENTRY, `${collection} entry ${key} already exists`);
    this.name = 'DuplicateKeyError';
    this.collection = collection;
    this.key = String(key);
  }
}

// --- Errors for Transport ---

export type TransportOperation = 'connect' | 'subscribe' | 'publish' | 'disconnect';

/**
 * Error class for pub/sub failures
 */
export class TransportError extends MassError {
  readonly operation: TransportOperation;

  constructor(operation: TransportOperation, message: string) {
    super(`Transport ${operation} failed: ${message}`);
    this.name = 'TransportError';
    this.operation = operation;
  }
}

/**
 * Error class for publishing while the transport is down
 */
export class NotConnectedError extends TransportError {
  constructor(operation: TransportOperation = 'publish') {
    super(operation, 'transport is not connected');
    this.name = 'NotConnectedError';
  }
}

// --- Errors for Configuration ---

/**
 * Error class for invalid configuration values
 */
export class ConfigError extends MassError {
  constructor(variable: string, message: string) {
    super(`Invalid configuration ${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}
