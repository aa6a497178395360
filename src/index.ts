// src/index.ts

export { default as Logger } from './logger.js';
export type { LogRecord, LogStats } from './logger.js';
export * from './errors.js';
export * from './constants/constants.js';
export * from './types/mass-types.js';

export type { MassFramer } from './framers/mass-framer.js';
export { LengthPrefixFramer } from './framers/length-prefix-framer.js';
export { EnvelopeCodec } from './framers/envelope-codec.js';
export {
  createAck,
  createEnvelope,
  createFailMessage,
  createHeader,
  createRoutingProperties,
  newReferenceId,
} from './message-builder.js';

export { DeviceState, DeviceStore } from './device-state/device-state.js';
export type { DeviceStoreOptions, IdentityUpdate } from './device-state/device-state.js';
export { TelemetryDrift } from './device-state/telemetry-drift.js';
export type { DriftField, DriftParams } from './device-state/telemetry-drift.js';

export { DefaultSampleGenerator } from './samples/sample-generator.js';
export type {
  LogRequest,
  LogSample,
  ProfileInterval,
  ProfileRequest,
  ReadoutRequest,
  ReadoutSample,
  SampleGenerator,
} from './samples/sample-generator.js';

export { defineHandler, parseRequest } from './functions/function-handler.js';
export type { FunctionHandler, HandlerContext } from './functions/function-handler.js';
export { FunctionRouter } from './functions/function-router.js';
export type { DispatchResult, FunctionRouterOptions } from './functions/function-router.js';
export { INBOUND_HANDLERS, PUSH_ONLY_HANDLERS, registerDefaultHandlers } from './functions/handlers.js';

export { HeartbeatScheduler } from './heartbeat-scheduler.js';
export { MqttTransport } from './transport/mqtt-transport.js';
export type { MqttTransportOptions } from './transport/mqtt-transport.js';
export { MassDeviceEmulator } from './device-emulator/device-emulator.js';
export type { MassDeviceEmulatorOptions, EmulatorTopics } from './device-emulator/device-emulator.js';
export { ControlServer } from './control/control-server.js';
export { loadConfig } from './config.js';
export type { SimulatorConfig } from './config.js';
