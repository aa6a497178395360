// src/functions/heartbeat.ts

import { FUNCTION_NAMES } from '../constants/constants.js';
import { DeviceStore } from '../device-state/device-state.js';
import { JsonObject } from '../types/mass-types.js';
import { defineHandler, emptyRequestSchema } from './function-handler.js';

export function buildHeartbeatBody(store: DeviceStore): JsonObject {
  const telemetry = store.getTelemetry();
  return {
    signal: telemetry.signal,
    deviceDate: store.deviceDateText(),
    cpuTemp: telemetry.cpuTemp,
  };
}

export const heartbeatHandler = defineHandler(
  FUNCTION_NAMES.HEARTBEAT,
  emptyRequestSchema,
  store => [{ function: FUNCTION_NAMES.HEARTBEAT, kind: 'response', body: buildHeartbeatBody(store) }]
);
