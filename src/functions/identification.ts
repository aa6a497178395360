// src/functions/identification.ts

import { FUNCTION_NAMES } from '../constants/constants.js';
import { DeviceStore } from '../device-state/device-state.js';
import { JsonObject } from '../types/mass-types.js';
import { defineHandler, emptyRequestSchema } from './function-handler.js';

/**
 * Full identification body: identity, telemetry, settings, hardware profile,
 * meters and schedules.
 */
export function buildIdentificationBody(store: DeviceStore): JsonObject {
  const identity = store.getIdentity();
  const telemetry = store.getTelemetry();
  const settings = store.getSettings();
  const hardware = store.getHardware();

  return {
    registered: telemetry.registered,
    brand: identity.brand,
    model: identity.model,
    protocolVersion: identity.protocolVersion,
    manufactureDate: identity.manufactureDate,
    firmware: identity.firmware,
    signal: telemetry.signal,
    cpuTemp: telemetry.cpuTemp,
    deviceDate: store.deviceDateText(),
    daylightSaving: settings.daylightSaving,
    timezone: settings.timezone,
    restartPeriod: settings.restartPeriod,
    networkId: settings.networkId,
    servers: hardware.servers,
    ntp: hardware.ntp,
    ipWhiteList: hardware.ipWhiteList,
    retryInterval: settings.retryInterval,
    retryCount: settings.retryCount,
    communicationInterfaces: hardware.communicationInterfaces,
    serialPorts: hardware.serialPorts,
    ioInterfaces: hardware.ioInterfaces,
    modules: hardware.modules,
    meters: store.listMeters(),
    schedules: store.schedules.list(),
  };
}

export const identificationHandler = defineHandler(
  FUNCTION_NAMES.IDENTIFICATION,
  emptyRequestSchema,
  store => [
    {
      function: FUNCTION_NAMES.IDENTIFICATION,
      kind: 'response',
      body: buildIdentificationBody(store),
    },
  ]
);
