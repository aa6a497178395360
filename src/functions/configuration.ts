// src/functions/configuration.ts

import { z } from 'zod';
import {
  CPU_TEMP_RANGE,
  DEVICE_FLAG_LENGTH,
  FUNCTION_NAMES,
  MassFailCode,
  SERIAL_NUMBER_LENGTH,
  SIGNAL_RANGE,
} from '../constants/constants.js';
import { ValidationError } from '../errors.js';
import { defineHandler, deviceDateSchema } from './function-handler.js';

export const CONFIGURABLE_KEYS = [
  'registered',
  'deviceDate',
  'signal',
  'cpuTemp',
  'flag',
  'serialNumber',
  'daylightSaving',
  'timezone',
  'restartPeriod',
  'networkId',
  'retryInterval',
  'retryCount',
] as const;

const configurableKeys: readonly string[] = CONFIGURABLE_KEYS;

export const signalSchema = z.number().int().min(SIGNAL_RANGE[0]).max(SIGNAL_RANGE[1]);
export const cpuTempSchema = z.number().int().min(CPU_TEMP_RANGE[0]).max(CPU_TEMP_RANGE[1]);

export const configurationRequestSchema = z
  .object({
    registered: z.boolean().optional(),
    deviceDate: deviceDateSchema.optional(),
    signal: signalSchema.optional(),
    cpuTemp: cpuTempSchema.optional(),
    flag: z.string().length(DEVICE_FLAG_LENGTH).optional(),
    serialNumber: z.string().length(SERIAL_NUMBER_LENGTH).optional(),
    daylightSaving: z.boolean().optional(),
    timezone: z
      .string()
      .regex(/^[+-]\d{2}:\d{2}$/, 'expected an offset like +03:00')
      .optional(),
    restartPeriod: z.number().int().nonnegative().optional(),
    networkId: z.string().optional(),
    retryInterval: z.number().int().positive().optional(),
    retryCount: z.number().int().nonnegative().optional(),
  })
  .passthrough();

/**
 * Partial settings update. Emits a confirmation notification followed by
 * the configuration response, both correlated to the request.
 */
export const configurationHandler = defineHandler(
  FUNCTION_NAMES.CONFIGURATION,
  configurationRequestSchema,
  (store, request, ctx) => {
    const ignored = Object.keys(request).filter(key => !configurableKeys.includes(key));
    const fields = CONFIGURABLE_KEYS.filter(key => request[key] !== undefined);
    if (fields.length === 0) {
      throw new ValidationError(
        MassFailCode.MISSING_PARAMETER,
        `at least one of ${CONFIGURABLE_KEYS.join(', ')} is required`
      );
    }

    store.updateTelemetry({
      registered: request.registered,
      signal: request.signal,
      cpuTemp: request.cpuTemp,
    });
    store.updateIdentity({ flag: request.flag, serialNumber: request.serialNumber });
    store.updateSettings({
      daylightSaving: request.daylightSaving,
      timezone: request.timezone,
      restartPeriod: request.restartPeriod,
      networkId: request.networkId,
      retryInterval: request.retryInterval,
      retryCount: request.retryCount,
    });
    if (request.deviceDate) store.setDeviceDate(request.deviceDate);

    if (ignored.length > 0) {
      ctx.logger.warn(`Ignored configuration keys: ${ignored.join(', ')}`, {
        fn: FUNCTION_NAMES.CONFIGURATION,
      });
    }
    ctx.logger.info(`Configuration updated: ${fields.join(', ')}`, { fn: FUNCTION_NAMES.CONFIGURATION });

    return [
      {
        function: FUNCTION_NAMES.NOTIFICATION,
        kind: 'notification',
        body: {
          type: 'info',
          message: 'Configuration updated',
          fields: [...fields],
          ignored,
          date: store.deviceDateText(),
        },
      },
      {
        function: FUNCTION_NAMES.CONFIGURATION,
        kind: 'response',
        body: { updated: [...fields] },
      },
    ];
  }
);
