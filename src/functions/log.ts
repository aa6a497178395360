// src/functions/log.ts

import { z } from 'zod';
import { FUNCTION_NAMES, MassFailCode } from '../constants/constants.js';
import { ValidationError } from '../errors.js';
import { MeterReference } from '../types/mass-types.js';
import { defineHandler, deviceDateSchema, meterSelectorSchema } from './function-handler.js';

const logRequestSchema = z.object({
  startDate: deviceDateSchema,
  endDate: deviceDateSchema,
  incidentCodes: z.array(z.number().int().nonnegative()).optional(),
  meter: meterSelectorSchema.optional(),
});

export const logHandler = defineHandler(FUNCTION_NAMES.LOG, logRequestSchema, (store, request, ctx) => {
  if (request.startDate.getTime() > request.endDate.getTime()) {
    throw new ValidationError(MassFailCode.INVALID_PARAMETER, 'startDate must not be after endDate');
  }

  let meter: MeterReference | undefined;
  if (request.meter) {
    const found = store.findMeter(request.meter.serialNumber);
    if (!found) {
      throw new ValidationError(MassFailCode.UNKNOWN_METER, `meter ${request.meter.serialNumber} is not attached`);
    }
    meter = { brand: found.brand, serialNumber: found.serialNumber };
  }

  const entries = ctx.samples.log({
    start: request.startDate,
    end: request.endDate,
    incidentCodes: request.incidentCodes,
    meter,
  });

  return [{ function: FUNCTION_NAMES.LOG, kind: 'response', body: entries }];
});
