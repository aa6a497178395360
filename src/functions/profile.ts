// src/functions/profile.ts

import { z } from 'zod';
import {
  DEFAULT_PROFILE_PERIOD_MINUTES,
  FUNCTION_NAMES,
  MassFailCode,
  MAX_PROFILE_INTERVALS,
} from '../constants/constants.js';
import { ValidationError } from '../errors.js';
import { JsonObject } from '../types/mass-types.js';
import { defineHandler, deviceDateSchema, meterSelectorSchema } from './function-handler.js';

const profileRequestSchema = z.object({
  startDate: deviceDateSchema,
  endDate: deviceDateSchema,
  period: z.number().int().positive().default(DEFAULT_PROFILE_PERIOD_MINUTES),
  meter: meterSelectorSchema.optional(),
});

/**
 * Load profile between two dates. Intervals start at `startDate` and step by
 * `period` minutes while they stay before `endDate`.
 */
export const profileHandler = defineHandler(
  FUNCTION_NAMES.PROFILE,
  profileRequestSchema,
  (store, request, ctx) => {
    const spanMs = request.endDate.getTime() - request.startDate.getTime();
    if (spanMs < 0) {
      throw new ValidationError(MassFailCode.INVALID_PARAMETER, 'startDate must not be after endDate');
    }

    const count = Math.ceil(spanMs / (request.period * 60_000));
    if (count > MAX_PROFILE_INTERVALS) {
      throw new ValidationError(
        MassFailCode.RANGE_TOO_LARGE,
        `${count} intervals requested, at most ${MAX_PROFILE_INTERVALS} allowed`
      );
    }

    const body: JsonObject = { period: request.period };
    if (request.meter) {
      const meter = store.findMeter(request.meter.serialNumber);
      if (!meter) {
        throw new ValidationError(MassFailCode.UNKNOWN_METER, `meter ${request.meter.serialNumber} is not attached`);
      }
      body.meter = { brand: meter.brand, serialNumber: meter.serialNumber };
    }

    body.intervals = ctx.samples.profile({
      start: request.startDate,
      periodMinutes: request.period,
      count,
      meterSerial: request.meter?.serialNumber,
    });

    return [{ function: FUNCTION_NAMES.PROFILE, kind: 'response', body }];
  }
);
