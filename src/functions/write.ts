// src/functions/write.ts

import { z } from 'zod';
import { FUNCTION_NAMES, MassFailCode } from '../constants/constants.js';
import { ValidationError } from '../errors.js';
import { defineHandler, meterSelectorSchema } from './function-handler.js';

export const writeRequestSchema = z
  .object({
    meter: meterSelectorSchema,
    obisCode: z.string().min(1).optional(),
    register: z.string().min(1).optional(),
    value: z.union([z.string(), z.number(), z.boolean()]),
  })
  .refine(request => request.obisCode !== undefined || request.register !== undefined, {
    message: 'obisCode or register is required',
    params: { missing: true },
  });

export type WriteRequest = z.infer<typeof writeRequestSchema>;

/**
 * Simulated pass-through write: the meter must exist, nothing is stored.
 */
export const writeHandler = defineHandler(FUNCTION_NAMES.WRITE, writeRequestSchema, (store, request) => {
  const meter = store.findMeter(request.meter.serialNumber);
  if (!meter) {
    throw new ValidationError(MassFailCode.UNKNOWN_METER, `meter ${request.meter.serialNumber} is not attached`);
  }

  return [
    {
      function: FUNCTION_NAMES.WRITE,
      kind: 'response',
      body: {
        meter: { brand: meter.brand, serialNumber: meter.serialNumber },
        obisCode: request.obisCode ?? request.register ?? '',
        value: request.value,
        result: 'success',
        date: store.deviceDateText(),
      },
    },
  ];
});
