// src/functions/read.ts

import { z } from 'zod';
import { FUNCTION_NAMES, MassFailCode } from '../constants/constants.js';
import { ValidationError } from '../errors.js';
import { formatDeviceDate } from '../utils/utils.js';
import { JsonObject } from '../types/mass-types.js';
import { defineHandler, meterSelectorSchema } from './function-handler.js';

const OBIS_CODE_PATTERN = /^\d{1,3}\.\d{1,3}\.\d{1,3}$/;

const readRequestSchema = z.object({
  directive: z.string().min(1),
  meter: meterSelectorSchema.optional(),
  parameters: z
    .object({
      obisCodes: z.array(z.string().regex(OBIS_CODE_PATTERN, 'expected an OBIS code like 1.8.0')).optional(),
    })
    .optional(),
});

/**
 * Readout of a meter. `readout` returns the full register set, `shortReadout`
 * identity and total import, `obis` only the requested codes.
 * Unrecognized directives fall back to the full register set.
 */
export const readHandler = defineHandler(FUNCTION_NAMES.READ, readRequestSchema, (store, request, ctx) => {
  const obisCodes = request.parameters?.obisCodes;
  if (request.directive === 'obis' && (!obisCodes || obisCodes.length === 0)) {
    throw new ValidationError(
      MassFailCode.MISSING_PARAMETER,
      'parameters.obisCodes is required for the obis directive'
    );
  }

  let meterBody: JsonObject | undefined;
  if (request.meter) {
    const meter = store.findMeter(request.meter.serialNumber);
    if (!meter) {
      throw new ValidationError(MassFailCode.UNKNOWN_METER, `meter ${request.meter.serialNumber} is not attached`);
    }
    meterBody = { brand: meter.brand, serialNumber: meter.serialNumber };
  }

  const readDate = store.deviceDate();
  const sample = ctx.samples.readout({
    directive: request.directive,
    meterSerial: request.meter?.serialNumber,
    obisCodes,
    readDate,
  });

  const body: JsonObject = {
    readDate: formatDeviceDate(readDate),
    directive: request.directive,
    data: { id: sample.id, rawData: sample.rawData },
  };
  if (meterBody) body.meter = meterBody;

  ctx.logger.debug('Readout synthesized', { fn: FUNCTION_NAMES.READ, directive: request.directive });
  return [{ function: FUNCTION_NAMES.READ, kind: 'response', body }];
});
