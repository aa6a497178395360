// src/functions/alarm.ts

import { z } from 'zod';
import { FUNCTION_NAMES } from '../constants/constants.js';
import { JsonObject } from '../types/mass-types.js';
import { defineHandler } from './function-handler.js';

export const alarmRequestSchema = z.object({
  type: z.enum(['alarm', 'info', 'danger']),
  level: z.enum(['critical', 'warning', 'info']),
  incidentCode: z.number().int().nonnegative(),
  description: z.string(),
  meter: z
    .object({
      brand: z.string(),
      serialNumber: z.string().min(1),
    })
    .optional(),
});

export type AlarmRequest = z.infer<typeof alarmRequestSchema>;

/**
 * Alarm push. Only ever raised by a trigger, never routed from the server.
 * Body is a one-element list with `messageStatus: "success"`.
 */
export const alarmHandler = defineHandler(FUNCTION_NAMES.ALARM, alarmRequestSchema, (store, request) => {
  const alarm: JsonObject = {
    type: request.type,
    level: request.level,
    incidentCode: request.incidentCode,
    description: request.description,
    date: store.deviceDateText(),
  };
  if (request.meter) {
    alarm.meter = { brand: request.meter.brand, serialNumber: request.meter.serialNumber };
  }

  return [
    {
      function: FUNCTION_NAMES.ALARM,
      kind: 'notification',
      messageStatus: 'success',
      body: [alarm],
    },
  ];
});
