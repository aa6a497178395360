// src/functions/reset.ts

import { z } from 'zod';
import { FUNCTION_NAMES } from '../constants/constants.js';
import { defineHandler } from './function-handler.js';

export const resetRequestSchema = z
  .object({ type: z.enum(['soft', 'hard']).default('soft') })
  .default({});

export const resetHandler = defineHandler(FUNCTION_NAMES.RESET, resetRequestSchema, (store, request, ctx) => {
  store.resetTelemetry();
  ctx.logger.info(`Device reset (${request.type})`, { fn: FUNCTION_NAMES.RESET });

  return [
    {
      function: FUNCTION_NAMES.RESET,
      kind: 'notification',
      body: {
        type: 'info',
        message: 'Device reset',
        resetType: request.type,
        date: store.deviceDateText(),
      },
    },
  ];
});
