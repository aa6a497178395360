// src/functions/firmware-update.ts

import { z } from 'zod';
import { FUNCTION_NAMES } from '../constants/constants.js';
import { defineHandler } from './function-handler.js';

const firmwareUpdateRequestSchema = z.object({
  version: z.string().min(1),
  url: z.string().url().optional(),
});

export const firmwareUpdateHandler = defineHandler(
  FUNCTION_NAMES.FIRMWARE_UPDATE,
  firmwareUpdateRequestSchema,
  (store, request, ctx) => {
    const previousVersion = store.getIdentity().firmware;
    store.updateIdentity({ firmware: request.version });
    ctx.logger.info(`Firmware ${previousVersion} -> ${request.version}`, {
      fn: FUNCTION_NAMES.FIRMWARE_UPDATE,
    });

    return [
      {
        function: FUNCTION_NAMES.FIRMWARE_UPDATE,
        kind: 'notification',
        body: {
          previousVersion,
          currentVersion: request.version,
          result: 'success',
          date: store.deviceDateText(),
        },
      },
    ];
  }
);
