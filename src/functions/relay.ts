// src/functions/relay.ts

import { z } from 'zod';
import { FUNCTION_NAMES, MassFailCode } from '../constants/constants.js';
import { ValidationError } from '../errors.js';
import { defineHandler } from './function-handler.js';

export const relayRequestSchema = z
  .object({
    id: z.number().int().optional(),
    name: z.string().min(1).optional(),
    state: z.enum(['on', 'off']),
  })
  .refine(request => request.id !== undefined || request.name !== undefined, {
    message: 'id or name is required',
    params: { missing: true },
  });

export type RelayRequest = z.infer<typeof relayRequestSchema>;

/**
 * Simulated relay switch. The target must be a relay I/O interface;
 * no relay state is kept.
 */
export const relayHandler = defineHandler(FUNCTION_NAMES.RELAY, relayRequestSchema, (store, request, ctx) => {
  const relay = store
    .getHardware()
    .ioInterfaces.find(
      io =>
        io.type === 'relay' &&
        (request.id === undefined || io.id === request.id) &&
        (request.name === undefined || io.name === request.name)
    );
  if (!relay) {
    throw new ValidationError(
      MassFailCode.UNKNOWN_RELAY,
      `no relay matches ${request.name ?? `id ${request.id}`}`
    );
  }

  ctx.logger.info(`Relay ${relay.name} switched ${request.state}`, { fn: FUNCTION_NAMES.RELAY });
  return [
    {
      function: FUNCTION_NAMES.RELAY,
      kind: 'notification',
      body: {
        relay: { id: relay.id, name: relay.name },
        state: request.state,
        date: store.deviceDateText(),
      },
    },
  ];
});
