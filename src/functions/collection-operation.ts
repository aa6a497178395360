// src/functions/collection-operation.ts

import { z } from 'zod';
import { MassFailCode } from '../constants/constants.js';
import { ValidationError } from '../errors.js';
import { jsonValueSchema } from '../framers/envelope-codec.js';
import { DeviceStore } from '../device-state/device-state.js';
import { EntryCollection } from '../device-state/entry-collection.js';
import { FunctionHandler, defineHandler, parseRequest } from './function-handler.js';

const entryIdSchema = z.union([z.string().min(1), z.number()]);

const entrySchema = z.object({ id: entryIdSchema }).catchall(jsonValueSchema);

const entryListSchema = z.array(entrySchema).min(1, 'must list at least one entry');

/**
 * Builds an add/list/remove handler over one keyed collection of the store.
 * Every operation answers with the collection as it stands afterwards.
 */
export function createCollectionHandler(
  name: string,
  listKey: string,
  select: (store: DeviceStore) => EntryCollection
): FunctionHandler {
  const schema = z
    .object({
      operation: z.enum(['add', 'list', 'remove']),
      filter: z.object({ id: entryIdSchema.optional() }).optional(),
    })
    .passthrough();

  return defineHandler(name, schema, (store, request, ctx) => {
    const collection = select(store);

    switch (request.operation) {
      case 'add': {
        const rawEntries = request[listKey];
        if (rawEntries === undefined) {
          throw new ValidationError(MassFailCode.MISSING_PARAMETER, `${listKey} is required`);
        }
        const entries = parseRequest(entryListSchema, rawEntries);
        collection.add(entries);
        ctx.logger.info(`Added ${entries.length} ${listKey} entr${entries.length === 1 ? 'y' : 'ies'}`, {
          fn: name,
        });
        break;
      }
      case 'remove': {
        const id = request.filter?.id;
        if (id === undefined) {
          throw new ValidationError(MassFailCode.MISSING_PARAMETER, 'filter.id is required');
        }
        const removed = collection.remove(id);
        ctx.logger.info(`Removed ${listKey} entry ${id}`, { fn: name, removed });
        break;
      }
      case 'list':
        break;
    }

    return [{ function: name, kind: 'response', body: { [listKey]: collection.list() } }];
  });
}
