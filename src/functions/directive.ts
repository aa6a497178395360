// src/functions/directive.ts

import { z } from 'zod';
import { FUNCTION_NAMES } from '../constants/constants.js';
import { JsonObject } from '../types/mass-types.js';
import { defineHandler } from './function-handler.js';

const directiveRequestSchema = z
  .object({ directive: z.string().optional(), name: z.string().optional() })
  .passthrough()
  .default({});

/** Placeholder: any directive is accepted and nothing runs */
export const directiveHandler = defineHandler(
  FUNCTION_NAMES.DIRECTIVE,
  directiveRequestSchema,
  (_store, request) => {
    const body: JsonObject = { status: 'accepted' };
    const name = request.directive ?? request.name;
    if (name !== undefined) body.directive = name;
    return [{ function: FUNCTION_NAMES.DIRECTIVE, kind: 'response', body }];
  }
);
