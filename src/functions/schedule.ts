// src/functions/schedule.ts

import { FUNCTION_NAMES } from '../constants/constants.js';
import { createCollectionHandler } from './collection-operation.js';

export const scheduleHandler = createCollectionHandler(
  FUNCTION_NAMES.SCHEDULE,
  'schedules',
  store => store.schedules
);
