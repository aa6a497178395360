// src/functions/notification.ts

import { FUNCTION_NAMES } from '../constants/constants.js';
import { createCollectionHandler } from './collection-operation.js';

export const notificationHandler = createCollectionHandler(
  FUNCTION_NAMES.NOTIFICATION,
  'notifications',
  store => store.notifications
);
