// src/functions/handlers.ts

import { FunctionRouter } from './function-router.js';
import { FunctionHandler } from './function-handler.js';
import { identificationHandler } from './identification.js';
import { heartbeatHandler } from './heartbeat.js';
import { alarmHandler } from './alarm.js';
import { readHandler } from './read.js';
import { configurationHandler } from './configuration.js';
import { scheduleHandler } from './schedule.js';
import { notificationHandler } from './notification.js';
import { logHandler } from './log.js';
import { writeHandler } from './write.js';
import { resetHandler } from './reset.js';
import { firmwareUpdateHandler } from './firmware-update.js';
import { profileHandler } from './profile.js';
import { directiveHandler } from './directive.js';
import { relayHandler } from './relay.js';

/** Handlers the server may call */
export const INBOUND_HANDLERS: readonly FunctionHandler[] = [
  identificationHandler,
  heartbeatHandler,
  readHandler,
  configurationHandler,
  scheduleHandler,
  notificationHandler,
  logHandler,
  writeHandler,
  resetHandler,
  firmwareUpdateHandler,
  profileHandler,
  directiveHandler,
  relayHandler,
];

/** Handlers reachable only as device-initiated pushes */
export const PUSH_ONLY_HANDLERS: readonly FunctionHandler[] = [alarmHandler];

export function registerDefaultHandlers(router: FunctionRouter): FunctionRouter {
  for (const handler of INBOUND_HANDLERS) router.register(handler);
  for (const handler of PUSH_ONLY_HANDLERS) router.register(handler, { inbound: false });
  return router;
}
