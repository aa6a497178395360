#!/usr/bin/env node
// src/main.ts

import 'dotenv/config';
import Logger from './logger.js';
import { loadConfig } from './config.js';
import { PROTOCOL_VERSION } from './constants/constants.js';
import { DeviceState } from './device-state/device-state.js';
import { DEFAULT_MANUFACTURE_DATE } from './device-state/defaults.js';
import { TelemetryDrift } from './device-state/telemetry-drift.js';
import { DefaultSampleGenerator } from './samples/sample-generator.js';
import { MqttTransport } from './transport/mqtt-transport.js';
import { MassDeviceEmulator } from './device-emulator/device-emulator.js';
import { ControlServer } from './control/control-server.js';

const loggerInstance = new Logger();
const logger = loggerInstance.createLogger('Main');

async function main(): Promise<void> {
  const config = loadConfig();

  loggerInstance.setLevel(config.log.level);
  if (!config.log.colors) loggerInstance.disableColors();

  logger.info('MASS communication unit simulator');
  logger.info(`Device: ${config.device.flag}/${config.device.serialNumber}`);
  logger.info(`Broker: ${config.mqtt.url}`);
  logger.info(`Topics: ${config.topics.toServer} / ${config.topics.fromServer}`);

  const state = new DeviceState({
    identity: {
      flag: config.device.flag,
      serialNumber: config.device.serialNumber,
      brand: config.device.brand,
      model: config.device.model,
      protocolVersion: PROTOCOL_VERSION,
      firmware: config.device.firmware,
      manufactureDate: DEFAULT_MANUFACTURE_DATE,
    },
  });

  const transport = new MqttTransport({
    url: config.mqtt.url,
    clientId: `mass_sim_${config.device.serialNumber}`,
    username: config.mqtt.username,
    password: config.mqtt.password,
    keepalive: config.mqtt.keepalive,
    qos: config.mqtt.qos,
    reconnectPeriod: config.mqtt.reconnectPeriod,
    logger: loggerInstance,
  });

  const emulator = new MassDeviceEmulator({
    transport,
    state,
    samples: new DefaultSampleGenerator(config.sampleSeed),
    topics: { inbound: config.topics.fromServer, outbound: config.topics.toServer },
    heartbeatInterval: config.heartbeatInterval,
    responseDelay: config.responseDelay,
    logger: loggerInstance,
  });

  const drift = new TelemetryDrift(state, loggerInstance.createLogger('TelemetryDrift'));
  const controlServer = new ControlServer({
    emulator,
    host: config.api.host,
    port: config.api.port,
    broker: config.mqtt.url,
    logger: loggerInstance,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down`);
    drift.stopAll();
    try {
      await controlServer.stop();
      await emulator.stop();
      process.exit(0);
    } catch (err: unknown) {
      logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).then(undefined, (err: unknown) => logger.error(String(err)));
    });
  }

  await emulator.start();

  if (config.drift.interval > 0) {
    drift.start({ field: 'signal', range: config.drift.signalRange, intervalMs: config.drift.interval });
    drift.start({ field: 'cpuTemp', range: config.drift.cpuTempRange, intervalMs: config.drift.interval });
  }

  await controlServer.start();
}

main().catch((err: unknown) => {
  logger.error(`Startup failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
