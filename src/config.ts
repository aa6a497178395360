// src/config.ts

import { z } from 'zod';
import {
  CPU_TEMP_RANGE,
  DEFAULT_TOPIC_FROM_SERVER,
  DEFAULT_TOPIC_TO_SERVER,
  DEVICE_FLAG_LENGTH,
  MAX_TIMER_DELAY_MS,
  SERIAL_NUMBER_LENGTH,
  SIGNAL_RANGE,
} from './constants/constants.js';
import { ConfigError } from './errors.js';
import { LogLevel, MqttQos } from './types/mass-types.js';

export interface SimulatorConfig {
  device: {
    flag: string;
    serialNumber: string;
    brand: string;
    model: string;
    firmware: string;
  };
  mqtt: {
    url: string;
    username?: string;
    password?: string;
    /** seconds */
    keepalive: number;
    qos: MqttQos;
    /** ms */
    reconnectPeriod: number;
  };
  topics: {
    toServer: string;
    fromServer: string;
  };
  /** ms */
  heartbeatInterval: number;
  api: {
    host: string;
    port: number;
  };
  /** ms */
  responseDelay: number;
  sampleSeed: number;
  drift: {
    /** ms; 0 disables drift */
    interval: number;
    signalRange: [number, number];
    cpuTempRange: [number, number];
  };
  log: {
    level: LogLevel;
    colors: boolean;
  };
}

const integer = (min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'expected an integer')
    .transform(Number)
    .pipe(z.number().int().min(min).max(max));

const range = (bounds: readonly [number, number]) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+\s*-\s*-?\d+$/, 'expected min-max')
    .transform((text, ctx): [number, number] => {
      const match = /^(-?\d+)\s*-\s*(-?\d+)$/.exec(text);
      const min = Number(match?.[1]);
      const max = Number(match?.[2]);
      if (min > max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'min must not exceed max' });
        return z.NEVER;
      }
      if (min < bounds[0] || max > bounds[1]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must lie within ${bounds[0]}-${bounds[1]}` });
        return z.NEVER;
      }
      return [min, max];
    });

/** Longest timer delay in whole seconds */
const MAX_TIMER_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const optionalText = z
  .string()
  .optional()
  .transform(value => (value ? value : undefined));

const envSchema = z.object({
  DEVICE_FLAG: z.string().length(DEVICE_FLAG_LENGTH).default('XYZ'),
  DEVICE_SERIAL: z.string().length(SERIAL_NUMBER_LENGTH).default('0123456789ABCDE'),
  DEVICE_BRAND: z.string().min(1).default('SimulatorBrand'),
  DEVICE_MODEL: z.string().min(1).default('SimV1.0'),
  FIRMWARE: z.string().min(1).default('1.01'),
  MQTT_URL: optionalText,
  MQTT_BROKER: z.string().min(1).default('localhost'),
  MQTT_PORT: integer(1, 65535).default('1883'),
  MQTT_USERNAME: optionalText,
  MQTT_PASSWORD: optionalText,
  MQTT_KEEPALIVE: integer(0, 65535).default('60'),
  MQTT_QOS: z.enum(['0', '1', '2']).default('1').transform((value): MqttQos => (value === '0' ? 0 : value === '1' ? 1 : 2)),
  MQTT_RECONNECT_PERIOD: integer(0, MAX_TIMER_DELAY_MS).default('2000'),
  TOPIC_TO_SERVER: z.string().min(1).default(DEFAULT_TOPIC_TO_SERVER),
  TOPIC_FROM_SERVER: z.string().min(1).default(DEFAULT_TOPIC_FROM_SERVER),
  HEARTBEAT_INTERVAL: integer(1, MAX_TIMER_SECONDS).default('60'),
  API_PORT: integer(0, 65535).default('8000'),
  API_HOST: z.string().min(1).default('0.0.0.0'),
  RESPONSE_DELAY_MS: integer(0, MAX_TIMER_DELAY_MS).default('0'),
  SAMPLE_SEED: integer(0, 0xffffffff).default('0'),
  TELEMETRY_DRIFT_INTERVAL: integer(0, MAX_TIMER_SECONDS).default('0'),
  SIGNAL_DRIFT_RANGE: range(SIGNAL_RANGE).default('10-31'),
  CPU_TEMP_DRIFT_RANGE: range(CPU_TEMP_RANGE).default('15-45'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  LOG_COLORS: flag.default('true'),
});

/**
 * Reads the simulator configuration from environment variables.
 * Empty variables count as unset.
 * @throws ConfigError naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SimulatorConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') present[key] = value;
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(String(issue?.path[0] ?? 'environment'), issue?.message ?? 'invalid value');
  }
  const e = result.data;

  return {
    device: {
      flag: e.DEVICE_FLAG,
      serialNumber: e.DEVICE_SERIAL,
      brand: e.DEVICE_BRAND,
      model: e.DEVICE_MODEL,
      firmware: e.FIRMWARE,
    },
    mqtt: {
      url: e.MQTT_URL ?? `mqtt://${e.MQTT_BROKER}:${e.MQTT_PORT}`,
      username: e.MQTT_USERNAME,
      password: e.MQTT_PASSWORD,
      keepalive: e.MQTT_KEEPALIVE,
      qos: e.MQTT_QOS,
      reconnectPeriod: e.MQTT_RECONNECT_PERIOD,
    },
    topics: {
      toServer: e.TOPIC_TO_SERVER,
      fromServer: e.TOPIC_FROM_SERVER,
    },
    heartbeatInterval: e.HEARTBEAT_INTERVAL * 1000,
    api: { host: e.API_HOST, port: e.API_PORT },
    responseDelay: e.RESPONSE_DELAY_MS,
    sampleSeed: e.SAMPLE_SEED,
    drift: {
      interval: e.TELEMETRY_DRIFT_INTERVAL * 1000,
      signalRange: e.SIGNAL_DRIFT_RANGE,
      cpuTempRange: e.CPU_TEMP_DRIFT_RANGE,
    },
    log: { level: e.LOG_LEVEL, colors: e.LOG_COLORS },
  };
}
