// src/constants/constants.ts

/**
 * Protocol function names as they appear in the `function` field of an envelope.
 */
export const FUNCTION_NAMES = {
  ACK: 'ack',
  IDENTIFICATION: 'identification',
  HEARTBEAT: 'heartbeat',
  ALARM: 'alarm',
  READ: 'read',
  CONFIGURATION: 'configuration',
  SCHEDULE: 'schedule',
  NOTIFICATION: 'notification',
  LOG: 'log',
  WRITE: 'write',
  RESET: 'reset',
  FIRMWARE_UPDATE: 'firmwareUpdate',
  PROFILE: 'profile',
  DIRECTIVE: 'directive',
  RELAY: 'relay',
} as const;

export type MassFunctionName = (typeof FUNCTION_NAMES)[keyof typeof FUNCTION_NAMES];

/**
 * Machine-readable codes carried in `failCode` of a fail response.
 */
export enum MassFailCode {
  MALFORMED_REQUEST = 100,
  MISSING_PARAMETER = 101,
  INVALID_PARAMETER = 102,
  DUPLICATE_ENTRY = 103,
  UNKNOWN_METER = 104,
  UNKNOWN_RELAY = 105,
  RANGE_TOO_LARGE = 106,
  INTERNAL_ERROR = 199,
}

export const MASS_FAIL_MESSAGES: Record<MassFailCode, string> = {
  [MassFailCode.MALFORMED_REQUEST]: 'Malformed request',
  [MassFailCode.MISSING_PARAMETER]: 'Missing required parameter',
  [MassFailCode.INVALID_PARAMETER]: 'Invalid parameter value',
  [MassFailCode.DUPLICATE_ENTRY]: 'Duplicate entry',
  [MassFailCode.UNKNOWN_METER]: 'Unknown meter',
  [MassFailCode.UNKNOWN_RELAY]: 'Unknown relay',
  [MassFailCode.RANGE_TOO_LARGE]: 'Requested range too large',
  [MassFailCode.INTERNAL_ERROR]: 'Internal device error',
};

// Frame grammar bytes: "#" <digits> "$" <payload>
export const FRAME_START = 0x23;
export const FRAME_SEPARATOR = 0x24;
export const DIGIT_ZERO = 0x30;
export const DIGIT_NINE = 0x39;
export const MAX_LENGTH_DIGITS = 9;

export const DEVICE_FLAG_LENGTH = 3;
export const SERIAL_NUMBER_LENGTH = 15;
export const PROTOCOL_VERSION = '1.0.0';

export const DEFAULT_TOPIC_TO_SERVER = 'mass/device/to_server';
export const DEFAULT_TOPIC_FROM_SERVER = 'mass/server/to_device';

export const DEFAULT_TELEMETRY = {
  registered: false,
  signal: 13,
  cpuTemp: 17,
} as const;

export const MIN_HEARTBEAT_INTERVAL_MS = 1;
/** Largest delay setTimeout and setInterval honour; longer ones fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const SIGNAL_RANGE: readonly [number, number] = [0, 31];
export const CPU_TEMP_RANGE: readonly [number, number] = [-40, 125];
export const DEFAULT_PROFILE_PERIOD_MINUTES = 15;
export const MAX_PROFILE_INTERVALS = 2976;
export const MAX_LOG_ENTRIES = 16;

/**
 * Incident codes reported in alarms and synthesized log entries.
 */
export const INCIDENT_DESCRIPTIONS: Record<number, string> = {
  104: 'power restored',
  278: 'cover opened',
  302: 'power outage',
  310: 'relay tampered',
  439: 'relay removed',
};

/**
 * OBIS registers of a full readout, in report order.
 */
export const READOUT_OBIS_CODES = [
  '0.0.0',
  '0.9.1',
  '0.9.2',
  '1.8.0',
  '1.8.1',
  '1.8.2',
  '1.8.3',
  '2.8.0',
] as const;

export const SHORT_READOUT_OBIS_CODES = ['0.0.0', '1.8.0'] as const;
