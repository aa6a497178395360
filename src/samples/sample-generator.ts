// src/samples/sample-generator.ts

import {
  INCIDENT_DESCRIPTIONS,
  MAX_LOG_ENTRIES,
  READOUT_OBIS_CODES,
  SHORT_READOUT_OBIS_CODES,
} from '../constants/constants.js';
import { createRandom, formatDeviceDate, hashString } from '../utils/utils.js';
import { MeterReference } from '../types/mass-types.js';

export type ReadoutSample = {
  id: string;
  rawData: string;
};

export type LogSample = {
  incidentCode: number;
  description: string;
  date: string;
  meter?: MeterReference;
};

export type ProfileInterval = {
  date: string;
  activeImport: number;
  reactiveImport: number;
};

export interface ReadoutRequest {
  directive: string;
  meterSerial?: string;
  obisCodes?: string[];
  readDate: Date;
}

export interface LogRequest {
  start: Date;
  end: Date;
  incidentCodes?: number[];
  meter?: MeterReference;
}

export interface ProfileRequest {
  start: Date;
  periodMinutes: number;
  count: number;
  meterSerial?: string;
}

/**
 * Source of synthetic measurement data, one method per data shape.
 * Implementations must return the same output for the same input.
 */
export interface SampleGenerator {
  readout(request: ReadoutRequest): ReadoutSample;
  log(request: LogRequest): LogSample[];
  profile(request: ProfileRequest): ProfileInterval[];
}

const METER_ID = '/LGZ5\\2ZMG405000b.P07';

/**
 * Seeded generator: every value derives from the seed and the request alone.
 */
export class DefaultSampleGenerator implements SampleGenerator {
  constructor(private readonly seed: number = 0) {}

  private randomFor(key: string): () => number {
    return createRandom((hashString(key) ^ this.seed) >>> 0);
  }

  private obisValue(code: string, meterSerial: string, readDate: Date): string {
    const date = formatDeviceDate(readDate);
    switch (code) {
      case '0.0.0':
        return meterSerial;
      case '0.9.1':
        return date.slice(11);
      case '0.9.2':
        return date.slice(0, 10);
      default: {
        const random = this.randomFor(`obis:${meterSerial}:${code}`);
        return (random() * 100000).toFixed(3).padStart(14, '0');
      }
    }
  }

  readout(request: ReadoutRequest): ReadoutSample {
    const meterSerial = request.meterSerial ?? '23660088';
    let codes: readonly string[];
    if (request.directive === 'shortReadout') {
      codes = SHORT_READOUT_OBIS_CODES;
    } else if (request.directive === 'obis' && request.obisCodes) {
      codes = request.obisCodes;
    } else {
      codes = READOUT_OBIS_CODES;
    }

    const rawData = codes
      .map(code => `${code}(${this.obisValue(code, meterSerial, request.readDate)})\r\n`)
      .join('');
    return { id: METER_ID, rawData };
  }

  log(request: LogRequest): LogSample[] {
    const knownCodes = Object.keys(INCIDENT_DESCRIPTIONS).map(Number);
    const codes =
      request.incidentCodes && request.incidentCodes.length > 0
        ? knownCodes.filter(code => request.incidentCodes?.includes(code))
        : knownCodes;
    if (codes.length === 0) return [];

    const startMs = request.start.getTime();
    const spanMs = request.end.getTime() - startMs;
    const random = this.randomFor(`log:${startMs}:${request.end.getTime()}:${codes.join(',')}`);
    const count = Math.min(MAX_LOG_ENTRIES, codes.length * 2);

    const offsets: number[] = [];
    for (let i = 0; i < count; i++) {
      // whole seconds, since dates are reported to the second
      offsets.push(Math.floor((random() * spanMs) / 1000) * 1000);
    }
    offsets.sort((a, b) => a - b);

    return offsets.map((offset, i) => {
      const incidentCode = codes[i % codes.length] ?? 0;
      const entry: LogSample = {
        incidentCode,
        description: INCIDENT_DESCRIPTIONS[incidentCode] ?? 'unknown incident',
        date: formatDeviceDate(new Date(startMs + offset)),
      };
      if (request.meter) entry.meter = { ...request.meter };
      return entry;
    });
  }

  profile(request: ProfileRequest): ProfileInterval[] {
    const random = this.randomFor(`profile:${request.meterSerial ?? ''}:${request.start.getTime()}`);
    const periodMs = request.periodMinutes * 60_000;
    const intervals: ProfileInterval[] = [];
    for (let i = 0; i < request.count; i++) {
      const date = new Date(request.start.getTime() + i * periodMs);
      const hourLoad = 0.5 + 0.5 * Math.sin((date.getUTCHours() / 24) * 2 * Math.PI);
      intervals.push({
        date: formatDeviceDate(date),
        activeImport: Number((hourLoad * 2 + random()).toFixed(3)),
        reactiveImport: Number((hourLoad * 0.4 + random() * 0.2).toFixed(3)),
      });
    }
    return intervals;
  }
}
