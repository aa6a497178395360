// test/sample-generator.test.ts

import { describe, expect, it } from 'vitest';
import { DefaultSampleGenerator } from '../src/samples/sample-generator.js';
import { FIXED_NOW } from './helpers.js';

describe('DefaultSampleGenerator', () => {
  it('gives identical readouts for identical requests', () => {
    const request = { directive: 'readout', readDate: FIXED_NOW };
    expect(new DefaultSampleGenerator(3).readout(request)).toEqual(new DefaultSampleGenerator(3).readout(request));
  });

  it('varies register values with the seed', () => {
    const request = { directive: 'obis', obisCodes: ['1.8.0', '2.8.0'], readDate: FIXED_NOW };
    expect(new DefaultSampleGenerator(1).readout(request).rawData).not.toBe(
      new DefaultSampleGenerator(2).readout(request).rawData
    );
  });

  it('keeps a register stable across directives', () => {
    const generator = new DefaultSampleGenerator();
    const full = generator.readout({ directive: 'readout', readDate: FIXED_NOW }).rawData;
    const single = generator.readout({ directive: 'obis', obisCodes: ['1.8.0'], readDate: FIXED_NOW }).rawData;
    expect(full).toContain(single);
  });

  it('caps log entries at sixteen', () => {
    const generator = new DefaultSampleGenerator();
    const entries = generator.log({
      start: new Date(Date.UTC(2024, 0, 1)),
      end: new Date(Date.UTC(2024, 11, 31)),
    });
    expect(entries.length).toBeLessThanOrEqual(16);
    expect(entries.every(entry => /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/.test(entry.date))).toBe(true);
  });

  it('puts every log entry at the start of an empty range', () => {
    const start = new Date(Date.UTC(2024, 9, 21, 8, 0, 0));
    const entries = new DefaultSampleGenerator().log({ start, end: start, incidentCodes: [278] });
    expect(entries).toEqual([
      { incidentCode: 278, description: 'cover opened', date: '2024-10-21 08:00:00' },
      { incidentCode: 278, description: 'cover opened', date: '2024-10-21 08:00:00' },
    ]);
  });

  it('spaces profile intervals by the period', () => {
    const intervals = new DefaultSampleGenerator().profile({
      start: new Date(Date.UTC(2024, 9, 21, 23, 30, 0)),
      periodMinutes: 30,
      count: 3,
    });
    expect(intervals.map(interval => interval.date)).toEqual([
      '2024-10-21 23:30:00',
      '2024-10-22 00:00:00',
      '2024-10-22 00:30:00',
    ]);
    expect(intervals.every(interval => interval.activeImport >= 0 && interval.reactiveImport >= 0)).toBe(true);
  });
});
