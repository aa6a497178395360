// test/utils.test.ts

import { describe, expect, it } from 'vitest';
import {
  createRandom,
  decodeText,
  formatDeviceDate,
  hashString,
  parseDeviceDate,
  randomInt,
} from '../src/utils/utils.js';

describe('device dates', () => {
  it('formats in UTC to the second', () => {
    expect(formatDeviceDate(new Date(Date.UTC(2024, 0, 5, 7, 8, 9, 999)))).toBe('2024-01-05 07:08:09');
  });

  it('parses its own format', () => {
    expect(parseDeviceDate('2024-10-21 10:00:00')?.getTime()).toBe(Date.UTC(2024, 9, 21, 10, 0, 0));
  });

  it.each(['2024-02-30 00:00:00', '2024-10-21 24:00:00', '2024-10-21T10:00:00', '21.10.2024', ''])(
    'rejects %j',
    text => {
      expect(parseDeviceDate(text)).toBeNull();
    }
  );
});

describe('decodeText', () => {
  it('throws on invalid UTF-8', () => {
    expect(() => decodeText(new Uint8Array([0xff, 0xfe]))).toThrow(TypeError);
  });
});

describe('seeded randomness', () => {
  it('hashes with 32-bit FNV-1a', () => {
    expect(hashString('')).toBe(0x811c9dc5);
    expect(hashString('a')).toBe(0xe40c292c);
  });

  it('repeats a sequence for the same seed', () => {
    const a = createRandom(42);
    const b = createRandom(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    expect(first.every(value => value >= 0 && value < 1)).toBe(true);
  });

  it('maps the source onto an inclusive integer range', () => {
    expect(randomInt(3, 7, () => 0)).toBe(3);
    expect(randomInt(3, 7, () => 0.9999)).toBe(7);
    expect(randomInt(-2, -2, () => 0.5)).toBe(-2);
  });
});
