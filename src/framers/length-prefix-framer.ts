// src/framers/length-prefix-framer.ts

import { MassFramer } from './mass-framer.js';
import { concatUint8Arrays, encodeText, sliceUint8Array } from '../utils/utils.js';
import { FramingError } from '../errors.js';
import {
  DIGIT_NINE,
  DIGIT_ZERO,
  FRAME_SEPARATOR,
  FRAME_START,
  MAX_LENGTH_DIGITS,
} from '../constants/constants.js';

const FRAME_START_BYTES = new Uint8Array([FRAME_START]);
const FRAME_SEPARATOR_BYTES = new Uint8Array([FRAME_SEPARATOR]);

/**
 * `#<length>$<payload>` framing, where length is the decimal byte count of the payload.
 */
export class LengthPrefixFramer implements MassFramer {
  public buildFrame(payload: Uint8Array): Uint8Array {
    const lengthBytes = encodeText(String(payload.length));
    return concatUint8Arrays([FRAME_START_BYTES, lengthBytes, FRAME_SEPARATOR_BYTES, payload]);
  }

  public parseFrame(frame: Uint8Array): Uint8Array {
    if (frame.length === 0 || frame[0] !== FRAME_START) {
      throw new FramingError('missing-start', 'frame must begin with "#"');
    }

    let cursor = 1;
    let declaredLength = 0;
    while (cursor < frame.length) {
      const byte = frame[cursor];
      if (byte === undefined || byte < DIGIT_ZERO || byte > DIGIT_NINE) break;
      if (cursor > MAX_LENGTH_DIGITS) {
        throw new FramingError('invalid-length', `length field exceeds ${MAX_LENGTH_DIGITS} digits`);
      }
      declaredLength = declaredLength * 10 + (byte - DIGIT_ZERO);
      cursor++;
    }

    if (cursor === 1) {
      if (cursor >= frame.length) {
        throw new FramingError('missing-length', 'no length digits after "#"');
      }
      if (frame[cursor] === FRAME_SEPARATOR) {
        throw new FramingError('missing-length', 'empty length field');
      }
      throw new FramingError('invalid-length', 'length field is not numeric');
    }

    if (cursor >= frame.length || frame[cursor] !== FRAME_SEPARATOR) {
      if (cursor < frame.length) {
        throw new FramingError('invalid-length', 'length field is not numeric');
      }
      throw new FramingError('missing-separator', 'no "$" after the length field');
    }

    const bodyStart = cursor + 1;
    const available = frame.length - bodyStart;
    if (declaredLength > available) {
      throw new FramingError(
        'truncated',
        `declared ${declaredLength} bytes, ${available} available`
      );
    }
    if (declaredLength < available) {
      throw new FramingError(
        'trailing-bytes',
        `declared ${declaredLength} bytes, ${available - declaredLength} left over`
      );
    }

    return sliceUint8Array(frame, bodyStart, bodyStart + declaredLength);
  }
}
