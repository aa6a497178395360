// src/framers/envelope-codec.ts

import { z } from 'zod';
import { MassFramer } from './mass-framer.js';
import { LengthPrefixFramer } from './length-prefix-framer.js';
import { FramingError } from '../errors.js';
import { decodeText, encodeText } from '../utils/utils.js';
import { Envelope, InboundEnvelope, JsonValue } from '../types/mass-types.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const inboundEnvelopeSchema = z.object({
  device: z.object({ flag: z.string(), serialNumber: z.string() }).optional(),
  function: z.string(),
  referenceId: z.string(),
  streaming: z.boolean().optional(),
  messageStatus: z.enum(['success', 'fail']).optional(),
  request: jsonValueSchema.optional(),
  response: jsonValueSchema.optional(),
  notification: jsonValueSchema.optional(),
});

/**
 * JSON layer on top of a framer: envelopes are written as compact UTF-8 JSON.
 */
export class EnvelopeCodec {
  constructor(private readonly framer: MassFramer = new LengthPrefixFramer()) {}

  public encode(envelope: Envelope): Uint8Array {
    return this.framer.buildFrame(encodeText(JSON.stringify(envelope)));
  }

  /**
   * @throws FramingError when the frame, its JSON, or the envelope header is invalid
   */
  public decode(frame: Uint8Array): InboundEnvelope {
    const body = this.framer.parseFrame(frame);

    let parsed: unknown;
    try {
      parsed = JSON.parse(decodeText(body));
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new FramingError('invalid-body', `body is not UTF-8 JSON: ${reason}`);
    }

    const result = inboundEnvelopeSchema.safeParse(parsed);
    if (!result.success) {
      const paths = result.error.issues.map(issue => issue.path.join('.') || '(root)');
      throw new FramingError('invalid-body', `invalid envelope fields: ${paths.join(', ')}`);
    }
    return result.data;
  }
}
