/**
 * @fileoverview Wire codec for protocol envelopes.
 */

import { MalformedEnvelopeError, UnknownEventTypeError } from './errors.js';
import { Envelope, isEventType } from './messages.js';

/**
 * Outcome of decoding a wire string.
 */
export type DecodeResult =
  | { readonly ok: true; readonly envelope: Envelope }
  | { readonly ok: false; readonly error: MalformedEnvelopeError | UnknownEventTypeError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(reason: string, details?: Record<string, unknown>): DecodeResult {
  return { ok: false, error: new MalformedEnvelopeError(reason, details) };
}

/**
 * Serialize an envelope to its wire form.
 */
export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify(envelope);
}

/**
 * Parse and validate a wire string.
 *
 * Never throws. A string `type` outside the protocol yields an
 * UnknownEventTypeError so callers can tell version skew from corruption.
 */
export function decodeEnvelope(wire: string): DecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(wire);
  } catch (error) {
    return malformed('not valid JSON', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  if (!isRecord(raw)) {
    return malformed('envelope must be an object');
  }

  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const type = raw['type'];
  if (typeof type !== 'string') {
    return malformed('type must be a string');
  }
  if (!isEventType(type)) {
    return { ok: false, error: new UnknownEventTypeError(type) };
  }

  const result = Envelope.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return malformed(`invalid ${type} envelope`, { type, issues });
  }

  return { ok: true, envelope: result.data };
}
