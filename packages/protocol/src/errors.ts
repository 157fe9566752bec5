/**
 * @fileoverview Error taxonomy shared by the surface and host sides.
 *
 * None of these errors cross the wire. The surface reports them as
 * diagnostics and drops the offending message; the host receives decode
 * failures through its error callback.
 */

/**
 * Machine-readable error codes.
 */
export type OverlayErrorCode =
  | 'MalformedEnvelope'
  | 'UnknownEventType'
  | 'UnknownComponent'
  | 'InvalidPayload'
  | 'PinnedComponent';

/**
 * Base class for protocol errors.
 */
export abstract class OverlayProtocolError extends Error {
  abstract readonly code: OverlayErrorCode;

  constructor(
    message: string,
    readonly details: Readonly<Record<string, unknown>> = {}
  ) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Flatten the error into logger-friendly data.
   */
  toLogData(): Record<string, unknown> {
    return { code: this.code, reason: this.message, ...this.details };
  }
}

/**
 * Wire data that is not a well-formed envelope.
 */
export class MalformedEnvelopeError extends OverlayProtocolError {
  override readonly code = 'MalformedEnvelope';

  constructor(reason: string, details: Readonly<Record<string, unknown>> = {}) {
    super(`Malformed envelope: ${reason}`, details);
  }
}

/**
 * An envelope whose `type` is a string outside the closed event set.
 * Expected while host and surface versions drift.
 */
export class UnknownEventTypeError extends OverlayProtocolError {
  override readonly code = 'UnknownEventType';

  constructor(readonly eventType: string) {
    super(`Unknown event type: ${eventType}`, { eventType });
  }
}

/**
 * A command referencing a component kind the registry does not know.
 */
export class UnknownComponentError extends OverlayProtocolError {
  override readonly code = 'UnknownComponent';

  constructor(readonly component: string) {
    super(`Unknown component: ${component}`, { component });
  }
}

/**
 * A payload that violates its component's schema.
 */
export class InvalidPayloadError extends OverlayProtocolError {
  override readonly code = 'InvalidPayload';

  constructor(
    readonly component: string,
    readonly issues: readonly string[]
  ) {
    super(`Invalid payload for ${component}: ${issues.join('; ')}`, { component, issues });
  }
}

/**
 * A show/hide/update aimed at a component that is permanently visible.
 */
export class PinnedComponentError extends OverlayProtocolError {
  override readonly code = 'PinnedComponent';

  constructor(readonly component: string) {
    super(`Component is pinned and accepts no control commands: ${component}`, { component });
  }
}

/**
 * Thrown when a registry is built with the same kind twice.
 */
export class DuplicateComponentError extends Error {
  constructor(kind: string) {
    super(`Component already registered: ${kind}`);
    this.name = 'DuplicateComponentError';
  }
}
