/**
 * @fileoverview Per-component visibility state machine.
 *
 * Each component kind has exactly one instance for the whole session:
 *
 *   hidden → showing → visible → hiding → hidden
 *
 * The entry and exit animations belong to the presenter, so `showing` and
 * `hiding` are passed through within a single processing step. Pinned kinds
 * (the explore button) sit in `visible` permanently and reject every command.
 */

import {
  type ComponentDefinition,
  type ComponentKind,
  type ComponentPayload,
  type ComponentRegistry,
  type InvalidPayloadError,
  PinnedComponentError,
} from '@stream-overlay/protocol';
import type { ScheduledTask, TimerScheduler } from './scheduler.js';
import type { Logger } from './utils/logger.js';

export type VisibilityState = 'hidden' | 'showing' | 'visible' | 'hiding';

/**
 * Read-only view of an instance.
 */
export interface ComponentSnapshot {
  readonly kind: ComponentKind;
  readonly state: VisibilityState;
  readonly payload: ComponentPayload | null;
  /** Epoch milliseconds at which the component auto-hides; null while indefinite or hidden */
  readonly expiry: number | null;
}

/**
 * What a successful transition means for the outside world.
 */
export type InstanceEffect =
  | { readonly type: 'shown'; readonly payload: ComponentPayload }
  | { readonly type: 'hidden' }
  | { readonly type: 'updated'; readonly payload: ComponentPayload; readonly visible: boolean }
  | { readonly type: 'none' };

export type TransitionResult =
  | { readonly ok: true; readonly effect: InstanceEffect }
  | { readonly ok: false; readonly error: InvalidPayloadError | PinnedComponentError };

/**
 * Called when an armed countdown elapses. The token identifies the arming;
 * the owner passes it back to `expire` once it gets a processing slot.
 */
export type ExpiryCallback = (kind: ComponentKind, token: number) => void;

const NO_EFFECT: TransitionResult = { ok: true, effect: { type: 'none' } };

export class ComponentInstance {
  readonly kind: ComponentKind;
  private readonly pinned: boolean;
  private state: VisibilityState;
  private payload: ComponentPayload | null = null;
  private expiry: number | null = null;
  private timer: ScheduledTask | null = null;
  private timerToken = 0;

  constructor(
    definition: ComponentDefinition,
    private readonly registry: ComponentRegistry,
    private readonly scheduler: TimerScheduler,
    private readonly onExpire: ExpiryCallback,
    private readonly logger: Logger
  ) {
    this.kind = definition.kind;
    this.pinned = definition.pinned;
    this.state = this.initialState();
    if (this.pinned) {
      this.payload = this.validate({});
    }
  }

  // ============ Transitions ============

  /**
   * Show the component, replacing its payload when `data` is given and
   * reusing the stored payload otherwise.
   * @param durationMs - Auto-hide delay; 0 keeps the component up until hidden
   */
  show(data: Readonly<Record<string, unknown>> | undefined, durationMs: number): TransitionResult {
    if (this.pinned) {
      return { ok: false, error: new PinnedComponentError(this.kind) };
    }

    const validation = this.registry.validatePayload(this.kind, data ?? this.payload ?? {});
    if (!validation.success) {
      return { ok: false, error: validation.error };
    }

    this.cancelTimer();
    this.payload = validation.payload;
    this.transition('showing');
    if (durationMs > 0) {
      this.armTimer(durationMs);
    }
    this.transition('visible');

    return { ok: true, effect: { type: 'shown', payload: validation.payload } };
  }

  /**
   * Hide the component now. A no-op while already hidden.
   */
  hide(): TransitionResult {
    if (this.pinned) {
      return { ok: false, error: new PinnedComponentError(this.kind) };
    }
    if (this.state === 'hidden') {
      return NO_EFFECT;
    }

    this.cancelTimer();
    this.transition('hiding');
    this.transition('hidden');
    return { ok: true, effect: { type: 'hidden' } };
  }

  /**
   * Merge fields into the payload. The merged result must satisfy the full
   * schema. Never changes visibility or the countdown.
   */
  update(patch: Readonly<Record<string, unknown>>): TransitionResult {
    if (this.pinned) {
      return { ok: false, error: new PinnedComponentError(this.kind) };
    }

    const validation = this.registry.validatePayload(this.kind, { ...this.payload, ...patch });
    if (!validation.success) {
      return { ok: false, error: validation.error };
    }

    this.payload = validation.payload;
    return {
      ok: true,
      effect: { type: 'updated', payload: validation.payload, visible: this.state !== 'hidden' },
    };
  }

  /**
   * Apply a countdown that has elapsed. Stale tokens, and instances that are
   * no longer visible with a finite expiry, are ignored.
   */
  expire(token: number): TransitionResult {
    if (token !== this.timerToken || this.expiry === null || this.state !== 'visible') {
      this.logger.debug('Discarding stale expiry', { component: this.kind, token });
      return NO_EFFECT;
    }

    this.timer = null;
    this.expiry = null;
    this.transition('hiding');
    this.transition('hidden');
    return { ok: true, effect: { type: 'hidden' } };
  }

  /**
   * Return to the initial state, dropping payload and countdown.
   */
  reset(): void {
    this.cancelTimer();
    this.state = this.initialState();
    this.payload = this.pinned ? this.validate({}) : null;
  }

  /**
   * Cancel any pending countdown.
   */
  dispose(): void {
    this.cancelTimer();
  }

  // ============ Queries ============

  snapshot(): ComponentSnapshot {
    return {
      kind: this.kind,
      state: this.state,
      payload: this.payload,
      expiry: this.expiry,
    };
  }

  get isPinned(): boolean {
    return this.pinned;
  }

  // ============ Internals ============

  private initialState(): VisibilityState {
    return this.pinned ? 'visible' : 'hidden';
  }

  private transition(next: VisibilityState): void {
    this.logger.debug('Component transition', { component: this.kind, from: this.state, to: next });
    this.state = next;
  }

  private armTimer(durationMs: number): void {
    this.cancelTimer();
    const token = ++this.timerToken;
    this.expiry = this.scheduler.now() + durationMs;
    this.timer = this.scheduler.schedule(durationMs, () => this.onExpire(this.kind, token));
  }

  private cancelTimer(): void {
    if (this.timer) {
      this.timer.cancel();
      this.timer = null;
    }
    this.expiry = null;
    this.timerToken++;
  }

  private validate(candidate: Readonly<Record<string, unknown>>): ComponentPayload | null {
    const validation = this.registry.validatePayload(this.kind, candidate);
    return validation.success ? validation.payload : null;
  }
}
