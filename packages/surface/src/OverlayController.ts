/**
 * @fileoverview Overlay controller: the surface's single entry point.
 *
 * Handles:
 * - Decoding inbound wire messages and dropping malformed ones
 * - Readiness gating (commands before `webViewReady` are buffered)
 * - Dispatching host commands to the per-kind state machines
 * - Emitting lifecycle and user-interaction events to the host
 * - Serializing every mutation, including timer expiries, through one queue
 */

import {
  type ComponentKind,
  type ComponentPayload,
  type ComponentRegistry,
  createComponentRegistry,
  decodeEnvelope,
  type Envelope,
  encodeEnvelope,
  type InboundEnvelope,
  isInboundEnvelope,
  type OutboundEnvelope,
  UnknownComponentError,
  type UserInteractionEnvelope,
} from '@stream-overlay/protocol';
import {
  ComponentInstance,
  type ComponentSnapshot,
  type TransitionResult,
} from './ComponentInstance.js';
import { SerialQueue } from './SerialQueue.js';
import { systemScheduler, type TimerScheduler } from './scheduler.js';
import { type Logger, logger as defaultLogger } from './utils/logger.js';

/**
 * Outgoing half of the transport: carries encoded envelopes to the host.
 */
export interface SurfaceBridge {
  send(wire: string): void;
}

/**
 * Rendering layer. Receives the visible consequences of each transition.
 */
export interface ComponentPresenter {
  show(kind: ComponentKind, payload: ComponentPayload): void;
  hide(kind: ComponentKind): void;
  update(kind: ComponentKind, payload: ComponentPayload): void;
}

export interface OverlayControllerOptions {
  readonly bridge: SurfaceBridge;
  readonly presenter?: ComponentPresenter;
  readonly registry?: ComponentRegistry;
  readonly scheduler?: TimerScheduler;
  readonly logger?: Logger;
  /** Commands held before readiness; further ones are dropped (default: 100) */
  readonly maxPendingCommands?: number;
}

export const DEFAULT_MAX_PENDING_COMMANDS = 100;

export class OverlayController {
  private readonly bridge: SurfaceBridge;
  private readonly presenter: ComponentPresenter | null;
  private readonly registry: ComponentRegistry;
  private readonly logger: Logger;
  private readonly maxPendingCommands: number;
  private readonly instances = new Map<ComponentKind, ComponentInstance>();
  private readonly queue: SerialQueue;
  private readonly pending: InboundEnvelope[] = [];
  private surfaceReady = false;
  private disposed = false;

  constructor(options: OverlayControllerOptions) {
    this.bridge = options.bridge;
    this.presenter = options.presenter ?? null;
    this.registry = options.registry ?? createComponentRegistry();
    this.logger = options.logger ?? defaultLogger;
    this.maxPendingCommands = options.maxPendingCommands ?? DEFAULT_MAX_PENDING_COMMANDS;
    this.queue = new SerialQueue((error) => {
      this.logger.error('Overlay task failed', { error: describeError(error) });
    });

    const scheduler = options.scheduler ?? systemScheduler;
    for (const kind of this.registry.listKinds()) {
      const instance = new ComponentInstance(
        this.registry.schemaFor(kind),
        this.registry,
        scheduler,
        (expiredKind, token) => this.queue.enqueue(() => this.expire(expiredKind, token)),
        this.logger
      );
      this.instances.set(kind, instance);
    }
  }

  // ============ Inbound ============

  /**
   * Decode a wire message from the host and process it.
   * Malformed messages are dropped with a diagnostic.
   */
  receive(wire: string): void {
    const result = decodeEnvelope(wire);
    if (!result.ok) {
      if (result.error.code === 'UnknownEventType') {
        this.logger.debug('Ignoring unknown event type', result.error.toLogData());
      } else {
        this.logger.warn('Dropped malformed envelope', result.error.toLogData());
      }
      return;
    }
    this.handleIncoming(result.envelope);
  }

  /**
   * Process a decoded envelope. Only host commands are acted on.
   */
  handleIncoming(envelope: Envelope): void {
    this.queue.enqueue(() => this.route(envelope));
  }

  /**
   * Announce readiness to the host and apply buffered commands.
   * Emits `webViewReady` once; later calls do nothing.
   */
  ready(): void {
    this.queue.enqueue(() => this.becomeReady());
  }

  /**
   * Bring a newly attached host up to date. The first call makes the surface
   * ready; later ones send that host `webViewReady` and a `componentShown`
   * for every component it currently shows.
   */
  greetHost(): void {
    this.queue.enqueue(() => {
      if (this.disposed) return;
      if (!this.surfaceReady) {
        this.becomeReady();
        return;
      }
      this.announceState();
    });
  }

  // ============ Outbound ============

  /**
   * Forward a user interaction from the presenter to the host unmodified.
   */
  emitUserEvent(event: UserInteractionEnvelope): void {
    this.queue.enqueue(() => {
      if (this.disposed) return;
      this.emit(event);
    });
  }

  // ============ Session ============

  /**
   * Cancel all countdowns and return every component to its initial state.
   */
  reset(): void {
    this.queue.enqueue(() => {
      for (const instance of this.instances.values()) {
        instance.reset();
      }
      this.logger.info('Overlay session reset');
    });
  }

  /**
   * Cancel all countdowns and stop processing input.
   */
  dispose(): void {
    this.disposed = true;
    this.pending.length = 0;
    for (const instance of this.instances.values()) {
      instance.dispose();
    }
  }

  // ============ Queries ============

  get isReady(): boolean {
    return this.surfaceReady;
  }

  get pendingCommandCount(): number {
    return this.pending.length;
  }

  /**
   * @throws {UnknownComponentError} if the kind is not registered
   */
  getSnapshot(kind: string): ComponentSnapshot {
    const instance = this.registry.isKnownKind(kind) ? this.instances.get(kind) : undefined;
    if (!instance) {
      throw new UnknownComponentError(kind);
    }
    return instance.snapshot();
  }

  snapshots(): ComponentSnapshot[] {
    return [...this.instances.values()].map((instance) => instance.snapshot());
  }

  // ============ Processing ============

  private route(envelope: Envelope): void {
    if (this.disposed) return;

    if (!isInboundEnvelope(envelope)) {
      this.logger.debug('Ignoring non-command envelope', { type: envelope.type });
      return;
    }

    if (!this.surfaceReady) {
      this.buffer(envelope);
      return;
    }

    this.apply(envelope);
  }

  private buffer(command: InboundEnvelope): void {
    if (this.pending.length >= this.maxPendingCommands) {
      this.logger.warn('Pending command buffer full; dropping command', {
        type: command.type,
        component: command.data.component,
        limit: this.maxPendingCommands,
      });
      return;
    }
    this.pending.push(command);
  }

  private becomeReady(): void {
    if (this.disposed) return;
    if (this.surfaceReady) {
      this.logger.debug('Surface already ready');
      return;
    }

    this.surfaceReady = true;
    this.emit({ type: 'webViewReady', data: {} });

    const buffered = this.pending.splice(0);
    this.logger.info('Surface ready', { bufferedCommands: buffered.length });
    for (const command of buffered) {
      this.apply(command);
    }
  }

  private announceState(): void {
    this.emit({ type: 'webViewReady', data: {} });
    const visible: ComponentKind[] = [];
    for (const instance of this.instances.values()) {
      if (instance.isPinned || instance.snapshot().state !== 'visible') continue;
      visible.push(instance.kind);
      this.emit({ type: 'componentShown', data: { component: instance.kind } });
    }
    this.logger.info('Re-announced surface state', { visible });
  }

  private apply(command: InboundEnvelope): void {
    const { component } = command.data;
    const instance = this.registry.isKnownKind(component)
      ? this.instances.get(component)
      : undefined;

    if (!instance) {
      const error = new UnknownComponentError(component);
      this.logger.warn(`Dropped ${command.type} command`, error.toLogData());
      return;
    }

    const result = this.dispatch(instance, command);
    if (!result.ok) {
      this.logger.warn(`Dropped ${command.type} command`, result.error.toLogData());
      return;
    }
    this.applyEffect(instance.kind, result);
  }

  private dispatch(instance: ComponentInstance, command: InboundEnvelope): TransitionResult {
    switch (command.type) {
      case 'showComponent':
        return instance.show(command.data.data, command.data.duration);
      case 'hideComponent':
        return instance.hide();
      case 'updateComponentData':
        return instance.update(command.data.data);
    }
  }

  private expire(kind: ComponentKind, token: number): void {
    if (this.disposed) return;
    const instance = this.instances.get(kind);
    if (!instance) return;
    this.applyEffect(kind, instance.expire(token));
  }

  private applyEffect(kind: ComponentKind, result: TransitionResult): void {
    if (!result.ok) return;
    const { effect } = result;

    switch (effect.type) {
      case 'shown':
        this.emit({ type: 'componentShown', data: { component: kind } });
        this.present('show', () => this.presenter?.show(kind, effect.payload));
        break;
      case 'hidden':
        this.emit({ type: 'componentHidden', data: { component: kind } });
        this.present('hide', () => this.presenter?.hide(kind));
        break;
      case 'updated':
        if (effect.visible) {
          this.present('update', () => this.presenter?.update(kind, effect.payload));
        }
        break;
      case 'none':
        break;
    }
  }

  private emit(envelope: OutboundEnvelope): void {
    this.bridge.send(encodeEnvelope(envelope));
  }

  private present(operation: string, render: () => void): void {
    try {
      render();
    } catch (error) {
      this.logger.error('Presenter failed', { operation, error: describeError(error) });
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
