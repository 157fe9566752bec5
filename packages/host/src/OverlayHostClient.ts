/**
 * @fileoverview Host-side client for an overlay surface.
 *
 * Handles:
 * - Connection management with optional reconnection
 * - Typed show/hide/update commands for the controllable components
 * - Surface readiness and visibility tracking
 * - Routing user interactions to the host application
 */

import {
  type ComponentKind,
  ComponentKindSchema,
  type ComponentPayloadInputMap,
  type ComponentPayloadPatchMap,
  type ControllableComponentKind,
  decodeEnvelope,
  type Envelope,
  encodeEnvelope,
  type InboundEnvelope,
  type MalformedEnvelopeError,
  type UnknownEventTypeError,
  type UserInteractionEnvelope,
} from '@stream-overlay/protocol';
import type { HostConnection, HostTransport } from './transport.js';
import { webSocketTransport } from './webSocketTransport.js';

/**
 * Connection state for the host client.
 */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * Host client event handlers.
 */
export interface OverlayHostEvents {
  /** Called when connection state changes */
  onConnectionStateChange?: (state: ConnectionState) => void;

  /** Called when the surface reports it can accept commands */
  onSurfaceReady?: () => void;

  onComponentShown?: (component: string) => void;
  onComponentHidden?: (component: string) => void;

  /** Called for follow, buy-now, explore and reward clicks */
  onUserInteraction?: (event: UserInteractionEnvelope) => void;

  /** Called when a message from the surface cannot be decoded */
  onProtocolError?: (error: MalformedEnvelopeError | UnknownEventTypeError) => void;
}

export interface HostLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Host client configuration.
 */
export interface OverlayHostConfig {
  /** Enable automatic reconnection on disconnect */
  autoReconnect?: boolean;
  /** Reconnection delay in milliseconds */
  reconnectDelayMs?: number;
  /** Maximum reconnection attempts */
  maxReconnectAttempts?: number;
  logger?: HostLogger;
}

/**
 * Default host client configuration.
 */
export const DEFAULT_HOST_CONFIG: Required<Omit<OverlayHostConfig, 'logger'>> = {
  autoReconnect: false,
  reconnectDelayMs: 1000,
  maxReconnectAttempts: 5,
};

const consoleLogger: HostLogger = {
  info: (message, data) => console.log(`[OverlayHost] ${message}`, data ?? ''),
  warn: (message, data) => console.warn(`[OverlayHost] ${message}`, data ?? ''),
  error: (message, data) => console.error(`[OverlayHost] ${message}`, data ?? ''),
};

export interface ShowComponentOptions<K extends ControllableComponentKind> {
  /** Auto-hide delay in milliseconds; 0 or absent keeps it up until hidden */
  durationMs?: number;
  /** Replaces the stored payload; absent reuses it */
  data?: ComponentPayloadInputMap[K];
}

/**
 * Client that drives an overlay surface from the host process.
 *
 * @example
 * ```typescript
 * const client = new OverlayHostClient({
 *   onSurfaceReady: () => {
 *     client.showComponent('rewardBadge', { durationMs: 5000, data: { points: '50' } });
 *   },
 *   onUserInteraction: (event) => console.log(event.type),
 * });
 * client.connect('ws://127.0.0.1:3001');
 * ```
 */
export class OverlayHostClient {
  private connection: HostConnection | null = null;
  private connectionState: ConnectionState = 'disconnected';
  private generation = 0;
  private reconnectAttempts = 0;
  private reconnectTimeout: ReturnType<typeof setTimeout> | null = null;
  private lastUrl: string | null = null;
  private surfaceReady = false;
  private readonly visible = new Set<ComponentKind>();
  private readonly logger: HostLogger;

  constructor(
    private readonly events: OverlayHostEvents = {},
    private readonly config: OverlayHostConfig = DEFAULT_HOST_CONFIG,
    private readonly transport: HostTransport = webSocketTransport
  ) {
    this.logger = config.logger ?? consoleLogger;
  }

  // ============ Connection Management ============

  /**
   * Connect to a surface.
   * @param url - WebSocket URL (e.g., ws://127.0.0.1:3001)
   */
  connect(url: string): void {
    this.lastUrl = url;
    this.clearReconnectTimer();
    this.closeConnection();
    this.setConnectionState('connecting');

    const generation = this.generation;
    const isCurrent = (): boolean => generation === this.generation;

    this.connection = this.transport(url, {
      onOpen: () => {
        if (!isCurrent()) return;
        this.reconnectAttempts = 0;
        this.setConnectionState('connected');
      },
      onMessage: (text) => {
        if (!isCurrent()) return;
        this.receive(text);
      },
      onClose: () => {
        if (!isCurrent()) return;
        this.connection = null;
        this.surfaceReady = false;
        this.visible.clear();
        this.setConnectionState('disconnected');
        this.maybeReconnect();
      },
      onError: (error) => {
        if (!isCurrent()) return;
        this.logger.error('Connection error', { error: error.message });
        this.setConnectionState('error');
      },
    });
  }

  /**
   * Disconnect from the surface and forget its state.
   */
  disconnect(): void {
    this.clearReconnectTimer();
    this.reconnectAttempts = 0;
    this.lastUrl = null;
    this.closeConnection();
    this.surfaceReady = false;
    this.visible.clear();
    this.setConnectionState('disconnected');
  }

  get state(): ConnectionState {
    return this.connectionState;
  }

  get isConnected(): boolean {
    return this.connection !== null && this.connection.isOpen;
  }

  /** Whether `webViewReady` has been received on the current connection */
  get isSurfaceReady(): boolean {
    return this.surfaceReady;
  }

  /**
   * Components the surface has reported as shown and not yet hidden.
   */
  visibleComponents(): ComponentKind[] {
    return [...this.visible];
  }

  // ============ Commands ============

  showComponent<K extends ControllableComponentKind>(
    kind: K,
    options: ShowComponentOptions<K> = {}
  ): boolean {
    const duration = options.durationMs ?? 0;
    return this.send(
      options.data !== undefined
        ? { type: 'showComponent', data: { component: kind, duration, data: options.data } }
        : { type: 'showComponent', data: { component: kind, duration } }
    );
  }

  hideComponent(kind: ControllableComponentKind): boolean {
    return this.send({ type: 'hideComponent', data: { component: kind } });
  }

  updateComponentData<K extends ControllableComponentKind>(
    kind: K,
    patch: ComponentPayloadPatchMap[K]
  ): boolean {
    return this.send({ type: 'updateComponentData', data: { component: kind, data: patch } });
  }

  // ============ Incoming ============

  /**
   * Decode and route one message from the surface.
   */
  receive(wire: string): void {
    const result = decodeEnvelope(wire);
    if (!result.ok) {
      this.logger.warn('Dropped message from surface', result.error.toLogData());
      this.events.onProtocolError?.(result.error);
      return;
    }
    this.handleEnvelope(result.envelope);
  }

  // ============ Private Methods ============

  private handleEnvelope(envelope: Envelope): void {
    switch (envelope.type) {
      case 'webViewReady':
        this.surfaceReady = true;
        this.events.onSurfaceReady?.();
        break;

      case 'componentShown': {
        const kind = ComponentKindSchema.safeParse(envelope.data.component);
        if (kind.success) this.visible.add(kind.data);
        this.events.onComponentShown?.(envelope.data.component);
        break;
      }

      case 'componentHidden': {
        const kind = ComponentKindSchema.safeParse(envelope.data.component);
        if (kind.success) this.visible.delete(kind.data);
        this.events.onComponentHidden?.(envelope.data.component);
        break;
      }

      case 'followButtonClicked':
      case 'buyNowButtonClicked':
      case 'exploreButtonClicked':
      case 'rewardBadgeClicked':
        this.events.onUserInteraction?.(envelope);
        break;

      case 'showComponent':
      case 'hideComponent':
      case 'updateComponentData':
        this.logger.warn('Ignoring host command sent by surface', { type: envelope.type });
        break;
    }
  }

  private send(command: InboundEnvelope): boolean {
    if (!this.connection || !this.connection.isOpen) {
      this.logger.warn('Cannot send command - not connected', {
        type: command.type,
        component: command.data.component,
      });
      return false;
    }
    this.connection.send(encodeEnvelope(command));
    return true;
  }

  private setConnectionState(state: ConnectionState): void {
    this.connectionState = state;
    this.events.onConnectionStateChange?.(state);
  }

  private closeConnection(): void {
    // Handlers of the old connection compare against this
    this.generation++;
    if (this.connection) {
      this.connection.close();
      this.connection = null;
    }
  }

  private maybeReconnect(): void {
    const { autoReconnect, reconnectDelayMs, maxReconnectAttempts } = {
      ...DEFAULT_HOST_CONFIG,
      ...this.config,
    };

    if (!autoReconnect || !this.lastUrl) return;
    if (this.reconnectAttempts >= maxReconnectAttempts) {
      this.logger.warn('Max reconnection attempts reached', { attempts: this.reconnectAttempts });
      return;
    }

    this.reconnectAttempts++;
    this.logger.info(
      `Reconnecting in ${reconnectDelayMs}ms (attempt ${this.reconnectAttempts}/${maxReconnectAttempts})`
    );

    const url = this.lastUrl;
    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      this.connect(url);
    }, reconnectDelayMs);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
  }
}
