import { MalformedEnvelopeError, type UserInteractionEnvelope } from '@stream-overlay/protocol';
import {
  createInMemoryHostTransport,
  createRecordingLogger,
  type InMemoryHostConnection,
  type InMemoryHostTransport,
  type RecordingLogger,
} from '@stream-overlay/testing';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  type ConnectionState,
  OverlayHostClient,
  type OverlayHostConfig,
  type OverlayHostEvents,
} from '../src/index.js';

const SURFACE_URL = 'ws://surface.test:3001';

interface Harness {
  client: OverlayHostClient;
  memory: InMemoryHostTransport;
  logger: RecordingLogger;
  states: ConnectionState[];
}

function createHarness(
  events: OverlayHostEvents = {},
  config: Omit<OverlayHostConfig, 'logger'> = {}
): Harness {
  const memory = createInMemoryHostTransport();
  const logger = createRecordingLogger();
  const states: ConnectionState[] = [];
  const client = new OverlayHostClient(
    {
      ...events,
      onConnectionStateChange: (state) => {
        states.push(state);
      },
    },
    { ...config, logger },
    memory.transport
  );
  return { client, memory, logger, states };
}

function latest(memory: InMemoryHostTransport): InMemoryHostConnection {
  const connection = memory.latest();
  if (!connection) throw new Error('no connection opened');
  return connection;
}

function connectAndOpen(harness: Harness): InMemoryHostConnection {
  harness.client.connect(SURFACE_URL);
  const connection = latest(harness.memory);
  connection.open();
  return connection;
}

describe('OverlayHostClient', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('connection', () => {
    it('should move through connecting to connected', () => {
      const harness = createHarness();

      harness.client.connect(SURFACE_URL);
      expect(harness.client.state).toBe('connecting');
      expect(harness.client.isConnected).toBe(false);

      latest(harness.memory).open();

      expect(harness.client.state).toBe('connected');
      expect(harness.client.isConnected).toBe(true);
      expect(harness.states).toEqual(['connecting', 'connected']);
      expect(latest(harness.memory).url).toBe(SURFACE_URL);
    });

    it('should become disconnected when the surface closes', () => {
      const harness = createHarness();
      const connection = connectAndOpen(harness);

      connection.drop();

      expect(harness.client.state).toBe('disconnected');
      expect(harness.client.isConnected).toBe(false);
      vi.advanceTimersByTime(10000);
      expect(harness.memory.connections).toHaveLength(1);
    });

    it('should report transport errors', () => {
      const harness = createHarness();
      const connection = connectAndOpen(harness);

      connection.fail(new Error('connection reset'));

      expect(harness.states).toEqual(['connecting', 'connected', 'error', 'disconnected']);
      expect(harness.logger.at('error')).toEqual([
        { level: 'error', message: 'Connection error', data: { error: 'connection reset' } },
      ]);
    });

    it('should close the connection and forget surface state on disconnect', () => {
      const harness = createHarness();
      const connection = connectAndOpen(harness);
      connection.deliverEnvelope({ type: 'webViewReady', data: {} });

      harness.client.disconnect();

      expect(connection.closedByClient).toBe(true);
      expect(harness.client.state).toBe('disconnected');
      expect(harness.client.isSurfaceReady).toBe(false);
    });

    it('should ignore events from a replaced connection', () => {
      const onSurfaceReady = vi.fn();
      const harness = createHarness({ onSurfaceReady });
      const first = connectAndOpen(harness);

      harness.client.connect('ws://other.test:3001');
      first.deliverEnvelope({ type: 'webViewReady', data: {} });

      expect(first.closedByClient).toBe(true);
      expect(onSurfaceReady).not.toHaveBeenCalled();
      expect(harness.client.state).toBe('connecting');
    });
  });

  describe('reconnection', () => {
    it('should retry after the delay up to the attempt limit', () => {
      const harness = createHarness(
        {},
        { autoReconnect: true, reconnectDelayMs: 500, maxReconnectAttempts: 2 }
      );
      connectAndOpen(harness).drop();

      vi.advanceTimersByTime(499);
      expect(harness.memory.connections).toHaveLength(1);
      vi.advanceTimersByTime(1);
      expect(harness.memory.connections).toHaveLength(2);

      latest(harness.memory).drop();
      vi.advanceTimersByTime(500);
      expect(harness.memory.connections).toHaveLength(3);

      latest(harness.memory).drop();
      vi.advanceTimersByTime(5000);
      expect(harness.memory.connections).toHaveLength(3);
      expect(harness.logger.at('warn').map((entry) => entry.message)).toEqual([
        'Max reconnection attempts reached',
      ]);
      expect(harness.memory.connections.map((connection) => connection.url)).toEqual([
        SURFACE_URL,
        SURFACE_URL,
        SURFACE_URL,
      ]);
    });

    it('should reset the attempt count after a successful reconnect', () => {
      const harness = createHarness(
        {},
        { autoReconnect: true, reconnectDelayMs: 100, maxReconnectAttempts: 1 }
      );
      connectAndOpen(harness).drop();
      vi.advanceTimersByTime(100);

      latest(harness.memory).open();
      latest(harness.memory).drop();
      vi.advanceTimersByTime(100);

      expect(harness.memory.connections).toHaveLength(3);
    });

    it('should not reconnect after disconnect', () => {
      const harness = createHarness({}, { autoReconnect: true, reconnectDelayMs: 100 });
      connectAndOpen(harness).drop();

      harness.client.disconnect();
      vi.advanceTimersByTime(1000);

      expect(harness.memory.connections).toHaveLength(1);
    });
  });

  describe('commands', () => {
    it('should send showComponent with duration and data', () => {
      const harness = createHarness();
      const connection = connectAndOpen(harness);

      const sent = harness.client.showComponent('rewardBadge', {
        durationMs: 5000,
        data: { points: '50' },
      });

      expect(sent).toBe(true);
      expect(connection.sent).toEqual([
        '{"type":"showComponent","data":{"component":"rewardBadge","duration":5000,"data":{"points":"50"}}}',
      ]);
    });

    it('should default to an indefinite show without data', () => {
      const harness = createHarness();
      const connection = connectAndOpen(harness);

      harness.client.showComponent('itemCard');

      expect(connection.sent).toEqual([
        '{"type":"showComponent","data":{"component":"itemCard","duration":0}}',
      ]);
    });

    it('should send hideComponent and updateComponentData', () => {
      const harness = createHarness();
      const connection = connectAndOpen(harness);

      harness.client.updateComponentData('itemCard', { currentPrice: '$750.000' });
      harness.client.hideComponent('itemCard');

      expect(connection.sent).toEqual([
        '{"type":"updateComponentData","data":{"component":"itemCard","data":{"currentPrice":"$750.000"}}}',
        '{"type":"hideComponent","data":{"component":"itemCard"}}',
      ]);
    });

    it('should refuse to send while disconnected', () => {
      const harness = createHarness();

      expect(harness.client.hideComponent('brandFollowCard')).toBe(false);
      expect(harness.logger.at('warn')).toEqual([
        {
          level: 'warn',
          message: 'Cannot send command - not connected',
          data: { type: 'hideComponent', component: 'brandFollowCard' },
        },
      ]);
    });
  });

  describe('surface events', () => {
    it('should report readiness', () => {
      const onSurfaceReady = vi.fn();
      const harness = createHarness({ onSurfaceReady });
      const connection = connectAndOpen(harness);

      connection.deliver('{"type":"webViewReady","data":{}}');

      expect(onSurfaceReady).toHaveBeenCalledTimes(1);
      expect(harness.client.isSurfaceReady).toBe(true);
    });

    it('should report readiness again after reconnecting', () => {
      const onSurfaceReady = vi.fn();
      const harness = createHarness({ onSurfaceReady });
      connectAndOpen(harness).deliverEnvelope({ type: 'webViewReady', data: {} });

      harness.client.disconnect();
      expect(harness.client.isSurfaceReady).toBe(false);

      const next = connectAndOpen(harness);
      next.deliverEnvelope({ type: 'webViewReady', data: {} });
      next.deliverEnvelope({ type: 'componentShown', data: { component: 'rewardBadge' } });

      expect(onSurfaceReady).toHaveBeenCalledTimes(2);
      expect(harness.client.isSurfaceReady).toBe(true);
      expect(harness.client.visibleComponents()).toEqual(['rewardBadge']);
    });

    it('should forget readiness when the connection drops', () => {
      const harness = createHarness();
      const connection = connectAndOpen(harness);
      connection.deliverEnvelope({ type: 'webViewReady', data: {} });

      connection.drop();

      expect(harness.client.isSurfaceReady).toBe(false);
    });

    it('should accept webViewReady without data', () => {
      const harness = createHarness();
      const connection = connectAndOpen(harness);

      connection.deliver('{"type":"webViewReady"}');

      expect(harness.client.isSurfaceReady).toBe(true);
    });

    it('should track visible components', () => {
      const onComponentShown = vi.fn();
      const onComponentHidden = vi.fn();
      const harness = createHarness({ onComponentShown, onComponentHidden });
      const connection = connectAndOpen(harness);

      connection.deliverEnvelope({ type: 'componentShown', data: { component: 'itemCard' } });
      connection.deliverEnvelope({ type: 'componentShown', data: { component: 'rewardBadge' } });
      connection.deliverEnvelope({ type: 'componentHidden', data: { component: 'itemCard' } });

      expect(harness.client.visibleComponents()).toEqual(['rewardBadge']);
      expect(onComponentShown.mock.calls).toEqual([['itemCard'], ['rewardBadge']]);
      expect(onComponentHidden).toHaveBeenCalledWith('itemCard');
    });

    it('should clear visible components when the connection drops', () => {
      const harness = createHarness();
      const connection = connectAndOpen(harness);
      connection.deliverEnvelope({ type: 'componentShown', data: { component: 'itemCard' } });

      connection.drop();

      expect(harness.client.visibleComponents()).toEqual([]);
    });

    it('should route user interactions', () => {
      const interactions: UserInteractionEnvelope[] = [];
      const harness = createHarness({
        onUserInteraction: (event) => {
          interactions.push(event);
        },
      });
      const connection = connectAndOpen(harness);

      connection.deliverEnvelope({ type: 'buyNowButtonClicked', data: { productId: 'sku-1' } });
      connection.deliverEnvelope({ type: 'exploreButtonClicked', data: {} });

      expect(interactions).toEqual([
        { type: 'buyNowButtonClicked', data: { productId: 'sku-1' } },
        { type: 'exploreButtonClicked', data: {} },
      ]);
    });

    it('should report undecodable messages', () => {
      const onProtocolError = vi.fn();
      const harness = createHarness({ onProtocolError });
      const connection = connectAndOpen(harness);

      connection.deliver('[1,2,3]');

      expect(onProtocolError).toHaveBeenCalledTimes(1);
      expect(onProtocolError.mock.calls[0]?.[0]).toBeInstanceOf(MalformedEnvelopeError);
      expect(harness.logger.at('warn')[0]?.data).toEqual({
        code: 'MalformedEnvelope',
        reason: 'Malformed envelope: envelope must be an object',
      });
    });

    it('should ignore host commands echoed back by the surface', () => {
      const onUserInteraction = vi.fn();
      const harness = createHarness({ onUserInteraction });
      const connection = connectAndOpen(harness);

      connection.deliver('{"type":"hideComponent","data":{"component":"itemCard"}}');

      expect(onUserInteraction).not.toHaveBeenCalled();
      expect(harness.logger.at('warn').map((entry) => entry.message)).toEqual([
        'Ignoring host command sent by surface',
      ]);
    });
  });
});
