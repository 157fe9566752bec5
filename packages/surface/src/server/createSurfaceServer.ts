/**
 * @fileoverview Factory function to create an overlay surface server.
 *
 * Wires a socket server to an OverlayController:
 * - One host connection at a time
 * - The first host connection marks the surface ready; later ones are
 *   sent `webViewReady` and the components currently shown
 * - Inbound text frames go to the controller
 * - Graceful shutdown
 */

import { OverlayController, type OverlayControllerOptions } from '../OverlayController.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { HostConnectionBridge } from './HostConnectionBridge.js';
import {
  HOST_ALREADY_CONNECTED_CLOSE_CODE,
  type HostSocketListeners,
  type SocketServerFactory,
} from './types.js';
import { listenWithWs } from './wsSocketServer.js';

export interface SurfaceServerConfig {
  /** Port to listen on; 0 picks a free one */
  readonly port: number;
  readonly host?: string;
  /** Controller options other than the bridge, which the server supplies */
  readonly controllerOptions?: Omit<OverlayControllerOptions, 'bridge' | 'logger'>;
  /** Socket server factory (default: `ws`) */
  readonly listen?: SocketServerFactory;
  readonly logger?: Logger;
}

/**
 * Running surface server instance.
 */
export interface SurfaceServer {
  readonly controller: OverlayController;
  /** Port the server is listening on */
  readonly port: number;
  hasHost(): boolean;
  /** Dispose the controller and stop listening */
  stop(): Promise<void>;
}

/**
 * Create and start a surface server.
 *
 * @example
 * ```typescript
 * const server = await createSurfaceServer({ port: 3001 });
 *
 * // Later: graceful shutdown
 * await server.stop();
 * ```
 */
export async function createSurfaceServer(config: SurfaceServerConfig): Promise<SurfaceServer> {
  const logger = config.logger ?? defaultLogger;
  const listen = config.listen ?? listenWithWs;
  const bridge = new HostConnectionBridge(logger);
  const controller = new OverlayController({
    ...config.controllerOptions,
    bridge,
    logger,
  });

  const handle = await listen(
    config.host !== undefined ? { port: config.port, host: config.host } : { port: config.port },
    (socket): HostSocketListeners => {
      if (!bridge.attach(socket)) {
        logger.warn('Rejecting host connection; a host is already connected');
        socket.close(HOST_ALREADY_CONNECTED_CLOSE_CODE, 'Host already connected');
        return {
          onMessage: () => {},
          onClose: () => {},
          onError: () => {},
        };
      }

      logger.info('Host connected');
      controller.greetHost();

      return {
        onMessage: (text) => controller.receive(text),
        onClose: () => {
          bridge.detach(socket);
          logger.info('Host disconnected');
        },
        onError: (error) => {
          logger.error('Host connection error', { error: error.message });
        },
      };
    }
  );

  logger.info('Surface server listening', { port: handle.port, host: config.host ?? null });

  let stopped = false;
  return {
    controller,
    port: handle.port,
    hasHost: () => bridge.hasHost,
    stop: async () => {
      if (stopped) return;
      stopped = true;
      controller.dispose();
      await handle.close();
      logger.info('Surface server stopped');
    },
  };
}
