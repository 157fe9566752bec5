/**
 * @fileoverview Overlay surface standalone server.
 */

import { loadSurfaceConfig } from './config/surfaceConfig.js';
import { createSurfaceServer } from './server/createSurfaceServer.js';
import { createLogger } from './utils/logger.js';

const config = loadSurfaceConfig();
const logger = createLogger({ scope: 'Surface', level: config.logging.level });

// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
const port = Number(process.env['PORT']) || config.server.port;

const server = await createSurfaceServer({
  port,
  host: config.server.host,
  controllerOptions: { maxPendingCommands: config.controller.maxPendingCommands },
  logger,
});

const shutdown = async (signal: string): Promise<void> => {
  logger.info(`${signal} received, shutting down...`);
  try {
    await server.stop();
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
