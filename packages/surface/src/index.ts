/**
 * @fileoverview Overlay surface: component lifecycle controller and the
 * socket server that connects it to a host.
 */

export {
  type ComponentSnapshot,
  ComponentInstance,
  type ExpiryCallback,
  type InstanceEffect,
  type TransitionResult,
  type VisibilityState,
} from './ComponentInstance.js';
export {
  clearConfigCache,
  loadSurfaceConfig,
  parseSurfaceConfig,
  type SurfaceConfig,
  SurfaceConfigError,
} from './config/surfaceConfig.js';
export {
  type ComponentPresenter,
  DEFAULT_MAX_PENDING_COMMANDS,
  OverlayController,
  type OverlayControllerOptions,
  type SurfaceBridge,
} from './OverlayController.js';
export { type QueueTask, SerialQueue } from './SerialQueue.js';
export {
  MAX_TIMER_DELAY_MS,
  type ScheduledTask,
  systemScheduler,
  type TimerScheduler,
} from './scheduler.js';
export * from './server/index.js';
export {
  createLogger,
  formatLog,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  logger,
} from './utils/logger.js';
