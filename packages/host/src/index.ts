export {
  type ConnectionState,
  DEFAULT_HOST_CONFIG,
  type HostLogger,
  OverlayHostClient,
  type OverlayHostConfig,
  type OverlayHostEvents,
  type ShowComponentOptions,
} from './OverlayHostClient.js';
export type { HostConnection, HostConnectionHandlers, HostTransport } from './transport.js';
export { webSocketTransport } from './webSocketTransport.js';
