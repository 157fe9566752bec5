export { createSurfaceServer, type SurfaceServer, type SurfaceServerConfig } from './createSurfaceServer.js';
export { HostConnectionBridge } from './HostConnectionBridge.js';
export {
  HOST_ALREADY_CONNECTED_CLOSE_CODE,
  type HostSocket,
  type HostSocketListeners,
  type SocketServerFactory,
  type SocketServerHandle,
  type SocketServerOptions,
} from './types.js';
export { listenWithWs } from './wsSocketServer.js';
