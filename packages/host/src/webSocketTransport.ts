import { type RawData, WebSocket } from 'ws';
import type { HostTransport } from './transport.js';

/**
 * Host transport backed by `ws`.
 */
export const webSocketTransport: HostTransport = (url, handlers) => {
  const ws = new WebSocket(url);

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data: RawData, isBinary: boolean) => {
    if (isBinary) return;
    handlers.onMessage(data.toString());
  });
  ws.on('close', () => handlers.onClose());
  ws.on('error', (error: Error) => handlers.onError(error));

  return {
    send: (data) => ws.send(data),
    close: () => ws.close(),
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
  };
};
