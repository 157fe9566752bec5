import type { AddressInfo } from 'node:net';
import { type RawData, type WebSocket, WebSocketServer } from 'ws';
import type { HostSocket, SocketServerFactory } from './types.js';

function wrapSocket(ws: WebSocket): HostSocket {
  return {
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
  };
}

function boundPort(address: AddressInfo | string | null, fallback: number): number {
  return address !== null && typeof address === 'object' ? address.port : fallback;
}

/**
 * Socket server factory backed by `ws`.
 */
export const listenWithWs: SocketServerFactory = (options, onConnection) =>
  new Promise((resolve, reject) => {
    const wss = new WebSocketServer({
      port: options.port,
      ...(options.host !== undefined ? { host: options.host } : {}),
    });

    const onStartupError = (error: Error): void => {
      reject(error);
    };
    wss.once('error', onStartupError);

    wss.on('connection', (ws: WebSocket) => {
      const listeners = onConnection(wrapSocket(ws));

      ws.on('message', (data: RawData, isBinary: boolean) => {
        if (isBinary) return;
        listeners.onMessage(data.toString());
      });
      ws.on('close', () => listeners.onClose());
      ws.on('error', (error: Error) => listeners.onError(error));
    });

    wss.once('listening', () => {
      wss.off('error', onStartupError);
      resolve({
        port: boundPort(wss.address(), options.port),
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            for (const client of wss.clients) {
              client.terminate();
            }
            wss.close((error) => (error ? rejectClose(error) : resolveClose()));
          }),
      });
    });
  });
