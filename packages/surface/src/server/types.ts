/**
 * A connected host, as seen by the surface server.
 */
export interface HostSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

/**
 * Callbacks the server registers for one connection.
 */
export interface HostSocketListeners {
  onMessage(text: string): void;
  onClose(): void;
  onError(error: Error): void;
}

export interface SocketServerOptions {
  readonly port: number;
  readonly host?: string;
}

/**
 * A listening socket server.
 */
export interface SocketServerHandle {
  /** Port actually bound (differs from the requested one when 0 was asked for) */
  readonly port: number;
  close(): Promise<void>;
}

/**
 * Starts listening and hands every accepted connection to `onConnection`.
 * Resolves once the server is bound.
 */
export type SocketServerFactory = (
  options: SocketServerOptions,
  onConnection: (socket: HostSocket) => HostSocketListeners
) => Promise<SocketServerHandle>;

/** Close code sent to a host that connects while another one is attached */
export const HOST_ALREADY_CONNECTED_CLOSE_CODE = 1013;
