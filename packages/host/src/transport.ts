/**
 * Callbacks a transport invokes for one connection attempt.
 */
export interface HostConnectionHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(): void;
  onError(error: Error): void;
}

/**
 * An open (or opening) connection to a surface.
 */
export interface HostConnection {
  send(data: string): void;
  close(): void;
  readonly isOpen: boolean;
}

/**
 * Opens a connection to a surface. Handlers are invoked asynchronously.
 */
export type HostTransport = (url: string, handlers: HostConnectionHandlers) => HostConnection;
