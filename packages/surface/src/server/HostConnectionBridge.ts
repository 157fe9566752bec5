import type { SurfaceBridge } from '../OverlayController.js';
import type { Logger } from '../utils/logger.js';
import type { HostSocket } from './types.js';

/**
 * Carries outgoing envelopes to the single attached host.
 */
export class HostConnectionBridge implements SurfaceBridge {
  private socket: HostSocket | null = null;

  constructor(private readonly logger: Logger) {}

  /**
   * Attach a host. Fails if one is already attached.
   */
  attach(socket: HostSocket): boolean {
    if (this.socket) {
      return false;
    }
    this.socket = socket;
    return true;
  }

  /**
   * Detach a host. Ignores sockets that are not the attached one.
   */
  detach(socket: HostSocket): void {
    if (this.socket === socket) {
      this.socket = null;
    }
  }

  get hasHost(): boolean {
    return this.socket !== null;
  }

  send(wire: string): void {
    if (!this.socket) {
      this.logger.debug('No host connected; dropping envelope', { wire });
      return;
    }
    this.socket.send(wire);
  }
}
