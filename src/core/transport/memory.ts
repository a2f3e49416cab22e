/**
 * In-process messaging fabric with the same contract as the TCP transport
 * Sends are handled synchronously by the receiving node's handler.
 */

import { TransportError } from '../errors.js';
import { formatEndpoint, type Endpoint } from '../node.js';
import { dispatchInbound } from './inbound.js';
import type { Listener, MessageHandler, MessageTransport } from './types.js';

const EPHEMERAL_PORT_START = 49152;

export class MemoryTransport implements MessageTransport {
  readonly name = 'memory';
  private handlers = new Map<string, MessageHandler>();
  private nextEphemeralPort = EPHEMERAL_PORT_START;

  async bind(endpoint: Endpoint, onMessage: MessageHandler, signal: AbortSignal): Promise<Listener> {
    const bound = endpoint.port === 0 ? this.ephemeral(endpoint.host) : endpoint;
    const address = formatEndpoint(bound);

    if (signal.aborted) {
      throw new TransportError(`Listener for ${address} cancelled before bind`, address);
    }
    if (this.handlers.has(address)) {
      throw new TransportError(`Address ${address} already in use`, address);
    }

    this.handlers.set(address, onMessage);

    const closed = new Promise<void>((resolve) => {
      signal.addEventListener(
        'abort',
        () => {
          this.handlers.delete(address);
          resolve();
        },
        { once: true }
      );
    });

    return { endpoint: bound, closed };
  }

  async send(endpoint: Endpoint, payload: string): Promise<void> {
    const address = formatEndpoint(endpoint);
    const handler = this.handlers.get(address);
    if (!handler) {
      throw new TransportError(`Connection refused by ${address}`, address);
    }

    dispatchInbound(address, handler, payload);
  }

  isListening(endpoint: Endpoint): boolean {
    return this.handlers.has(formatEndpoint(endpoint));
  }

  private ephemeral(host: string): Endpoint {
    while (this.handlers.has(formatEndpoint({ host, port: this.nextEphemeralPort }))) {
      this.nextEphemeralPort++;
    }
    return { host, port: this.nextEphemeralPort++ };
  }
}
