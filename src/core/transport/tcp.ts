/**
 * TCP messaging fabric: one server per node, one message per connection
 *
 * The sender writes its payload and half-closes; the receiver replies with
 * the acknowledgement once the payload is in the mailbox and closes. A send
 * therefore settles only after the receiver has handled the message.
 */

import net, { type Socket } from 'node:net';
import { ACKNOWLEDGEMENT } from '../advertisement.js';
import { TransportError } from '../errors.js';
import { formatEndpoint, type Endpoint } from '../node.js';
import { getSimLogger } from '../../utils/logger.js';
import { dispatchInbound } from './inbound.js';
import type { Listener, MessageHandler, MessageTransport } from './types.js';

export interface TcpTransportConfig {
  pollIntervalMs: number; // idle bound on an inbound connection
  sendTimeoutMs: number; // connection-level bound on an outbound send
}

const DEFAULT_CONFIG: TcpTransportConfig = {
  pollIntervalMs: 1000,
  sendTimeoutMs: 1000,
};

const logger = getSimLogger('transport');

export class TcpTransport implements MessageTransport {
  readonly name = 'tcp';
  private config: TcpTransportConfig;

  constructor(config: Partial<TcpTransportConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  bind(endpoint: Endpoint, onMessage: MessageHandler, signal: AbortSignal): Promise<Listener> {
    const requested = formatEndpoint(endpoint);

    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new TransportError(`Listener for ${requested} cancelled before bind`, requested));
        return;
      }

      let address = requested;
      const server = net.createServer({ allowHalfOpen: true }, (socket) => {
        this.handleConnection(socket, address, onMessage);
      });

      const closed = new Promise<void>((resolveClosed) => {
        server.once('close', () => {
          logger.debug('Listener {address} shut down', { address });
          resolveClosed();
        });
      });

      const onBindError = (error: Error): void => {
        reject(new TransportError(`Failed to listen on ${requested}`, requested, { cause: error }));
      };
      server.once('error', onBindError);

      // Aborting the signal closes the server
      server.listen({ host: endpoint.host, port: endpoint.port, signal }, () => {
        server.off('error', onBindError);
        server.on('error', (error) => {
          logger.warn('Listener {address} error: {error}', { address, error: error.message });
        });

        const info = server.address();
        const bound: Endpoint =
          info !== null && typeof info === 'object'
            ? { host: endpoint.host, port: info.port }
            : endpoint;
        address = formatEndpoint(bound);
        logger.debug('Listener ready on {address}', { address });
        resolve({ endpoint: bound, closed });
      });
    });
  }

  private handleConnection(socket: Socket, address: string, onMessage: MessageHandler): void {
    const chunks: Buffer[] = [];

    // Never wait indefinitely on a silent peer, so shutdown is not held up
    socket.setTimeout(this.config.pollIntervalMs, () => {
      logger.warn('Inbound connection at {address} went idle, dropping it', { address });
      socket.destroy();
    });

    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });

    socket.once('end', () => {
      const payload = Buffer.concat(chunks).toString('utf8');
      if (dispatchInbound(address, onMessage, payload)) {
        socket.end(ACKNOWLEDGEMENT);
      } else {
        socket.end();
      }
    });

    socket.on('error', (error) => {
      logger.warn('Inbound connection at {address} failed: {error}', {
        address,
        error: error.message,
      });
    });
  }

  send(endpoint: Endpoint, payload: string): Promise<void> {
    const address = formatEndpoint(endpoint);

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      const socket = net.createConnection({ host: endpoint.host, port: endpoint.port });

      socket.setTimeout(this.config.sendTimeoutMs, () => {
        socket.destroy(new TransportError(`Send to ${address} timed out`, address));
      });

      socket.once('connect', () => {
        socket.end(payload, 'utf8');
      });

      socket.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });

      socket.once('error', (error) => {
        reject(
          error instanceof TransportError
            ? error
            : new TransportError(`Send to ${address} failed: ${error.message}`, address, { cause: error })
        );
      });

      socket.once('close', (hadError) => {
        if (hadError) return;
        const reply = Buffer.concat(chunks).toString('utf8');
        if (reply !== ACKNOWLEDGEMENT) {
          logger.debug('No acknowledgement from {address}', { address });
        }
        resolve();
      });
    });
  }
}
