/**
 * Messaging fabric contract shared by the TCP and in-process transports
 */

import type { Endpoint } from '../node.js';

/**
 * Consumes one inbound payload. Throwing rejects the payload: the
 * transport logs it, skips the acknowledgement and keeps listening.
 */
export type MessageHandler = (payload: string) => void;

export interface Listener {
  /** Address actually bound (port 0 resolved) */
  readonly endpoint: Endpoint;
  /** Settles once the listener has stopped after its signal aborted */
  readonly closed: Promise<void>;
}

export interface MessageTransport {
  readonly name: string;

  /**
   * Start listening on `endpoint`. Resolves only once the listener is
   * ready to accept; aborting `signal` shuts it down.
   */
  bind(endpoint: Endpoint, onMessage: MessageHandler, signal: AbortSignal): Promise<Listener>;

  /**
   * Deliver one payload, best effort. Rejects with a TransportError when
   * the peer cannot be reached; nothing is retried. Resolves once the
   * connection completes, whether or not the receiver accepted the payload.
   */
  send(endpoint: Endpoint, payload: string): Promise<void>;
}
