/**
 * Router node: identity, endpoint, links, distance vector and inbound mailbox
 */

import type { Edge } from '../graph/network-graph.js';
import { decodeAdvertisement } from './advertisement.js';
import { SimulationStateError } from './errors.js';
import type { DistanceVector, MailboxPolicy, RoutingTableEntry } from './routing/types.js';
import type { Listener, MessageTransport } from './transport/types.js';

export interface Endpoint {
  host: string;
  port: number;
}

export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

export interface NodeStats {
  advertisementsReceived: number;
  advertisementsSent: number;
  sendFailures: number;
  tableUpdates: number;
}

export class RouterNode {
  readonly id: string;
  readonly edges: Edge[] = [];

  // Rebound to the actual address once the listener is up
  endpoint: Endpoint;
  routingTable: DistanceVector = new Map();

  stats: NodeStats;

  private mailbox: RoutingTableEntry[][] = [];
  private cancellation = new AbortController();
  private listener: Listener | undefined;

  constructor(id: string, endpoint: Endpoint) {
    this.id = id;
    this.endpoint = endpoint;
    this.stats = {
      advertisementsReceived: 0,
      advertisementsSent: 0,
      sendFailures: 0,
      tableUpdates: 0,
    };
  }

  get isListening(): boolean {
    return this.listener !== undefined;
  }

  get mailboxSize(): number {
    return this.mailbox.length;
  }

  /**
   * Bind this node's listener. Resolves once it accepts connections.
   */
  async startListener(transport: MessageTransport): Promise<Endpoint> {
    if (this.listener) {
      throw new SimulationStateError(`Node ${this.id} is already listening`);
    }

    this.cancellation = new AbortController();
    const listener = await transport.bind(
      this.endpoint,
      (payload) => this.receive(payload),
      this.cancellation.signal
    );
    this.listener = listener;
    this.endpoint = listener.endpoint;
    return listener.endpoint;
  }

  /**
   * Signal the listener to stop and wait until it has released its endpoint
   */
  async stopListener(): Promise<void> {
    const listener = this.listener;
    if (!listener) return;

    this.cancellation.abort();
    await listener.closed;
    this.listener = undefined;
  }

  /**
   * Inbound payload from the transport
   * @throws MalformedAdvertisementError, leaving the mailbox untouched
   */
  receive(payload: string): void {
    this.deliver(decodeAdvertisement(payload));
  }

  /**
   * Append one advertisement to the mailbox as a single unit
   */
  deliver(entries: RoutingTableEntry[]): void {
    this.mailbox.push(entries);
    this.stats.advertisementsReceived++;
  }

  /**
   * Snapshot of the mailbox for one update step. `drain` empties it;
   * `accumulate` leaves everything in place to be reprocessed next round.
   */
  takeMailbox(policy: MailboxPolicy): RoutingTableEntry[][] {
    if (policy === 'drain') {
      return this.mailbox.splice(0, this.mailbox.length);
    }
    return [...this.mailbox];
  }

  costTo(destination: string): number | undefined {
    return this.routingTable.get(destination);
  }

  /**
   * Routing table as (source, destination, cost) rows, in table order
   */
  getTable(): RoutingTableEntry[] {
    return Array.from(this.routingTable, ([destination, cost]) => ({
      source: this.id,
      destination,
      cost,
    }));
  }
}
