/**
 * Shared types for distance-vector routing
 */

import type { NetworkGraph } from '../../graph/network-graph.js';
import type { RouterNode } from '../node.js';

/**
 * One row of a routing table: the cost `source` currently believes it
 * takes to reach `destination`. Unreachable destinations carry Infinity.
 */
export interface RoutingTableEntry {
  source: string;
  destination: string;
  cost: number;
}

/**
 * Destination id -> best known cost, in table order
 */
export type DistanceVector = Map<string, number>;

export interface TableUpdate {
  table: RoutingTableEntry[];
  changed: boolean;
}

export type MailboxPolicy = 'drain' | 'accumulate';

export interface Advertisement {
  targets: RouterNode[];
  entries: RoutingTableEntry[];
}

export interface RoutingStrategy {
  readonly name: string;

  /**
   * Build a node's starting table from its direct links
   */
  initialize(graph: NetworkGraph, node: RouterNode): RoutingTableEntry[];

  /**
   * What a node broadcasts this round, and to whom
   */
  advertise(graph: NetworkGraph, node: RouterNode): Advertisement;

  /**
   * Fold received advertisements into the node's table
   */
  update(node: RouterNode, batches: readonly (readonly RoutingTableEntry[])[]): TableUpdate;
}
