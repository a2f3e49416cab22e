/**
 * Distance-vector (distributed Bellman-Ford) routing
 *
 * No split horizon or poison reverse: a cost is only ever replaced by a
 * strictly smaller one, so a link that gets more expensive is not
 * reflected in routes learned through it. Counting to infinity is bounded
 * only by the controller's round cap.
 */

import type { NetworkGraph } from '../../graph/network-graph.js';
import type { RouterNode } from '../node.js';
import type {
  Advertisement,
  DistanceVector,
  RoutingStrategy,
  RoutingTableEntry,
  TableUpdate,
} from './types.js';

/**
 * Cost of reaching `destination` from `source` before any exchange:
 * 0 to itself, the link weight to a direct neighbor, Infinity otherwise
 */
export function initialCost(graph: NetworkGraph, source: string, destination: string): number {
  if (source === destination) {
    return 0;
  }
  return graph.getEdge(source, destination)?.weight ?? Infinity;
}

/**
 * Nodes a node advertises to: every neighbor over a finite link, including
 * zero-cost ones
 */
export function advertisementTargets(graph: NetworkGraph, node: RouterNode): RouterNode[] {
  const targets: RouterNode[] = [];
  for (const edge of node.edges) {
    if (edge.destination === node.id || !Number.isFinite(edge.weight)) continue;

    const target = graph.getNode(edge.destination);
    if (target) {
      targets.push(target);
    }
  }
  return targets;
}

export function toTable(source: string, vector: DistanceVector): RoutingTableEntry[] {
  return Array.from(vector, ([destination, cost]) => ({ source, destination, cost }));
}

/**
 * Relaxation step. Rows from advertisers this node has no finite route to
 * are ignored; a destination is adopted when it is new or the route through
 * the advertiser is strictly cheaper. The self entry is never touched.
 */
export function relax(
  selfId: string,
  current: ReadonlyMap<string, number>,
  batches: readonly (readonly RoutingTableEntry[])[]
): { vector: DistanceVector; changed: boolean } {
  const vector: DistanceVector = new Map(current);
  let changed = false;

  for (const batch of batches) {
    for (const { source: advertiser, destination, cost } of batch) {
      if (advertiser === selfId || destination === selfId) continue;

      const toAdvertiser = vector.get(advertiser);
      if (toAdvertiser === undefined || !Number.isFinite(toAdvertiser)) continue;

      const candidate = toAdvertiser + cost;
      const known = vector.get(destination);
      if (known === undefined || candidate < known) {
        vector.set(destination, candidate);
        changed = true;
      }
    }
  }

  return { vector, changed };
}

export class DistanceVectorStrategy implements RoutingStrategy {
  readonly name = 'distance-vector';

  /**
   * One row per node in the graph, in graph order
   */
  initialize(graph: NetworkGraph, node: RouterNode): RoutingTableEntry[] {
    const vector: DistanceVector = new Map();
    for (const destination of graph.nodeIds()) {
      vector.set(destination, initialCost(graph, node.id, destination));
    }
    node.routingTable = vector;
    return toTable(node.id, vector);
  }

  advertise(graph: NetworkGraph, node: RouterNode): Advertisement {
    return {
      targets: advertisementTargets(graph, node),
      entries: node.getTable(),
    };
  }

  update(node: RouterNode, batches: readonly (readonly RoutingTableEntry[])[]): TableUpdate {
    const { vector, changed } = relax(node.id, node.routingTable, batches);
    node.routingTable = vector;
    if (changed) {
      node.stats.tableUpdates++;
    }
    return { table: toTable(node.id, vector), changed };
  }
}

export function createDistanceVectorStrategy(): RoutingStrategy {
  return new DistanceVectorStrategy();
}
