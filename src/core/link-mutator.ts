/**
 * Runtime link-cost edits
 */

import type { NetworkGraph } from '../graph/network-graph.js';
import { InvalidLinkCostError, LinkNotFoundError } from './errors.js';

/**
 * Set the cost of the link between `a` and `b` in both directions: the
 * graph's edge pair and each endpoint's table entry for the other. Every
 * check runs before the first write, so a failed call changes nothing.
 *
 * Does not propagate the change; run the controller again for that.
 *
 * @throws LinkNotFoundError if either node is missing, or the two have no
 *   direct link or no table entry for each other
 * @throws InvalidLinkCostError for a negative or NaN cost
 */
export function mutateLink(graph: NetworkGraph, a: string, b: string, cost: number): void {
  const nodeA = graph.getNode(a);
  const nodeB = graph.getNode(b);
  if (!nodeA || !nodeB) {
    throw new LinkNotFoundError(a, b, `node ${nodeA ? b : a} does not exist`);
  }
  if (a === b) {
    throw new LinkNotFoundError(a, b, 'a node has no link to itself');
  }
  if (!graph.getEdge(a, b) || !graph.getEdge(b, a)) {
    throw new LinkNotFoundError(a, b, 'the nodes are not directly linked');
  }
  if (!nodeA.routingTable.has(b) || !nodeB.routingTable.has(a)) {
    throw new LinkNotFoundError(a, b, 'routing tables have no entry for the link');
  }
  if (Number.isNaN(cost) || cost < 0) {
    throw new InvalidLinkCostError(cost);
  }

  graph.setEdgeWeight(a, b, cost);
  nodeA.routingTable.set(b, cost);
  nodeB.routingTable.set(a, cost);
}
