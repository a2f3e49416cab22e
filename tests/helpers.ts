import { parseTopology } from '@/graph/topology-loader';
import type { NetworkGraph } from '@/graph/network-graph';

export const TRIANGLE = ['1 2 3', '2 3 1', '1 3 10', 'End of Input'].join('\n');

export const createTriangle = (): NetworkGraph => parseTopology(TRIANGLE);

/**
 * A node's table as a plain destination -> cost object
 */
export const vectorOf = (graph: NetworkGraph, id: string): Record<string, number> =>
  Object.fromEntries(graph.requireNode(id).routingTable);
