/**
 * Seeded random topologies: a random spanning tree (so the graph is
 * connected) plus extra links between random pairs
 */

import { createSeededRandom } from '../utils/random.js';
import { NetworkGraph, allocateEndpoint, type EndpointAllocation } from './network-graph.js';

export interface TopologyGeneratorConfig {
  nodeCount: number;
  extraEdges: number;
  minWeight: number;
  maxWeight: number;
  decimals: number; // 0 for integer weights
  seed: number;
}

const DEFAULT_CONFIG: TopologyGeneratorConfig = {
  nodeCount: 8,
  extraEdges: 4,
  minWeight: 1,
  maxWeight: 20,
  decimals: 0,
  seed: 1,
};

export function generateTopology(
  config: Partial<TopologyGeneratorConfig> = {},
  allocation: Partial<EndpointAllocation> = {}
): NetworkGraph {
  const { nodeCount, extraEdges, minWeight, maxWeight, decimals, seed } = {
    ...DEFAULT_CONFIG,
    ...config,
  };
  if (!Number.isInteger(nodeCount) || nodeCount < 1) {
    throw new RangeError(`nodeCount must be a positive integer, got ${nodeCount}`);
  }

  const random = createSeededRandom(seed);
  const graph = new NetworkGraph();
  const ids = Array.from({ length: nodeCount }, (_, i) => String(i + 1));

  for (const id of ids) {
    graph.addNode(id, allocateEndpoint(graph.size, allocation));
  }

  // Attach each node to one already placed
  const order = random.shuffle(ids);
  for (let i = 1; i < order.length; i++) {
    const id = order[i];
    const anchor = random.nextChoice(order.slice(0, i));
    if (id !== undefined) {
      graph.addEdge(id, anchor, random.nextWeight(minWeight, maxWeight, decimals));
    }
  }

  const maxLinks = (nodeCount * (nodeCount - 1)) / 2;
  let added = 0;
  let attempts = 0;
  while (added < extraEdges && graph.getLinkCount() < maxLinks && attempts < extraEdges * 20) {
    attempts++;
    const a = random.nextChoice(ids);
    const b = random.nextChoice(ids);
    if (a === b || graph.getEdge(a, b)) continue;

    graph.addEdge(a, b, random.nextWeight(minWeight, maxWeight, decimals));
    added++;
  }

  return graph;
}
