/**
 * Network topology: router nodes joined by weighted, bidirectional links
 * Wraps ngraph.graph with domain-specific operations
 */

import createGraph, { type Graph } from 'ngraph.graph';
import { aStar, type PathFinder } from 'ngraph.path';
import { RouterNode, type Endpoint } from '../core/node.js';

/**
 * One direction of a link. Every edge has a mirror with the same weight
 * running the other way; `setEdgeWeight` keeps the pair in step.
 */
export interface Edge {
  readonly source: string;
  readonly destination: string;
  weight: number;
}

export interface EndpointAllocation {
  host: string;
  basePort: number; // 0 defers the port to the transport at bind time
  portStride: number;
}

export const DEFAULT_ENDPOINT_ALLOCATION: EndpointAllocation = {
  host: '127.0.0.1',
  basePort: 47000,
  portStride: 1,
};

/**
 * Endpoint for the node created `index`-th
 */
export function allocateEndpoint(
  index: number,
  allocation: Partial<EndpointAllocation> = {}
): Endpoint {
  const { host, basePort, portStride } = { ...DEFAULT_ENDPOINT_ALLOCATION, ...allocation };
  if (basePort === 0) {
    return { host, port: 0 };
  }

  const port = basePort + index * portStride;
  if (port > 65535) {
    throw new RangeError(`Port ${port} for node #${index} is out of range`);
  }
  return { host, port };
}

export class NetworkGraph {
  private graph: Graph<RouterNode, Edge>;
  private readonly nodesById = new Map<string, RouterNode>();
  private pathFinder: PathFinder<RouterNode> | undefined;

  constructor() {
    this.graph = createGraph<RouterNode, Edge>();
  }

  /**
   * Add a node with an empty routing table
   */
  addNode(id: string, endpoint: Endpoint): RouterNode {
    if (this.nodesById.has(id)) {
      throw new Error(`Node with id ${id} already exists`);
    }

    const node = new RouterNode(id, endpoint);
    this.nodesById.set(id, node);
    this.graph.addNode(id, node);
    this.pathFinder = undefined;
    return node;
  }

  /**
   * Link two existing nodes in both directions. Linking an already linked
   * pair overwrites the weight of both directions.
   */
  addEdge(a: string, b: string, weight: number): void {
    if (a === b) {
      throw new Error(`Cannot link node ${a} to itself`);
    }
    if (Number.isNaN(weight) || weight < 0) {
      throw new RangeError(`Edge weight must be non-negative, got ${weight}`);
    }

    const nodeA = this.requireNode(a);
    const nodeB = this.requireNode(b);

    if (this.setEdgeWeight(a, b, weight)) {
      return;
    }

    const forward: Edge = { source: a, destination: b, weight };
    const reverse: Edge = { source: b, destination: a, weight };
    this.graph.addLink(a, b, forward);
    this.graph.addLink(b, a, reverse);
    nodeA.edges.push(forward);
    nodeB.edges.push(reverse);
    this.pathFinder = undefined;
  }

  hasNode(id: string): boolean {
    return this.nodesById.has(id);
  }

  getNode(id: string): RouterNode | undefined {
    return this.nodesById.get(id);
  }

  requireNode(id: string): RouterNode {
    const node = this.nodesById.get(id);
    if (!node) {
      throw new Error(`Node ${id} not found`);
    }
    return node;
  }

  /**
   * All nodes, in the order they were added
   */
  nodes(): RouterNode[] {
    return Array.from(this.nodesById.values());
  }

  nodeIds(): string[] {
    return Array.from(this.nodesById.keys());
  }

  get size(): number {
    return this.nodesById.size;
  }

  /**
   * The directed edge `from -> to`, if the two are linked
   */
  getEdge(from: string, to: string): Edge | undefined {
    const link = this.graph.getLink(from, to);
    return link ? link.data : undefined;
  }

  /**
   * Outgoing edges of a node
   */
  getNeighbors(id: string): Edge[] {
    return [...(this.nodesById.get(id)?.edges ?? [])];
  }

  /**
   * Overwrite the weight of an existing link in both directions
   * @returns false when the two nodes are not linked
   */
  setEdgeWeight(a: string, b: string, weight: number): boolean {
    const forward = this.getEdge(a, b);
    const reverse = this.getEdge(b, a);
    if (!forward || !reverse) {
      return false;
    }

    forward.weight = weight;
    reverse.weight = weight;
    return true;
  }

  getLinkCount(): number {
    // Each undirected link is stored as a mirrored pair
    return this.graph.getLinkCount() / 2;
  }

  /**
   * Reference cost of the cheapest path between two nodes over the current
   * edge weights (Dijkstra: A* with no heuristic). Infinity if unreachable.
   */
  shortestPathCost(from: string, to: string): number {
    if (!this.hasNode(from) || !this.hasNode(to)) {
      return Infinity;
    }
    if (from === to) {
      return 0;
    }

    if (!this.pathFinder) {
      this.pathFinder = aStar<RouterNode, Edge>(this.graph, {
        oriented: true,
        distance: (_fromNode, _toNode, link) => link.data.weight,
        blocked: (_fromNode, _toNode, link) => !Number.isFinite(link.data.weight),
      });
    }

    // ngraph.path returns the path from destination back to source
    const path = this.pathFinder.find(from, to).map((node) => String(node.id)).reverse();
    if (path.length < 2) {
      return Infinity;
    }

    let total = 0;
    for (let i = 1; i < path.length; i++) {
      const hopFrom = path[i - 1];
      const hopTo = path[i];
      const edge = hopFrom !== undefined && hopTo !== undefined ? this.getEdge(hopFrom, hopTo) : undefined;
      if (!edge) {
        return Infinity;
      }
      total += edge.weight;
    }
    return total;
  }
}
