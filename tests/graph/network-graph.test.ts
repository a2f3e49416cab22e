import { describe, it, expect, beforeEach } from 'vitest';
import { NetworkGraph, allocateEndpoint } from '@/graph/network-graph';

describe('allocateEndpoint', () => {
  it('should offset the base port by index and stride', () => {
    expect(allocateEndpoint(0)).toEqual({ host: '127.0.0.1', port: 47000 });
    expect(allocateEndpoint(3, { basePort: 5000, portStride: 10 })).toEqual({
      host: '127.0.0.1',
      port: 5030,
    });
  });

  it('should defer every port to the transport when the base is 0', () => {
    expect(allocateEndpoint(5, { host: 'localhost', basePort: 0 })).toEqual({
      host: 'localhost',
      port: 0,
    });
  });

  it('should reject ports beyond 65535', () => {
    expect(() => allocateEndpoint(2, { basePort: 65535 })).toThrow(RangeError);
  });
});

describe('NetworkGraph', () => {
  let graph: NetworkGraph;

  const endpoint = (port: number) => ({ host: '127.0.0.1', port });

  beforeEach(() => {
    graph = new NetworkGraph();
    graph.addNode('a', endpoint(1));
    graph.addNode('b', endpoint(2));
    graph.addNode('c', endpoint(3));
  });

  describe('nodes', () => {
    it('should keep insertion order', () => {
      expect(graph.nodeIds()).toEqual(['a', 'b', 'c']);
      expect(graph.size).toBe(3);
      expect(graph.getNode('b')?.endpoint).toEqual(endpoint(2));
    });

    it('should reject duplicate ids', () => {
      expect(() => graph.addNode('a', endpoint(9))).toThrow('Node with id a already exists');
    });

    it('should fail requireNode for an unknown id', () => {
      expect(graph.hasNode('z')).toBe(false);
      expect(() => graph.requireNode('z')).toThrow('Node z not found');
    });
  });

  describe('addEdge', () => {
    it('should create a mirrored pair of edges', () => {
      graph.addEdge('a', 'b', 4);

      expect(graph.getEdge('a', 'b')).toEqual({ source: 'a', destination: 'b', weight: 4 });
      expect(graph.getEdge('b', 'a')).toEqual({ source: 'b', destination: 'a', weight: 4 });
      expect(graph.getNeighbors('a')).toEqual([{ source: 'a', destination: 'b', weight: 4 }]);
      expect(graph.getLinkCount()).toBe(1);
    });

    it('should share edge objects with the node', () => {
      graph.addEdge('a', 'b', 4);

      graph.setEdgeWeight('b', 'a', 9);

      expect(graph.requireNode('a').edges[0]?.weight).toBe(9);
    });

    it('should overwrite the weight of an existing link', () => {
      graph.addEdge('a', 'b', 4);
      graph.addEdge('b', 'a', 6);

      expect(graph.getLinkCount()).toBe(1);
      expect(graph.getEdge('a', 'b')?.weight).toBe(6);
      expect(graph.requireNode('a').edges).toHaveLength(1);
    });

    it('should reject self links and negative weights', () => {
      expect(() => graph.addEdge('a', 'a', 1)).toThrow('Cannot link node a to itself');
      expect(() => graph.addEdge('a', 'b', -2)).toThrow(RangeError);
    });

    it('should reject unknown endpoints', () => {
      expect(() => graph.addEdge('a', 'z', 1)).toThrow('Node z not found');
    });
  });

  describe('setEdgeWeight', () => {
    it('should return false when the nodes are not linked', () => {
      expect(graph.setEdgeWeight('a', 'c', 1)).toBe(false);
    });
  });

  describe('shortestPathCost', () => {
    beforeEach(() => {
      graph.addEdge('a', 'b', 3);
      graph.addEdge('b', 'c', 1);
      graph.addEdge('a', 'c', 10);
    });

    it('should find the cheapest multi-hop path', () => {
      expect(graph.shortestPathCost('a', 'c')).toBe(4);
      expect(graph.shortestPathCost('c', 'a')).toBe(4);
    });

    it('should be 0 to itself', () => {
      expect(graph.shortestPathCost('b', 'b')).toBe(0);
    });

    it('should follow weight changes', () => {
      graph.setEdgeWeight('a', 'b', 100);

      expect(graph.shortestPathCost('a', 'b')).toBe(11);
    });

    it('should treat infinite links as absent', () => {
      graph.setEdgeWeight('a', 'b', Infinity);
      graph.setEdgeWeight('a', 'c', Infinity);

      expect(graph.shortestPathCost('a', 'c')).toBe(Infinity);
    });

    it('should be Infinity for disconnected or unknown nodes', () => {
      graph.addNode('d', endpoint(4));

      expect(graph.shortestPathCost('a', 'd')).toBe(Infinity);
      expect(graph.shortestPathCost('a', 'z')).toBe(Infinity);
    });
  });
});
