import { describe, it, expect, beforeEach } from 'vitest';
import { mutateLink } from '@/core/link-mutator';
import { InvalidLinkCostError, LinkNotFoundError } from '@/core/errors';
import { createDistanceVectorStrategy } from '@/core/routing/distance-vector';
import type { NetworkGraph } from '@/graph/network-graph';
import { createTriangle, vectorOf } from '../helpers';

describe('mutateLink', () => {
  let graph: NetworkGraph;

  const snapshot = () =>
    JSON.stringify(graph.nodes().map((node) => [node.id, node.getTable(), node.edges]));

  beforeEach(() => {
    graph = createTriangle();
    const strategy = createDistanceVectorStrategy();
    for (const node of graph.nodes()) {
      strategy.initialize(graph, node);
    }
  });

  it('should set both table entries and both edge weights', () => {
    mutateLink(graph, '1', '2', 100);

    expect(graph.requireNode('1').costTo('2')).toBe(100);
    expect(graph.requireNode('2').costTo('1')).toBe(100);
    expect(graph.getEdge('1', '2')?.weight).toBe(100);
    expect(graph.getEdge('2', '1')?.weight).toBe(100);
  });

  it('should leave every other entry alone', () => {
    mutateLink(graph, '2', '3', 7);

    expect(vectorOf(graph, '1')).toEqual({ '1': 0, '2': 3, '3': 10 });
    expect(vectorOf(graph, '2')).toEqual({ '1': 3, '2': 0, '3': 7 });
    expect(vectorOf(graph, '3')).toEqual({ '1': 10, '2': 7, '3': 0 });
  });

  it('should accept a cost of zero or Infinity', () => {
    mutateLink(graph, '1', '3', 0);
    expect(graph.requireNode('3').costTo('1')).toBe(0);

    mutateLink(graph, '1', '3', Infinity);
    expect(graph.requireNode('1').costTo('3')).toBe(Infinity);
  });

  it('should fail with LinkNotFoundError for an unknown node and change nothing', () => {
    const before = snapshot();

    expect(() => mutateLink(graph, '1', '4', 5)).toThrow(LinkNotFoundError);
    expect(() => mutateLink(graph, '4', '1', 5)).toThrow('node 4 does not exist');
    expect(snapshot()).toBe(before);
  });

  it('should fail when the nodes are not directly linked', () => {
    graph.addNode('4', { host: '127.0.0.1', port: 48000 });
    graph.addEdge('3', '4', 2);
    const before = snapshot();

    expect(() => mutateLink(graph, '1', '4', 5)).toThrow('not directly linked');
    expect(snapshot()).toBe(before);
  });

  it('should fail when a table has no entry for the link', () => {
    graph.requireNode('2').routingTable.delete('1');
    const before = snapshot();

    expect(() => mutateLink(graph, '1', '2', 5)).toThrow(LinkNotFoundError);
    expect(graph.requireNode('1').costTo('2')).toBe(3);
    expect(snapshot()).toBe(before);
  });

  it('should fail for a node paired with itself', () => {
    expect(() => mutateLink(graph, '1', '1', 5)).toThrow(LinkNotFoundError);
  });

  it('should reject negative and NaN costs', () => {
    const before = snapshot();

    expect(() => mutateLink(graph, '1', '2', -1)).toThrow(InvalidLinkCostError);
    expect(() => mutateLink(graph, '1', '2', Number.NaN)).toThrow(InvalidLinkCostError);
    expect(snapshot()).toBe(before);
  });
});
