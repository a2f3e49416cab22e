/**
 * Topology file loader
 *
 * One link per line: `SRC DEST WEIGHT`, meaning a bidirectional link of
 * that weight. Reading stops at the `End of Input` line. Blank lines and
 * lines starting with `#` are skipped.
 */

import { readFile } from 'node:fs/promises';
import { TopologyParseError } from '../core/errors.js';
import { NetworkGraph, allocateEndpoint, type EndpointAllocation } from './network-graph.js';

export const END_OF_INPUT = 'End of Input';

export interface TopologyLink {
  source: string;
  destination: string;
  weight: number;
}

/**
 * Parse the link lines of a topology, in file order
 * @throws TopologyParseError
 */
export function parseTopologyLinks(text: string): TopologyLink[] {
  const links: TopologyLink[] = [];
  const lines = text.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    const lineNumber = index + 1;
    const line = (lines[index] ?? '').trim();

    if (line === END_OF_INPUT) break;
    if (line === '' || line.startsWith('#')) continue;

    const words = line.split(/\s+/);
    if (words.length !== 3) {
      throw new TopologyParseError(`expected "SRC DEST WEIGHT", got "${line}"`, lineNumber);
    }

    const [source = '', destination = '', rawWeight = ''] = words;
    const weight = Number(rawWeight);
    if (rawWeight === '' || Number.isNaN(weight)) {
      throw new TopologyParseError(`weight "${rawWeight}" is not a number`, lineNumber);
    }
    if (weight < 0) {
      throw new TopologyParseError(`weight ${weight} is negative`, lineNumber);
    }
    if (source === destination) {
      throw new TopologyParseError(`node ${source} cannot link to itself`, lineNumber);
    }

    links.push({ source, destination, weight });
  }

  return links;
}

/**
 * Build a graph from topology text. Nodes get endpoints in the order they
 * first appear; a pair listed twice keeps the last weight.
 */
export function parseTopology(
  text: string,
  allocation: Partial<EndpointAllocation> = {}
): NetworkGraph {
  const graph = new NetworkGraph();

  for (const { source, destination, weight } of parseTopologyLinks(text)) {
    for (const id of [source, destination]) {
      if (!graph.hasNode(id)) {
        graph.addNode(id, allocateEndpoint(graph.size, allocation));
      }
    }
    graph.addEdge(source, destination, weight);
  }

  return graph;
}

export async function loadTopologyFile(
  path: string,
  allocation: Partial<EndpointAllocation> = {}
): Promise<NetworkGraph> {
  const text = await readFile(path, 'utf8');
  return parseTopology(text, allocation);
}
