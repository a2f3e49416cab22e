/**
 * Graph module: the network topology and the ways to build one
 *
 * This module provides:
 * - NetworkGraph: nodes and mirrored weighted links, with reference shortest paths
 * - parseTopology / loadTopologyFile: `SRC DEST WEIGHT` topology files
 * - generateTopology: seeded random connected topologies
 */

export {
  NetworkGraph,
  allocateEndpoint,
  DEFAULT_ENDPOINT_ALLOCATION,
  type Edge,
  type EndpointAllocation,
} from './network-graph.js';

export {
  parseTopology,
  parseTopologyLinks,
  loadTopologyFile,
  END_OF_INPUT,
  type TopologyLink,
} from './topology-loader.js';

export { generateTopology, type TopologyGeneratorConfig } from './topology-generator.js';
