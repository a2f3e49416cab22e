/**
 * Distance-vector routing simulator
 * Main entry point
 */

// Core exports
export { Simulation } from './core/simulation.js';
export type {
  SimulationConfig,
  SimulationOptions,
  SimulationEvents,
  RunMode,
  RunOptions,
  RunOutcome,
  RunResult,
  RoundResult,
  RouteMismatch,
  ContinuationContext,
  ContinuationPredicate,
} from './core/simulation.js';

export { RouterNode, formatEndpoint } from './core/node.js';
export type { Endpoint, NodeStats } from './core/node.js';

export { mutateLink } from './core/link-mutator.js';

export {
  ACKNOWLEDGEMENT,
  AdvertisementSchema,
  encodeAdvertisement,
  decodeAdvertisement,
} from './core/advertisement.js';

export {
  LinkNotFoundError,
  InvalidLinkCostError,
  MalformedAdvertisementError,
  TopologyParseError,
  TransportError,
  SimulationStateError,
} from './core/errors.js';

// Routing exports
export {
  DistanceVectorStrategy,
  createDistanceVectorStrategy,
  initialCost,
  advertisementTargets,
  relax,
  toTable,
} from './core/routing/distance-vector.js';
export type {
  RoutingStrategy,
  RoutingTableEntry,
  DistanceVector,
  TableUpdate,
  Advertisement,
  MailboxPolicy,
} from './core/routing/types.js';

// Transport exports
export { TcpTransport } from './core/transport/tcp.js';
export type { TcpTransportConfig } from './core/transport/tcp.js';
export { MemoryTransport } from './core/transport/memory.js';
export type { MessageTransport, MessageHandler, Listener } from './core/transport/types.js';

// Graph exports
export {
  NetworkGraph,
  allocateEndpoint,
  parseTopology,
  parseTopologyLinks,
  loadTopologyFile,
  generateTopology,
  END_OF_INPUT,
} from './graph/index.js';
export type {
  Edge,
  EndpointAllocation,
  TopologyLink,
  TopologyGeneratorConfig,
} from './graph/index.js';

// Display exports
export { ConsoleDisplay, formatCost } from './display/console-display.js';
export type { ConsoleDisplayOptions } from './display/console-display.js';
export { createStdinContinuation, isAffirmative } from './display/prompt.js';

// Configuration and utilities
export { loadConfig, SimulatorConfigSchema } from './config.js';
export type { SimulatorConfig } from './config.js';

export { configureLogging, getSimLogger } from './utils/logger.js';

export { createSeededRandom } from './utils/random.js';
export type { SeededRandom } from './utils/random.js';

export { TypedEventEmitter } from './utils/event-emitter.js';
export type { EventEmitter, EventHandler } from './utils/event-emitter.js';
