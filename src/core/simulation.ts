/**
 * Convergence controller for the distance-vector simulation
 *
 * Owns the node listeners and drives rounds: every node broadcasts its
 * table, then every node folds in what it received. A run ends when a
 * round changes nothing, when the round cap is hit, or (stepped mode)
 * when the continuation predicate declines.
 */

import { TypedEventEmitter } from '../utils/event-emitter.js';
import { getSimLogger } from '../utils/logger.js';
import type { NetworkGraph } from '../graph/network-graph.js';
import { encodeAdvertisement } from './advertisement.js';
import { SimulationStateError } from './errors.js';
import { mutateLink } from './link-mutator.js';
import { createDistanceVectorStrategy } from './routing/distance-vector.js';
import type { MailboxPolicy, RoutingStrategy, RoutingTableEntry } from './routing/types.js';
import { MemoryTransport } from './transport/memory.js';
import type { MessageTransport } from './transport/types.js';

export interface SimulationConfig {
  roundCapFactor: number; // round cap is node count x this factor
  maxRounds?: number; // explicit cap, overrides the factor
  mailboxPolicy: MailboxPolicy;
}

export interface SimulationOptions {
  transport?: MessageTransport;
  strategy?: RoutingStrategy;
}

export type RunMode = 'stepped' | 'unattended';

export interface ContinuationContext {
  round: number;
  maxRounds: number;
  changedNodes: string[];
}

/**
 * Asked after every unstable round in stepped mode; false stops the run
 */
export type ContinuationPredicate = (context: ContinuationContext) => boolean | Promise<boolean>;

export interface RunOptions {
  mode?: RunMode;
  shouldContinue?: ContinuationPredicate;
}

export type RunOutcome = 'converged' | 'halted' | 'round-limit';

export interface RunResult {
  mode: RunMode;
  outcome: RunOutcome;
  rounds: number;
  durationMs: number;
}

export interface RoundResult {
  round: number;
  changedNodes: string[];
  /**
   * Sends whose connection completed. A payload the receiver rejected as
   * malformed still counts here; only the receiver's log records it.
   */
  delivered: number;
  /** Sends that failed to connect or timed out */
  dropped: number;
}

export interface RouteMismatch {
  source: string;
  destination: string;
  expected: number;
  actual: number;
}

export type SimulationEvents = {
  'table:initialized': { nodeId: string; table: RoutingTableEntry[] };
  'table:changed': { nodeId: string; table: RoutingTableEntry[]; round: number };
  'round:completed': RoundResult;
  'message:dropped': { from: string; to: string; reason: string };
  'link:changed': { from: string; to: string; cost: number };
  'run:completed': RunResult;
};

type Lifecycle = 'idle' | 'started' | 'stopped';

const DEFAULT_CONFIG: SimulationConfig = {
  roundCapFactor: 50,
  mailboxPolicy: 'drain',
};

const logger = getSimLogger('controller');

function costsMatch(expected: number, actual: number): boolean {
  if (!Number.isFinite(expected) || !Number.isFinite(actual)) {
    return expected === actual;
  }
  return Math.abs(expected - actual) <= 1e-9 * Math.max(1, Math.abs(expected));
}

export class Simulation extends TypedEventEmitter<SimulationEvents> {
  readonly config: SimulationConfig;
  readonly graph: NetworkGraph;
  readonly transport: MessageTransport;
  readonly strategy: RoutingStrategy;

  private lifecycle: Lifecycle = 'idle';
  private running = false;
  private roundsExecuted = 0;

  constructor(
    graph: NetworkGraph,
    config: Partial<SimulationConfig> = {},
    options: SimulationOptions = {}
  ) {
    super();
    this.graph = graph;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.transport = options.transport ?? new MemoryTransport();
    this.strategy = options.strategy ?? createDistanceVectorStrategy();
  }

  get isStarted(): boolean {
    return this.lifecycle === 'started';
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Rounds executed since start, across runs
   */
  get totalRounds(): number {
    return this.roundsExecuted;
  }

  get maxRounds(): number {
    return this.config.maxRounds ?? this.graph.size * this.config.roundCapFactor;
  }

  /**
   * Start every listener, wait until all are ready, then build the initial
   * tables. If any listener fails to bind, the others are shut down again.
   */
  async start(): Promise<void> {
    if (this.lifecycle !== 'idle') {
      throw new SimulationStateError(`Cannot start a simulation that is ${this.lifecycle}`);
    }

    const nodes = this.graph.nodes();
    const bindings = await Promise.allSettled(
      nodes.map((node) => node.startListener(this.transport))
    );

    const failure = bindings.find(
      (binding): binding is PromiseRejectedResult => binding.status === 'rejected'
    );
    if (failure) {
      await Promise.all(nodes.map((node) => node.stopListener()));
      this.lifecycle = 'stopped';
      throw failure.reason;
    }

    logger.info('All {count} listeners ready on {transport} transport', {
      count: nodes.length,
      transport: this.transport.name,
    });

    this.lifecycle = 'started';

    for (const node of nodes) {
      const table = this.strategy.initialize(this.graph, node);
      this.emit('table:initialized', { nodeId: node.id, table });
    }
  }

  /**
   * One broadcast + update round over every node, in graph order
   */
  async runRound(): Promise<RoundResult> {
    this.assertStarted();

    const round = ++this.roundsExecuted;
    const nodes = this.graph.nodes();
    let delivered = 0;
    let dropped = 0;

    for (const node of nodes) {
      const { targets, entries } = this.strategy.advertise(this.graph, node);
      if (targets.length === 0) continue;

      const payload = encodeAdvertisement(entries);
      for (const target of targets) {
        try {
          await this.transport.send(target.endpoint, payload);
          node.stats.advertisementsSent++;
          delivered++;
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          node.stats.sendFailures++;
          dropped++;
          logger.warn('Advertisement {from} -> {to} dropped: {reason}', {
            from: node.id,
            to: target.id,
            reason,
          });
          this.emit('message:dropped', { from: node.id, to: target.id, reason });
        }
      }
    }

    const changedNodes: string[] = [];
    for (const node of nodes) {
      const batches = node.takeMailbox(this.config.mailboxPolicy);
      const { table, changed } = this.strategy.update(node, batches);
      if (changed) {
        changedNodes.push(node.id);
        logger.debug('Node {nodeId} updated its table in round {round}', {
          nodeId: node.id,
          round,
        });
        this.emit('table:changed', { nodeId: node.id, table, round });
      }
    }

    const result: RoundResult = { round, changedNodes, delivered, dropped };
    this.emit('round:completed', result);
    return result;
  }

  /**
   * Run rounds until the tables are stable, the round cap is reached, or
   * (stepped mode) the continuation predicate declines
   */
  async run(options: RunOptions = {}): Promise<RunResult> {
    this.assertStarted();
    if (this.running) {
      throw new SimulationStateError('A run is already in progress');
    }

    const mode = options.mode ?? 'unattended';
    const shouldContinue = options.shouldContinue;
    if (mode === 'stepped' && !shouldContinue) {
      throw new SimulationStateError('Stepped mode needs a continuation predicate');
    }

    this.running = true;
    const maxRounds = this.maxRounds;
    const startedAt = Date.now();
    let rounds = 0;
    let outcome: RunOutcome;

    try {
      for (;;) {
        const { changedNodes } = await this.runRound();
        rounds++;

        if (changedNodes.length === 0) {
          outcome = 'converged';
          break;
        }
        if (rounds >= maxRounds) {
          outcome = 'round-limit';
          break;
        }
        if (mode === 'stepped' && shouldContinue) {
          const proceed = await shouldContinue({ round: rounds, maxRounds, changedNodes });
          if (!proceed) {
            outcome = 'halted';
            break;
          }
        }
      }
    } finally {
      this.running = false;
    }

    const result: RunResult = { mode, outcome, rounds, durationMs: Date.now() - startedAt };

    if (outcome === 'round-limit') {
      logger.warn('Did not converge within {maxRounds} rounds', { maxRounds });
    } else {
      logger.info('Run finished ({outcome}) after {rounds} rounds in {durationMs} ms', {
        outcome,
        rounds,
        durationMs: result.durationMs,
      });
    }

    this.emit('run:completed', result);
    return result;
  }

  /**
   * Change the cost of one link. Call `run` afterwards to propagate it.
   * @throws LinkNotFoundError
   */
  mutateLink(a: string, b: string, cost: number): void {
    if (this.running) {
      throw new SimulationStateError('Cannot change a link while a run is in progress');
    }

    mutateLink(this.graph, a, b, cost);
    logger.info('Link {a} <-> {b} cost set to {cost}', { a, b, cost });
    this.emit('link:changed', { from: a, to: b, cost });
  }

  getTable(nodeId: string): RoutingTableEntry[] {
    return this.graph.requireNode(nodeId).getTable();
  }

  getTables(): Map<string, RoutingTableEntry[]> {
    return new Map(this.graph.nodes().map((node) => [node.id, node.getTable()]));
  }

  /**
   * Compare every table against reference shortest paths on the current
   * link costs. Empty when every node holds the true all-pairs costs.
   */
  verify(): RouteMismatch[] {
    const mismatches: RouteMismatch[] = [];
    for (const node of this.graph.nodes()) {
      for (const destination of this.graph.nodeIds()) {
        const expected = this.graph.shortestPathCost(node.id, destination);
        const actual = node.costTo(destination) ?? Infinity;
        if (!costsMatch(expected, actual)) {
          mismatches.push({ source: node.id, destination, expected, actual });
        }
      }
    }
    return mismatches;
  }

  /**
   * Stop every listener and wait for all of them to release their endpoints
   */
  async shutdown(): Promise<void> {
    if (this.lifecycle === 'stopped') return;

    this.lifecycle = 'stopped';
    await Promise.all(this.graph.nodes().map((node) => node.stopListener()));
    logger.info('All listeners shut down');
  }

  private assertStarted(): void {
    if (this.lifecycle !== 'started') {
      throw new SimulationStateError(
        this.lifecycle === 'idle' ? 'Simulation has not been started' : 'Simulation has been shut down'
      );
    }
  }
}
