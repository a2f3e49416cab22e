import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ZodError } from 'zod';
import { LogLevelSchema, loadConfig, type SimulatorConfig } from '../config.js';
import { Simulation, type RunMode } from '../core/simulation.js';
import { TcpTransport } from '../core/transport/tcp.js';
import { ConsoleDisplay } from '../display/console-display.js';
import { createStdinContinuation } from '../display/prompt.js';
import { generateTopology } from '../graph/topology-generator.js';
import { loadTopologyFile } from '../graph/topology-loader.js';
import type { NetworkGraph } from '../graph/network-graph.js';
import { configureLogging } from '../utils/logger.js';

type LogLevel = SimulatorConfig['logLevel'];

interface LinkChange {
  a: string;
  b: string;
  cost: number;
}

interface RunCommandOptions {
  mode: RunMode;
  random?: number;
  seed: number;
  change: LinkChange[];
  verify?: boolean;
  logLevel?: LogLevel;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  const result = LogLevelSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of: ${LogLevelSchema.options.join(', ')}.`);
  }
  return result.data;
}

function parseMode(value: string): RunMode {
  if (value !== 'stepped' && value !== 'unattended') {
    throw new InvalidArgumentError('Expected "stepped" or "unattended".');
  }
  return value;
}

export function parseLinkChange(value: string, previous: LinkChange[] = []): LinkChange[] {
  const parts = value.split(',').map((part) => part.trim());
  const [a, b, rawCost] = parts;
  const cost = Number(rawCost);
  if (parts.length !== 3 || !a || !b || rawCost === '' || Number.isNaN(cost) || cost < 0) {
    throw new InvalidArgumentError('Expected <a>,<b>,<cost> with a non-negative cost.');
  }
  return [...previous, { a, b, cost }];
}

async function buildGraph(
  topology: string | undefined,
  options: { random?: number; seed: number },
  config: SimulatorConfig
): Promise<NetworkGraph> {
  const allocation = { host: config.host, basePort: config.basePort, portStride: config.portStride };
  if (options.random !== undefined) {
    return generateTopology({ nodeCount: options.random, seed: options.seed }, allocation);
  }
  if (!topology) {
    throw new InvalidArgumentError('Give a topology file or --random <nodes>.');
  }
  return loadTopologyFile(topology, allocation);
}

function createSimulation(graph: NetworkGraph, config: SimulatorConfig): Simulation {
  return new Simulation(
    graph,
    {
      roundCapFactor: config.roundCapFactor,
      maxRounds: config.maxRounds,
      mailboxPolicy: config.mailboxPolicy,
    },
    {
      transport: new TcpTransport({
        pollIntervalMs: config.pollIntervalMs,
        sendTimeoutMs: config.sendTimeoutMs,
      }),
    }
  );
}

async function runCommand(topology: string | undefined, options: RunCommandOptions): Promise<number> {
  const config = loadConfig(process.env, options.logLevel ? { logLevel: options.logLevel } : {});
  await configureLogging(config.logLevel);

  const graph = await buildGraph(topology, options, config);
  const simulation = createSimulation(graph, config);
  const display = new ConsoleDisplay();
  display.attach(simulation);

  const prompt = options.mode === 'stepped' ? createStdinContinuation() : undefined;
  const runOptions = { mode: options.mode, shouldContinue: prompt?.shouldContinue };

  try {
    await simulation.start();

    let result = await simulation.run(runOptions);
    display.showRunResult(result);

    if (result.outcome !== 'halted' && options.change.length > 0) {
      for (const { a, b, cost } of options.change) {
        simulation.mutateLink(a, b, cost);
      }
      result = await simulation.run(runOptions);
      display.showRunResult(result);
    }

    if (options.verify) {
      display.showVerification(simulation.verify());
    }
    return result.outcome === 'round-limit' ? 2 : 0;
  } finally {
    prompt?.close();
    await simulation.shutdown();
  }
}

async function initCommand(topology: string, options: { logLevel?: LogLevel }): Promise<number> {
  const config = loadConfig(process.env, options.logLevel ? { logLevel: options.logLevel } : {});
  await configureLogging(config.logLevel);

  const graph = await buildGraph(topology, { seed: 1 }, config);
  const simulation = createSimulation(graph, config);
  new ConsoleDisplay().attach(simulation);

  try {
    await simulation.start();
    return 0;
  } finally {
    await simulation.shutdown();
  }
}

export function reportFailure(error: unknown): void {
  if (error instanceof ZodError) {
    console.error(chalk.red('Invalid configuration:'));
    error.issues.forEach((issue) => {
      console.error(chalk.yellow(`- ${issue.path.join('.')}: ${issue.message}`));
    });
    return;
  }
  console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('dvsim')
    .description('Distance-vector routing simulator')
    .version(process.env.VERSION || '0.0.0-dev');

  program
    .command('init')
    .description('Print the initial distance-vector table of every node')
    .argument('<topology>', 'Topology file (SRC DEST WEIGHT lines)')
    .option('--log-level <level>', 'Log level', parseLogLevel)
    .action(async (topology: string, options: { logLevel?: LogLevel }) => {
      process.exitCode = await initCommand(topology, options);
    });

  program
    .command('run')
    .description('Exchange tables until every node has converged')
    .argument('[topology]', 'Topology file (SRC DEST WEIGHT lines)')
    .option('--mode <mode>', 'stepped or unattended', parseMode, 'unattended')
    .option('--random <nodes>', 'Generate a random connected topology instead', parsePositiveInt)
    .option('--seed <seed>', 'Seed for --random', parsePositiveInt, 1)
    .option('--change <a,b,cost>', 'Change a link after converging, then re-run (repeatable)', parseLinkChange, [])
    .option('--verify', 'Compare final tables with reference shortest paths')
    .option('--log-level <level>', 'Log level', parseLogLevel)
    .action(async (topology: string | undefined, options: RunCommandOptions) => {
      process.exitCode = await runCommand(topology, options);
    });

  return program;
}
