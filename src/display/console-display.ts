/**
 * Console rendering of routing tables
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { RoutingTableEntry } from '../core/routing/types.js';
import type { RouteMismatch, RunResult, Simulation } from '../core/simulation.js';

export interface ConsoleDisplayOptions {
  write: (line: string) => void;
  color: boolean;
}

export function formatCost(cost: number): string {
  return Number.isFinite(cost) ? String(cost) : 'inf';
}

export class ConsoleDisplay {
  private readonly write: (line: string) => void;
  private readonly chalk: ChalkInstance;

  constructor(options: Partial<ConsoleDisplayOptions> = {}) {
    this.write = options.write ?? ((line) => console.log(line));
    this.chalk = new Chalk(options.color === false ? { level: 0 } : {});
  }

  /**
   * Subscribe to a simulation's table events
   * @returns a function that unsubscribes again
   */
  attach(simulation: Simulation): () => void {
    const onInitialized = ({ nodeId, table }: { nodeId: string; table: RoutingTableEntry[] }) =>
      this.showTable(`Node ${nodeId} (initial)`, table);
    const onChanged = ({ nodeId, table, round }: { nodeId: string; table: RoutingTableEntry[]; round: number }) =>
      this.showTable(`Node ${nodeId} (round ${round})`, table);
    const onLinkChanged = ({ from, to, cost }: { from: string; to: string; cost: number }) =>
      this.write(this.chalk.yellow(`Link ${from} <-> ${to} cost set to ${formatCost(cost)}`));

    simulation.on('table:initialized', onInitialized);
    simulation.on('table:changed', onChanged);
    simulation.on('link:changed', onLinkChanged);

    return () => {
      simulation.off('table:initialized', onInitialized);
      simulation.off('table:changed', onChanged);
      simulation.off('link:changed', onLinkChanged);
    };
  }

  showTable(title: string, table: readonly RoutingTableEntry[]): void {
    for (const line of this.formatTable(title, table)) {
      this.write(line);
    }
  }

  formatTable(title: string, table: readonly RoutingTableEntry[]): string[] {
    const rows = table.map(({ source, destination, cost }) => [source, destination, formatCost(cost)]);
    const header = ['Source', 'Destination', 'Cost'];
    const widths = header.map((label, column) =>
      Math.max(label.length, ...rows.map((row) => (row[column] ?? '').length))
    );
    const render = (cells: string[]) =>
      cells.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join('  ').trimEnd();

    return [
      this.chalk.bold(title),
      this.chalk.dim(render(header)),
      ...rows.map((row) => render(row)),
      '',
    ];
  }

  showRunResult(result: RunResult): void {
    const summary = `${result.rounds} rounds, ${result.durationMs} ms`;
    switch (result.outcome) {
      case 'converged':
        this.write(this.chalk.green(`Stable after ${summary}`));
        break;
      case 'halted':
        this.write(this.chalk.yellow(`Halted after ${summary}`));
        break;
      case 'round-limit':
        this.write(this.chalk.red(`Did not converge: round cap reached after ${summary}`));
        break;
    }
  }

  showVerification(mismatches: readonly RouteMismatch[]): void {
    if (mismatches.length === 0) {
      this.write(this.chalk.green('All tables match reference shortest paths'));
      return;
    }
    this.write(this.chalk.red(`${mismatches.length} entries differ from reference shortest paths:`));
    for (const { source, destination, expected, actual } of mismatches) {
      this.write(`  ${source} -> ${destination}: expected ${formatCost(expected)}, got ${formatCost(actual)}`);
    }
  }
}
