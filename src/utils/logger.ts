/**
 * LogTape setup for the simulator
 *
 * Library code only calls `getSimLogger`; sinks are attached by the host
 * (the CLI) through `configureLogging`. Until then records are discarded.
 */

import { configure, getConsoleSink, getLogger, reset, type LogLevel, type Logger } from '@logtape/logtape';

export type { LogLevel };

const ROOT_CATEGORY = 'dvsim';

let configured = false;

export async function configureLogging(level: LogLevel = 'info'): Promise<void> {
  if (configured) return;

  await configure({
    sinks: {
      console: getConsoleSink(),
    },
    filters: {},
    loggers: [
      { category: [ROOT_CATEGORY], lowestLevel: level, sinks: ['console'] },
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] },
    ],
  });

  configured = true;
}

/**
 * Detach all sinks (used by the CLI before exit)
 */
export async function resetLogging(): Promise<void> {
  if (!configured) return;
  await reset();
  configured = false;
}

/**
 * Get a logger below the simulator's root category
 * @param subcategory e.g. 'transport', 'controller'
 */
export function getSimLogger(subcategory?: string): Logger {
  return getLogger(subcategory ? [ROOT_CATEGORY, subcategory] : [ROOT_CATEGORY]);
}
