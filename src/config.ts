import { z } from 'zod';
import { getSimLogger } from './utils/logger.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warning', 'error', 'fatal']);

export const MailboxPolicySchema = z.enum(['drain', 'accumulate']);

export const SimulatorConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  basePort: z.number().int().min(0).max(65535).default(47000),
  portStride: z.number().int().min(1).default(1),
  roundCapFactor: z.number().int().positive().default(50),
  maxRounds: z.number().int().positive().optional(),
  pollIntervalMs: z.number().int().positive().default(1000),
  sendTimeoutMs: z.number().int().positive().default(1000),
  mailboxPolicy: MailboxPolicySchema.default('drain'),
  logLevel: LogLevelSchema.default('info'),
});

export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;
export type SimulatorConfigInput = z.input<typeof SimulatorConfigSchema>;

const logger = getSimLogger('config');

function numberFrom(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

/**
 * Read `DVSIM_*` variables, apply explicit overrides on top and validate
 * @throws ZodError when a value is out of range or of the wrong type
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<SimulatorConfigInput> = {}
): SimulatorConfig {
  const fromEnv: Record<string, unknown> = {
    host: env.DVSIM_HOST,
    basePort: numberFrom(env.DVSIM_BASE_PORT),
    portStride: numberFrom(env.DVSIM_PORT_STRIDE),
    roundCapFactor: numberFrom(env.DVSIM_ROUND_CAP_FACTOR),
    maxRounds: numberFrom(env.DVSIM_MAX_ROUNDS),
    pollIntervalMs: numberFrom(env.DVSIM_POLL_INTERVAL_MS),
    sendTimeoutMs: numberFrom(env.DVSIM_SEND_TIMEOUT_MS),
    mailboxPolicy: env.DVSIM_MAILBOX_POLICY,
    logLevel: env.DVSIM_LOG_LEVEL,
  };

  const merged: Record<string, unknown> = {};
  for (const [key, value] of Object.entries({ ...fromEnv, ...overrides })) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const result = SimulatorConfigSchema.safeParse(merged);
  if (!result.success) {
    logger.error('Invalid configuration: {issues}', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    throw result.error;
  }
  return result.data;
}
