import { createProgram, reportFailure } from './commands.js';
import { resetLogging } from '../utils/logger.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    reportFailure(error);
    process.exitCode = 1;
  } finally {
    await resetLogging();
  }
}

await main();
