import { FibenchError } from '../core/errors.js';
import { logger } from './logger.js';

/**
 * Run a command body, turning failures into a logged message and exit code 1.
 */
export async function runCommand(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof FibenchError) {
      logger.error(err.message);
    } else {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Unexpected error: ${message}`);
      if (err instanceof Error && err.stack) logger.debug(err.stack);
    }
    process.exitCode = 1;
  }
}
