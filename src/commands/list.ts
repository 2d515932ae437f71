import { VARIANTS } from '../core/variants.js';
import { logger } from '../utils/logger.js';

export async function listCommand(): Promise<void> {
  for (const variant of VARIANTS) {
    logger.info(`${variant.name.padEnd(18)} ${variant.title}`);
    logger.dim(`${''.padEnd(18)} time ${variant.complexity.time}, space ${variant.complexity.space}`);
  }
}
