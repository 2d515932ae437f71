import { MAX_EXACT_INDEX } from '../constants.js';
import { computeFibonacci, resolveVariants } from '../core/variants.js';
import { parseIndex } from '../core/validate.js';
import { logger } from '../utils/logger.js';

export async function computeCommand(rawN: string, options: { variant?: string }): Promise<void> {
  const n = parseIndex(rawN);
  const variants = resolveVariants(options.variant ? [options.variant] : undefined);

  if (n > MAX_EXACT_INDEX) {
    logger.warn(`F(${n}) does not fit in 64 bits; the value shown has wrapped.`);
  }

  for (const variant of variants) {
    if (n > variant.maxIndex) {
      logger.dim(`${variant.name.padEnd(18)} skipped (n > ${variant.maxIndex})`);
      continue;
    }
    logger.info(`${variant.name.padEnd(18)} ${computeFibonacci(variant.name, n)}`);
  }
}
