import { DEFAULT_VERIFY_MAX } from '../constants.js';
import { verifyVariants } from '../core/verify.js';
import { resolveVariants } from '../core/variants.js';
import { logger } from '../utils/logger.js';

export async function verifyCommand(options: { max?: number; variant?: string[] }): Promise<void> {
  const maxIndex = options.max ?? DEFAULT_VERIFY_MAX;
  const result = verifyVariants({ maxIndex, variants: resolveVariants(options.variant) });

  for (const n of result.recurrenceFailures) {
    logger.error(`Recurrence broken at n=${n}`);
  }
  for (const m of result.mismatches) {
    logger.error(`${m.variant}: F(${m.n}) = ${m.actual}, expected ${m.expected}`);
  }

  if (result.mismatches.length > 0 || result.recurrenceFailures.length > 0) {
    logger.error(`${result.mismatches.length} mismatch(es) in ${result.checked} checks`);
    process.exitCode = 1;
    return;
  }
  logger.success(`All variants agree for n = 0..${maxIndex} (${result.checked} checks)`);
}
