import { loadConfig, resolveBenchOptions, type BenchConfig } from '../core/config.js';
import { runBenchmarks } from '../core/benchmark.js';
import { resolveVariants } from '../core/variants.js';
import { findCrossover, formatJson, formatTable } from '../core/report.js';
import { logger } from '../utils/logger.js';

export interface BenchCommandOptions {
  config?: string;
  variant?: string[];
  sizes?: number[];
  minTime?: number;
  json?: boolean;
}

export async function benchCommand(options: BenchCommandOptions): Promise<void> {
  const config = await loadConfig(options.config);
  const overrides: BenchConfig = {};
  if (options.variant) overrides.variants = resolveVariants(options.variant).map(v => v.name);
  if (options.sizes) overrides.sizes = options.sizes;
  if (options.minTime !== undefined) overrides.minTimeMs = options.minTime;
  const benchOptions = resolveBenchOptions(config, overrides);

  if (!options.json) {
    logger.info(`Benchmarking ${benchOptions.variants.length} variant(s) over sizes ${benchOptions.sizes.join(', ')}`);
    logger.dim(`At least ${benchOptions.minTimeMs}ms per case.`);
  }

  const result = runBenchmarks(benchOptions);

  if (options.json) {
    logger.info(formatJson(result));
    return;
  }

  logger.info('');
  logger.info(formatTable(result));
  logger.info('');

  const crossover = findCrossover(result, 'iterative', 'power-matrix-log');
  if (crossover !== null) {
    logger.info(`power-matrix-log overtakes iterative at n=${crossover}`);
  }
  if (result.skipped.length > 0) {
    logger.dim(`${result.skipped.length} case(s) skipped above variant benchmark limits`);
  }
}
