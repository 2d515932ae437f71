import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { z } from 'zod';
import type { BenchOptions } from '../types/benchmark.js';
import {
  CONFIG_FILE,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MIN_TIME_MS,
  DEFAULT_SIZES,
  DEFAULT_WARMUP_ITERATIONS,
  VARIANT_NAMES,
} from '../constants.js';
import { ConfigError } from './errors.js';
import { logger } from '../utils/logger.js';

export const VariantNameSchema = z.enum(VARIANT_NAMES);

export const BenchConfigSchema = z
  .object({
    variants: z.array(VariantNameSchema).optional(),
    sizes: z.array(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)).optional(),
    minTimeMs: z.number().positive().optional(),
    maxIterations: z.number().int().positive().optional(),
    warmupIterations: z.number().int().nonnegative().optional(),
  })
  .strict();
export type BenchConfig = z.infer<typeof BenchConfigSchema>;

export function resolveConfigPath(configPath?: string): string {
  const cwd = process.cwd();
  if (!configPath) return join(cwd, CONFIG_FILE);
  return isAbsolute(configPath) ? configPath : join(cwd, configPath);
}

/**
 * Load the benchmark config file. A missing default file yields an empty
 * config; a missing file that was named explicitly is an error.
 */
export async function loadConfig(configPath?: string): Promise<BenchConfig> {
  const filePath = resolveConfigPath(configPath);
  if (!existsSync(filePath)) {
    if (configPath) throw new ConfigError(filePath, 'file not found');
    return {};
  }

  const content = await readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(filePath, `not valid JSON (${message})`);
  }

  const parsed = BenchConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(filePath, issues);
  }

  logger.debug(`Loaded config from ${filePath}`);
  return parsed.data;
}

/**
 * Merge defaults, file config and CLI overrides, later sources winning.
 */
export function resolveBenchOptions(config: BenchConfig, overrides: BenchConfig = {}): BenchOptions {
  return {
    variants: overrides.variants ?? config.variants ?? [...VARIANT_NAMES],
    sizes: overrides.sizes ?? config.sizes ?? [...DEFAULT_SIZES],
    minTimeMs: overrides.minTimeMs ?? config.minTimeMs ?? DEFAULT_MIN_TIME_MS,
    maxIterations: overrides.maxIterations ?? config.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    warmupIterations: overrides.warmupIterations ?? config.warmupIterations ?? DEFAULT_WARMUP_ITERATIONS,
  };
}
