import chokidar from 'chokidar';
import { benchCommand, type BenchCommandOptions } from './bench.js';
import { resolveConfigPath } from '../core/config.js';
import { DEFAULT_DEBOUNCE_MS } from '../constants.js';
import { logger } from '../utils/logger.js';

export async function watchCommand(
  options: BenchCommandOptions & { debounce?: number },
): Promise<void> {
  const debounceMs = options.debounce ?? DEFAULT_DEBOUNCE_MS;
  const configPath = resolveConfigPath(options.config);

  logger.info(`Watching benchmark config: ${configPath}`);
  logger.info(`Debounce: ${debounceMs}ms`);
  logger.dim('Press Ctrl+C to stop.');

  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  let isRunning = false;

  const runBench = async () => {
    if (isRunning) return;
    isRunning = true;
    try {
      await benchCommand(options);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Benchmark failed: ${message}`);
    } finally {
      isRunning = false;
    }
  };

  const debouncedRun = () => {
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }
    debounceTimer = setTimeout(() => {
      void runBench();
    }, debounceMs);
  };

  const watcher = chokidar.watch(configPath, {
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: { stabilityThreshold: 200 },
  });

  watcher.on('add', debouncedRun);
  watcher.on('change', debouncedRun);

  const shutdown = async () => {
    logger.info('Shutting down watcher...');
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }
    await watcher.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  // Initial run, so the first results show up without touching the file
  await runBench();
}
