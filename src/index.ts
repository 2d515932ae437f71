import { Command, InvalidArgumentError } from 'commander';
import { benchCommand } from './commands/bench.js';
import { computeCommand } from './commands/compute.js';
import { listCommand } from './commands/list.js';
import { verifyCommand } from './commands/verify.js';
import { watchCommand } from './commands/watch.js';
import { runCommand } from './utils/errors.js';
import { setVerbose } from './utils/logger.js';

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function parsePositive(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return n;
}

function parseSizes(value: string): number[] {
  return value.split(',').map(part => parseInteger(part.trim()));
}

const program = new Command();

program
  .name('fibench')
  .description('Compare six Fibonacci algorithms')
  .version('0.1.0')
  .option('--verbose', 'Print debug output')
  .hook('preAction', (thisCommand) => {
    setVerbose(Boolean(thisCommand.opts().verbose));
  });

// Default action: benchmark with config file or defaults
program.action(async () => {
  await runCommand(() => benchCommand({}));
});

program
  .command('compute')
  .description('Print F(n) computed by each variant')
  .argument('<n>', 'Zero-based index into the Fibonacci sequence')
  .option('--variant <name>', 'Use only this variant')
  .action(async (n: string, opts) => {
    await runCommand(() => computeCommand(n, { variant: opts.variant }));
  });

program
  .command('bench')
  .description('Benchmark variants across input sizes')
  .option('-c, --config <path>', 'Path to config file (default: fibench.config.json)')
  .option('--variant <names...>', 'Benchmark only these variants')
  .option('--sizes <list>', 'Comma-separated input sizes (e.g., 1,10,100)', parseSizes)
  .option('--min-time <ms>', 'Minimum measuring time per case in ms', parsePositive)
  .option('--json', 'Print results as JSON')
  .action(async (opts) => {
    await runCommand(() => benchCommand({
      config: opts.config,
      variant: opts.variant,
      sizes: opts.sizes,
      minTime: opts.minTime,
      json: opts.json,
    }));
  });

program
  .command('verify')
  .description('Check that every variant returns the same sequence')
  .option('--max <n>', 'Highest index to check (default: 92)', parseInteger)
  .option('--variant <names...>', 'Check only these variants')
  .action(async (opts) => {
    await runCommand(() => verifyCommand({ max: opts.max, variant: opts.variant }));
  });

program
  .command('list')
  .description('List variants and their complexity')
  .action(async () => {
    await runCommand(() => listCommand());
  });

program
  .command('watch')
  .description('Re-run the benchmark whenever the config file changes')
  .option('-c, --config <path>', 'Path to config file (default: fibench.config.json)')
  .option('--debounce <ms>', 'Debounce interval in ms (default: 500)', parseInteger)
  .action(async (opts) => {
    await runCommand(() => watchCommand({ config: opts.config, debounce: opts.debounce }));
  });

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}
