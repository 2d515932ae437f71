import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, resolveBenchOptions, resolveConfigPath } from '../src/core/config.js';
import { ConfigError } from '../src/core/errors.js';
import { DEFAULT_SIZES, VARIANT_NAMES } from '../src/constants.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
}));

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'fibench-config-test-'));
  vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true });
});

describe('resolveConfigPath', () => {
  it('should default to fibench.config.json in the working directory', () => {
    expect(resolveConfigPath()).toBe(join(tempDir, 'fibench.config.json'));
  });

  it('should resolve relative paths against the working directory', () => {
    expect(resolveConfigPath('bench/custom.json')).toBe(join(tempDir, 'bench/custom.json'));
    expect(resolveConfigPath('/etc/fib.json')).toBe('/etc/fib.json');
  });
});

describe('loadConfig', () => {
  it('should return an empty config when the default file is absent', async () => {
    expect(await loadConfig()).toEqual({});
  });

  it('should fail when an explicitly named file is absent', async () => {
    await expect(loadConfig('missing.json')).rejects.toThrow(ConfigError);
  });

  it('should load and validate a config file', async () => {
    await writeFile(
      join(tempDir, 'fibench.config.json'),
      JSON.stringify({ variants: ['iterative'], sizes: [10, 20], minTimeMs: 5 }),
    );
    expect(await loadConfig()).toEqual({ variants: ['iterative'], sizes: [10, 20], minTimeMs: 5 });
  });

  it('should reject malformed JSON', async () => {
    await writeFile(join(tempDir, 'bad.json'), '{ "sizes": [1, ');
    await expect(loadConfig('bad.json')).rejects.toThrow(/not valid JSON/);
  });

  it('should reject unknown variants with the offending path', async () => {
    await writeFile(join(tempDir, 'bad.json'), JSON.stringify({ variants: ['bogus'] }));
    await expect(loadConfig('bad.json')).rejects.toThrow(/variants\.0/);
  });

  it('should reject negative sizes and unknown keys', async () => {
    await writeFile(join(tempDir, 'neg.json'), JSON.stringify({ sizes: [-1] }));
    await expect(loadConfig('neg.json')).rejects.toThrow(/sizes\.0/);

    await writeFile(join(tempDir, 'extra.json'), JSON.stringify({ sizez: [1] }));
    await expect(loadConfig('extra.json')).rejects.toThrow(/Unrecognized key/);
  });
});

describe('resolveBenchOptions', () => {
  it('should fill defaults', () => {
    expect(resolveBenchOptions({})).toEqual({
      variants: [...VARIANT_NAMES],
      sizes: DEFAULT_SIZES,
      minTimeMs: 100,
      maxIterations: 1_000_000_000,
      warmupIterations: 10,
    });
  });

  it('should let overrides win over the file', () => {
    const options = resolveBenchOptions(
      { sizes: [1, 2], minTimeMs: 50, warmupIterations: 0 },
      { sizes: [3], minTimeMs: 10 },
    );
    expect(options.sizes).toEqual([3]);
    expect(options.minTimeMs).toBe(10);
    expect(options.warmupIterations).toBe(0);
  });
});
