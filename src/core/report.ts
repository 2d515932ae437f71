import type { BenchCase, BenchResult } from '../types/benchmark.js';
import type { VariantName } from '../types/fibonacci.js';

/**
 * Format a duration in nanoseconds with a unit that keeps it readable.
 */
export function formatNs(ns: number): string {
  if (ns < 1_000) return `${ns.toFixed(1)}ns`;
  if (ns < 1_000_000) return `${(ns / 1_000).toFixed(2)}µs`;
  if (ns < 1_000_000_000) return `${(ns / 1_000_000).toFixed(2)}ms`;
  return `${(ns / 1_000_000_000).toFixed(2)}s`;
}

/**
 * Text table: one row per variant, one column per size, cells are time per call.
 */
export function formatTable(result: BenchResult): string {
  const variants = orderedVariants(result.cases);
  const byKey = new Map<string, BenchCase>();
  for (const c of result.cases) {
    byKey.set(`${c.variant}:${c.n}`, c);
  }

  const header = ['variant', ...result.sizes.map(n => `n=${n}`)];
  const rows = variants.map(variant => [
    variant,
    ...result.sizes.map(n => {
      const c = byKey.get(`${variant}:${n}`);
      return c ? formatNs(c.nsPerOp) : '-';
    }),
  ]);

  const widths = header.map((cell, col) =>
    Math.max(cell.length, ...rows.map(row => row[col].length)),
  );
  const line = (cells: string[]) =>
    cells.map((cell, col) => (col === 0 ? cell.padEnd(widths[col]) : cell.padStart(widths[col]))).join('  ');

  return [line(header), ...rows.map(line)].join('\n');
}

export function formatJson(result: BenchResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Smallest benchmarked size at which `challenger` is faster than `baseline`,
 * or null if it never is.
 */
export function findCrossover(
  result: BenchResult,
  baseline: VariantName,
  challenger: VariantName,
): number | null {
  for (const n of result.sizes) {
    const a = result.cases.find(c => c.variant === baseline && c.n === n);
    const b = result.cases.find(c => c.variant === challenger && c.n === n);
    if (a && b && b.nsPerOp < a.nsPerOp) {
      return n;
    }
  }
  return null;
}

function orderedVariants(cases: BenchCase[]): VariantName[] {
  const seen: VariantName[] = [];
  for (const c of cases) {
    if (!seen.includes(c.variant)) seen.push(c.variant);
  }
  return seen;
}
