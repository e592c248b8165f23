/**
 * Small counting helpers shared by the miners.
 */

/** Insertion-ordered tally. */
export class Tally {
  private readonly counts = new Map<string, number>();
  private sum = 0;

  add(key: string): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
    this.sum++;
  }

  get total(): number {
    return this.sum;
  }

  /**
   * The key with the highest count. On a tie the key seen first wins.
   */
  majority(): { key: string; count: number } | null {
    let best: { key: string; count: number } | null = null;
    for (const [key, count] of this.counts) {
      if (best === null || count > best.count) {
        best = { key, count };
      }
    }
    return best;
  }
}

/**
 * Arithmetic mean and population standard deviation. Returns null for an
 * empty input.
 */
export function meanAndStdDev(values: readonly number[]): { mean: number; stddev: number } | null {
  if (values.length === 0) return null;

  const mean = values.reduce((acc, v) => acc + v, 0) / values.length;
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
  return { mean, stddev: Math.sqrt(variance) };
}
