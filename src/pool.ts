/**
 * Bounded fan-out for per-project fetches.
 *
 * Results come back as (index, outcome) pairs in the order of the input,
 * whatever order the workers finished in.
 */

export type Settled<T> =
  | { index: number; ok: true; value: T }
  | { index: number; ok: false; error: unknown };

export interface FanOutOptions {
  /** Maximum workers in flight (default: one per item) */
  concurrency?: number;
}

export async function fanOut<I, T>(
  items: readonly I[],
  worker: (item: I, index: number) => Promise<T>,
  options: FanOutOptions = {}
): Promise<Settled<T>[]> {
  const results: Settled<T>[] = new Array(items.length);
  const limit = Math.max(1, Math.min(options.concurrency ?? items.length, items.length));
  let cursor = 0;

  async function runner(): Promise<void> {
    while (cursor < items.length) {
      const index = cursor++;
      try {
        const value = await worker(items[index], index);
        results[index] = { index, ok: true, value };
      } catch (error) {
        results[index] = { index, ok: false, error };
      }
    }
  }

  const runners: Promise<void>[] = [];
  for (let i = 0; i < limit && i < items.length; i++) {
    runners.push(runner());
  }
  await Promise.all(runners);

  return results;
}

/** Unwrap fan-out results, throwing the lowest-index failure if any */
export function collectOrThrow<T>(results: readonly Settled<T>[]): T[] {
  const values: T[] = [];
  for (const result of results) {
    if (!result.ok) throw result.error;
    values.push(result.value);
  }
  return values;
}
