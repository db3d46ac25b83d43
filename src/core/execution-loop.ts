/**
 * Parse comma-separated CLI identifiers into a normalized list.
 * Empty/whitespace input returns `undefined` so callers can distinguish
 * "not given" from "explicit empty list."
 */
export function parseCsvArgument(raw: string | undefined): string[] | undefined {
  if (!raw) {
    return undefined;
  }

  const values = raw
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

  return values.length > 0 ? values : undefined;
}

/**
 * Execute asynchronous work with bounded concurrency while preserving the input
 * ordering in the returned result array.
 *
 * Workers pull from one shared iterator, so each item is handed out exactly once.
 * The returned promise settles only after every worker has drained.
 */
export async function runWithConcurrency<TInput, TOutput>(
  items: readonly TInput[],
  requestedConcurrency: number,
  worker: (item: TInput, index: number) => Promise<TOutput>
): Promise<TOutput[]> {
  if (items.length === 0) {
    return [];
  }

  const concurrency = normalizeConcurrency(requestedConcurrency, items.length);
  const results = new Array<TOutput>(items.length);
  const queue = items.entries();

  async function runWorker(): Promise<void> {
    for (const [index, item] of queue) {
      results[index] = await worker(item, index);
    }
  }

  const workers = Array.from({ length: concurrency }, () => runWorker());
  await Promise.all(workers);
  return results;
}

/**
 * Clamp and sanitize caller-provided concurrency to a safe positive integer.
 */
export function normalizeConcurrency(requestedConcurrency: number, maxItems: number): number {
  const fallback = 1;
  if (!Number.isFinite(requestedConcurrency)) {
    return fallback;
  }

  const rounded = Math.floor(requestedConcurrency);
  if (rounded <= 0) {
    return fallback;
  }

  return Math.min(rounded, Math.max(1, maxItems));
}
