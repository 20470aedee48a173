/**
 * Bounded-parallel batch execution. Item-scoped failures become ItemFailures;
 * PoolExhaustedError is systemic (no item can proceed) and aborts the batch.
 */

import { PoolExhaustedError, PipelineError, describeError, type ErrorCode } from "../errors.js";

export interface ItemFailure {
  itemId: string;
  error: string;
  code?: ErrorCode;
}

export interface BatchResult<R> {
  results: R[];
  failures: ItemFailure[];
}

/**
 * Runs fn over items with at most `limit` in flight. Output order follows input order.
 * Workers pull the next index, so a slow item never blocks the others.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const out = new Array<R>(items.length);
  let next = 0;
  const workerCount = Math.max(1, Math.min(limit, items.length));
  const workers = Array.from({ length: workerCount }, async () => {
    while (next < items.length) {
      const i = next++;
      out[i] = await fn(items[i], i);
    }
  });
  await Promise.all(workers);
  return out;
}

type Settled<R> = { ok: true; value: R } | { ok: false; failure: ItemFailure };

export async function runBatch<T, R>(
  items: readonly T[],
  options: {
    concurrency: number;
    itemId: (item: T, index: number) => string;
    onItemFailure?: (failure: ItemFailure) => void | Promise<void>;
  },
  fn: (item: T, index: number) => Promise<R>
): Promise<BatchResult<R>> {
  let systemic: PoolExhaustedError | undefined;
  const settled = await mapWithConcurrency(items, options.concurrency, async (item, i): Promise<Settled<R>> => {
    if (systemic) {
      return { ok: false, failure: { itemId: options.itemId(item, i), error: systemic.message, code: systemic.code } };
    }
    try {
      return { ok: true, value: await fn(item, i) };
    } catch (err) {
      if (err instanceof PoolExhaustedError) {
        systemic = err;
      }
      const failure: ItemFailure = {
        itemId: options.itemId(item, i),
        error: describeError(err),
        ...(err instanceof PipelineError ? { code: err.code } : {}),
      };
      await options.onItemFailure?.(failure);
      return { ok: false, failure };
    }
  });
  if (systemic) throw systemic;

  const results: R[] = [];
  const failures: ItemFailure[] = [];
  for (const s of settled) {
    if (s.ok) results.push(s.value);
    else failures.push(s.failure);
  }
  return { results, failures };
}
