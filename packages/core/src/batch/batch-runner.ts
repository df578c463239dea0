import { describeError } from "../errors";
import type { BatchItemResult, BatchReport } from "../types";

export interface BatchItem {
  id: string;
  label: string;
}

/**
 * Run `worker` over each item in order. A failing item is recorded and the
 * batch moves on to the next one.
 */
export async function runBatch<I extends BatchItem, T>(
  items: readonly I[],
  worker: (item: I, index: number) => Promise<T>
): Promise<BatchReport<T>> {
  const results: BatchItemResult<T>[] = [];

  for (const [index, item] of items.entries()) {
    try {
      const value = await worker(item, index);
      results.push({ ok: true, id: item.id, label: item.label, value });
    } catch (error: unknown) {
      results.push({ ok: false, id: item.id, label: item.label, reason: describeError(error) });
    }
  }

  const succeeded = results.filter((result) => result.ok).length;
  return { results, succeeded, failed: results.length - succeeded };
}
