/**
 * @file concurrency.ts
 * @module shared/utils/concurrency
 * @created 2026-10-15
 * @license MIT
 *
 * @fileoverview Bounded-concurrency async mapping.
 */

/**
 * Map items through an async function with at most `limit` calls in flight.
 *
 * Results keep the input order. The first rejection rejects the whole call
 * once the in-flight calls have settled; no new calls start after it.
 *
 * @example
 * ```typescript
 * const sizes = await mapWithConcurrency(files, 4, async f => (await stat(f)).size);
 * ```
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
    let next = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
        while (!failed && next < items.length) {
            const index = next++;
            try {
                results[index] = await fn(items[index], index);
            } catch (error) {
                failed = true;
                throw error;
            }
        }
    };

    const workers = Array.from({ length: workerCount }, () => worker());
    const settled = await Promise.allSettled(workers);
    for (const outcome of settled) {
        if (outcome.status === 'rejected') throw outcome.reason;
    }
    return results;
}
