/**
 * Bounded-concurrency map
 *
 * Runs worker over items with at most `limit` calls in flight and returns
 * the results in input order. Workers are expected to report failures in
 * their result rather than reject.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    let next = 0;

    async function drain(): Promise<void> {
        while (next < items.length) {
            const index = next++;
            results[index] = await worker(items[index], index);
        }
    }

    const lanes = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: lanes }, () => drain()));
    return results;
}
