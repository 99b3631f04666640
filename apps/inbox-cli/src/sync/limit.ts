/**
 * Run `task` over every item with at most `limit` calls in flight.
 * Every task is awaited; results come back in input order as settled outcomes.
 */
export async function mapSettled<T, R>(
    items: readonly T[],
    limit: number,
    task: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
    const results = new Array<PromiseSettledResult<R>>(items.length);
    let next = 0;

    const runner = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            try {
                results[index] = { status: 'fulfilled', value: await task(items[index], index) };
            } catch (reason) {
                results[index] = { status: 'rejected', reason };
            }
        }
    };

    const width = Math.min(Math.max(1, limit), items.length);
    await Promise.all(Array.from({ length: width }, () => runner()));
    return results;
}
