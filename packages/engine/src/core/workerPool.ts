/**
 * runBounded
 *
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * With a concurrency of 1 items are processed strictly in order.
 *
 * After the first failure no new item is started; calls already in flight
 * are allowed to settle, then the first error is thrown. An aborted
 * `signal` stops new items the same way and throws its reason.
 *
 * @param items - Work items
 * @param concurrency - Max number of concurrent calls (integer >= 1)
 * @param worker - Async function applied to each item
 * @param signal - Optional cancellation signal
 */
export async function runBounded<T>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T) => Promise<void>,
    signal?: AbortSignal
): Promise<void> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new TypeError("Expected `concurrency` to be an integer from 1 and up");
    }

    let next = 0;
    const errors: unknown[] = [];

    const lane = async (): Promise<void> => {
        while (next < items.length && errors.length === 0 && !signal?.aborted) {
            const item = items[next];
            next += 1;
            try {
                await worker(item);
            }
            catch (error) {
                errors.push(error);
            }
        }
    };

    const lanes = Math.min(concurrency, items.length);
    await Promise.all(Array.from({ length: lanes }, () => lane()));

    if (errors.length > 0) {
        throw errors[0];
    }
    signal?.throwIfAborted();
}
