import { toError } from './errors.js';

export type TaskOutcome<T, R> =
    | { ok: true; item: T; value: R; worker: number }
    | { ok: false; item: T; error: Error; worker: number };

export interface PoolOptions<T, R> {
    /** Number of workers; each takes one item at a time */
    concurrency: number;

    /** Stop handing out items after the first failed task (in-flight tasks still finish) */
    stopOnError?: boolean;

    /** Called as each task settles, in completion order */
    onSettled?: (outcome: TaskOutcome<T, R>) => void;
}

export interface PoolResult<T, R> {
    /** Completion order */
    outcomes: TaskOutcome<T, R>[];
    maxConcurrent: number;
    stopped: boolean;
}

async function* pull<T>(items: Iterable<T> | AsyncIterable<T>): AsyncGenerator<T> {
    yield* items;
}

/**
 * Run `task` over a lazily consumed item stream with a fixed number of
 * workers. Every worker owns a context built by `createWorker` on its first
 * item, so workers share nothing but what the context itself shares.
 *
 * Task failures, and failures to build a worker's context, are reported as
 * outcomes of the item at hand; a worker whose context failed retries the
 * build on its next item. A throwing item source rejects the returned
 * promise, after every in-flight task has settled.
 */
export async function runPool<T, R, W>(
    items: Iterable<T> | AsyncIterable<T>,
    createWorker: (index: number) => W,
    task: (worker: W, item: T) => Promise<R>,
    options: PoolOptions<T, R>
): Promise<PoolResult<T, R>> {
    const { concurrency, stopOnError = false, onSettled } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const source = pull(items);
    const outcomes: TaskOutcome<T, R>[] = [];
    let activeCount = 0;
    let maxConcurrent = 0;
    let stopped = false;

    const runWorker = async (index: number): Promise<void> => {
        let context: W | undefined;

        while (!stopped) {
            const next = await source.next();
            if (next.done) return;

            const item = next.value;

            activeCount++;
            maxConcurrent = Math.max(maxConcurrent, activeCount);

            let outcome: TaskOutcome<T, R>;
            try {
                context ??= createWorker(index);
                const value = await task(context, item);
                outcome = { ok: true, item, value, worker: index };
            } catch (error) {
                outcome = { ok: false, item, error: toError(error), worker: index };
                if (stopOnError) stopped = true;
            } finally {
                activeCount--;
            }

            outcomes.push(outcome);
            onSettled?.(outcome);
        }
    };

    const workers = Array.from({ length: concurrency }, (_, index) => runWorker(index));
    const settled = await Promise.allSettled(workers);

    const crashed = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (crashed) {
        throw toError(crashed.reason);
    }

    return { outcomes, maxConcurrent, stopped };
}
