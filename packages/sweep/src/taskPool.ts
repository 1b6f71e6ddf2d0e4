import { assertPositiveInteger } from "@backlab/core";
import { SweepCancelledError } from "./errors";

export type PoolTask<T> = () => T | Promise<T>;

export interface TaskPoolOptions<T> {
	concurrency: number;
	signal?: AbortSignal;
	onResult?: (result: T, index: number, completed: number) => void;
}

const yieldToEventLoop = (): Promise<void> =>
	new Promise((resolve) => {
		setImmediate(resolve);
	});

/**
 * Runs tasks with at most `concurrency` in flight and yields to the event
 * loop between tasks. Results keep task order. The abort signal is checked
 * before each task starts; a task already running is not interrupted.
 */
export const runTaskPool = async <T>(
	tasks: ReadonlyArray<PoolTask<T>>,
	options: TaskPoolOptions<T>
): Promise<T[]> => {
	assertPositiveInteger(options.concurrency, "concurrency");
	const results: T[] = [];
	let nextIndex = 0;
	let completed = 0;
	let failed = false;

	const worker = async (): Promise<void> => {
		while (!failed && nextIndex < tasks.length) {
			if (options.signal?.aborted) {
				failed = true;
				throw new SweepCancelledError(completed, tasks.length);
			}
			const index = nextIndex;
			nextIndex += 1;
			try {
				const result = await tasks[index]();
				results[index] = result;
				completed += 1;
				options.onResult?.(result, index, completed);
			} catch (error) {
				failed = true;
				throw error;
			}
			await yieldToEventLoop();
		}
	};

	const workers = Array.from(
		{ length: Math.min(options.concurrency, tasks.length) },
		() => worker()
	);
	await Promise.all(workers);
	if (options.signal?.aborted && completed < tasks.length) {
		throw new SweepCancelledError(completed, tasks.length);
	}
	return results;
};
