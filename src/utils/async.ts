/**
 * Async helpers: bounded operations and per-key serialization
 */

import { TimeoutError } from '../inference/errors';

/**
 * Run `task` with a deadline. The task receives a signal that aborts on
 * timeout or when `parent` aborts. The returned promise rejects with
 * TimeoutError on timeout and with the parent's reason on abort, whether
 * or not the task honours its signal.
 */
export async function withTimeout<T>(
	operation: string,
	timeoutMs: number,
	task: (signal: AbortSignal) => Promise<T>,
	parent?: AbortSignal
): Promise<T> {
	if (parent?.aborted) {
		throw parent.reason;
	}

	const controller = new AbortController();
	const onParentAbort = () => controller.abort(parent?.reason);
	parent?.addEventListener('abort', onParentAbort, { once: true });

	let timer: NodeJS.Timeout | undefined;
	const deadline = new Promise<never>((_, reject) => {
		controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
		timer = setTimeout(() => controller.abort(new TimeoutError(operation, timeoutMs)), timeoutMs);
	});

	try {
		return await Promise.race([task(controller.signal), deadline]);
	} finally {
		clearTimeout(timer);
		parent?.removeEventListener('abort', onParentAbort);
	}
}

/**
 * Serializes tasks per key: tasks for one key run one at a time in
 * submission order, tasks for different keys interleave freely.
 */
export class KeyedSerialQueue {
	private tails = new Map<string, Promise<void>>();

	run<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		const result = previous.then(task);

		// Tail never rejects so one failed task does not poison the lane
		const tail = result.then(
			() => undefined,
			() => undefined
		);
		this.tails.set(key, tail);
		void tail.then(() => {
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		});

		return result;
	}

	/**
	 * Keys with queued or running tasks
	 */
	activeKeys(): number {
		return this.tails.size;
	}

	/**
	 * Wait until every lane submitted so far is idle
	 */
	async drain(): Promise<void> {
		while (this.tails.size > 0) {
			await Promise.all(Array.from(this.tails.values()));
		}
	}
}
