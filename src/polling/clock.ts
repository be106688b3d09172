import { OperationAbortedError } from '../errors';

/**
 * Time source for retry and poll loops. Tests substitute a simulated clock.
 */
export interface Clock {
	now(): number;
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new OperationAbortedError());
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			reject(new OperationAbortedError());
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);

		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

export const systemClock: Clock = {
	now: () => Date.now(),
	sleep,
};

export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new OperationAbortedError();
	}
}
