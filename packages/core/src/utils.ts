/**
 * Core Utilities
 */

/**
 * Generate unique ID with optional prefix
 */
export function generateId(prefix = ""): string {
	return `${prefix}${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 9)}`;
}

/**
 * Deferred promise - a promise with externally accessible resolve/reject
 */
export interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (error: Error) => void;
}

/**
 * Create a deferred promise
 */
export function createDeferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => undefined;
	let reject: (error: Error) => void = () => undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

/**
 * Sleep for specified milliseconds.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

/**
 * Run a worker over items with at most `limit` workers in flight.
 *
 * Every item is processed even when a worker throws; `onError` is called for
 * each failure as it happens and the first failure is rethrown once all
 * workers have settled.
 */
export async function runWithConcurrency<T>(
	items: readonly T[],
	limit: number,
	worker: (item: T, index: number) => Promise<void>,
	onError?: (error: unknown) => void,
): Promise<void> {
	const errors: unknown[] = [];
	let next = 0;

	const lane = async (): Promise<void> => {
		while (next < items.length) {
			const index = next++;
			try {
				await worker(items[index], index);
			} catch (error) {
				errors.push(error);
				onError?.(error);
			}
		}
	};

	const lanes = Math.min(Math.max(1, limit), items.length);
	await Promise.all(Array.from({ length: lanes }, lane));

	if (errors.length > 0) {
		throw errors[0];
	}
}

/**
 * Race a promise against a deadline. Resolves with `fallback()` when the
 * deadline passes first; the timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, fallback: () => T): Promise<T> {
	let timeoutId: ReturnType<typeof setTimeout> | undefined;

	const timeoutPromise = new Promise<T>((resolve) => {
		timeoutId = setTimeout(() => resolve(fallback()), timeoutMs);
	});

	try {
		return await Promise.race([promise, timeoutPromise]);
	} finally {
		clearTimeout(timeoutId);
	}
}
