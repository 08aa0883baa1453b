/**
 * Progress Tracker
 *
 * Ordered event stream of one run. Every event gets the next sequence number
 * and is delivered synchronously to each listener before `emit` returns, so
 * listeners observe events in sequence order even when branches run
 * concurrently.
 */

import type { Deferred } from "../utils";
import { createDeferred, toError } from "../utils";
import type { ProgressEvent, ProgressListener, ProgressPayload } from "./progress.types";

export interface ProgressTrackerOptions {
	/** Called when a listener throws (default: console.error) */
	onListenerError?: (error: Error, event: ProgressEvent) => void;
}

export class ProgressTracker {
	private seq = 0;
	private events: ProgressEvent[] = [];
	private listeners = new Set<ProgressListener>();
	private closed = false;
	private waiter?: Deferred<void>;
	private readonly onListenerError: (error: Error, event: ProgressEvent) => void;

	constructor(
		readonly runId: string,
		options?: ProgressTrackerOptions,
	) {
		this.onListenerError =
			options?.onListenerError ??
			((error, event) => console.error(`Progress listener failed on ${event.type} #${event.seq}: ${error.message}`));
	}

	/**
	 * Stamp and deliver an event. A run-complete or run-error event closes the stream.
	 */
	emit(payload: ProgressPayload): ProgressEvent {
		if (this.closed) {
			throw new Error(`Progress stream of run ${this.runId} is closed`);
		}

		const event: ProgressEvent = { ...payload, seq: ++this.seq, runId: this.runId, timestamp: Date.now() };
		this.events.push(event);

		if (event.type === "run-complete" || event.type === "run-error") {
			this.closed = true;
		}

		for (const listener of Array.from(this.listeners)) {
			try {
				listener(event);
			} catch (error) {
				this.onListenerError(toError(error), event);
			}
		}

		const waiter = this.waiter;
		this.waiter = undefined;
		waiter?.resolve();

		return event;
	}

	/**
	 * Listen to events emitted from now on. Returns the unsubscribe function.
	 */
	subscribe(listener: ProgressListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * All events emitted so far
	 */
	history(): readonly ProgressEvent[] {
		return [...this.events];
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Iterate every event of the run: past events first, then live ones
	 * until the stream closes.
	 */
	async *stream(): AsyncGenerator<ProgressEvent, void, undefined> {
		let index = 0;
		while (true) {
			while (index < this.events.length) {
				yield this.events[index++];
			}
			if (this.closed) {
				return;
			}
			this.waiter ??= createDeferred<void>();
			await this.waiter.promise;
		}
	}
}
