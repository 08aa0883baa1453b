/**
 * Run Options
 */

import type { TestReporter } from "../recording/reporter";
import type { ProgressEvent } from "../progress/progress.types";

/**
 * What to do with a resolution failure found while the run executes
 */
export type ResolutionErrorPolicy = "fail-node" | "fail-run";

/**
 * Run configuration
 */
export interface RunOptions {
	/** Run name (default: root node name) */
	name?: string;
	/** Worker limit of parallel suites */
	concurrency?: number;
	/** Default step deadline (ms) */
	stepTimeout?: number;
	/** Wait for interrupted actions to settle (ms) */
	cancelGracePeriod?: number;
	/** Skip remaining siblings after a failure in cases and flights */
	failFast?: boolean;
	/** Double finalization raises instead of being ignored */
	strict?: boolean;
	/**
	 * Rank passed above skipped when aggregating, so a case with passed and
	 * skipped flights reports passed. Off by default: the status table ranks
	 * skipped above passed.
	 */
	passedOverSkipped?: boolean;
	onResolutionError?: ResolutionErrorPolicy;
	reporters?: TestReporter[];
	/** Called when a progress listener or reporter throws */
	onListenerError?: (error: Error, event: ProgressEvent) => void;
	metadata?: Record<string, unknown>;
}

export type ResolvedRunOptions = Required<Omit<RunOptions, "name" | "onListenerError" | "metadata">> &
	Pick<RunOptions, "name" | "onListenerError" | "metadata">;

export type RunDefaults = Omit<ResolvedRunOptions, "reporters" | "name" | "onListenerError" | "metadata">;

export const DEFAULT_RUN_OPTIONS: Readonly<RunDefaults> = Object.freeze({
	concurrency: 4,
	stepTimeout: 30000,
	cancelGracePeriod: 1000,
	failFast: true,
	strict: false,
	passedOverSkipped: false,
	onResolutionError: "fail-node",
});

function assertNumber(name: string, value: number, { integer, min }: { integer: boolean; min: number }): void {
	if (!Number.isFinite(value) || (integer && !Number.isInteger(value)) || value < min) {
		throw new RangeError(`${name} must be ${integer ? "an integer" : "a number"} >= ${min}, got ${value}`);
	}
}

/**
 * Merge options over defaults and validate them
 *
 * @throws RangeError on invalid numbers or an unknown resolution policy
 */
export function resolveRunOptions(...layers: Array<RunOptions | undefined>): ResolvedRunOptions {
	const merged: RunOptions = {};
	for (const layer of layers) {
		if (!layer) continue;
		for (const [key, value] of Object.entries(layer)) {
			if (value !== undefined) {
				Object.assign(merged, { [key]: value });
			}
		}
	}

	const options: ResolvedRunOptions = {
		...DEFAULT_RUN_OPTIONS,
		reporters: [],
		...merged,
	};

	assertNumber("concurrency", options.concurrency, { integer: true, min: 1 });
	assertNumber("stepTimeout", options.stepTimeout, { integer: false, min: 1 });
	assertNumber("cancelGracePeriod", options.cancelGracePeriod, { integer: false, min: 0 });

	if (options.onResolutionError !== "fail-node" && options.onResolutionError !== "fail-run") {
		throw new RangeError(`onResolutionError must be "fail-node" or "fail-run", got ${String(options.onResolutionError)}`);
	}
	return options;
}
