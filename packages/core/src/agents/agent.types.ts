/**
 * Agent Types
 *
 * Agents perform automation actions against one target interface
 * (REST, CLI, GUI, native...). The core is protocol-agnostic: concrete agents
 * live in their own packages and are registered as factories.
 */

/**
 * Abstract automation action carried by a step
 */
export interface Action {
	/** Action type understood by the agent, e.g. "request" or "send" */
	type: string;
	params?: Record<string, unknown>;
	description?: string;
}

/**
 * Verdict an agent can report for an action it executed without fault
 */
export type OutcomeStatus = "passed" | "failed";

/**
 * Captured result of an action. A missing status means passed.
 */
export interface ActionOutcome<TData = unknown> {
	status?: OutcomeStatus;
	message?: string;
	data?: TData;
	metadata?: Record<string, unknown>;
}

/**
 * Options passed to every execute call
 */
export interface ExecuteOptions {
	/** Deadline enforced by the dispatcher (ms) */
	timeout: number;
	/** Aborted on timeout or run cancellation */
	signal: AbortSignal;
}

/**
 * Agent capability
 */
export interface Agent {
	/** Interface kind, informational only */
	readonly kind?: string;

	execute(action: Action, options: ExecuteOptions): Promise<ActionOutcome>;

	/** Best-effort interruption of in-flight actions */
	cancel(): void | Promise<void>;

	/** Release resources at run end */
	dispose?(): void | Promise<void>;
}

/**
 * Type guard for the agent capability
 */
export function isAgent(value: unknown): value is Agent {
	return (
		typeof value === "object" &&
		value !== null &&
		"execute" in value &&
		typeof value.execute === "function" &&
		"cancel" in value &&
		typeof value.cancel === "function"
	);
}

/**
 * Check if a resolved instance can be released
 */
export function isDisposable(value: unknown): value is { dispose(): void | Promise<void> } {
	return typeof value === "object" && value !== null && "dispose" in value && typeof value.dispose === "function";
}
