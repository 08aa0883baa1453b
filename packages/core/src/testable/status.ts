/**
 * Status
 *
 * Node lifecycle: pending -> running -> terminal, or pending -> terminal
 * when a node is skipped without starting.
 */

export type Status = "pending" | "running" | "passed" | "failed" | "error" | "skipped";

export type TerminalStatus = Exclude<Status, "pending" | "running">;

/**
 * Aggregation precedence (highest wins)
 */
export const STATUS_PRECEDENCE: Readonly<Record<TerminalStatus, number>> = {
	passed: 1,
	skipped: 2,
	failed: 3,
	error: 4,
};

/**
 * Ordering where a passed child outranks skipped siblings
 */
export const PASSED_OVER_SKIPPED_PRECEDENCE: Readonly<Record<TerminalStatus, number>> = {
	skipped: 1,
	passed: 2,
	failed: 3,
	error: 4,
};

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ["passed", "failed", "error", "skipped"];

export function isTerminal(status: Status): status is TerminalStatus {
	return status !== "pending" && status !== "running";
}

/**
 * Failed or error, the statuses that trigger failFast
 */
export function isBadStatus(status: Status): boolean {
	return status === "failed" || status === "error";
}
