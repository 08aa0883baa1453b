/**
 * Errors
 *
 * Every error raised by the engine carries a stable `code` so that reporters
 * and callers can branch on it without relying on class identity.
 */

import type { ConstraintSet } from "./constraints/constraint.types";
import { formatConstraints } from "./constraints/signature";
import type { NodeSnapshot } from "./testable/test-node";

export type StepwiseErrorCode =
	| "UnsatisfiableConstraint"
	| "AmbiguousResolution"
	| "ActionExecutionError"
	| "ActionTimeout"
	| "ActionCancelled"
	| "AggregationInvariantViolation"
	| "TopologyResolution"
	| "RegistrySealed"
	| "AssertionFailure";

/**
 * Base class for engine errors
 */
export abstract class StepwiseError extends Error {
	abstract readonly code: StepwiseErrorCode;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * No registered factory satisfies a requirement.
 */
export class UnsatisfiableConstraintError extends StepwiseError {
	readonly code = "UnsatisfiableConstraint";

	constructor(
		readonly requirement: ConstraintSet,
		readonly unmetAttributes: readonly string[],
	) {
		super(
			`No factory satisfies {${formatConstraints(requirement)}}; unmet attributes: ${
				unmetAttributes.length > 0 ? unmetAttributes.join(", ") : "(none)"
			}`,
		);
	}
}

/**
 * Two or more equally specific factories satisfy a requirement.
 */
export class AmbiguousResolutionError extends StepwiseError {
	readonly code = "AmbiguousResolution";

	constructor(
		readonly requirement: ConstraintSet,
		readonly candidates: readonly string[],
	) {
		super(`Ambiguous resolution for {${formatConstraints(requirement)}}: ${candidates.join(", ")}`);
	}
}

/**
 * An agent raised a fault while executing an action.
 */
export class ActionExecutionError extends StepwiseError {
	readonly code = "ActionExecutionError";

	constructor(
		message: string,
		readonly actionType?: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}

	/**
	 * Wrap a fault raised by an agent
	 */
	static fromFault(actionType: string, cause: Error): ActionExecutionError {
		return new ActionExecutionError(`Action "${actionType}" failed: ${cause.message}`, actionType, { cause });
	}
}

/**
 * A step exceeded its deadline.
 */
export class ActionTimeoutError extends StepwiseError {
	readonly code = "ActionTimeout";

	constructor(
		readonly timeout: number,
		readonly actionType?: string,
	) {
		super(`Action "${actionType ?? "unknown"}" timed out after ${timeout}ms`);
	}
}

/**
 * A step was interrupted by run cancellation.
 */
export class ActionCancelledError extends StepwiseError {
	readonly code = "ActionCancelled";

	constructor(readonly reason: string) {
		super(`Action cancelled: ${reason}`);
	}
}

/**
 * The aggregation protocol was broken. Always fatal to the run.
 */
export class AggregationInvariantViolation extends StepwiseError {
	readonly code = "AggregationInvariantViolation";

	constructor(
		message: string,
		readonly nodeId: string,
		readonly snapshot: NodeSnapshot,
	) {
		super(`${message} (node ${nodeId}, status ${snapshot.status})`);
	}
}

/**
 * Failure of one topology component during up-front resolution
 */
export interface TopologyFailure {
	component: string;
	error: Error;
}

/**
 * One or more topology components could not be resolved before the run.
 */
export class TopologyResolutionError extends StepwiseError {
	readonly code = "TopologyResolution";

	constructor(readonly failures: readonly TopologyFailure[]) {
		super(
			`Topology resolution failed for ${failures.length} component(s):\n${failures
				.map((f) => `  - ${f.component}: ${f.error.message}`)
				.join("\n")}`,
		);
	}
}

/**
 * The factory registry no longer accepts registrations.
 */
export class RegistrySealedError extends StepwiseError {
	readonly code = "RegistrySealed";

	constructor(factoryName: string) {
		super(`Cannot register factory ${factoryName}: registry is sealed`);
	}
}

/**
 * Raised by step assertions. Maps to a failed result rather than an error.
 */
export class AssertionFailure extends StepwiseError {
	readonly code = "AssertionFailure";

	constructor(
		message: string,
		readonly expected?: unknown,
		readonly actual?: unknown,
	) {
		super(message);
	}
}

/**
 * Check if an error came from requirement resolution
 */
export function isResolutionError(error: unknown): error is UnsatisfiableConstraintError | AmbiguousResolutionError {
	return error instanceof UnsatisfiableConstraintError || error instanceof AmbiguousResolutionError;
}

/**
 * Check if an error signals a failed check rather than a broken automation
 */
export function isAssertionError(error: unknown): boolean {
	return error instanceof AssertionFailure || (error instanceof Error && error.name === "AssertionError");
}
