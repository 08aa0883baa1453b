/**
 * Result Aggregator
 *
 * Finalizes nodes and propagates results upward. Each child's result is
 * delivered to its parent exactly once, in completion order; the parent
 * finalizes itself when the last child has delivered. Deliveries before that
 * point only produce partial `aggregate` events.
 */

import type { ActionOutcome } from "../agents/agent.types";
import { AggregationInvariantViolation, StepwiseError } from "../errors";
import type { ProgressTracker } from "../progress/progress-tracker";
import type { Result, ResultError } from "../testable/result.types";
import type { TerminalStatus } from "../testable/status";
import { PASSED_OVER_SKIPPED_PRECEDENCE, STATUS_PRECEDENCE } from "../testable/status";
import type { TestNode } from "../testable/test-node";

export interface AggregationOptions {
	/** Rank passed above skipped */
	passedOverSkipped?: boolean;
}

export interface AggregatorOptions extends AggregationOptions {
	/** Finalizing a finalized node throws instead of being ignored */
	strict?: boolean;
}

/**
 * Fields of a leaf result
 */
export interface FinalizeFields {
	status: TerminalStatus;
	message?: string;
	error?: Error;
	outcome?: ActionOutcome;
}

/**
 * Index of the first status with the highest precedence, or -1 when empty
 */
export function worstIndex(statuses: readonly TerminalStatus[], options?: AggregationOptions): number {
	const precedence = options?.passedOverSkipped ? PASSED_OVER_SKIPPED_PRECEDENCE : STATUS_PRECEDENCE;
	let worst = -1;
	statuses.forEach((status, index) => {
		if (worst < 0 || precedence[status] > precedence[statuses[worst]]) {
			worst = index;
		}
	});
	return worst;
}

/**
 * Reduce child statuses by precedence. No children means passed.
 */
export function aggregateStatus(statuses: readonly TerminalStatus[], options?: AggregationOptions): TerminalStatus {
	const index = worstIndex(statuses, options);
	return index < 0 ? "passed" : statuses[index];
}

/**
 * Serializable form of an error
 */
export function toResultError(error: Error): ResultError {
	return Object.freeze({
		name: error.name,
		message: error.message,
		stack: error.stack,
		code: error instanceof StepwiseError ? error.code : undefined,
	});
}

export class ResultAggregator {
	private deliveries = new Map<TestNode, TestNode[]>();
	private readonly strict: boolean;
	private readonly aggregation: AggregationOptions;

	constructor(
		private readonly tracker: ProgressTracker,
		options?: AggregatorOptions,
	) {
		this.strict = options?.strict ?? false;
		this.aggregation = { passedOverSkipped: options?.passedOverSkipped ?? false };
	}

	/**
	 * pending -> running
	 */
	start(node: TestNode): void {
		node.markRunning();
		this.transition(node, "pending");
	}

	/**
	 * Finalize a step. Returns false when the node was already finalized.
	 *
	 * @throws AggregationInvariantViolation for a container with undelivered
	 * children, or for a second finalization in strict mode
	 */
	finalize(node: TestNode, fields: FinalizeFields): boolean {
		if (this.rejectRepeat(node)) {
			return false;
		}
		if (node.children.length > 0) {
			throw new AggregationInvariantViolation(
				"Container finalized before all children finalized",
				node.id,
				node.snapshot(),
			);
		}

		this.complete(node, {
			status: fields.status,
			message: fields.message,
			error: fields.error ? toResultError(fields.error) : undefined,
			outcome: fields.outcome,
		});
		return true;
	}

	/**
	 * Skip a node that has not started, with every descendant.
	 * Descendants finalize first; a container with children then completes
	 * through the regular delivery path.
	 */
	skip(node: TestNode, reason: string): void {
		if (node.isFinalized) {
			return;
		}
		if (node.children.length === 0) {
			this.complete(node, { status: "skipped", message: reason });
			return;
		}
		for (const child of node.children) {
			this.skip(child, reason);
		}
	}

	/**
	 * Finalize a container that has no children (vacuously passed)
	 */
	finalizeEmpty(node: TestNode): boolean {
		if (this.rejectRepeat(node)) {
			return false;
		}
		if (node.children.length > 0) {
			throw new AggregationInvariantViolation("Container has children", node.id, node.snapshot());
		}
		this.complete(node, {});
		return true;
	}

	/**
	 * Children of a container in the order they delivered
	 */
	deliveredTo(node: TestNode): readonly TestNode[] {
		return this.deliveries.get(node) ?? [];
	}

	// =========================================================================
	// Propagation
	// =========================================================================

	private rejectRepeat(node: TestNode): boolean {
		if (!node.isFinalized) {
			return false;
		}
		if (this.strict) {
			throw new AggregationInvariantViolation("Node finalized twice", node.id, node.snapshot());
		}
		return true;
	}

	private complete(node: TestNode, fields: Partial<Omit<Result, "nodeId" | "kind" | "name" | "children">>): void {
		const from = node.status;
		const endTime = Date.now();
		const startTime = node.startTime ?? endTime;

		const result: Result = Object.freeze({
			nodeId: node.id,
			kind: node.kind,
			name: node.name,
			status: fields.status ?? "passed",
			startTime,
			endTime,
			duration: endTime - startTime,
			message: fields.message,
			error: fields.error,
			outcome: fields.outcome,
			causeId: fields.causeId,
			phase: node.phase,
			metadata: node.definition.kind === "case" ? node.definition.metadata : undefined,
			children: Object.freeze(node.children.map((child) => this.resultOf(child))),
		});

		node.applyResult(result);
		this.transition(node, from, result);

		if (node.parent) {
			this.deliver(node.parent, node);
		}
	}

	private deliver(parent: TestNode, child: TestNode): void {
		if (!parent.children.includes(child)) {
			throw new AggregationInvariantViolation(`Node ${child.id} is not a child`, parent.id, parent.snapshot());
		}
		if (parent.isFinalized) {
			throw new AggregationInvariantViolation(
				`Child ${child.id} finalized after its parent`,
				parent.id,
				parent.snapshot(),
			);
		}

		const delivered = this.deliveries.get(parent) ?? [];
		if (delivered.includes(child)) {
			throw new AggregationInvariantViolation(`Child ${child.id} delivered twice`, parent.id, parent.snapshot());
		}
		delivered.push(child);
		this.deliveries.set(parent, delivered);

		const statuses = delivered.map((node) => this.resultOf(node).status);
		const index = worstIndex(statuses, this.aggregation);

		if (delivered.length < parent.children.length) {
			this.tracker.emit({
				type: "aggregate",
				nodeId: parent.id,
				childId: child.id,
				status: statuses[index],
				completed: delivered.length,
				total: parent.children.length,
				final: false,
			});
			return;
		}

		const cause = this.resultOf(delivered[index]);
		this.complete(parent, {
			status: cause.status,
			message: cause.status === "passed" ? undefined : cause.message,
			causeId: cause.nodeId,
		});
	}

	private resultOf(node: TestNode): Result {
		const result = node.result;
		if (!result) {
			throw new AggregationInvariantViolation("Result read before finalization", node.id, node.snapshot());
		}
		return result;
	}

	private transition(node: TestNode, from: TestNode["status"], result?: Result): void {
		this.tracker.emit({
			type: "transition",
			nodeId: node.id,
			parentId: node.parent?.id,
			kind: node.kind,
			name: node.name,
			from,
			to: node.status,
			metadata: node.definition.kind === "case" ? node.definition.metadata : undefined,
			result,
		});
	}
}
