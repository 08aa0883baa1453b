/**
 * Agent Dispatcher
 *
 * Runs one step: resolves its agent, builds the action, executes it under the
 * step deadline and turns whatever happens into a step outcome. Nothing raised
 * by an agent escapes `dispatch`.
 */

import {
	ActionCancelledError,
	ActionExecutionError,
	ActionTimeoutError,
	isAssertionError,
} from "../errors";
import type { Resolver } from "../resolver/resolver";
import type { ResolvedTopology } from "../resolver/topology";
import type { AgentTarget, StepContext, StepDefinition } from "../testable/definition.types";
import type { TerminalStatus } from "../testable/status";
import { toError, withTimeout } from "../utils";
import type { Action, ActionOutcome, Agent } from "./agent.types";
import { isAgent } from "./agent.types";

/**
 * Normalized result of a dispatched step
 */
export interface StepOutcome {
	status: TerminalStatus;
	message?: string;
	error?: Error;
	outcome?: ActionOutcome;
}

export interface DispatchOptions {
	runId: string;
	stepId: string;
	/** Step deadline (ms) */
	timeout: number;
	/** Wait for an interrupted action to settle (ms) */
	cancelGracePeriod: number;
	/** Run cancellation signal */
	signal: AbortSignal;
}

type Settlement =
	| { kind: "done"; outcome: ActionOutcome }
	| { kind: "fault"; error: Error }
	| { kind: "timeout" }
	| { kind: "cancelled" };

/**
 * Rewrite a status against the expected one(s).
 * Without an expectation the status is returned as is.
 */
export function applyExpectation(
	status: TerminalStatus,
	expect?: TerminalStatus | readonly TerminalStatus[],
): { status: TerminalStatus; matched?: boolean; message?: string } {
	if (expect === undefined) {
		return { status };
	}
	const expected = typeof expect === "string" ? [expect] : expect;
	const list = `[${expected.join(", ")}]`;

	if (expected.includes(status)) {
		return { status: "passed", matched: true, message: `actual ${status} matched expected ${list}` };
	}
	return { status: "failed", matched: false, message: `actual ${status} not in expected ${list}` };
}

function cancellationReason(signal: AbortSignal): string {
	return signal.reason === undefined ? "run cancelled" : String(signal.reason);
}

export class AgentDispatcher {
	constructor(
		private readonly resolver: Resolver,
		private readonly topology: ResolvedTopology,
	) {}

	/**
	 * Agent of a step: a topology component or an inline requirement.
	 * Resolution errors propagate to the caller.
	 */
	async resolveAgent(target: AgentTarget): Promise<Agent> {
		const label = typeof target === "string" ? `Component ${target}` : "Resolved binding";
		const instance =
			typeof target === "string" ? this.topology.get<unknown>(target) : (await this.resolver.resolve(target)).instance;

		if (!isAgent(instance)) {
			throw new ActionExecutionError(`${label} is not an agent`);
		}
		return instance;
	}

	/**
	 * Dispatch a step. Never throws.
	 */
	async dispatch(step: StepDefinition, options: DispatchOptions): Promise<StepOutcome> {
		if (options.signal.aborted) {
			return this.cancelled(options.signal);
		}

		let agent: Agent;
		try {
			agent = await this.resolveAgent(step.agent);
		} catch (error) {
			const cause = toError(error);
			return { status: "error", message: cause.message, error: cause };
		}
		if (options.signal.aborted) {
			return this.cancelled(options.signal);
		}

		const controller = new AbortController();
		const context: StepContext = {
			runId: options.runId,
			stepId: options.stepId,
			topology: this.topology,
			signal: controller.signal,
		};

		let action: Action;
		try {
			action = typeof step.action === "function" ? step.action(context) : step.action;
		} catch (error) {
			const cause = new ActionExecutionError(`Action provider failed: ${toError(error).message}`, undefined, {
				cause: error,
			});
			return this.expect(step, { status: "error", message: cause.message, error: cause });
		}
		if (options.signal.aborted) {
			return this.cancelled(options.signal);
		}

		const execution = this.execute(agent, action, controller, options.timeout);
		const settlement = await this.race(execution, options);

		switch (settlement.kind) {
			case "cancelled": {
				const cancelFailure = await this.interrupt(agent, controller, execution, options.cancelGracePeriod);
				const error = new ActionCancelledError(cancellationReason(options.signal));
				return { status: "error", message: this.withCancelFailure(error.message, cancelFailure), error };
			}
			case "timeout": {
				const cancelFailure = await this.interrupt(agent, controller, execution, options.cancelGracePeriod);
				const error = new ActionTimeoutError(options.timeout, action.type);
				return this.expect(step, {
					status: "error",
					message: this.withCancelFailure(error.message, cancelFailure),
					error,
				});
			}
			case "fault": {
				const error = ActionExecutionError.fromFault(action.type, settlement.error);
				return this.expect(step, { status: "error", message: error.message, error });
			}
			case "done":
				return this.expect(step, await this.evaluate(step, settlement.outcome, context, action));
		}
	}

	// =========================================================================
	// Execution
	// =========================================================================

	private execute(agent: Agent, action: Action, controller: AbortController, timeout: number): Promise<Settlement> {
		return Promise.resolve()
			.then(() => agent.execute(action, { timeout, signal: controller.signal }))
			.then(
				(outcome): Settlement => ({ kind: "done", outcome }),
				(error): Settlement => ({ kind: "fault", error: toError(error) }),
			);
	}

	/**
	 * First of: settlement, run cancellation, deadline
	 */
	private async race(execution: Promise<Settlement>, options: DispatchOptions): Promise<Settlement> {
		let onAbort: (() => void) | undefined;
		const cancellation = new Promise<Settlement>((resolve) => {
			if (options.signal.aborted) {
				resolve({ kind: "cancelled" });
				return;
			}
			onAbort = () => resolve({ kind: "cancelled" });
			options.signal.addEventListener("abort", onAbort, { once: true });
		});

		try {
			return await withTimeout(Promise.race([execution, cancellation]), options.timeout, (): Settlement => ({
				kind: "timeout",
			}));
		} finally {
			if (onAbort) {
				options.signal.removeEventListener("abort", onAbort);
			}
		}
	}

	/**
	 * Abort the action, ask the agent to stop and wait for the execution to
	 * settle, all bounded by the grace period.
	 * Returns the error raised by `cancel()`, if any.
	 */
	private async interrupt(
		agent: Agent,
		controller: AbortController,
		execution: Promise<Settlement>,
		gracePeriod: number,
	): Promise<Error | undefined> {
		controller.abort();
		const cancellation = Promise.resolve()
			.then(() => agent.cancel())
			.then(
				() => undefined,
				(error: unknown) => toError(error),
			);
		const settled = Promise.all([cancellation, execution]).then(([failure]) => failure);
		return withTimeout(settled, gracePeriod, () => undefined);
	}

	private withCancelFailure(message: string, failure?: Error): string {
		return failure ? `${message}; cancel failed: ${failure.message}` : message;
	}

	private async evaluate(
		step: StepDefinition,
		outcome: ActionOutcome,
		context: StepContext,
		action: Action,
	): Promise<StepOutcome> {
		if (outcome.status === "failed") {
			return {
				status: "failed",
				message: outcome.message ?? `Action "${action.type}" reported failure`,
				outcome,
			};
		}

		if (step.assert) {
			try {
				const verdict = await step.assert(outcome, context);
				if (verdict === false) {
					return {
						status: "failed",
						message: `Assertion failed: ${step.description ?? step.name}`,
						outcome,
					};
				}
			} catch (error) {
				const cause = toError(error);
				return {
					status: isAssertionError(cause) ? "failed" : "error",
					message: cause.message,
					error: cause,
					outcome,
				};
			}
		}

		return { status: "passed", message: outcome.message, outcome };
	}

	private expect(step: StepDefinition, actual: StepOutcome): StepOutcome {
		const expectation = applyExpectation(actual.status, step.expect);
		if (expectation.matched === undefined) {
			return actual;
		}
		if (expectation.matched) {
			return { status: expectation.status, message: expectation.message, outcome: actual.outcome };
		}
		const detail = actual.message ? `: ${actual.message}` : "";
		return { ...actual, status: expectation.status, message: `${expectation.message}${detail}` };
	}

	private cancelled(signal: AbortSignal): StepOutcome {
		const error = new ActionCancelledError(cancellationReason(signal));
		return { status: "error", message: error.message, error };
	}
}
