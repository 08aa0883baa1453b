/**
 * Agent Dispatcher Tests
 */

import type { DispatchOptions, StepConfig, StepDefinition } from "@stepwise/core";
import {
	ActionCancelledError,
	ActionExecutionError,
	ActionTimeoutError,
	AgentDispatcher,
	applyExpectation,
	AssertionFailure,
	defineTopology,
	FactoryRegistry,
	Resolver,
	resolveTopology,
	step,
	UnsatisfiableConstraintError,
} from "@stepwise/core";
import { beforeEach, describe, expect, it } from "vitest";
import { act, FakeAgent } from "../mocks/fakeAgent";

describe("applyExpectation", () => {
	it("should keep the status without an expectation", () => {
		expect(applyExpectation("error")).toEqual({ status: "error" });
	});

	it("should pass a matching status", () => {
		expect(applyExpectation("failed", ["failed", "error"])).toEqual({
			status: "passed",
			matched: true,
			message: "actual failed matched expected [failed, error]",
		});
	});

	it("should fail a status outside the expectation", () => {
		expect(applyExpectation("passed", "failed")).toEqual({
			status: "failed",
			matched: false,
			message: "actual passed not in expected [failed]",
		});
	});
});

describe("AgentDispatcher", () => {
	let agent: FakeAgent;
	let dispatcher: AgentDispatcher;

	const options = (overrides?: Partial<DispatchOptions>): DispatchOptions => ({
		runId: "run-1",
		stepId: "case/main/step",
		timeout: 1000,
		cancelGracePeriod: 100,
		signal: new AbortController().signal,
		...overrides,
	});

	const dispatch = (config: StepConfig, overrides?: Partial<DispatchOptions>) =>
		dispatcher.dispatch(step("step", config), options(overrides));

	beforeEach(async () => {
		agent = new FakeAgent();
		const registry = new FactoryRegistry();
		registry.registerAgent({ interface: "fake" }, () => agent);
		registry.register({ interface: "db" }, () => ({ url: "db://test" }));

		const resolver = new Resolver(registry, { runId: "run-1" });
		const topology = await resolveTopology(resolver, defineTopology({ api: { interface: "fake" }, db: { interface: "db" } }));
		dispatcher = new AgentDispatcher(resolver, topology);
	});

	describe("outcomes", () => {
		it("should pass a completed action", async () => {
			const outcome = await dispatch(act("login", { user: "ada" }));

			expect(outcome).toEqual({
				status: "passed",
				message: "login",
				outcome: { message: "login", data: { user: "ada" } },
			});
		});

		it("should fail on a failed outcome", async () => {
			const outcome = await dispatch(act("deny"));
			expect(outcome).toMatchObject({ status: "failed", message: "denied" });
		});

		it("should describe a failed outcome without message", async () => {
			const outcome = await dispatch(act("reject"));
			expect(outcome.message).toBe('Action "reject" reported failure');
		});

		it("should turn an agent fault into an error", async () => {
			const outcome = await dispatch(act("crash"));

			expect(outcome.status).toBe("error");
			expect(outcome.message).toBe('Action "crash" failed: connection refused');
			expect(outcome.error).toBeInstanceOf(ActionExecutionError);
			expect(outcome.error?.cause).toEqual(new Error("connection refused"));
		});

		it("should build the action from the step context", async () => {
			const outcome = await dispatch({
				agent: "api",
				action: (context) => ({
					type: "lookup",
					params: { step: context.stepId, db: context.topology.get<{ url: string }>("db").url },
				}),
			});

			expect(outcome.outcome?.data).toEqual({ step: "case/main/step", db: "db://test" });
		});

		it("should report a failing action provider", async () => {
			const outcome = await dispatch({
				agent: "api",
				action: () => {
					throw new Error("no token");
				},
			});

			expect(outcome).toMatchObject({ status: "error", message: "Action provider failed: no token" });
			expect(agent.executed).toEqual([]);
		});
	});

	describe("agent resolution", () => {
		it("should resolve an inline requirement", async () => {
			const outcome = await dispatch({ agent: { interface: "fake" }, action: { type: "ping" } });
			expect(outcome.status).toBe("passed");
			expect(agent.executed).toEqual(["ping"]);
		});

		it("should report an unsatisfiable inline requirement", async () => {
			const outcome = await dispatch({ agent: { interface: "cli" }, action: { type: "ping" } });

			expect(outcome.status).toBe("error");
			expect(outcome.error).toBeInstanceOf(UnsatisfiableConstraintError);
			expect(outcome.message).toBe('No factory satisfies {interface="cli"}; unmet attributes: interface');
		});

		it("should reject a component that is not an agent", async () => {
			const outcome = await dispatch({ agent: "db", action: { type: "ping" } });
			expect(outcome).toMatchObject({ status: "error", message: "Component db is not an agent" });
		});

		it("should reject an unknown component", async () => {
			const outcome = await dispatch({ agent: "cache", action: { type: "ping" } });
			expect(outcome).toMatchObject({ status: "error", message: "Component cache is not part of the topology" });
		});
	});

	describe("assertions", () => {
		it("should fail when the assertion returns false", async () => {
			const outcome = await dispatch(act("login", undefined, { assert: () => false }));
			expect(outcome).toMatchObject({ status: "failed", message: "Assertion failed: step" });
		});

		it("should name the assertion by description", async () => {
			const outcome = await dispatch(act("login", undefined, { assert: () => false, description: "token is issued" }));
			expect(outcome.message).toBe("Assertion failed: token is issued");
		});

		it("should pass when the assertion returns nothing", async () => {
			const outcome = await dispatch(act("login", undefined, { assert: () => {} }));
			expect(outcome.status).toBe("passed");
		});

		it("should fail on an assertion failure", async () => {
			const outcome = await dispatch(
				act("login", undefined, {
					assert: () => {
						throw new AssertionFailure("token mismatch", "a", "b");
					},
				}),
			);
			expect(outcome).toMatchObject({ status: "failed", message: "token mismatch" });
		});

		it("should fail on an AssertionError from an assertion library", async () => {
			const outcome = await dispatch(
				act("login", undefined, {
					assert: () => {
						const error = new Error("expected 1 to be 2");
						error.name = "AssertionError";
						throw error;
					},
				}),
			);
			expect(outcome.status).toBe("failed");
		});

		it("should error when the assertion itself breaks", async () => {
			const outcome = await dispatch(
				act("login", undefined, {
					assert: async (result) => {
						const data = result.data;
						if (data === undefined) throw new TypeError("data is undefined");
						return true;
					},
				}),
			);
			expect(outcome).toMatchObject({ status: "error", message: "data is undefined" });
		});
	});

	describe("deadlines", () => {
		it("should time out a slow action and cancel the agent", async () => {
			const outcome = await dispatch(act("sleep", { ms: 500 }), { timeout: 20 });

			expect(outcome.status).toBe("error");
			expect(outcome.message).toBe('Action "sleep" timed out after 20ms');
			expect(outcome.error).toBeInstanceOf(ActionTimeoutError);
			expect(agent.cancelCalls).toBe(1);
			expect(agent.finished).toEqual([]);
		});

		it("should report a failing cancel", async () => {
			agent.cancelError = new Error("socket busy");
			const outcome = await dispatch(act("sleep", { ms: 500 }), { timeout: 20 });

			expect(outcome.message).toBe('Action "sleep" timed out after 20ms; cancel failed: socket busy');
		});

		it("should not wait past the grace period for a stuck action", async () => {
			const started = Date.now();
			const outcome = await dispatch(act("stuck", { ms: 1000 }), { timeout: 20, cancelGracePeriod: 20 });

			expect(outcome.status).toBe("error");
			expect(Date.now() - started).toBeLessThan(500);
		});

		it("should rewrite a timeout against an expectation", async () => {
			const outcome = await dispatch(act("sleep", { ms: 500 }, { expect: "error" }), { timeout: 20 });

			expect(outcome).toEqual({
				status: "passed",
				message: "actual error matched expected [error]",
				outcome: undefined,
			});
		});
	});

	describe("cancellation", () => {
		it("should not execute once the run is cancelled", async () => {
			const controller = new AbortController();
			controller.abort("shutdown");

			const outcome = await dispatch(act("login"), { signal: controller.signal });

			expect(outcome.status).toBe("error");
			expect(outcome.message).toBe("Action cancelled: shutdown");
			expect(agent.executed).toEqual([]);
		});

		it("should interrupt an in-flight action", async () => {
			const controller = new AbortController();
			setTimeout(() => controller.abort("user abort"), 20);

			const outcome = await dispatch(act("sleep", { ms: 1000 }, { expect: "error" }), { signal: controller.signal });

			expect(outcome.status).toBe("error");
			expect(outcome.message).toBe("Action cancelled: user abort");
			expect(outcome.error).toBeInstanceOf(ActionCancelledError);
			expect(agent.cancelCalls).toBe(1);
		});
	});

	describe("expectations", () => {
		it("should pass an expected failure", async () => {
			const outcome = await dispatch(act("deny", undefined, { expect: "failed" }));

			expect(outcome).toEqual({
				status: "passed",
				message: "actual failed matched expected [failed]",
				outcome: { status: "failed", message: "denied" },
			});
		});

		it("should fail an unexpected pass and keep the original message", async () => {
			const outcome = await dispatch(act("login", undefined, { expect: "failed" }));
			expect(outcome).toMatchObject({ status: "failed", message: "actual passed not in expected [failed]: login" });
		});

		it("should accept several expected statuses", async () => {
			const definition: StepDefinition = step("crash", act("crash", undefined, { expect: ["failed", "error"] }));
			const outcome = await dispatcher.dispatch(definition, options());

			expect(outcome.status).toBe("passed");
			expect(outcome.error).toBeUndefined();
		});
	});
});
