/**
 * Run Engine Tests
 *
 * Full runs against an in-process fake agent.
 */

import type { ProgressEvent, Result } from "@stepwise/core";
import {
	SilentReporter,
	suite,
	testCase,
	TopologyResolutionError,
	UnsatisfiableConstraintError,
} from "@stepwise/core";
import { describe, expect, it } from "vitest";
import { act, createEngine, FakeAgent, TOPOLOGY, wait } from "../mocks/fakeAgent";

function findOrUndefined(result: Result, nodeId: string): Result | undefined {
	if (result.nodeId === nodeId) return result;
	for (const child of result.children) {
		const found = findOrUndefined(child, nodeId);
		if (found) return found;
	}
	return undefined;
}

function find(result: Result, nodeId: string): Result {
	const found = findOrUndefined(result, nodeId);
	if (!found) {
		throw new Error(`No result ${nodeId}`);
	}
	return found;
}

const statusOf = (result: Result, nodeId: string) => find(result, nodeId).status;

describe("RunEngine", () => {
	describe("aggregation", () => {
		it("should raise an execution error to the suite", async () => {
			const { engine } = createEngine();
			const tree = suite("smoke", [
				testCase("browse", (test) => {
					test.step("open", act("open"));
					test.step("search", act("search"));
				}),
				testCase("checkout", (test) => {
					test.step("pay", act("crash"));
				}),
			]);

			const result = await engine.run(TOPOLOGY, tree);

			expect(statusOf(result, "smoke/browse")).toBe("passed");
			expect(statusOf(result, "smoke/checkout")).toBe("error");
			expect(result.status).toBe("error");
			expect(result.causeId).toBe("smoke/checkout");
			expect(result.message).toBe('Action "crash" failed: connection refused');
			expect(find(result, "smoke/checkout/main/pay").error?.code).toBe("ActionExecutionError");
		});

		it("should pass an empty suite", async () => {
			const { engine } = createEngine();
			const result = await engine.run(TOPOLOGY, suite("empty", []));

			expect(result.status).toBe("passed");
			expect(result.children).toEqual([]);
		});

		it("should run a test case as the root", async () => {
			const { engine } = createEngine();
			const result = await engine.run(
				TOPOLOGY,
				testCase("solo", (test) => test.step("ping", act("ping"))),
			);

			expect(result.kind).toBe("case");
			expect(result.nodeId).toBe("solo");
			expect(find(result, "solo/main/ping").message).toBe("ping");
		});

		it("should nest suites", async () => {
			const { engine } = createEngine();
			const result = await engine.run(
				TOPOLOGY,
				suite("root", [suite("api", [testCase("health", (test) => test.step("get", act("get")))])]),
			);

			expect(statusOf(result, "root/api/health/main/get")).toBe("passed");
		});
	});

	describe("progress events", () => {
		it("should emit an ordered stream ending with run-complete", async () => {
			const { engine } = createEngine();
			const handle = engine.submit(
				TOPOLOGY,
				suite("smoke", [
					testCase("a", (test) => test.step("one", act("sleep", { ms: 5 }))),
					testCase("b", (test) => test.step("two", act("ok"))),
				]),
				{ name: "nightly" },
			);

			const events: ProgressEvent[] = [];
			for await (const event of handle.events.stream()) {
				events.push(event);
			}

			expect(events.map((event) => event.seq)).toEqual(events.map((_, index) => index + 1));
			expect(events[0]).toMatchObject({ type: "run-start", name: "nightly", rootId: "smoke", runId: handle.id });
			expect(events[events.length - 1].type).toBe("run-complete");

			const terminal = events.filter((event) => event.type === "transition" && event.result !== undefined);
			const order = terminal.map((event) => (event.type === "transition" ? event.nodeId : ""));
			expect(new Set(order).size).toBe(order.length);
			expect(order).toHaveLength(7);
			expect(order[order.length - 1]).toBe("smoke");
			for (const event of terminal) {
				if (event.type === "transition" && event.parentId) {
					expect(order.indexOf(event.parentId)).toBeGreaterThan(order.indexOf(event.nodeId));
				}
			}
		});

		it("should feed reporters", async () => {
			const { engine } = createEngine();
			const reporter = new SilentReporter();

			const result = await engine.run(TOPOLOGY, testCase("solo", (test) => test.step("ping", act("ping"))), {
				reporters: [reporter],
			});

			expect(reporter.getLastResult()).toBe(result);
		});
	});

	describe("deadlines", () => {
		it("should time out one step without affecting other cases", async () => {
			const { engine, agent } = createEngine();
			const tree = suite("smoke", [
				testCase("slow", (test) => test.step("wait", act("sleep", { ms: 200 }, { timeout: 5 }))),
				testCase("fast", (test) => test.step("ping", act("ping"))),
			]);

			const result = await engine.run(TOPOLOGY, tree);

			const timedOut = find(result, "smoke/slow/main/wait");
			expect(timedOut.status).toBe("error");
			expect(timedOut.message).toBe('Action "sleep" timed out after 5ms');
			expect(timedOut.error?.code).toBe("ActionTimeout");
			expect(statusOf(result, "smoke/fast")).toBe("passed");
			expect(result.status).toBe("error");
			expect(agent.cancelCalls).toBe(1);
		});

		it("should apply the run step timeout", async () => {
			const { engine } = createEngine({ stepTimeout: 10 });
			const result = await engine.run(TOPOLOGY, testCase("c", (test) => test.step("wait", act("sleep", { ms: 200 }))));

			expect(find(result, "c/main/wait").message).toBe('Action "sleep" timed out after 10ms');
		});
	});

	describe("cancellation", () => {
		it("should interrupt the running step and skip everything not started", async () => {
			const { engine, agent } = createEngine();
			const tree = suite(
				"smoke",
				[
					testCase("first", (test) => {
						test.step("wait", act("sleep", { ms: 1000 }));
						test.step("after", act("ok"));
					}),
					testCase("second", (test) => test.step("never", act("ok"))),
				],
				{ mode: "sequential" },
			);

			const handle = engine.submit(TOPOLOGY, tree, { failFast: false });
			await wait(30);
			handle.cancel("stop requested");
			const result = await handle.await();

			expect(find(result, "smoke/first/main/wait")).toMatchObject({
				status: "error",
				message: "Action cancelled: stop requested",
			});
			expect(find(result, "smoke/first/main/after")).toMatchObject({
				status: "skipped",
				message: "Cancelled: stop requested",
			});
			expect(find(result, "smoke/second")).toMatchObject({ status: "skipped", message: "Cancelled: stop requested" });
			expect(agent.cancelCalls).toBe(1);
			expect(agent.executed).toEqual(["sleep"]);
			expect(result.status).toBe("error");
		});

		it("should not start a step whose agent resolves after cancellation", async () => {
			const { engine, registry } = createEngine();
			const slow = new FakeAgent();
			registry.registerAgent({ interface: "slow" }, async () => {
				await wait(50);
				return slow;
			});
			const tree = testCase("lookup", (test) => {
				test.step("stuck", { agent: { interface: "slow" }, action: { type: "stuck", params: { ms: 400 } } });
				test.step("after", act("ok"));
			});

			const handle = engine.submit(TOPOLOGY, tree, { failFast: false });
			await wait(10);
			handle.cancel("stop requested");
			const result = await handle.await();

			expect(find(result, "lookup/main/stuck")).toMatchObject({
				status: "error",
				message: "Action cancelled: stop requested",
			});
			expect(find(result, "lookup/main/after")).toMatchObject({
				status: "skipped",
				message: "Cancelled: stop requested",
			});
			expect(slow.executed).toEqual([]);
			expect(slow.cancelCalls).toBe(0);
			expect(result.status).toBe("error");
		});
	});

	describe("failFast", () => {
		it("should skip the rest of a flight after a failure", async () => {
			const { engine, agent } = createEngine();
			const result = await engine.run(
				TOPOLOGY,
				testCase("c", (test) => {
					test.step("a", act("deny"));
					test.step("b", act("ok"));
				}),
			);

			expect(find(result, "c/main/b")).toMatchObject({ status: "skipped", message: "Skipped after a sibling failed" });
			expect(result.status).toBe("failed");
			expect(agent.executed).toEqual(["deny"]);
		});

		it("should keep going after a step marked continueOnFailure", async () => {
			const { engine } = createEngine();
			const result = await engine.run(
				TOPOLOGY,
				testCase("c", (test) => {
					test.step("a", act("deny", undefined, { continueOnFailure: true }));
					test.step("b", act("ok"));
				}),
			);

			expect(statusOf(result, "c/main/b")).toBe("passed");
			expect(result.status).toBe("failed");
		});

		it("should run every step when failFast is off", async () => {
			const { engine, agent } = createEngine({ failFast: false });
			await engine.run(
				TOPOLOGY,
				testCase("c", (test) => {
					test.step("a", act("deny"));
					test.step("b", act("ok"));
				}),
			);

			expect(agent.executed).toEqual(["deny", "ok"]);
		});

		it("should skip later cases of a failFast suite", async () => {
			const { engine } = createEngine();
			const result = await engine.run(
				TOPOLOGY,
				suite(
					"smoke",
					[
						testCase("a", (test) => test.step("x", act("deny"))),
						testCase("b", (test) => test.step("y", act("ok"))),
					],
					{ mode: "sequential", failFast: true },
				),
			);

			expect(find(result, "smoke/b")).toMatchObject({ status: "skipped", message: "Skipped after a sibling failed" });
		});
	});

	describe("phases", () => {
		it("should skip the test flights after a failed setup and still clean up", async () => {
			const { engine, agent } = createEngine();
			const tc = testCase("order", (test) => test.step("place", act("place")))
				.before((test) => test.step("seed", act("deny")))
				.after((test) => test.step("cleanup", act("cleanup")));

			const result = await engine.run(TOPOLOGY, tc);

			expect(result.children.map((flight) => [flight.nodeId, flight.phase, flight.status])).toEqual([
				["order/before", "before", "failed"],
				["order/main", "test", "skipped"],
				["order/after", "after", "passed"],
			]);
			expect(find(result, "order/main").message).toBe("Skipped after setup failed");
			expect(result.causeId).toBe("order/before");
			expect(agent.executed).toEqual(["deny", "cleanup"]);
		});
	});

	describe("concurrency", () => {
		it("should run adjacent independent steps together", async () => {
			const { engine, agent } = createEngine();
			const result = await engine.run(
				TOPOLOGY,
				testCase("c", (test) => {
					test.step("a", act("sleep", { ms: 30 }, { independent: true }));
					test.step("b", act("sleep", { ms: 30 }, { independent: true }));
					test.step("c", act("ok"));
				}),
			);

			expect(agent.maxActive).toBe(2);
			expect(result.status).toBe("passed");
		});

		it("should run dependent steps one at a time", async () => {
			const { engine, agent } = createEngine();
			await engine.run(
				TOPOLOGY,
				testCase("c", (test) => {
					test.step("a", act("sleep", { ms: 10 }));
					test.step("b", act("sleep", { ms: 10 }));
				}),
			);

			expect(agent.maxActive).toBe(1);
		});

		it("should finish a batch before applying failFast", async () => {
			const { engine, agent } = createEngine();
			const result = await engine.run(
				TOPOLOGY,
				testCase("c", (test) => {
					test.step("a", act("deny", undefined, { independent: true }));
					test.step("b", act("sleep", { ms: 10 }, { independent: true }));
					test.step("c", act("ok"));
				}),
			);

			expect(statusOf(result, "c/main/b")).toBe("passed");
			expect(statusOf(result, "c/main/c")).toBe("skipped");
			expect(agent.executed).toEqual(["deny", "sleep"]);
		});

		it("should bound parallel cases by the suite concurrency", async () => {
			const { engine, agent } = createEngine();
			const cases = ["a", "b", "c", "d"].map((name) => testCase(name, (test) => test.step("wait", act("sleep", { ms: 20 }))));

			await engine.run(TOPOLOGY, suite("load", cases, { concurrency: 2 }));

			expect(agent.maxActive).toBe(2);
		});

		it("should take the default concurrency from the run options", async () => {
			const { engine, agent } = createEngine();
			const cases = ["a", "b", "c"].map((name) => testCase(name, (test) => test.step("wait", act("sleep", { ms: 10 }))));

			await engine.run(TOPOLOGY, suite("load", cases), { concurrency: 1 });

			expect(agent.maxActive).toBe(1);
		});
	});

	describe("resolution failures", () => {
		const tree = testCase("c", (test) => {
			test.step("lookup", { agent: { interface: "cli" }, action: { type: "ok" } });
			test.step("next", act("ok"));
		});

		it("should fail only the node by default", async () => {
			const { engine } = createEngine({ failFast: false });
			const result = await engine.run(TOPOLOGY, tree);

			expect(find(result, "c/main/lookup").error?.code).toBe("UnsatisfiableConstraint");
			expect(statusOf(result, "c/main/next")).toBe("passed");
			expect(result.status).toBe("error");
		});

		it("should abort the run under fail-run", async () => {
			const { engine } = createEngine({ failFast: false });
			const handle = engine.submit(TOPOLOGY, tree, { onResolutionError: "fail-run" });

			await expect(handle.await()).rejects.toThrow(UnsatisfiableConstraintError);

			const last = handle.events.history().at(-1);
			expect(last?.type).toBe("run-error");
			expect(handle.root.result?.status).toBe("error");
			expect(handle.root.children[0].children[1].result?.message).toBe(
				'Run aborted: No factory satisfies {interface="cli"}; unmet attributes: interface',
			);
		});

		it("should reject the run when the topology cannot be resolved", async () => {
			const { engine } = createEngine();
			const handle = engine.submit({ api: { interface: "missing" } }, tree);

			await expect(handle.await()).rejects.toThrow(TopologyResolutionError);
			expect(handle.events.history().map((event) => event.type)).toEqual(["run-start", "run-error"]);
			expect(handle.root.status).toBe("pending");
		});
	});

	describe("lifecycle", () => {
		it("should seal the registry and dispose agents at run end", async () => {
			const { engine, registry, agent } = createEngine();
			const handle = engine.submit(TOPOLOGY, testCase("c", (test) => test.step("ping", act("ping"))));
			await handle.await();

			expect(registry.isSealed()).toBe(true);
			expect(agent.disposeCalls).toBe(1);
			expect(handle.disposeErrors).toEqual([]);
		});

		it("should validate options synchronously", () => {
			const { engine } = createEngine();
			expect(() => engine.submit(TOPOLOGY, suite("s", []), { concurrency: 0 })).toThrow(
				"concurrency must be an integer >= 1, got 0",
			);
			expect(() => engine.submit(TOPOLOGY, suite("s", [], { concurrency: 1.5 }))).toThrow(
				'Suite "s" concurrency must be a positive integer, got 1.5',
			);
		});
	});
});
