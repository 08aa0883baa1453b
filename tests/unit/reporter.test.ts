/**
 * Reporter Tests
 */

import type { Result, TestReporter } from "@stepwise/core";
import {
	attachReporter,
	CompositeReporter,
	ConsoleReporter,
	ProgressTracker,
	SilentReporter,
	suite,
	summarizeResult,
	testCase,
} from "@stepwise/core";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { act, createEngine, TOPOLOGY } from "../mocks/fakeAgent";

const createResult = (overrides?: Partial<Result>): Result => ({
	nodeId: "smoke/login",
	kind: "case",
	name: "login",
	status: "passed",
	startTime: 1000,
	endTime: 1012,
	duration: 12,
	children: [],
	...overrides,
});

const createMockReporter = () => ({
	name: "mock",
	onStart: vi.fn(),
	onTestCaseStart: vi.fn(),
	onStepComplete: vi.fn(),
	onTestCaseComplete: vi.fn(),
	onComplete: vi.fn(),
	onError: vi.fn(),
});

describe("attachReporter", () => {
	it("should route run events to reporter hooks", async () => {
		const { engine } = createEngine();
		const reporter = createMockReporter();
		const tc = testCase("login", (test) => {
			test.step("open", act("open"));
			test.step("submit", act("deny"));
		});

		const handle = engine.submit(TOPOLOGY, suite("smoke", [tc]), { reporters: [reporter] });
		const result = await handle.await();

		expect(reporter.onStart).toHaveBeenCalledWith({ runId: handle.id, name: "smoke", startTime: expect.any(Number) });
		expect(reporter.onTestCaseStart).toHaveBeenCalledTimes(1);
		expect(reporter.onTestCaseStart).toHaveBeenCalledWith({ id: "smoke/login", name: "login", metadata: {} });
		expect(reporter.onStepComplete.mock.calls.map(([step]) => step.name)).toEqual(["open", "submit"]);
		expect(reporter.onTestCaseComplete).toHaveBeenCalledTimes(1);
		expect(reporter.onTestCaseComplete.mock.calls[0][0].status).toBe("failed");
		expect(reporter.onComplete).toHaveBeenCalledWith(result, summarizeResult(result));
		expect(reporter.onError).not.toHaveBeenCalled();
	});

	it("should report skipped cases as completed without a start", async () => {
		const { engine } = createEngine();
		const reporter = createMockReporter();
		const tree = suite(
			"smoke",
			[testCase("a", (test) => test.step("x", act("deny"))), testCase("b", (test) => test.step("y", act("ok")))],
			{ mode: "sequential", failFast: true },
		);

		await engine.run(TOPOLOGY, tree, { reporters: [reporter] });

		expect(reporter.onTestCaseStart).toHaveBeenCalledTimes(1);
		expect(reporter.onTestCaseComplete.mock.calls.map(([result]) => [result.name, result.status])).toEqual([
			["a", "failed"],
			["b", "skipped"],
		]);
	});

	it("should stop routing after unsubscribe", () => {
		const tracker = new ProgressTracker("run_1");
		const reporter = createMockReporter();
		const detach = attachReporter(tracker, reporter);

		tracker.emit({ type: "run-start", name: "smoke", rootId: "smoke" });
		detach();
		tracker.emit({ type: "run-error", error: new Error("boom") });

		expect(reporter.onStart).toHaveBeenCalledTimes(1);
		expect(reporter.onError).not.toHaveBeenCalled();
	});

	it("should call only the hooks a reporter defines", () => {
		const tracker = new ProgressTracker("run_1");
		const onComplete = vi.fn();
		const minimal: TestReporter = { name: "minimal", onComplete };
		attachReporter(tracker, minimal);

		const result = createResult({ kind: "suite", nodeId: "smoke", name: "smoke" });
		tracker.emit({ type: "run-start", name: "smoke", rootId: "smoke" });
		tracker.emit({ type: "run-complete", result });

		expect(onComplete).toHaveBeenCalledWith(result, summarizeResult(result));
	});
});

describe("ConsoleReporter", () => {
	let reporter: ConsoleReporter;
	let logSpy: MockInstance;
	let errorSpy: MockInstance;

	const lines = () => logSpy.mock.calls.map((call) => call[0]);

	beforeEach(() => {
		reporter = new ConsoleReporter();
		logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
		errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should print the run header", () => {
		reporter.onStart({ runId: "run_1", name: "smoke", startTime: 0 });
		expect(lines()).toContain("🧪 Run: smoke (run_1)");
	});

	it("should print a failed case with its message", () => {
		reporter.onTestCaseComplete(createResult({ status: "failed", message: "denied" }));
		expect(lines()).toEqual(["❌ login - FAILED (12ms)", "   denied"]);
	});

	it("should print a passed case on one line", () => {
		reporter.onTestCaseComplete(createResult());
		expect(lines()).toEqual(["✅ login - PASSED (12ms)"]);
	});

	it("should print steps only when verbose", () => {
		const step = createResult({ kind: "step", name: "submit", status: "failed", duration: 3, message: "denied" });

		reporter.onStepComplete(step);
		expect(logSpy).not.toHaveBeenCalled();

		new ConsoleReporter({ verbose: true }).onStepComplete(step);
		expect(lines()).toEqual(["    \x1b[31m✗\x1b[0m submit (3ms)", "      denied"]);
	});

	it("should print the summary", () => {
		const step = createResult({ kind: "step", nodeId: "smoke/login/main/open", status: "failed" });
		const flight = createResult({ kind: "flight", nodeId: "smoke/login/main", status: "failed", children: [step] });
		const login = createResult({ status: "failed", children: [flight] });
		const root = createResult({ kind: "suite", nodeId: "smoke", name: "smoke", status: "failed", duration: 40, children: [login] });

		reporter.onComplete(root, summarizeResult(root));

		expect(lines()).toContain("Cases:    1 (0 passed, 1 failed, 0 error, 0 skipped)");
		expect(lines()).toContain("Steps:    1 (0 passed, 1 failed, 0 error, 0 skipped)");
		expect(lines()).toContain("Duration: 40ms");
		expect(lines()).toContain("Pass Rate: 0.0%");
		expect(lines()).toContain("\n❌ Run failed.\n");
	});

	it("should print run errors to stderr", () => {
		reporter.onError(new Error("topology broken"));
		expect(errorSpy).toHaveBeenCalledWith("\n❌ Error: topology broken\n");
	});
});

describe("SilentReporter", () => {
	it("should collect results and errors", () => {
		const reporter = new SilentReporter();
		const first = createResult();
		const second = createResult({ status: "failed" });
		const error = new Error("boom");

		reporter.onComplete(first);
		reporter.onComplete(second);
		reporter.onError(error);

		expect(reporter.getResults()).toEqual([first, second]);
		expect(reporter.getLastResult()).toBe(second);
		expect(reporter.getErrors()).toEqual([error]);
	});

	it("should have no last result before a run", () => {
		expect(new SilentReporter().getLastResult()).toBeUndefined();
	});
});

describe("CompositeReporter", () => {
	it("should fan out to every reporter", () => {
		const a = createMockReporter();
		const b = createMockReporter();
		const composite = new CompositeReporter([a, b]);
		const result = createResult();

		composite.onStart({ runId: "run_1", name: "smoke", startTime: 0 });
		composite.onTestCaseComplete(result);
		composite.onComplete(result, summarizeResult(result));

		for (const reporter of [a, b]) {
			expect(reporter.onStart).toHaveBeenCalledTimes(1);
			expect(reporter.onTestCaseComplete).toHaveBeenCalledWith(result);
			expect(reporter.onComplete).toHaveBeenCalledTimes(1);
		}
	});

	it("should add and remove reporters by name", () => {
		const silent = new SilentReporter();
		const mock = createMockReporter();
		const composite = new CompositeReporter([mock]);

		composite.addReporter(silent);
		composite.removeReporter("mock");
		composite.onComplete(createResult(), summarizeResult(createResult()));

		expect(mock.onComplete).not.toHaveBeenCalled();
		expect(silent.getResults()).toHaveLength(1);
	});
});
