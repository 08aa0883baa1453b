/**
 * Test Reporter
 *
 * Interface and implementations for reporting test results. Reporters are
 * fed from the progress stream by `attachReporter`.
 */

import type { ResultSummary } from "../aggregation/summary";
import { summarizeResult } from "../aggregation/summary";
import type { ProgressEvent } from "../progress/progress.types";
import type { ProgressTracker } from "../progress/progress-tracker";
import type { Result, TestCaseMetadata } from "../testable/result.types";
import type { TerminalStatus } from "../testable/status";

/**
 * Run start info
 */
export interface RunStartInfo {
	runId: string;
	name: string;
	startTime: number;
}

/**
 * Case start info
 */
export interface TestCaseStartInfo {
	id: string;
	name: string;
	metadata?: TestCaseMetadata;
}

/**
 * Test Reporter Interface
 */
export interface TestReporter {
	/** Reporter name */
	readonly name: string;

	/** Called when test execution starts */
	onStart?(run: RunStartInfo): void;

	/** Called when a test case starts */
	onTestCaseStart?(testCase: TestCaseStartInfo): void;

	/** Called when a test step completes */
	onStepComplete?(step: Result): void;

	/** Called when a test case completes (skipped cases included) */
	onTestCaseComplete?(result: Result): void;

	/** Called when test execution completes */
	onComplete(result: Result, summary: ResultSummary): void;

	/** Called when the run fails as a whole */
	onError?(error: Error): void;
}

/**
 * Route progress events to a reporter. Returns the unsubscribe function.
 */
export function attachReporter(tracker: ProgressTracker, reporter: TestReporter): () => void {
	return tracker.subscribe((event: ProgressEvent) => {
		switch (event.type) {
			case "run-start":
				reporter.onStart?.({ runId: event.runId, name: event.name, startTime: event.timestamp });
				break;
			case "transition":
				if (event.kind === "case" && event.to === "running") {
					reporter.onTestCaseStart?.({ id: event.nodeId, name: event.name, metadata: event.metadata });
				} else if (event.result && event.kind === "step") {
					reporter.onStepComplete?.(event.result);
				} else if (event.result && event.kind === "case") {
					reporter.onTestCaseComplete?.(event.result);
				}
				break;
			case "run-complete":
				reporter.onComplete(event.result, summarizeResult(event.result));
				break;
			case "run-error":
				reporter.onError?.(event.error);
				break;
		}
	});
}

const ICONS: Record<TerminalStatus, string> = {
	passed: "✓",
	failed: "✗",
	error: "!",
	skipped: "-",
};

const COLORS: Record<TerminalStatus, string> = {
	passed: "\x1b[32m",
	failed: "\x1b[31m",
	error: "\x1b[31m",
	skipped: "\x1b[33m",
};

const RESET = "\x1b[0m";

/**
 * Console Reporter
 *
 * Outputs test results to console with formatting.
 */
export class ConsoleReporter implements TestReporter {
	readonly name = "console";
	private verbose: boolean;

	constructor(options?: { verbose?: boolean }) {
		this.verbose = options?.verbose ?? false;
	}

	onStart(run: RunStartInfo): void {
		console.log(`\n${"=".repeat(60)}`);
		console.log(`🧪 Run: ${run.name || "Unnamed"} (${run.runId})`);
		console.log(`${"=".repeat(60)}\n`);
	}

	onTestCaseStart(testCase: TestCaseStartInfo): void {
		if (this.verbose) {
			console.log(`  📋 ${testCase.name}`);
		}
	}

	onStepComplete(step: Result): void {
		if (this.verbose) {
			const color = COLORS[step.status];
			console.log(`    ${color}${ICONS[step.status]}${RESET} ${step.name} (${step.duration}ms)`);
			if (step.status !== "passed" && step.message) {
				console.log(`      ${step.message}`);
			}
		}
	}

	onTestCaseComplete(result: Result): void {
		const icon = result.status === "passed" ? "✅" : result.status === "skipped" ? "⏭️" : "❌";
		console.log(`${icon} ${result.name} - ${result.status.toUpperCase()} (${result.duration}ms)`);

		if (result.status !== "passed" && result.message) {
			console.log(`   ${result.message}`);
		}
	}

	onComplete(result: Result, summary: ResultSummary): void {
		console.log(`\n${"-".repeat(60)}`);
		console.log("📊 Summary");
		console.log("-".repeat(60));

		const { cases, steps } = summary;
		console.log(`Cases:    ${cases.total} (${cases.passed} passed, ${cases.failed} failed, ${cases.error} error, ${cases.skipped} skipped)`);
		console.log(`Steps:    ${steps.total} (${steps.passed} passed, ${steps.failed} failed, ${steps.error} error, ${steps.skipped} skipped)`);
		console.log(`Duration: ${result.duration}ms`);
		console.log(`Pass Rate: ${(summary.passRate * 100).toFixed(1)}%`);

		console.log("-".repeat(60));

		if (result.status === "passed") {
			console.log("\n✅ All tests passed!\n");
		} else {
			console.log(`\n❌ Run ${result.status}.\n`);
		}
	}

	onError(error: Error): void {
		console.error(`\n❌ Error: ${error.message}\n`);
	}
}

/**
 * Silent Reporter
 *
 * Does not output anything (useful for testing).
 */
export class SilentReporter implements TestReporter {
	readonly name = "silent";
	private results: Result[] = [];
	private errors: Error[] = [];

	onComplete(result: Result): void {
		this.results.push(result);
	}

	onError(error: Error): void {
		this.errors.push(error);
	}

	/**
	 * Get collected results
	 */
	getResults(): Result[] {
		return this.results;
	}

	getLastResult(): Result | undefined {
		return this.results[this.results.length - 1];
	}

	getErrors(): Error[] {
		return this.errors;
	}
}

/**
 * Composite Reporter
 *
 * Combines multiple reporters.
 */
export class CompositeReporter implements TestReporter {
	readonly name = "composite";
	private reporters: TestReporter[];

	constructor(reporters: TestReporter[]) {
		this.reporters = [...reporters];
	}

	onStart(run: RunStartInfo): void {
		this.each((reporter) => reporter.onStart?.(run));
	}

	onTestCaseStart(testCase: TestCaseStartInfo): void {
		this.each((reporter) => reporter.onTestCaseStart?.(testCase));
	}

	onStepComplete(step: Result): void {
		this.each((reporter) => reporter.onStepComplete?.(step));
	}

	onTestCaseComplete(result: Result): void {
		this.each((reporter) => reporter.onTestCaseComplete?.(result));
	}

	onComplete(result: Result, summary: ResultSummary): void {
		this.each((reporter) => reporter.onComplete(result, summary));
	}

	onError(error: Error): void {
		this.each((reporter) => reporter.onError?.(error));
	}

	addReporter(reporter: TestReporter): void {
		this.reporters.push(reporter);
	}

	/**
	 * Remove a reporter by name
	 */
	removeReporter(name: string): void {
		this.reporters = this.reporters.filter((r) => r.name !== name);
	}

	private each(call: (reporter: TestReporter) => void): void {
		for (const reporter of this.reporters) {
			call(reporter);
		}
	}
}
