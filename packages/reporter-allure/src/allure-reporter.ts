/**
 * Allure Reporter
 *
 * Writes one Allure test result per finished case and, at run end, a
 * container grouping them plus environment.properties.
 */

import type { Result, ResultSummary, RunStartInfo, TestReporter } from "@stepwise/core";
import { convertTestCase, convertToContainer } from "./result-converter";
import type { AllureReporterOptions } from "./types";
import { FileSystemWriter } from "./writers/file-writer";
import type { AllureWriter } from "./writers/writer";

export class AllureReporter implements TestReporter {
	readonly name = "allure";
	private readonly options: AllureReporterOptions;
	private readonly writer: AllureWriter;
	private runName = "";
	private uuids: string[] = [];

	constructor(options?: AllureReporterOptions, writer?: AllureWriter) {
		this.options = {
			resultsDir: "allure-results",
			...options,
		};
		this.writer = writer ?? new FileSystemWriter(this.options.resultsDir ?? "allure-results");
	}

	getOptions(): AllureReporterOptions {
		return this.options;
	}

	/**
	 * UUIDs of the test results written for the current run
	 */
	getWrittenUuids(): readonly string[] {
		return this.uuids;
	}

	onStart(run: RunStartInfo): void {
		this.runName = run.name;
		this.uuids = [];
	}

	onTestCaseComplete(result: Result): void {
		const testResult = convertTestCase(result, this.options, this.writer);
		this.writer.writeTestResult(testResult);
		this.uuids.push(testResult.uuid);
	}

	onComplete(result: Result, summary: ResultSummary): void {
		this.writer.writeContainer(convertToContainer(result.name, this.uuids));
		this.writer.writeEnvironment({
			...this.options.environmentInfo,
			"run.status": summary.status,
			"run.cases": String(summary.cases.total),
		});
	}

	onError(): void {
		this.writer.writeContainer(convertToContainer(this.runName, this.uuids));
	}
}
