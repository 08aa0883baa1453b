/**
 * Allure Writer Interface
 */

import type { TestResult, TestResultContainer } from "allure-js-commons";

/**
 * Destination for Allure result files
 */
export interface AllureWriter {
	writeTestResult(result: TestResult): void;

	writeContainer(container: TestResultContainer): void;

	/** Write environment.properties */
	writeEnvironment(info: Record<string, string>): void;

	/**
	 * Write an attachment
	 * @returns Source filename referenced from the step
	 */
	writeAttachment(name: string, content: Buffer, mimeType: string): string;
}
