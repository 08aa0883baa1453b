/**
 * Allure Reporter Types
 */

import type { Label } from "allure-js-commons";

/**
 * Allure reporter options
 */
export interface AllureReporterOptions {
	/** Output directory (default: "allure-results") */
	resultsDir?: string;

	/** Environment info written to environment.properties */
	environmentInfo?: Record<string, string>;

	/** Default labels for all tests */
	labels?: Label[];

	/** URL pattern for TMS links (use {id} placeholder) */
	tmsUrlPattern?: string;

	/** URL pattern for issue links (use {id} placeholder) */
	issueUrlPattern?: string;

	/** Default epic for all tests */
	defaultEpic?: string;

	/** Default feature for all tests */
	defaultFeature?: string;

	/**
	 * Include captured action outcome data in Allure steps
	 * - undefined: Don't include outcome data (default)
	 * - "parameters": Add as a step parameter (truncated to maxDataLength)
	 * - "attachments": Add as a JSON file attachment (full content)
	 * - "both": Add as both parameter and attachment
	 */
	includeOutcomeData?: "parameters" | "attachments" | "both";

	/**
	 * Maximum data length in "parameters" mode (default: 1000 characters)
	 */
	maxDataLength?: number;
}
