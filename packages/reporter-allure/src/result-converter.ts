/**
 * Result Converter
 *
 * Pure functions to convert stepwise result trees to Allure format. A case
 * becomes an Allure test result; its flights become top-level steps and the
 * flight steps are nested under them.
 */

import { createHash, randomUUID } from "node:crypto";
import type { Result, TerminalStatus, TestCaseMetadata } from "@stepwise/core";
import {
	type StepResult as AllureStepResult,
	type TestResult as AllureTestResult,
	type Attachment,
	ContentType,
	type Label,
	LabelName,
	type Link,
	LinkType,
	type Parameter,
	Stage,
	Status,
	type StatusDetails,
	type TestResultContainer,
} from "allure-js-commons";
import type { AllureReporterOptions } from "./types";
import type { AllureWriter } from "./writers/writer";

/**
 * Generate MD5 hash for historyId/testCaseId
 */
function md5(input: string): string {
	return createHash("md5").update(input).digest("hex");
}

const STATUS_MAP: Record<TerminalStatus, Status> = {
	passed: Status.PASSED,
	failed: Status.FAILED,
	error: Status.BROKEN,
	skipped: Status.SKIPPED,
};

/**
 * Convert a terminal status to the Allure Status enum
 */
export function convertStatus(status: TerminalStatus): Status {
	return STATUS_MAP[status];
}

/**
 * Build StatusDetails from a result message and error
 */
export function convertStatusDetails(result: Pick<Result, "message" | "error">): StatusDetails | undefined {
	const message = result.message ?? result.error?.message;
	const trace = result.error?.stack;
	if (!message && !trace) {
		return undefined;
	}
	return { message, trace };
}

/**
 * Convert TestCaseMetadata to Allure labels.
 * Framework labels first, then reporter defaults, then case metadata.
 */
export function convertMetadataToLabels(
	metadata: TestCaseMetadata | undefined,
	options: AllureReporterOptions,
): Label[] {
	const candidates: Array<[string, string | undefined]> = [
		[LabelName.ALLURE_ID, metadata?.id],
		[LabelName.EPIC, metadata?.epic ?? options.defaultEpic],
		[LabelName.FEATURE, metadata?.feature ?? options.defaultFeature],
		[LabelName.STORY, metadata?.story],
		[LabelName.SEVERITY, metadata?.severity],
		...(metadata?.tags ?? []).map((tag): [string, string] => [LabelName.TAG, tag]),
		...Object.entries(metadata?.labels ?? {}),
	];

	const labels: Label[] = [
		{ name: LabelName.FRAMEWORK, value: "stepwise" },
		{ name: LabelName.LANGUAGE, value: "typescript" },
		...(options.labels ?? []),
	];
	for (const [name, value] of candidates) {
		if (value) {
			labels.push({ name, value });
		}
	}
	return labels;
}

function linkTo(pattern: string | undefined, id: string, type: LinkType): Link[] {
	return pattern ? [{ name: id, url: pattern.replace("{id}", id), type }] : [];
}

/**
 * Convert TestCaseMetadata to Allure links (TMS id and issues)
 */
export function convertMetadataToLinks(metadata: TestCaseMetadata | undefined, options: AllureReporterOptions): Link[] {
	const tms = metadata?.id ? linkTo(options.tmsUrlPattern, metadata.id, LinkType.TMS) : [];
	const issues = (metadata?.issues ?? []).flatMap((issue) => linkTo(options.issueUrlPattern, issue, LinkType.ISSUE));
	return [...tms, ...issues];
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) {
		return str;
	}
	return `${str.slice(0, maxLength - 3)}...`;
}

/**
 * Convert a flight or step result to an Allure step
 */
export function convertStep(result: Result, options: AllureReporterOptions, writer?: AllureWriter): AllureStepResult {
	const parameters: Parameter[] = [];
	const attachments: Attachment[] = [];

	if (result.kind === "flight" && result.phase) {
		parameters.push({ name: "phase", value: result.phase });
	}

	const data = result.outcome?.data;
	if (data !== undefined && options.includeOutcomeData) {
		const json = typeof data === "string" ? data : JSON.stringify(data, null, 2);

		if (options.includeOutcomeData === "parameters" || options.includeOutcomeData === "both") {
			parameters.push({ name: "data", value: truncate(json, options.maxDataLength ?? 1000) });
		}

		if ((options.includeOutcomeData === "attachments" || options.includeOutcomeData === "both") && writer) {
			const source = writer.writeAttachment(`${result.nodeId}-data.json`, Buffer.from(json, "utf-8"), ContentType.JSON);
			attachments.push({ name: "Outcome data", source, type: ContentType.JSON });
		}
	}

	return {
		name: result.name,
		status: convertStatus(result.status),
		statusDetails: convertStatusDetails(result) ?? { message: undefined },
		stage: Stage.FINISHED,
		start: result.startTime,
		stop: result.endTime,
		steps: result.children.map((child) => convertStep(child, options, writer)),
		attachments,
		parameters,
	};
}

/**
 * Convert a case result to an Allure test result
 */
export function convertTestCase(
	testCase: Result,
	options: AllureReporterOptions,
	writer?: AllureWriter,
): AllureTestResult {
	const metadata = testCase.metadata;
	const labels = convertMetadataToLabels(metadata, options);

	const path = testCase.nodeId.split("/");
	if (path.length > 1) {
		labels.push({ name: LabelName.SUITE, value: path[path.length - 2] });
	}

	return {
		uuid: randomUUID(),
		historyId: md5(testCase.nodeId),
		testCaseId: md5(testCase.nodeId),
		name: testCase.name,
		fullName: testCase.nodeId,
		description: metadata?.description,
		status: convertStatus(testCase.status),
		statusDetails: convertStatusDetails(testCase) ?? { message: undefined },
		stage: Stage.FINISHED,
		start: testCase.startTime,
		stop: testCase.endTime,
		steps: testCase.children.map((flight) => convertStep(flight, options, writer)),
		labels,
		links: convertMetadataToLinks(metadata, options),
		attachments: [],
		parameters: [],
	};
}

/**
 * Group test results of one run in an Allure container
 */
export function convertToContainer(name: string, testCaseUuids: string[]): TestResultContainer {
	return {
		uuid: randomUUID(),
		name,
		children: testCaseUuids,
		befores: [],
		afters: [],
	};
}
