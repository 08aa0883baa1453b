/**
 * Progress Event Types
 */

import type { Result, TestCaseMetadata } from "../testable/result.types";
import type { Status, TerminalStatus } from "../testable/status";
import type { TestableKind } from "../testable/definition.types";

/**
 * Fields common to every event
 */
export interface ProgressEnvelope {
	/** Global monotonic sequence number within the run, starting at 1 */
	seq: number;
	runId: string;
	timestamp: number;
}

export interface RunStartPayload {
	type: "run-start";
	name: string;
	rootId: string;
	metadata?: Record<string, unknown>;
}

/**
 * Status change of one node. Terminal transitions carry the node's result.
 */
export interface TransitionPayload {
	type: "transition";
	nodeId: string;
	parentId?: string;
	kind: TestableKind;
	name: string;
	from: Status;
	to: Status;
	/** Case metadata */
	metadata?: TestCaseMetadata;
	result?: Result;
}

/**
 * Live aggregate of a container after one child delivered.
 * Never the container's final status; see the container's terminal transition.
 */
export interface AggregatePayload {
	type: "aggregate";
	nodeId: string;
	childId: string;
	status: TerminalStatus;
	completed: number;
	total: number;
	final: false;
}

export interface RunCompletePayload {
	type: "run-complete";
	result: Result;
}

export interface RunErrorPayload {
	type: "run-error";
	error: Error;
	/** Partial tree when the run failed after execution started */
	result?: Result;
}

export type ProgressPayload =
	| RunStartPayload
	| TransitionPayload
	| AggregatePayload
	| RunCompletePayload
	| RunErrorPayload;

export type ProgressEvent = ProgressEnvelope & ProgressPayload;

export type ProgressEventType = ProgressPayload["type"];

export type ProgressListener = (event: ProgressEvent) => void;
