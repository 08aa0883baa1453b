/**
 * Result Types
 */

import type { ActionOutcome } from "../agents/agent.types";
import type { StepwiseErrorCode } from "../errors";
import type { Phase, TestableKind } from "./definition.types";
import type { TerminalStatus } from "./status";

// =============================================================================
// Test Metadata
// =============================================================================

/**
 * Severity levels for test cases
 */
export type Severity = "blocker" | "critical" | "normal" | "minor" | "trivial";

/**
 * Test case metadata, passed through to reporters
 */
export interface TestCaseMetadata {
	id?: string;
	issues?: string[];
	epic?: string;
	feature?: string;
	story?: string;
	severity?: Severity;
	tags?: string[];
	labels?: Record<string, string>;
	description?: string;
}

// =============================================================================
// Results
// =============================================================================

/**
 * Serializable error diagnostic
 */
export interface ResultError {
	name: string;
	message: string;
	stack?: string;
	code?: StepwiseErrorCode;
}

/**
 * Finalized result of a node. Frozen once produced.
 */
export interface Result {
	nodeId: string;
	kind: TestableKind;
	name: string;
	status: TerminalStatus;
	startTime: number;
	endTime: number;
	duration: number;
	message?: string;
	error?: ResultError;
	/** Captured action outcome (steps only) */
	outcome?: ActionOutcome;
	/** Child that determined a container's status */
	causeId?: string;
	/** Flight phase */
	phase?: Phase;
	/** Case metadata */
	metadata?: TestCaseMetadata;
	/** Child results in declaration order */
	children: readonly Result[];
}
