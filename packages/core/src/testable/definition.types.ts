/**
 * Test Tree Definition Types
 *
 * Declarative description of a test tree. Definitions are plain data and can
 * be written by hand or produced by the builders.
 */

import type { Action, ActionOutcome } from "../agents/agent.types";
import type { ConstraintSetInput } from "../constraints";
import type { ResolvedTopology } from "../resolver/topology";
import type { TestCaseMetadata } from "./result.types";
import type { TerminalStatus } from "./status";

export type TestableKind = "suite" | "case" | "flight" | "step";

/**
 * Phase of a flight inside its case
 */
export type Phase = "before" | "test" | "after";

export type ExecutionMode = "sequential" | "parallel";

/**
 * How a container runs its children
 */
export interface ExecutionPolicy {
	mode: ExecutionMode;
	/** Worker limit in parallel mode */
	concurrency: number;
	/** Skip not-yet-started siblings after a failure */
	failFast: boolean;
}

// =============================================================================
// Steps
// =============================================================================

/**
 * Agent of a step: a topology component name or an inline requirement
 */
export type AgentTarget = string | ConstraintSetInput;

/**
 * Context available to action providers and assertions
 */
export interface StepContext {
	runId: string;
	stepId: string;
	topology: ResolvedTopology;
	signal: AbortSignal;
}

/**
 * Static action or a provider building it when the step starts
 */
export type ActionSource = Action | ((context: StepContext) => Action);

/**
 * Check on the captured outcome. Returning false or throwing an
 * AssertionFailure fails the step.
 */
export type StepAssertion = (outcome: ActionOutcome, context: StepContext) => boolean | void | Promise<boolean | void>;

export interface StepDefinition {
	kind: "step";
	name: string;
	agent: AgentTarget;
	action: ActionSource;
	/** Deadline override (ms) */
	timeout?: number;
	/** May run concurrently with adjacent independent steps */
	independent?: boolean;
	/** A failure of this step does not trigger failFast */
	continueOnFailure?: boolean;
	/** Expected status(es); the actual status is rewritten to passed/failed */
	expect?: TerminalStatus | readonly TerminalStatus[];
	assert?: StepAssertion;
	description?: string;
}

// =============================================================================
// Containers
// =============================================================================

export interface FlightDefinition {
	kind: "flight";
	name: string;
	/** Default: "test" */
	phase?: Phase;
	steps: readonly StepDefinition[];
	failFast?: boolean;
}

export interface CaseDefinition {
	kind: "case";
	name: string;
	flights: readonly FlightDefinition[];
	failFast?: boolean;
	metadata?: TestCaseMetadata;
}

export interface SuiteDefinition {
	kind: "suite";
	name: string;
	children: readonly (SuiteDefinition | CaseDefinition)[];
	/** Default: "parallel" */
	mode?: ExecutionMode;
	concurrency?: number;
	/** Default: false */
	failFast?: boolean;
}

export type TestableDefinition = SuiteDefinition | CaseDefinition | FlightDefinition | StepDefinition;
