/**
 * Test Node
 *
 * One runtime node of the test tree. Every variant (suite, case, flight,
 * step) shares this shape; the engine dispatches on `definition.kind` to pick
 * an execution policy and nothing else depends on the variant.
 *
 * A node owns its children. The parent reference is a non-owning back link.
 */

import { AggregationInvariantViolation } from "../errors";
import type {
	ExecutionPolicy,
	Phase,
	SuiteDefinition,
	TestableDefinition,
	TestableKind,
} from "./definition.types";
import type { Result } from "./result.types";
import type { Status } from "./status";
import { isTerminal } from "./status";

/**
 * State captured for invariant diagnostics
 */
export interface NodeSnapshot {
	id: string;
	kind: TestableKind;
	name: string;
	status: Status;
	finalized: boolean;
	children: Array<{ id: string; status: Status }>;
}

/**
 * Run-level defaults applied while building the tree
 */
export interface TreeDefaults {
	concurrency: number;
	failFast: boolean;
}

const SEQUENTIAL_LEAF: ExecutionPolicy = Object.freeze({ mode: "sequential", concurrency: 1, failFast: false });

export class TestNode {
	readonly children: TestNode[] = [];
	private _status: Status = "pending";
	private _result?: Result;
	private _startTime?: number;

	constructor(
		readonly id: string,
		readonly definition: TestableDefinition,
		readonly policy: ExecutionPolicy,
		readonly parent?: TestNode,
	) {}

	get kind(): TestableKind {
		return this.definition.kind;
	}

	get name(): string {
		return this.definition.name;
	}

	get phase(): Phase | undefined {
		return this.definition.kind === "flight" ? (this.definition.phase ?? "test") : undefined;
	}

	get status(): Status {
		return this._status;
	}

	get result(): Result | undefined {
		return this._result;
	}

	get isFinalized(): boolean {
		return this._result !== undefined;
	}

	get startTime(): number | undefined {
		return this._startTime;
	}

	/**
	 * pending -> running
	 */
	markRunning(now = Date.now()): void {
		if (this._status !== "pending") {
			throw new AggregationInvariantViolation("Cannot start a node that is not pending", this.id, this.snapshot());
		}
		this._status = "running";
		this._startTime = now;
	}

	/**
	 * Set the final result. Happens exactly once.
	 */
	applyResult(result: Result): void {
		if (this._result) {
			throw new AggregationInvariantViolation("Result already set", this.id, this.snapshot());
		}
		if (!isTerminal(result.status)) {
			throw new AggregationInvariantViolation("Result status must be terminal", this.id, this.snapshot());
		}
		this._result = result;
		this._status = result.status;
		this._startTime ??= result.startTime;
	}

	snapshot(): NodeSnapshot {
		return {
			id: this.id,
			kind: this.kind,
			name: this.name,
			status: this._status,
			finalized: this.isFinalized,
			children: this.children.map((child) => ({ id: child.id, status: child.status })),
		};
	}

	/**
	 * Depth-first walk, parents before children
	 */
	*walk(): Generator<TestNode> {
		yield this;
		for (const child of this.children) {
			yield* child.walk();
		}
	}
}

// =============================================================================
// Tree Construction
// =============================================================================

function sanitize(name: string, kind: TestableKind): string {
	const segment = name.trim().replace(/\//g, "_");
	return segment || kind;
}

/**
 * Id segments of siblings; repeated names get their position as suffix
 */
function siblingSegments(definitions: readonly TestableDefinition[]): string[] {
	const seen = new Set<string>();
	return definitions.map((definition, index) => {
		const segment = sanitize(definition.name, definition.kind);
		if (seen.has(segment)) {
			return `${segment}#${index}`;
		}
		seen.add(segment);
		return segment;
	});
}

function policyOf(definition: TestableDefinition, defaults: TreeDefaults): ExecutionPolicy {
	switch (definition.kind) {
		case "suite":
			return suitePolicy(definition, defaults);
		case "case":
		case "flight":
			return { mode: "sequential", concurrency: 1, failFast: definition.failFast ?? defaults.failFast };
		case "step":
			return SEQUENTIAL_LEAF;
	}
}

function suitePolicy(definition: SuiteDefinition, defaults: TreeDefaults): ExecutionPolicy {
	const mode = definition.mode ?? "parallel";
	const concurrency = mode === "sequential" ? 1 : (definition.concurrency ?? defaults.concurrency);
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new RangeError(`Suite "${definition.name}" concurrency must be a positive integer, got ${concurrency}`);
	}
	return { mode, concurrency, failFast: definition.failFast ?? false };
}

function childDefinitions(definition: TestableDefinition): readonly TestableDefinition[] {
	switch (definition.kind) {
		case "suite":
			return definition.children;
		case "case":
			return definition.flights;
		case "flight":
			return definition.steps;
		case "step":
			return [];
	}
}

/**
 * Build the runtime tree of a definition
 */
export function buildTree(definition: TestableDefinition, defaults: TreeDefaults): TestNode {
	const build = (def: TestableDefinition, id: string, parent?: TestNode): TestNode => {
		const node = new TestNode(id, def, policyOf(def, defaults), parent);
		const defs = childDefinitions(def);
		const segments = siblingSegments(defs);
		defs.forEach((child, index) => {
			node.children.push(build(child, `${id}/${segments[index]}`, node));
		});
		return node;
	};
	return build(definition, sanitize(definition.name, definition.kind));
}
