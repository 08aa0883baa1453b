/**
 * Test Tree Builders
 *
 * Fluent API producing test tree definitions.
 *
 * @example
 * ```typescript
 * const login = testCase("login", (test) => {
 *   test.step("post credentials", {
 *     agent: "api",
 *     action: { type: "request", params: { method: "POST", path: "/login" } },
 *   });
 * })
 *   .feature("auth")
 *   .severity("critical");
 *
 * const tree = suite("smoke", [login]);
 * ```
 */

import type {
	CaseDefinition,
	ExecutionMode,
	FlightDefinition,
	Phase,
	StepDefinition,
	SuiteDefinition,
} from "./definition.types";
import type { Severity, TestCaseMetadata } from "./result.types";

/**
 * Step settings as passed to builders
 */
export type StepConfig = Omit<StepDefinition, "kind" | "name">;

export interface FlightOptions {
	failFast?: boolean;
}

export interface SuiteOptions {
	mode?: ExecutionMode;
	concurrency?: number;
	failFast?: boolean;
}

/**
 * Create a step definition
 */
export function step(name: string, config: StepConfig): StepDefinition {
	return { kind: "step", name, ...config };
}

/**
 * Create a flight definition from steps
 */
export function flight(
	name: string,
	steps: readonly StepDefinition[],
	options?: FlightOptions & { phase?: Phase },
): FlightDefinition {
	return { kind: "flight", name, steps, phase: options?.phase, failFast: options?.failFast };
}

// =============================================================================
// Flight Builder
// =============================================================================

export class FlightBuilder {
	private steps: StepDefinition[] = [];

	/**
	 * Add a step
	 */
	step(name: string, config: StepConfig): this {
		this.steps.push(step(name, config));
		return this;
	}

	getSteps(): StepDefinition[] {
		return [...this.steps];
	}
}

// =============================================================================
// Case Builder
// =============================================================================

interface FlightEntry {
	name: string;
	builder: FlightBuilder;
	options?: FlightOptions;
	implicit: boolean;
}

/**
 * Collects the flights of one case phase. Steps added directly go to an
 * implicit flight named after the phase.
 */
export class CaseBuilder {
	private entries: FlightEntry[] = [];

	constructor(readonly phase: Phase) {}

	/**
	 * Add a named flight
	 */
	flight(name: string, build: (flight: FlightBuilder) => void, options?: FlightOptions): this {
		const builder = new FlightBuilder();
		build(builder);
		this.entries.push({ name, builder, options, implicit: false });
		return this;
	}

	/**
	 * Add a step to the implicit flight
	 */
	step(name: string, config: StepConfig): this {
		let entry = this.entries[this.entries.length - 1];
		if (!entry?.implicit) {
			entry = { name: this.phase === "test" ? "main" : this.phase, builder: new FlightBuilder(), implicit: true };
			this.entries.push(entry);
		}
		entry.builder.step(name, config);
		return this;
	}

	getFlights(): FlightDefinition[] {
		return this.entries.map((entry) =>
			flight(entry.name, entry.builder.getSteps(), { ...entry.options, phase: this.phase }),
		);
	}
}

// =============================================================================
// Test Case
// =============================================================================

type CaseBuild = (test: CaseBuilder) => void;

/**
 * TestCase - a case with before/after phases and reporter metadata
 */
export class TestCase {
	readonly name: string;
	private testBuilder: CaseBuild;
	private beforeBuilder?: CaseBuild;
	private afterBuilder?: CaseBuild;
	private _metadata: TestCaseMetadata = {};
	private _failFast?: boolean;

	constructor(name: string, builder: CaseBuild, metadata?: TestCaseMetadata) {
		this.name = name;
		this.testBuilder = builder;
		if (metadata) {
			this._metadata = { ...metadata };
		}
	}

	// =========================================================================
	// Metadata Fluent API
	// =========================================================================

	/**
	 * Set test case ID (maps to Allure TestOps ID)
	 */
	id(value: string): this {
		this._metadata.id = value;
		return this;
	}

	epic(value: string): this {
		this._metadata.epic = value;
		return this;
	}

	feature(value: string): this {
		this._metadata.feature = value;
		return this;
	}

	story(value: string): this {
		this._metadata.story = value;
		return this;
	}

	severity(value: Severity): this {
		this._metadata.severity = value;
		return this;
	}

	tags(...values: string[]): this {
		this._metadata.tags = [...(this._metadata.tags ?? []), ...values];
		return this;
	}

	tag(value: string): this {
		return this.tags(value);
	}

	/**
	 * Add an issue/bug tracker ID
	 */
	issue(id: string): this {
		this._metadata.issues = [...(this._metadata.issues ?? []), id];
		return this;
	}

	/**
	 * Set description in markdown format
	 */
	description(text: string): this {
		this._metadata.description = text;
		return this;
	}

	label(name: string, value: string): this {
		this._metadata.labels = { ...this._metadata.labels, [name]: value };
		return this;
	}

	/**
	 * Override the run-level failFast for this case
	 */
	failFast(value: boolean): this {
		this._failFast = value;
		return this;
	}

	getMetadata(): TestCaseMetadata {
		return { ...this._metadata };
	}

	/**
	 * Define setup flights. A failing setup skips the test flights.
	 */
	before(handler: CaseBuild): this {
		this.beforeBuilder = handler;
		return this;
	}

	/**
	 * Define cleanup flights. They run even when the test flights fail.
	 */
	after(handler: CaseBuild): this {
		this.afterBuilder = handler;
		return this;
	}

	/**
	 * Build the case definition: before, test and after flights in that order
	 */
	toDefinition(): CaseDefinition {
		const flights: FlightDefinition[] = [];
		const phases: Array<[Phase, CaseBuild | undefined]> = [
			["before", this.beforeBuilder],
			["test", this.testBuilder],
			["after", this.afterBuilder],
		];

		for (const [phase, build] of phases) {
			if (!build) continue;
			const builder = new CaseBuilder(phase);
			build(builder);
			flights.push(...builder.getFlights());
		}

		return {
			kind: "case",
			name: this.name,
			flights,
			failFast: this._failFast,
			metadata: this.getMetadata(),
		};
	}
}

/**
 * Create a test case
 */
export function testCase(name: string, builder: CaseBuild, metadata?: TestCaseMetadata): TestCase {
	return new TestCase(name, builder, metadata);
}

/**
 * Create a suite definition
 */
export function suite(
	name: string,
	children: ReadonlyArray<SuiteDefinition | CaseDefinition | TestCase>,
	options?: SuiteOptions,
): SuiteDefinition {
	return {
		kind: "suite",
		name,
		children: children.map((child) => (child instanceof TestCase ? child.toDefinition() : child)),
		mode: options?.mode,
		concurrency: options?.concurrency,
		failFast: options?.failFast,
	};
}
