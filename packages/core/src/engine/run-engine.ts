/**
 * Run Engine
 *
 * Drives one run: resolves the topology, walks the test tree according to
 * each container's policy, dispatches steps and feeds the aggregator.
 *
 * Scheduling:
 * - suite: children through a bounded worker pool
 * - case: flights in order; a non-passing `before` flight skips the `test`
 *   flights, `after` flights always run
 * - flight: steps in order; consecutive independent steps run as a batch
 */

import { AgentDispatcher } from "../agents/dispatcher";
import { ResultAggregator } from "../aggregation/aggregator";
import { AggregationInvariantViolation, isResolutionError } from "../errors";
import { ProgressTracker } from "../progress/progress-tracker";
import type { TestReporter } from "../recording/reporter";
import { attachReporter } from "../recording/reporter";
import type { FactoryRegistry } from "../registry";
import { defaultRegistry } from "../registry";
import { Resolver } from "../resolver/resolver";
import type { Topology, TopologyInput } from "../resolver/topology";
import { defineTopology, resolveTopology } from "../resolver/topology";
import { TestCase } from "../testable/builders";
import type { StepDefinition, TestableDefinition } from "../testable/definition.types";
import type { Result } from "../testable/result.types";
import { isBadStatus } from "../testable/status";
import type { TestNode } from "../testable/test-node";
import { buildTree } from "../testable/test-node";
import { generateId, runWithConcurrency, toError } from "../utils";
import type { ResolvedRunOptions, RunOptions } from "./run-options";
import { resolveRunOptions } from "./run-options";

/**
 * Test tree accepted by the engine
 */
export type TestTree = TestableDefinition | TestCase;

/**
 * Handle of a submitted run
 */
export interface RunHandle {
	readonly id: string;
	/** Progress stream of the run */
	readonly events: ProgressTracker;
	/** Root of the runtime tree */
	readonly root: TestNode;
	/** Errors raised while releasing agents at run end */
	readonly disposeErrors: readonly Error[];
	/**
	 * Stop the run: nothing new starts, in-flight steps are interrupted and
	 * every node that has not started is skipped.
	 */
	cancel(reason?: string): void;
	/**
	 * Root result. Rejects when the run could not complete: topology
	 * resolution failure, invariant violation or a fail-run resolution error.
	 */
	await(): Promise<Result>;
}

const SIBLING_FAILED = "Skipped after a sibling failed";
const SETUP_FAILED = "Skipped after setup failed";

class Run implements RunHandle {
	readonly id = generateId("run_");
	readonly events: ProgressTracker;
	private readonly controller = new AbortController();
	private readonly aggregator: ResultAggregator;
	private readonly resolver: Resolver;
	private dispatcher?: AgentDispatcher;
	private fatal?: Error;
	private _disposeErrors: Error[] = [];
	private completion?: Promise<Result>;

	constructor(
		private readonly registry: FactoryRegistry,
		private readonly topology: Topology,
		readonly root: TestNode,
		private readonly options: ResolvedRunOptions,
	) {
		this.events = new ProgressTracker(this.id, { onListenerError: options.onListenerError });
		this.aggregator = new ResultAggregator(this.events, {
			strict: options.strict,
			passedOverSkipped: options.passedOverSkipped,
		});
		this.resolver = new Resolver(registry, { runId: this.id });
	}

	get disposeErrors(): readonly Error[] {
		return [...this._disposeErrors];
	}

	start(): this {
		const completion = this.execute();
		// The failure is also published as a run-error event; awaiting is optional
		completion.catch((error: unknown) => {
			this.fatal ??= toError(error);
		});
		this.completion = completion;
		return this;
	}

	cancel(reason = "run cancelled"): void {
		if (!this.controller.signal.aborted) {
			this.controller.abort(reason);
		}
	}

	await(): Promise<Result> {
		if (!this.completion) {
			return Promise.reject(new Error(`Run ${this.id} was not started`));
		}
		return this.completion;
	}

	// =========================================================================
	// Run Lifecycle
	// =========================================================================

	private async execute(): Promise<Result> {
		// Give the submitter a chance to subscribe before the first event
		await Promise.resolve();

		this.registry.seal();
		const detach = this.options.reporters.map((reporter: TestReporter) => attachReporter(this.events, reporter));

		try {
			this.events.emit({
				type: "run-start",
				name: this.options.name ?? this.root.name,
				rootId: this.root.id,
				metadata: this.options.metadata,
			});

			try {
				const topology = await resolveTopology(this.resolver, this.topology);
				this.dispatcher = new AgentDispatcher(this.resolver, topology);
			} catch (error) {
				return await this.fail(toError(error));
			}

			try {
				await this.runNode(this.root);
			} catch (error) {
				this.abort(toError(error));
			}

			if (this.fatal) {
				return await this.fail(this.fatal);
			}

			const result = this.root.result;
			if (!result) {
				return await this.fail(
					new AggregationInvariantViolation("Run ended before the root finalized", this.root.id, this.root.snapshot()),
				);
			}

			await this.release();
			this.events.emit({ type: "run-complete", result });
			return result;
		} finally {
			for (const unsubscribe of detach) {
				unsubscribe();
			}
		}
	}

	private async fail(error: Error): Promise<never> {
		await this.release();
		this.events.emit({ type: "run-error", error, result: this.root.result });
		throw error;
	}

	private async release(): Promise<void> {
		this._disposeErrors.push(...(await this.resolver.dispose()));
	}

	/**
	 * Fatal failure: stop the run and remember the first cause
	 */
	private abort(error: Error): void {
		this.fatal ??= error;
		if (!this.controller.signal.aborted) {
			this.controller.abort(`run aborted: ${error.message}`);
		}
	}

	private get stopping(): boolean {
		return this.controller.signal.aborted;
	}

	private stopReason(): string {
		return this.fatal ? `Run aborted: ${this.fatal.message}` : `Cancelled: ${String(this.controller.signal.reason)}`;
	}

	// =========================================================================
	// Tree Walk
	// =========================================================================

	private async runNode(node: TestNode): Promise<void> {
		if (this.stopping) {
			this.aggregator.skip(node, this.stopReason());
			return;
		}

		const definition = node.definition;
		if (definition.kind === "step") {
			return this.runStep(node, definition);
		}

		this.aggregator.start(node);
		if (node.children.length === 0) {
			this.aggregator.finalizeEmpty(node);
			return;
		}

		switch (definition.kind) {
			case "suite":
				return this.runSuite(node);
			case "case":
				return this.runCase(node);
			case "flight":
				return this.runFlight(node);
		}
	}

	private async runSuite(node: TestNode): Promise<void> {
		let failed = false;
		await runWithConcurrency(
			node.children,
			node.policy.concurrency,
			async (child) => {
				if (failed && node.policy.failFast) {
					this.aggregator.skip(child, SIBLING_FAILED);
					return;
				}
				await this.runNode(child);
				failed ||= isBadStatus(child.status);
			},
			(error) => this.abort(toError(error)),
		);
	}

	private async runCase(node: TestNode): Promise<void> {
		let setupFailed = false;
		let failed = false;

		for (const flight of node.children) {
			const phase = flight.phase ?? "test";

			if (phase === "after") {
				await this.runNode(flight);
				continue;
			}
			if (phase === "test" && setupFailed) {
				this.aggregator.skip(flight, SETUP_FAILED);
				continue;
			}
			if (failed && node.policy.failFast) {
				this.aggregator.skip(flight, SIBLING_FAILED);
				continue;
			}

			await this.runNode(flight);
			setupFailed ||= phase === "before" && flight.status !== "passed";
			failed ||= isBadStatus(flight.status);
		}
	}

	private async runFlight(node: TestNode): Promise<void> {
		let failed = false;

		for (const batch of this.batches(node.children)) {
			if (failed && node.policy.failFast) {
				for (const step of batch) {
					this.aggregator.skip(step, SIBLING_FAILED);
				}
				continue;
			}

			await runWithConcurrency(batch, batch.length, (step) => this.runNode(step));
			failed ||= batch.some((step) => this.triggersFailFast(step));
		}
	}

	private async runStep(node: TestNode, step: StepDefinition): Promise<void> {
		if (!this.dispatcher) {
			throw new Error("Steps cannot run before the topology is resolved");
		}

		this.aggregator.start(node);
		const outcome = await this.dispatcher.dispatch(step, {
			runId: this.id,
			stepId: node.id,
			timeout: step.timeout ?? this.options.stepTimeout,
			cancelGracePeriod: this.options.cancelGracePeriod,
			signal: this.controller.signal,
		});

		if (outcome.error && isResolutionError(outcome.error) && this.options.onResolutionError === "fail-run") {
			this.abort(outcome.error);
		}
		this.aggregator.finalize(node, outcome);
	}

	/**
	 * Group consecutive independent steps; every other step is its own batch
	 */
	private batches(steps: readonly TestNode[]): TestNode[][] {
		const batches: TestNode[][] = [];
		let open = false;

		for (const step of steps) {
			const independent = step.definition.kind === "step" && step.definition.independent === true;
			if (independent && open) {
				batches[batches.length - 1].push(step);
			} else {
				batches.push([step]);
			}
			open = independent;
		}
		return batches;
	}

	private triggersFailFast(node: TestNode): boolean {
		const exempt = node.definition.kind === "step" && node.definition.continueOnFailure === true;
		return !exempt && isBadStatus(node.status);
	}
}

/**
 * Run Engine - submits runs against a factory registry
 *
 * @example
 * ```typescript
 * const engine = new RunEngine(registry, { stepTimeout: 5000 });
 * const handle = engine.submit({ api: { interface: "rest" } }, suite("smoke", [login]));
 * for await (const event of handle.events.stream()) {
 *   console.log(event.seq, event.type);
 * }
 * const result = await handle.await();
 * ```
 */
export class RunEngine {
	constructor(
		private readonly registry: FactoryRegistry = defaultRegistry,
		private readonly defaults?: RunOptions,
	) {}

	/**
	 * Start a run. Invalid options, topology or tree throw synchronously;
	 * everything else is reported through the handle.
	 */
	submit(topology: TopologyInput, tree: TestTree, options?: RunOptions): RunHandle {
		const resolved = resolveRunOptions(this.defaults, options);
		const definition = tree instanceof TestCase ? tree.toDefinition() : tree;
		const root = buildTree(definition, { concurrency: resolved.concurrency, failFast: resolved.failFast });

		return new Run(this.registry, defineTopology(topology), root, resolved).start();
	}

	/**
	 * Submit and wait for the root result
	 */
	run(topology: TopologyInput, tree: TestTree, options?: RunOptions): Promise<Result> {
		return this.submit(topology, tree, options).await();
	}
}
