/**
 * Resolver
 *
 * Maps requirements onto registered factories and instantiates their
 * products. Resolutions are memoized per run by canonical signature: the
 * first request for a signature starts construction and every concurrent or
 * later request awaits the same promise, so a factory constructor runs at
 * most once per signature and identical requirements share one binding.
 */

import { isDisposable } from "../agents/agent.types";
import type { ConstraintSet, ConstraintSetInput } from "../constraints";
import { constraintSignature, defineConstraints, selectMostSpecific, unmetAttributes } from "../constraints";
import { AmbiguousResolutionError, UnsatisfiableConstraintError } from "../errors";
import type { Factory, FactoryContext } from "../registry";
import type { FactoryRegistry } from "../registry";
import { toError } from "../utils";

/**
 * Concrete product of a resolution
 */
export interface Binding<T = unknown> {
	readonly signature: string;
	readonly requirement: ConstraintSet;
	readonly factory: Factory;
	readonly instance: T;
}

export interface ResolverOptions {
	runId?: string;
}

export class Resolver {
	private cache = new Map<string, Promise<Binding>>();
	private owned: Binding[] = [];
	private readonly runId?: string;

	constructor(
		private readonly registry: FactoryRegistry,
		options?: ResolverOptions,
	) {
		this.runId = options?.runId;
	}

	/**
	 * Factories whose declaration satisfies the requirement, in registration order
	 */
	candidates(requirement: ConstraintSet): Factory[] {
		return this.registry
			.getFactories()
			.filter((factory) => unmetAttributes(requirement, factory.constraints).length === 0);
	}

	/**
	 * Select the factory for a requirement without constructing anything
	 *
	 * @throws UnsatisfiableConstraintError when nothing matches
	 * @throws AmbiguousResolutionError when equally specific factories match
	 */
	select(requirement: ConstraintSet): Factory {
		const candidates = this.candidates(requirement);

		if (candidates.length === 0) {
			throw new UnsatisfiableConstraintError(requirement, this.nearestUnmet(requirement));
		}

		const selection = selectMostSpecific(candidates);
		if (selection.winner !== undefined) {
			return selection.winner;
		}
		throw new AmbiguousResolutionError(
			requirement,
			selection.competitors.map((factory) => factory.name),
		);
	}

	/**
	 * Resolve a requirement into a binding. Failures are memoized as well,
	 * since the registry cannot change during a run.
	 */
	resolve<T = unknown>(input: ConstraintSetInput): Promise<Binding<T>> {
		const requirement = defineConstraints(input);
		const signature = constraintSignature(requirement);

		let entry = this.cache.get(signature);
		if (!entry) {
			entry = this.construct(requirement, signature);
			this.cache.set(signature, entry);
		}
		// The cache holds bindings of every product type; callers name the one they expect
		return entry as Promise<Binding<T>>;
	}

	/**
	 * Number of memoized signatures
	 */
	get cacheSize(): number {
		return this.cache.size;
	}

	/**
	 * Release every per-run product that can be disposed.
	 * Shared (stateless) products are left to the registry.
	 */
	async dispose(): Promise<Error[]> {
		const errors: Error[] = [];
		const owned = this.owned.splice(0);

		for (const binding of owned.reverse()) {
			if (!isDisposable(binding.instance)) continue;
			try {
				await binding.instance.dispose();
			} catch (error) {
				errors.push(toError(error));
			}
		}
		return errors;
	}

	private async construct(requirement: ConstraintSet, signature: string): Promise<Binding> {
		const factory = this.select(requirement);
		const context: FactoryContext = {
			requirement,
			signature,
			runId: this.runId,
			resolve: async <N>(nested: ConstraintSetInput): Promise<N> => (await this.resolve<N>(nested)).instance,
		};

		const instance = factory.stateless
			? await this.registry.getSharedInstance(factory, context)
			: await factory.create(context);

		const binding: Binding = Object.freeze({ signature, requirement, factory, instance });
		if (!factory.stateless) {
			this.owned.push(binding);
		}
		return binding;
	}

	/**
	 * Unmet attributes of the candidate closest to satisfying the requirement
	 */
	private nearestUnmet(requirement: ConstraintSet): string[] {
		let nearest: string[] = Object.keys(requirement).sort();
		for (const factory of this.registry.getFactories()) {
			const unmet = unmetAttributes(requirement, factory.constraints);
			if (unmet.length < nearest.length) {
				nearest = unmet;
			}
		}
		return nearest;
	}
}
