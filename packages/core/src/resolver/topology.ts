/**
 * Topology
 *
 * Declarative map of component name -> requirement, resolved once at run start.
 */

import type { ConstraintSet, ConstraintSetInput } from "../constraints";
import { defineConstraints } from "../constraints";
import type { TopologyFailure } from "../errors";
import { TopologyResolutionError } from "../errors";
import { toError } from "../utils";
import type { Binding, Resolver } from "./resolver";

/**
 * Topology as written by users
 *
 * @example
 * ```typescript
 * const topology = defineTopology({
 *   api: { interface: "rest", version: gte("2.3") },
 *   events: { interface: "ws" },
 * });
 * ```
 */
export type TopologyInput = Readonly<Record<string, ConstraintSetInput>>;

/**
 * Normalized topology
 */
export type Topology = Readonly<Record<string, ConstraintSet>>;

/**
 * Normalize and freeze a topology. Throws on an invalid component requirement.
 */
export function defineTopology(input: TopologyInput): Topology {
	const topology: Record<string, ConstraintSet> = {};
	for (const [component, requirement] of Object.entries(input)) {
		if (!component) {
			throw new Error("Topology component name must not be empty");
		}
		try {
			topology[component] = defineConstraints(requirement);
		} catch (error) {
			throw new Error(`Invalid requirement for component "${component}": ${toError(error).message}`, {
				cause: error,
			});
		}
	}
	return Object.freeze(topology);
}

/**
 * Concrete bindings of every topology component for one run
 */
export class ResolvedTopology {
	private readonly bindings: ReadonlyMap<string, Binding>;

	constructor(bindings: Iterable<readonly [string, Binding]>) {
		this.bindings = new Map(bindings);
	}

	/**
	 * Get the resolved instance of a component
	 */
	get<T = unknown>(name: string): T {
		// Bindings hold every product type; callers name the one they expect
		return this.binding(name).instance as T;
	}

	/**
	 * Get the full binding of a component
	 */
	binding(name: string): Binding {
		const binding = this.bindings.get(name);
		if (!binding) {
			throw new Error(`Component ${name} is not part of the topology`);
		}
		return binding;
	}

	has(name: string): boolean {
		return this.bindings.has(name);
	}

	names(): string[] {
		return Array.from(this.bindings.keys());
	}
}

/**
 * Resolve every component. All failures are collected into one error.
 */
export async function resolveTopology(resolver: Resolver, topology: Topology): Promise<ResolvedTopology> {
	const components = Object.keys(topology);
	const settled = await Promise.allSettled(components.map((name) => resolver.resolve(topology[name])));

	const bindings: Array<readonly [string, Binding]> = [];
	const failures: TopologyFailure[] = [];

	settled.forEach((result, index) => {
		if (result.status === "fulfilled") {
			bindings.push([components[index], result.value]);
		} else {
			failures.push({ component: components[index], error: toError(result.reason) });
		}
	});

	if (failures.length > 0) {
		throw new TopologyResolutionError(failures);
	}
	return new ResolvedTopology(bindings);
}
