/**
 * Factory Registry
 *
 * Process-wide catalogue of factories. Registration happens before runs
 * start; the first run seals the registry so that every run sees the same
 * immutable set of factories.
 */

import type { Agent } from "../agents/agent.types";
import { isDisposable } from "../agents/agent.types";
import type { ConstraintSetInput } from "../constraints";
import { defineConstraints } from "../constraints";
import { RegistrySealedError } from "../errors";
import { toError } from "../utils";
import type { Factory, FactoryContext, FactoryCreate, FactoryOptions } from "./registry.types";

let factoryIdCounter = 0;

export class FactoryRegistry {
	private factories: Factory[] = [];
	private names = new Set<string>();
	private sealed = false;
	private shared = new Map<string, Promise<unknown>>();

	/**
	 * Register a factory for a declared constraint set
	 *
	 * @example
	 * ```typescript
	 * registry.register({ interface: "rest", version: "2.4" }, () => new LoginStepV24(), { name: "login-v2.4" });
	 * ```
	 */
	register<T>(constraints: ConstraintSetInput, create: FactoryCreate<T>, options?: FactoryOptions): Factory<T> {
		const id = `factory-${++factoryIdCounter}`;
		const name = options?.name ?? id;

		if (this.sealed) {
			throw new RegistrySealedError(name);
		}
		if (this.names.has(name)) {
			throw new Error(`Factory ${name} already exists`);
		}

		const factory: Factory<T> = Object.freeze({
			id,
			name,
			constraints: defineConstraints(constraints),
			stateless: options?.stateless ?? false,
			create,
		});

		this.names.add(name);
		this.factories.push(factory);
		return factory;
	}

	/**
	 * Register an agent factory
	 */
	registerAgent<A extends Agent>(
		constraints: ConstraintSetInput,
		create: FactoryCreate<A>,
		options?: FactoryOptions,
	): Factory<A> {
		return this.register(constraints, create, options);
	}

	/**
	 * Freeze the catalogue. Idempotent.
	 */
	seal(): void {
		this.sealed = true;
	}

	isSealed(): boolean {
		return this.sealed;
	}

	/**
	 * All factories in registration order
	 */
	getFactories(): readonly Factory[] {
		return [...this.factories];
	}

	get size(): number {
		return this.factories.length;
	}

	/**
	 * Get or build the single shared instance of a stateless factory.
	 * Concurrent callers await the same construction.
	 */
	getSharedInstance(factory: Factory, context: FactoryContext): Promise<unknown> {
		const existing = this.shared.get(factory.id);
		if (existing) {
			return existing;
		}

		const pending = Promise.resolve().then(() => factory.create({ ...context, runId: undefined }));
		this.shared.set(factory.id, pending);
		pending.catch(() => {
			// A failed construction may be retried by a later run
			this.shared.delete(factory.id);
		});
		return pending;
	}

	/**
	 * Dispose every shared instance. Returns the errors raised while disposing.
	 */
	async disposeShared(): Promise<Error[]> {
		const errors: Error[] = [];
		const entries = Array.from(this.shared.values());
		this.shared.clear();

		for (const entry of entries) {
			try {
				const instance = await entry;
				if (isDisposable(instance)) {
					await instance.dispose();
				}
			} catch (error) {
				errors.push(toError(error));
			}
		}
		return errors;
	}
}

/**
 * Process-wide registry used when none is passed to the engine
 */
export const defaultRegistry = new FactoryRegistry();
