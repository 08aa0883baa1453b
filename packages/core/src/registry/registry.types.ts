/**
 * Registry Types
 */

import type { ConstraintSet, ConstraintSetInput } from "../constraints";

/**
 * Context handed to a factory constructor
 */
export interface FactoryContext {
	/** Requirement that selected this factory */
	requirement: ConstraintSet;
	/** Canonical signature of the requirement */
	signature: string;
	/** Run that triggered construction (absent for shared instances) */
	runId?: string;
	/** Resolve another requirement within the same run */
	resolve: <T = unknown>(requirement: ConstraintSetInput) => Promise<T>;
}

/**
 * Factory constructor
 */
export type FactoryCreate<T> = (context: FactoryContext) => T | Promise<T>;

/**
 * Registration options
 */
export interface FactoryOptions {
	/** Unique factory name used in diagnostics (default: generated) */
	name?: string;
	/**
	 * Stateless products are built once and shared by every run;
	 * others are built per run and disposed at run end.
	 */
	stateless?: boolean;
}

/**
 * Registered factory
 */
export interface Factory<T = unknown> {
	readonly id: string;
	readonly name: string;
	readonly constraints: ConstraintSet;
	readonly stateless: boolean;
	readonly create: FactoryCreate<T>;
}
