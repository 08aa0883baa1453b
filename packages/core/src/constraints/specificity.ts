/**
 * Matching and Specificity
 *
 * Pure functions over constraint sets. A declaration matches a requirement
 * when it constrains every required attribute with a compatible or narrower
 * predicate. Among matches, the most specific declaration wins; specificity is
 * a partial order, so incomparable or equal maxima are reported as
 * competitors instead of being guessed between.
 */

import type { ConstraintSet } from "./constraint.types";
import { isContained } from "./predicates";

/**
 * Attributes of the requirement that the declaration does not satisfy
 */
export function unmetAttributes(requirement: ConstraintSet, declared: ConstraintSet): string[] {
	return Object.keys(requirement)
		.sort()
		.filter((attribute) => {
			const predicate = declared[attribute];
			return predicate === undefined || !isContained(predicate, requirement[attribute]);
		});
}

/**
 * Check if a declaration satisfies a requirement
 */
export function satisfies(requirement: ConstraintSet, declared: ConstraintSet): boolean {
	return unmetAttributes(requirement, declared).length === 0;
}

/**
 * `a` is at least as specific as `b`: it constrains every attribute `b`
 * constrains, each at least as narrowly.
 */
export function isAtLeastAsSpecific(a: ConstraintSet, b: ConstraintSet): boolean {
	return Object.keys(b).every((attribute) => {
		const predicate = a[attribute];
		return predicate !== undefined && isContained(predicate, b[attribute]);
	});
}

export type SpecificityOrder = "more" | "less" | "equal" | "incomparable";

/**
 * Compare the specificity of two constraint sets
 */
export function compareSpecificity(a: ConstraintSet, b: ConstraintSet): SpecificityOrder {
	const aCoversB = isAtLeastAsSpecific(a, b);
	const bCoversA = isAtLeastAsSpecific(b, a);
	if (aCoversB && bCoversA) return "equal";
	if (aCoversB) return "more";
	if (bCoversA) return "less";
	return "incomparable";
}

/**
 * Outcome of selecting the most specific candidate
 */
export type SpecificitySelection<T> = { winner: T; competitors?: undefined } | { winner?: undefined; competitors: T[] };

/**
 * Select the single candidate strictly more specific than every other one.
 * Otherwise return the maximal candidates (those no other candidate beats).
 */
export function selectMostSpecific<T extends { constraints: ConstraintSet }>(candidates: readonly T[]): SpecificitySelection<T> {
	const winner = candidates.find((candidate) =>
		candidates.every(
			(other) => other === candidate || compareSpecificity(candidate.constraints, other.constraints) === "more",
		),
	);
	if (winner) {
		return { winner };
	}

	const competitors = candidates.filter(
		(candidate) =>
			!candidates.some(
				(other) => other !== candidate && compareSpecificity(other.constraints, candidate.constraints) === "more",
			),
	);
	return { competitors };
}
