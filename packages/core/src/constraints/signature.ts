/**
 * Canonical signatures
 *
 * Two requirements with the same signature admit the same factories, so the
 * resolver memoizes bindings by signature.
 */

import type { AttributeValue, ConstraintSet, Predicate } from "./constraint.types";
import { compareValues, valuesEqual } from "./version";

function formatValue(value: AttributeValue): string {
	return JSON.stringify(String(value));
}

function canonicalValues(values: readonly AttributeValue[]): AttributeValue[] {
	const sorted = [...values].sort(compareValues);
	return sorted.filter((value, index) => index === 0 || !valuesEqual(sorted[index - 1], value));
}

/**
 * Canonical textual form of a predicate
 */
export function formatPredicate(predicate: Predicate): string {
	switch (predicate.op) {
		case "eq":
			return `=${formatValue(predicate.value)}`;
		case "ne":
			return `!=${formatValue(predicate.value)}`;
		case "in":
			return ` in [${canonicalValues(predicate.values).map(formatValue).join(",")}]`;
		case "range": {
			const open = predicate.min === undefined ? "(" : predicate.minInclusive ? "[" : "(";
			const close = predicate.max === undefined ? ")" : predicate.maxInclusive ? "]" : ")";
			const min = predicate.min === undefined ? "*" : formatValue(predicate.min);
			const max = predicate.max === undefined ? "*" : formatValue(predicate.max);
			return ` in ${open}${min},${max}${close}`;
		}
	}
}

/**
 * Human-readable constraint list in attribute order
 */
export function formatConstraints(constraints: ConstraintSet): string {
	return Object.keys(constraints)
		.sort()
		.map((attribute) => `${attribute}${formatPredicate(constraints[attribute])}`)
		.join(", ");
}

/**
 * Canonical signature of a constraint set: sorted attribute/predicate pairs
 */
export function constraintSignature(constraints: ConstraintSet): string {
	return Object.keys(constraints)
		.sort()
		.map((attribute) => `${attribute}${formatPredicate(constraints[attribute])}`)
		.join(";");
}
