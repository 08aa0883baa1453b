/**
 * Predicates
 *
 * Builders, evaluation and containment for attribute predicates.
 * Containment (`isContained`) is what makes a factory declaration "compatible
 * or narrower" than a requirement.
 */

import type {
	AttributeValue,
	ConstraintInput,
	ConstraintSet,
	ConstraintSetInput,
	Predicate,
	RangePredicate,
} from "./constraint.types";
import { compareValues, valuesEqual } from "./version";

// =============================================================================
// Builders
// =============================================================================

export function eq(value: AttributeValue): Predicate {
	return { op: "eq", value };
}

export function ne(value: AttributeValue): Predicate {
	return { op: "ne", value };
}

export function oneOf(...values: AttributeValue[]): Predicate {
	return { op: "in", values };
}

/**
 * Ordered range; bounds are inclusive unless stated otherwise
 */
export function range(bounds: {
	min?: AttributeValue;
	max?: AttributeValue;
	minInclusive?: boolean;
	maxInclusive?: boolean;
}): Predicate {
	const predicate: RangePredicate = {
		op: "range",
		min: bounds.min,
		max: bounds.max,
		minInclusive: bounds.minInclusive ?? true,
		maxInclusive: bounds.maxInclusive ?? true,
	};
	if (predicate.min !== undefined && predicate.max !== undefined && compareValues(predicate.min, predicate.max) > 0) {
		throw new RangeError(`Invalid range: ${predicate.min} is greater than ${predicate.max}`);
	}
	return predicate;
}

export const gt = (value: AttributeValue): Predicate => range({ min: value, minInclusive: false });
export const gte = (value: AttributeValue): Predicate => range({ min: value });
export const lt = (value: AttributeValue): Predicate => range({ max: value, maxInclusive: false });
export const lte = (value: AttributeValue): Predicate => range({ max: value });

/**
 * Half-open range [min, max)
 */
export const between = (min: AttributeValue, max: AttributeValue): Predicate =>
	range({ min, max, maxInclusive: false });

// =============================================================================
// Normalization
// =============================================================================

function isPredicate(input: ConstraintInput): input is Predicate {
	return typeof input === "object";
}

/**
 * Normalize a predicate or a bare value (equality shorthand)
 */
export function toPredicate(input: ConstraintInput): Predicate {
	return isPredicate(input) ? input : eq(input);
}

/**
 * Normalize and freeze a constraint set
 */
export function defineConstraints(input: ConstraintSetInput): ConstraintSet {
	const constraints: Record<string, Predicate> = {};
	for (const [attribute, value] of Object.entries(input)) {
		if (attribute.length === 0) {
			throw new Error("Constraint attribute name cannot be empty");
		}
		constraints[attribute] = Object.freeze(toPredicate(value));
	}
	return Object.freeze(constraints);
}

// =============================================================================
// Evaluation
// =============================================================================

function aboveLower(predicate: RangePredicate, value: AttributeValue): boolean {
	if (predicate.min === undefined) return true;
	const c = compareValues(value, predicate.min);
	return predicate.minInclusive ? c >= 0 : c > 0;
}

function belowUpper(predicate: RangePredicate, value: AttributeValue): boolean {
	if (predicate.max === undefined) return true;
	const c = compareValues(value, predicate.max);
	return predicate.maxInclusive ? c <= 0 : c < 0;
}

/**
 * Evaluate a predicate against a single value
 */
export function testPredicate(predicate: Predicate, value: AttributeValue): boolean {
	switch (predicate.op) {
		case "eq":
			return valuesEqual(predicate.value, value);
		case "ne":
			return !valuesEqual(predicate.value, value);
		case "in":
			return predicate.values.some((v) => valuesEqual(v, value));
		case "range":
			return aboveLower(predicate, value) && belowUpper(predicate, value);
	}
}

/**
 * Evaluate a constraint set against concrete attributes
 */
export function testConstraints(constraints: ConstraintSet, attributes: Readonly<Record<string, AttributeValue>>): boolean {
	return Object.entries(constraints).every(([attribute, predicate]) => {
		const value = attributes[attribute];
		return value !== undefined && testPredicate(predicate, value);
	});
}

// =============================================================================
// Containment
// =============================================================================

function isEmptyRange(predicate: RangePredicate): boolean {
	if (predicate.min === undefined || predicate.max === undefined) return false;
	const c = compareValues(predicate.min, predicate.max);
	return c > 0 || (c === 0 && !(predicate.minInclusive && predicate.maxInclusive));
}

function pointOf(predicate: RangePredicate): AttributeValue | undefined {
	if (predicate.min === undefined || predicate.max === undefined) return undefined;
	if (!predicate.minInclusive || !predicate.maxInclusive) return undefined;
	return compareValues(predicate.min, predicate.max) === 0 ? predicate.min : undefined;
}

function rangeWithin(inner: RangePredicate, outer: RangePredicate): boolean {
	if (outer.min !== undefined) {
		if (inner.min === undefined) return false;
		const c = compareValues(inner.min, outer.min);
		if (c < 0 || (c === 0 && inner.minInclusive && !outer.minInclusive)) return false;
	}
	if (outer.max !== undefined) {
		if (inner.max === undefined) return false;
		const c = compareValues(inner.max, outer.max);
		if (c > 0 || (c === 0 && inner.maxInclusive && !outer.maxInclusive)) return false;
	}
	return true;
}

/**
 * Check that every value admitted by `inner` is admitted by `outer`.
 *
 * Ranges over versions are dense ("1.0" < "1.0.1" < "1.1"), so a non-point
 * range is never contained in a finite set of values.
 */
export function isContained(inner: Predicate, outer: Predicate): boolean {
	switch (inner.op) {
		case "eq":
			return testPredicate(outer, inner.value);
		case "in":
			return inner.values.every((value) => testPredicate(outer, value));
		case "ne":
			return outer.op === "ne" && valuesEqual(inner.value, outer.value);
		case "range": {
			if (isEmptyRange(inner)) return true;
			const point = pointOf(inner);
			if (point !== undefined) return testPredicate(outer, point);
			switch (outer.op) {
				case "eq":
				case "in":
					return false;
				case "ne":
					return !testPredicate(inner, outer.value);
				case "range":
					return rangeWithin(inner, outer);
			}
		}
	}
}

/**
 * Check two predicates admit exactly the same values
 */
export function isEquivalent(a: Predicate, b: Predicate): boolean {
	return isContained(a, b) && isContained(b, a);
}
