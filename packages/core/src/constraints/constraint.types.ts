/**
 * Constraint Types
 *
 * Constraints describe both what a test needs (requirements) and what a
 * factory provides (declarations). Both are sets of attribute predicates.
 */

/**
 * Value of a named attribute (interface kind, product, version, environment...)
 */
export type AttributeValue = string | number;

/**
 * Equality with a single value
 */
export interface EqPredicate {
	op: "eq";
	value: AttributeValue;
}

/**
 * Anything but a single value
 */
export interface NePredicate {
	op: "ne";
	value: AttributeValue;
}

/**
 * Membership in a set of values
 */
export interface InPredicate {
	op: "in";
	values: readonly AttributeValue[];
}

/**
 * Ordered range. An omitted bound is open-ended.
 * Strings are ordered as dotted versions, numbers numerically.
 */
export interface RangePredicate {
	op: "range";
	min?: AttributeValue;
	max?: AttributeValue;
	minInclusive: boolean;
	maxInclusive: boolean;
}

/**
 * Predicate over a single attribute
 */
export type Predicate = EqPredicate | NePredicate | InPredicate | RangePredicate;

/**
 * Normalized constraint set: attribute name -> predicate
 */
export type ConstraintSet = Readonly<Record<string, Predicate>>;

/**
 * Predicate or a bare value (shorthand for equality)
 */
export type ConstraintInput = Predicate | AttributeValue;

/**
 * Constraint set as written by users
 *
 * @example
 * ```typescript
 * const requirement: ConstraintSetInput = { interface: "rest", version: gte("2.3") };
 * ```
 */
export type ConstraintSetInput = Readonly<Record<string, ConstraintInput>>;
