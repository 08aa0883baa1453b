/**
 * Constraints Module
 *
 * Attribute predicates, canonical signatures and specificity.
 */

export * from "./constraint.types";
export * from "./version";
export * from "./predicates";
export * from "./signature";
export * from "./specificity";
