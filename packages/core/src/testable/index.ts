/**
 * Testable Module
 *
 * Test tree definitions, builders and runtime nodes.
 */

export * from "./status";
export * from "./definition.types";
export * from "./result.types";
export * from "./test-node";
export * from "./builders";
