/**
 * Registry Module
 */

export * from "./registry.types";
export * from "./factory-registry";
