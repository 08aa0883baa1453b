/**
 * Aggregation Module
 */

export * from "./aggregator";
export * from "./summary";
