/**
 * Resolver Module
 */

export * from "./resolver";
export * from "./topology";
