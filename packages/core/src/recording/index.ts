/**
 * Recording Module
 */

export * from "./reporter";
