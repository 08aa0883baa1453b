/**
 * Engine Module
 */

export * from "./run-options";
export * from "./run-engine";
