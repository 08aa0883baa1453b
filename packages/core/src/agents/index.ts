/**
 * Agents Module
 */

export * from "./agent.types";
export * from "./dispatcher";
