/**
 * Progress Module
 */

export * from "./progress.types";
export * from "./progress-tracker";
