/**
 * Allure Reporter for stepwise
 *
 * @example
 * ```typescript
 * import { RunEngine } from "@stepwise/core";
 * import { AllureReporter } from "@stepwise/reporter-allure";
 *
 * await new RunEngine(registry).run(topology, tree, {
 *   reporters: [new AllureReporter({ resultsDir: "allure-results", includeOutcomeData: "both" })],
 * });
 * ```
 */

export { AllureReporter } from "./allure-reporter";
export {
	convertMetadataToLabels,
	convertMetadataToLinks,
	convertStatus,
	convertStatusDetails,
	convertStep,
	convertTestCase,
	convertToContainer,
} from "./result-converter";
export type { AllureReporterOptions } from "./types";
export { FileSystemWriter } from "./writers/file-writer";
export type { AllureWriter } from "./writers/writer";
export { ContentType, LabelName, LinkType, Stage, Status } from "allure-js-commons";
