/**
 * @stepwise/agent-http
 *
 * REST agent for the stepwise engine.
 *
 * @example
 * ```typescript
 * import { FactoryRegistry } from "@stepwise/core";
 * import { registerHttpAgent } from "@stepwise/agent-http";
 *
 * const registry = new FactoryRegistry();
 * registerHttpAgent(registry, { version: "2.4" }, { baseUrl: "http://localhost:3000" });
 * ```
 */

export * from "./http.types";
export * from "./http-agent";
