/**
 * Stepwise Core
 *
 * Test-automation engine: a Suite/Case/Flight/Step tree whose results
 * propagate to the root, and a constraint resolver that maps version-agnostic
 * requirements onto registered factories. Protocol agents live in their own
 * packages and are registered like any other factory.
 *
 * For agents, install:
 * - @stepwise/agent-http - REST over fetch
 * - @stepwise/agent-ws - WebSocket
 *
 * For reporters:
 * - @stepwise/reporter-allure - Allure results
 *
 * @example
 * ```typescript
 * import { FactoryRegistry, RunEngine, gte, suite, testCase } from "@stepwise/core";
 * import { HttpAgent } from "@stepwise/agent-http";
 *
 * const registry = new FactoryRegistry();
 * registry.registerAgent({ interface: "rest", version: "2.4" }, () => new HttpAgent({ baseUrl: "http://localhost:3000" }));
 *
 * const login = testCase("login", (test) => {
 *   test.step("post credentials", {
 *     agent: "api",
 *     action: { type: "request", params: { method: "POST", path: "/login", expectStatus: 200 } },
 *   });
 * });
 *
 * const result = await new RunEngine(registry).run(
 *   { api: { interface: "rest", version: gte("2.3") } },
 *   suite("smoke", [login]),
 * );
 * ```
 */

// Constraints (predicates, signatures, specificity)
export * from "./constraints";
// Factory registry
export * from "./registry";
// Resolver and topology
export * from "./resolver";
// Agents and dispatch
export * from "./agents";
// Test tree (definitions, builders, nodes)
export * from "./testable";
// Aggregation and summaries
export * from "./aggregation";
// Progress events
export * from "./progress";
// Reporters
export * from "./recording";
// Run engine
export * from "./engine";
// Errors
export * from "./errors";
export { createDeferred, generateId, runWithConcurrency, sleep, toError, withTimeout } from "./utils";
export type { Deferred } from "./utils";
