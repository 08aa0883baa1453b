/**
 * HTTP Smoke Example
 *
 * Runs a small suite against a REST service. The topology asks for any API
 * version from 2.3; the registered 2.4 agent satisfies it.
 */

import { registerHttpAgent } from "@stepwise/agent-http";
import { ConsoleReporter, FactoryRegistry, gte, RunEngine, suite, testCase } from "@stepwise/core";
import { AllureReporter } from "@stepwise/reporter-allure";

const registry = new FactoryRegistry();
registerHttpAgent(registry, { version: "2.4" }, { baseUrl: "http://localhost:3000" }, { name: "rest-2.4" });

const topology = {
	api: { interface: "rest", version: gte("2.3") },
};

// =============================================================================
// Test Cases
// =============================================================================

const getUser = testCase("get user", (test) => {
	test.step("fetch user 1", {
		agent: "api",
		action: { type: "request", params: { method: "GET", path: "/users/1", expectStatus: 200 } },
		assert: (outcome) => outcome.message === "GET /users/1 -> 200",
	});
})
	.feature("Users")
	.severity("critical");

const createUser = testCase("create user", (test) => {
	test.step("post user", {
		agent: "api",
		action: {
			type: "request",
			params: { method: "POST", path: "/users", body: { name: "Bob" }, expectStatus: 201 },
		},
	});
	test.step("unknown user is missing", {
		agent: "api",
		action: { type: "request", params: { method: "GET", path: "/users/999", expectStatus: 200 } },
		expect: "failed",
	});
})
	.before((test) => {
		test.step("health", {
			agent: "api",
			action: { type: "request", params: { method: "GET", path: "/health", expectStatus: 200 } },
		});
	})
	.feature("Users")
	.tags("write");

// Run tests
async function main() {
	const engine = new RunEngine(registry, { stepTimeout: 5000 });
	const handle = engine.submit(topology, suite("users", [getUser, createUser], { concurrency: 2 }), {
		reporters: [new ConsoleReporter({ verbose: true }), new AllureReporter({ resultsDir: "allure-results" })],
	});

	const result = await handle.await();
	process.exitCode = result.status === "passed" ? 0 : 1;
}

main().catch(console.error);
