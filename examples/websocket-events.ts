/**
 * WebSocket Events Example
 *
 * Subscribes to a feed and waits for a specific event. Progress is read from
 * the run's event stream instead of a reporter.
 */

import { registerWsAgent } from "@stepwise/agent-ws";
import { FactoryRegistry, RunEngine, testCase } from "@stepwise/core";

const registry = new FactoryRegistry();
registerWsAgent(registry, { version: "1.0" }, { url: "ws://localhost:8080" });

const feed = testCase("price feed", (test) => {
	test.step("subscribe", {
		agent: "feed",
		action: { type: "send", params: { message: { type: "subscribe", symbol: "ACME" } } },
	});
	test.step("receive update", {
		agent: "feed",
		action: { type: "waitFor", params: { type: "price", match: { symbol: "ACME" } } },
		timeout: 2000,
	});
	test.step("ping", {
		agent: "feed",
		action: { type: "request", params: { message: { type: "ping" }, responseType: "pong" } },
	});
});

async function main() {
	const handle = new RunEngine(registry).submit({ feed: { interface: "ws" } }, feed);

	for await (const event of handle.events.stream()) {
		if (event.type === "transition" && event.result && event.kind === "step") {
			console.log(`#${event.seq} ${event.nodeId}: ${event.result.status}`);
		} else if (event.type === "run-error") {
			console.error(`Run failed: ${event.error.message}`);
		}
	}

	const result = await handle.await();
	console.log(`Done: ${result.status}`);
}

main().catch(console.error);
