/**
 * Allure Reporter Integration Tests
 *
 * Runs the engine with the reporter attached and verifies the JSON written
 * to a temporary results directory.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { Action, ActionOutcome, Agent } from "@stepwise/core";
import { FactoryRegistry, RunEngine, suite, testCase } from "@stepwise/core";
import { AllureReporter, FileSystemWriter, LabelName, Status } from "@stepwise/reporter-allure";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

class ScriptedAgent implements Agent {
	readonly kind = "scripted";

	async execute(action: Action): Promise<ActionOutcome> {
		if (action.type === "deny") {
			return { status: "failed", message: "access denied" };
		}
		return { data: { token: "test-token" }, message: "ok" };
	}

	cancel(): void {}
}

interface WrittenResult {
	uuid: string;
	name: string;
	fullName: string;
	status: string;
	statusDetails: { message?: string };
	labels: Array<{ name: string; value: string }>;
	steps: Array<{ name: string; steps: Array<{ name: string; parameters: Array<{ name: string; value: string }> }> }>;
}

interface WrittenContainer {
	name: string;
	children: string[];
}

function readJson<T>(file: string): T {
	return JSON.parse(fs.readFileSync(file, "utf-8"));
}

describe("AllureReporter", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "allure-test-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	const files = (suffix: string) =>
		fs
			.readdirSync(tempDir)
			.filter((file) => file.endsWith(suffix))
			.map((file) => path.join(tempDir, file));

	const runWith = async (reporter: AllureReporter) => {
		const registry = new FactoryRegistry();
		registry.registerAgent({ interface: "scripted" }, () => new ScriptedAgent());

		const login = testCase("login", (test) => {
			test.step("post credentials", { agent: "api", action: { type: "login" } });
		}).epic("Auth");
		const admin = testCase("admin", (test) => {
			test.step("open admin", { agent: "api", action: { type: "deny" } });
		});

		return new RunEngine(registry).run({ api: { interface: "scripted" } }, suite("api", [login, admin]), {
			reporters: [reporter],
		});
	};

	it("should default the results directory", () => {
		expect(new AllureReporter().getOptions().resultsDir).toBe("allure-results");
	});

	it("should write one result per case and a container", async () => {
		const reporter = new AllureReporter({ includeOutcomeData: "parameters" }, new FileSystemWriter(tempDir));
		await runWith(reporter);

		const results = files("-result.json").map((file) => readJson<WrittenResult>(file));
		expect(results).toHaveLength(2);

		const login = results.find((result) => result.name === "login");
		const admin = results.find((result) => result.name === "admin");

		expect(login?.status).toBe(Status.PASSED);
		expect(login?.fullName).toBe("api/login");
		expect(login?.labels).toContainEqual({ name: LabelName.EPIC, value: "Auth" });
		expect(login?.labels).toContainEqual({ name: LabelName.SUITE, value: "api" });
		expect(login?.steps[0].name).toBe("main");
		expect(login?.steps[0].steps[0].name).toBe("post credentials");
		expect(login?.steps[0].steps[0].parameters).toContainEqual({
			name: "data",
			value: '{\n  "token": "test-token"\n}',
		});

		expect(admin?.status).toBe(Status.FAILED);
		expect(admin?.statusDetails.message).toBe("access denied");

		const containers = files("-container.json").map((file) => readJson<WrittenContainer>(file));
		expect(containers).toHaveLength(1);
		expect(containers[0].name).toBe("api");
		expect([...containers[0].children].sort()).toEqual([...reporter.getWrittenUuids()].sort());
		expect(containers[0].children).toHaveLength(2);
	});

	it("should write environment.properties with run status", async () => {
		const reporter = new AllureReporter({ environmentInfo: { env: "staging" } }, new FileSystemWriter(tempDir));
		await runWith(reporter);

		const content = fs.readFileSync(path.join(tempDir, "environment.properties"), "utf-8");
		expect(content).toBe("env=staging\nrun.status=failed\nrun.cases=2");
	});

	it("should write outcome data attachments", async () => {
		const reporter = new AllureReporter({ includeOutcomeData: "attachments" }, new FileSystemWriter(tempDir));
		await runWith(reporter);

		const attachments = files("-attachment.json");
		expect(attachments).toHaveLength(1);
		expect(readJson<unknown>(attachments[0])).toEqual({ token: "test-token" });
	});

	it("should write a container when the run fails", async () => {
		const reporter = new AllureReporter({}, new FileSystemWriter(tempDir));
		const registry = new FactoryRegistry();

		const run = new RunEngine(registry).run(
			{ api: { interface: "missing" } },
			suite("broken", [testCase("never", (test) => test.step("noop", { agent: "api", action: { type: "noop" } }))]),
			{ reporters: [reporter] },
		);

		await expect(run).rejects.toThrow();

		const containers = files("-container.json").map((file) => readJson<WrittenContainer>(file));
		expect(containers).toEqual([expect.objectContaining({ name: "broken", children: [] })]);
		expect(files("-result.json")).toEqual([]);
	});
});
