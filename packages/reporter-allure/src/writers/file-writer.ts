/**
 * FileSystem Writer
 *
 * Writes Allure result files into a results directory, created on first write.
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import type { TestResult, TestResultContainer } from "allure-js-commons";
import type { AllureWriter } from "./writer";

const MIME_TO_EXTENSION: Record<string, string> = {
	"application/json": "json",
	"text/plain": "txt",
	"text/html": "html",
	"text/csv": "csv",
	"application/xml": "xml",
	"text/xml": "xml",
};

export class FileSystemWriter implements AllureWriter {
	private created = false;

	constructor(private readonly resultsDir: string) {}

	writeTestResult(result: TestResult): void {
		this.write(`${result.uuid}-result.json`, JSON.stringify(result, null, 2));
	}

	writeContainer(container: TestResultContainer): void {
		this.write(`${container.uuid}-container.json`, JSON.stringify(container, null, 2));
	}

	writeEnvironment(info: Record<string, string>): void {
		const lines = Object.entries(info).map(([key, value]) => `${key}=${value}`);
		this.write("environment.properties", lines.join("\n"));
	}

	writeAttachment(_name: string, content: Buffer, mimeType: string): string {
		const filename = `${randomUUID()}-attachment.${MIME_TO_EXTENSION[mimeType] ?? "bin"}`;
		this.write(filename, content);
		return filename;
	}

	getResultsDir(): string {
		return this.resultsDir;
	}

	private write(filename: string, content: string | Buffer): void {
		if (!this.created) {
			fs.mkdirSync(this.resultsDir, { recursive: true });
			this.created = true;
		}
		fs.writeFileSync(path.join(this.resultsDir, filename), content);
	}
}
