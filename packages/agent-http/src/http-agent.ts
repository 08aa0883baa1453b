/**
 * HTTP Agent
 *
 * REST agent built on fetch. Supports one action type:
 *
 * ```typescript
 * { type: "request", params: { method: "GET", path: "/users/1", expectStatus: 200 } }
 * ```
 *
 * The outcome data is the captured response. A status outside `expectStatus`
 * fails the step; network errors are agent faults.
 */

import type { Action, ActionOutcome, Agent, ConstraintSetInput, ExecuteOptions, Factory, FactoryOptions, FactoryRegistry } from "@stepwise/core";
import type { HttpAgentOptions, HttpRequestParams, HttpResponseData, QueryValue } from "./http.types";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isQueryValue(value: unknown): value is QueryValue {
	return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function stringRecord(name: string, value: unknown): Record<string, string> | undefined {
	if (value === undefined) return undefined;
	if (!isRecord(value)) {
		throw new Error(`HTTP request ${name} must be an object`);
	}
	const record: Record<string, string> = {};
	for (const [key, entry] of Object.entries(value)) {
		if (typeof entry !== "string") {
			throw new Error(`HTTP request ${name}.${key} must be a string`);
		}
		record[key] = entry;
	}
	return record;
}

function queryRecord(value: unknown): Record<string, QueryValue> | undefined {
	if (value === undefined) return undefined;
	if (!isRecord(value)) {
		throw new Error("HTTP request query must be an object");
	}
	const record: Record<string, QueryValue> = {};
	for (const [key, entry] of Object.entries(value)) {
		if (!isQueryValue(entry)) {
			throw new Error(`HTTP request query.${key} must be a string, number or boolean`);
		}
		record[key] = entry;
	}
	return record;
}

function expectedStatus(value: unknown): number | number[] | undefined {
	if (value === undefined || typeof value === "number") return value;
	if (Array.isArray(value) && value.every((code) => typeof code === "number")) {
		return value.map(Number);
	}
	throw new Error("HTTP request expectStatus must be a number or an array of numbers");
}

/**
 * Validate the params of a "request" action
 */
export function parseRequestParams(params: Record<string, unknown> | undefined): HttpRequestParams {
	const method = params?.method;
	const path = params?.path;

	if (typeof method !== "string" || !method) {
		throw new Error("HTTP request requires a method");
	}
	if (typeof path !== "string") {
		throw new Error("HTTP request requires a path");
	}

	return {
		method: method.toUpperCase(),
		path,
		headers: stringRecord("headers", params?.headers),
		query: queryRecord(params?.query),
		body: params?.body,
		expectStatus: expectedStatus(params?.expectStatus),
	};
}

/**
 * Build the request URL from base URL, path and query
 */
export function buildUrl(baseUrl: string, path: string, query?: Record<string, QueryValue>): string {
	const url = `${baseUrl.replace(/\/+$/, "")}${path.startsWith("/") ? path : `/${path}`}`;
	if (!query || Object.keys(query).length === 0) {
		return url;
	}
	const search = new URLSearchParams();
	for (const [key, value] of Object.entries(query)) {
		search.append(key, String(value));
	}
	return `${url}?${search.toString()}`;
}

export class HttpAgent implements Agent {
	readonly kind = "rest";
	private inflight = new Set<AbortController>();
	private requestCount = 0;

	constructor(private readonly options: HttpAgentOptions) {}

	/**
	 * Number of requests sent so far
	 */
	get requests(): number {
		return this.requestCount;
	}

	async execute(action: Action, options: ExecuteOptions): Promise<ActionOutcome<HttpResponseData>> {
		if (action.type !== "request") {
			throw new Error(`Unsupported action type: ${action.type}`);
		}
		const params = parseRequestParams(action.params);

		const controller = new AbortController();
		const onAbort = () => controller.abort();
		options.signal.addEventListener("abort", onAbort, { once: true });
		this.inflight.add(controller);

		const init: RequestInit = {
			method: params.method,
			headers: {
				"Content-Type": "application/json",
				...this.options.headers,
				...params.headers,
			},
			signal: controller.signal,
		};
		if (params.body !== undefined) {
			init.body = JSON.stringify(params.body);
		}

		try {
			this.requestCount++;
			const response = await fetch(buildUrl(this.options.baseUrl, params.path, params.query), init);
			const data = await this.readResponse(response);
			return this.verdict(params, data);
		} finally {
			options.signal.removeEventListener("abort", onAbort);
			this.inflight.delete(controller);
		}
	}

	/**
	 * Abort every in-flight request
	 */
	cancel(): void {
		for (const controller of this.inflight) {
			controller.abort();
		}
		this.inflight.clear();
	}

	dispose(): void {
		this.cancel();
	}

	private async readResponse(response: Response): Promise<HttpResponseData> {
		const headers: Record<string, string> = {};
		response.headers.forEach((value, key) => {
			headers[key] = value;
		});

		let body: unknown;
		const contentType = response.headers.get("content-type");
		if (contentType?.includes("application/json")) {
			body = await response.json();
		} else {
			const text = await response.text();
			body = text.length > 0 ? text : undefined;
		}

		return { status: response.status, headers, body };
	}

	private verdict(params: HttpRequestParams, data: HttpResponseData): ActionOutcome<HttpResponseData> {
		const request = `${params.method} ${params.path}`;
		if (params.expectStatus === undefined) {
			return { data, message: `${request} -> ${data.status}` };
		}

		const accepted = Array.isArray(params.expectStatus) ? params.expectStatus : [params.expectStatus];
		if (accepted.includes(data.status)) {
			return { data, message: `${request} -> ${data.status}` };
		}
		return {
			status: "failed",
			data,
			message: `${request}: expected status ${accepted.join(" or ")}, got ${data.status}`,
		};
	}
}

/**
 * Register an HTTP agent factory. One agent is created per run and binding.
 */
export function registerHttpAgent(
	registry: FactoryRegistry,
	constraints: ConstraintSetInput,
	options: HttpAgentOptions,
	factoryOptions?: FactoryOptions,
): Factory<HttpAgent> {
	return registry.registerAgent({ interface: "rest", ...constraints }, () => new HttpAgent(options), factoryOptions);
}
