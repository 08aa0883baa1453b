/**
 * HTTP Agent Types
 */

/**
 * HTTP agent options
 */
export interface HttpAgentOptions {
	/** Base URL, e.g. "http://localhost:3000" */
	baseUrl: string;
	/** Default headers */
	headers?: Record<string, string>;
}

export type QueryValue = string | number | boolean;

/**
 * Params of a "request" action
 */
export interface HttpRequestParams {
	/** HTTP method (GET, POST, PUT, DELETE, etc.) */
	method: string;
	/** URL path */
	path: string;
	headers?: Record<string, string>;
	query?: Record<string, QueryValue>;
	/** Request body, sent as JSON */
	body?: unknown;
	/** Accepted status code(s); anything else fails the step */
	expectStatus?: number | number[];
}

/**
 * Captured HTTP response (outcome data)
 */
export interface HttpResponseData {
	status: number;
	headers: Record<string, string>;
	body: unknown;
}
