/**
 * WebSocket Agent Types
 */

/**
 * JSON message exchanged over the socket. `type` routes waiters.
 */
export interface WsMessage {
	type: string;
	[key: string]: unknown;
}

/**
 * WebSocket agent options
 */
export interface WsAgentOptions {
	/** Server URL, e.g. "ws://localhost:8080/events" */
	url: string;
	/** Connection timeout in ms (default: 5000) */
	connectionTimeout?: number;
}

/**
 * Action types understood by the agent
 *
 * - connect: open the socket (done lazily by every other action)
 * - send: send `params.message`
 * - waitFor: wait for a message of `params.type`, optionally matching `params.match`
 * - request: send `params.message`, then wait for `params.responseType`
 * - close: close the socket
 */
export type WsActionType = "connect" | "send" | "waitFor" | "request" | "close";
