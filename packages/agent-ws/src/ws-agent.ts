/**
 * WebSocket Agent
 *
 * Keeps one socket per binding. Incoming messages are queued in an inbox and
 * handed to waiters by message type, so a message that arrives before the
 * step waiting for it is not lost.
 */

import type { Action, ActionOutcome, Agent, ConstraintSetInput, ExecuteOptions, Factory, FactoryOptions, FactoryRegistry } from "@stepwise/core";
import { WebSocket, type RawData } from "ws";
import type { WsAgentOptions, WsMessage } from "./ws.types";

interface Waiter {
	type: string;
	match?: Record<string, unknown>;
	resolve: (message: WsMessage) => void;
	reject: (error: Error) => void;
}

type Reply = { reply: WsMessage } | { error: unknown };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check if a value is a routable message
 */
export function isWsMessage(value: unknown): value is WsMessage {
	return isRecord(value) && typeof value.type === "string";
}

/**
 * Check if every field of `match` equals the message field (JSON equality)
 */
export function matchesMessage(message: WsMessage, match?: Record<string, unknown>): boolean {
	if (!match) return true;
	return Object.entries(match).every(([key, value]) => JSON.stringify(message[key]) === JSON.stringify(value));
}

function decode(data: RawData): unknown {
	const text = Array.isArray(data)
		? Buffer.concat(data).toString("utf8")
		: data instanceof ArrayBuffer
			? Buffer.from(data).toString("utf8")
			: data.toString("utf8");
	return JSON.parse(text);
}

function requireString(params: Record<string, unknown> | undefined, key: string, actionType: string): string {
	const value = params?.[key];
	if (typeof value !== "string" || !value) {
		throw new Error(`WebSocket ${actionType} requires params.${key}`);
	}
	return value;
}

function requireMessage(params: Record<string, unknown> | undefined, actionType: string): WsMessage {
	const message = params?.message;
	if (!isWsMessage(message)) {
		throw new Error(`WebSocket ${actionType} requires params.message with a string type`);
	}
	return message;
}

function optionalMatch(params: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
	const match = params?.match;
	if (match === undefined) return undefined;
	if (!isRecord(match)) {
		throw new Error("WebSocket waitFor params.match must be an object");
	}
	return match;
}

export class WsAgent implements Agent {
	readonly kind = "ws";
	private socket?: WebSocket;
	private connecting?: Promise<WebSocket>;
	private inbox: WsMessage[] = [];
	private waiters = new Set<Waiter>();
	private lastError?: Error;

	constructor(private readonly options: WsAgentOptions) {}

	/**
	 * Last socket or decoding error
	 */
	get error(): Error | undefined {
		return this.lastError;
	}

	get isConnected(): boolean {
		return this.socket?.readyState === WebSocket.OPEN;
	}

	/**
	 * Messages received and not yet consumed
	 */
	get pending(): readonly WsMessage[] {
		return [...this.inbox];
	}

	async execute(action: Action, options: ExecuteOptions): Promise<ActionOutcome<WsMessage | undefined>> {
		switch (action.type) {
			case "connect":
				await this.connect();
				return { message: `connected to ${this.options.url}` };

			case "send": {
				const message = requireMessage(action.params, "send");
				await this.send(message);
				return { message: `sent ${message.type}` };
			}

			case "waitFor": {
				const type = requireString(action.params, "type", "waitFor");
				await this.connect();
				const message = await this.waitFor(type, optionalMatch(action.params), options.signal);
				return { data: message, message: `received ${message.type}` };
			}

			case "request": {
				const message = requireMessage(action.params, "request");
				const responseType = requireString(action.params, "responseType", "request");
				await this.connect();
				const reply = await this.request(message, responseType, optionalMatch(action.params), options.signal);
				return { data: reply, message: `${message.type} -> ${reply.type}` };
			}

			case "close":
				await this.close();
				return { message: "closed" };

			default:
				throw new Error(`Unsupported action type: ${action.type}`);
		}
	}

	/**
	 * Reject every waiter
	 */
	cancel(): void {
		this.rejectWaiters(new Error("WebSocket wait cancelled"));
	}

	async dispose(): Promise<void> {
		this.cancel();
		await this.close();
		this.inbox = [];
	}

	// =========================================================================
	// Connection
	// =========================================================================

	private connect(): Promise<WebSocket> {
		if (this.socket && this.socket.readyState === WebSocket.OPEN) {
			return Promise.resolve(this.socket);
		}
		this.connecting ??= this.open().finally(() => {
			this.connecting = undefined;
		});
		return this.connecting;
	}

	private open(): Promise<WebSocket> {
		const timeout = this.options.connectionTimeout ?? 5000;

		return new Promise((resolve, reject) => {
			const socket = new WebSocket(this.options.url);
			let timeoutId: NodeJS.Timeout | undefined;

			if (timeout > 0) {
				timeoutId = setTimeout(() => {
					socket.terminate();
					reject(new Error(`WebSocket connection timeout after ${timeout}ms`));
				}, timeout);
			}

			socket.on("open", () => {
				if (timeoutId) clearTimeout(timeoutId);
				this.socket = socket;
				resolve(socket);
			});

			socket.on("message", (data) => {
				this.handleIncomingMessage(data);
			});

			socket.on("close", () => {
				if (this.socket === socket) {
					this.socket = undefined;
					this.rejectWaiters(new Error("WebSocket closed"));
				}
			});

			socket.on("error", (err) => {
				if (timeoutId) clearTimeout(timeoutId);
				this.lastError = err;
				reject(err);
			});
		});
	}

	private async send(message: WsMessage): Promise<void> {
		const socket = await this.connect();
		await new Promise<void>((resolve, reject) => {
			socket.send(JSON.stringify(message), (error) => (error ? reject(error) : resolve()));
		});
	}

	private async close(): Promise<void> {
		const socket = this.socket;
		this.socket = undefined;
		if (!socket || socket.readyState === WebSocket.CLOSED) {
			return;
		}
		await new Promise<void>((resolve) => {
			socket.once("close", () => resolve());
			socket.close();
		});
	}

	// =========================================================================
	// Inbox
	// =========================================================================

	private handleIncomingMessage(data: RawData): void {
		let message: unknown;
		try {
			message = decode(data);
		} catch (error) {
			this.lastError = new Error(`Cannot decode WebSocket message: ${error instanceof Error ? error.message : String(error)}`);
			return;
		}
		if (!isWsMessage(message)) {
			this.lastError = new Error("WebSocket message without a string type");
			return;
		}

		for (const waiter of this.waiters) {
			if (waiter.type === message.type && matchesMessage(message, waiter.match)) {
				this.waiters.delete(waiter);
				waiter.resolve(message);
				return;
			}
		}
		this.inbox.push(message);
	}

	private waitFor(type: string, match: Record<string, unknown> | undefined, signal: AbortSignal): Promise<WsMessage> {
		const index = this.inbox.findIndex((message) => message.type === type && matchesMessage(message, match));
		if (index >= 0) {
			const [message] = this.inbox.splice(index, 1);
			return Promise.resolve(message);
		}

		return new Promise((resolve, reject) => {
			const onAbort = () => {
				this.waiters.delete(waiter);
				reject(new Error(`Stopped waiting for ${type}`));
			};
			const waiter: Waiter = {
				type,
				match,
				resolve: (message) => {
					signal.removeEventListener("abort", onAbort);
					resolve(message);
				},
				reject: (error) => {
					signal.removeEventListener("abort", onAbort);
					reject(error);
				},
			};
			if (signal.aborted) {
				onAbort();
				return;
			}
			signal.addEventListener("abort", onAbort, { once: true });
			this.waiters.add(waiter);
		});
	}

	/**
	 * Wait for the reply before sending, so a fast reply is not missed.
	 * If the send fails the waiter is dropped and a reply it already took
	 * goes back to the inbox.
	 */
	private async request(
		message: WsMessage,
		responseType: string,
		match: Record<string, unknown> | undefined,
		signal: AbortSignal,
	): Promise<WsMessage> {
		const waiting = new AbortController();
		const forward = () => waiting.abort();
		if (signal.aborted) {
			forward();
		} else {
			signal.addEventListener("abort", forward, { once: true });
		}

		try {
			const response: Promise<Reply> = this.waitFor(responseType, match, waiting.signal).then(
				(reply) => ({ reply }),
				(error: unknown) => ({ error }),
			);
			try {
				await this.send(message);
			} catch (error) {
				waiting.abort();
				const settled = await response;
				if ("reply" in settled) {
					this.inbox.unshift(settled.reply);
				}
				throw error;
			}

			const settled = await response;
			if ("error" in settled) {
				throw settled.error;
			}
			return settled.reply;
		} finally {
			signal.removeEventListener("abort", forward);
		}
	}

	private rejectWaiters(error: Error): void {
		const waiters = Array.from(this.waiters);
		this.waiters.clear();
		for (const waiter of waiters) {
			waiter.reject(error);
		}
	}
}

/**
 * Register a WebSocket agent factory
 */
export function registerWsAgent(
	registry: FactoryRegistry,
	constraints: ConstraintSetInput,
	options: WsAgentOptions,
	factoryOptions?: FactoryOptions,
): Factory<WsAgent> {
	return registry.registerAgent({ interface: "ws", ...constraints }, () => new WsAgent(options), factoryOptions);
}
