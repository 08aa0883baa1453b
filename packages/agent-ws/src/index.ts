/**
 * @stepwise/agent-ws
 *
 * WebSocket agent for the stepwise engine.
 */

export * from "./ws.types";
export * from "./ws-agent";
