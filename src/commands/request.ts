import type { JsonRpcRequest } from "../types/index.js";

/**
 * Build a JSON-RPC 2.0 request. Every invocation talks to a fresh
 * server process, so the id never changes.
 */
export function createRequest(
  method: string,
  params: Record<string, unknown> = {}
): JsonRpcRequest {
  return { jsonrpc: "2.0", id: 1, method, params };
}

/**
 * Build a tools/call request
 */
export function toolCall(
  name: string,
  args: Record<string, unknown>
): JsonRpcRequest {
  return createRequest("tools/call", { name, arguments: args });
}
