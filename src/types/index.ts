// MCP client types

/**
 * JSON-RPC 2.0 request as written to the server's stdin.
 * The id is constant: one request per server process.
 */
export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: 1;
  method: string;
  params: Record<string, unknown>;
}

/**
 * Error member of a JSON-RPC 2.0 response
 */
export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * A CLI command that turns positional arguments into one request
 */
export interface Command {
  name: string;
  description: string;
  usage: string; // e.g. "balance <wallet_address> [token_address]"
  example: string;
  requiredArgs: number;
  build(args: string[]): JsonRpcRequest;
}

/**
 * Everything the server process produced before it closed
 */
export interface TransportResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Anything that can deliver a request and return the raw output
 */
export interface RequestTransport {
  send(request: JsonRpcRequest): Promise<TransportResult>;
}

/**
 * Settings for launching the MCP server
 */
export interface ClientConfig {
  command: string;
  args: string[];
  cwd?: string;
  timeoutMs: number;
}

/**
 * stdout of the server, interpreted
 */
export type ParsedResponse =
  | { kind: "empty" }
  | { kind: "invalid"; raw: string }
  | { kind: "json"; value: unknown };

/**
 * Line sink for everything the CLI prints
 */
export interface Printer {
  log(message: string): void;
  error(message: string): void;
}
