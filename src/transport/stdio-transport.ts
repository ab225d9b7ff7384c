import { spawn, type SpawnOptions } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { loadConfig } from "../config.js";
import type {
  ClientConfig,
  JsonRpcRequest,
  RequestTransport,
  TransportResult,
} from "../types/index.js";

// Time between SIGTERM and SIGKILL once the timeout has fired
const KILL_GRACE_MS = 2_000;

/**
 * The parts of a child process the transport touches
 */
export interface ServerProcess {
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): unknown;
}

export type SpawnServer = (
  command: string,
  args: string[],
  options: SpawnOptions
) => ServerProcess;

const spawnServer: SpawnServer = (command, args, options) =>
  spawn(command, args, options);

/**
 * Raised when the server process cannot be started
 */
export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * Raised when the server has not exited within the configured timeout.
 * Carries whatever output was collected before the process was killed.
 */
export class TransportTimeoutError extends TransportError {
  constructor(
    readonly timeoutMs: number,
    readonly stdout: string,
    readonly stderr: string
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for the MCP server`);
    this.name = "TransportTimeoutError";
  }
}

/**
 * Delivers one request per server process over stdin/stdout
 */
export class StdioTransport implements RequestTransport {
  private readonly config: ClientConfig;
  private readonly spawnServer: SpawnServer;

  constructor(config: ClientConfig, spawnFn: SpawnServer = spawnServer) {
    this.config = config;
    this.spawnServer = spawnFn;
  }

  /**
   * Start the server, write the request, close stdin and collect output
   * until the process closes or the timeout fires.
   */
  send(request: JsonRpcRequest): Promise<TransportResult> {
    const { command, args, cwd, timeoutMs } = this.config;

    return new Promise<TransportResult>((resolve, reject) => {
      let stdout = "";
      let stderr = "";
      let settled = false;
      let closed = false;

      const child = this.spawnServer(command, args, {
        cwd,
        env: process.env,
        stdio: ["pipe", "pipe", "pipe"],
      });

      const timer = setTimeout(() => {
        settled = true;
        child.kill("SIGTERM");
        setTimeout(() => {
          if (!closed) child.kill("SIGKILL");
        }, KILL_GRACE_MS).unref();
        reject(new TransportTimeoutError(timeoutMs, stdout, stderr));
      }, timeoutMs);

      child.stdout?.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on("error", (error: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(
          new TransportError(
            `Failed to start MCP server "${[command, ...args].join(" ")}": ${error.message}`
          )
        );
      });

      child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
        closed = true;
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({ stdout, stderr, exitCode: code, signal });
      });

      // The server may exit before reading its input
      child.stdin?.on("error", (error: Error) => {
        stderr += `\n[stdin] ${error.message}`;
      });
      child.stdin?.end(JSON.stringify(request) + "\n");
    });
  }
}

/**
 * Create a stdio transport from environment variables
 */
export function createTransportFromEnv(
  env: NodeJS.ProcessEnv = process.env
): StdioTransport {
  return new StdioTransport(loadConfig(env));
}
