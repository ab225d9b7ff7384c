import { z } from "zod";
import type { ClientConfig } from "./types/index.js";

export const DEFAULT_SERVER_COMMAND = "cargo run --release";
export const DEFAULT_TIMEOUT_MS = 30_000;

// setTimeout fires immediately above this
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Environment variables read by the client
 */
const envSchema = z.object({
  MCP_SERVER_COMMAND: z
    .string()
    .trim()
    .min(1, "MCP_SERVER_COMMAND must not be empty")
    .default(DEFAULT_SERVER_COMMAND),
  MCP_SERVER_CWD: z.string().min(1).optional(),
  MCP_TIMEOUT_MS: z.coerce
    .number()
    .int("MCP_TIMEOUT_MS must be an integer")
    .positive("MCP_TIMEOUT_MS must be positive")
    .max(MAX_TIMER_MS, "MCP_TIMEOUT_MS must fit a 32-bit timer")
    .default(DEFAULT_TIMEOUT_MS),
});

/**
 * Load client settings from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const [command, ...args] = result.data.MCP_SERVER_COMMAND.split(/\s+/);
  return {
    command,
    args,
    cwd: result.data.MCP_SERVER_CWD,
    timeoutMs: result.data.MCP_TIMEOUT_MS,
  };
}
