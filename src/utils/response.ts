import { z } from "zod";
import type { JsonRpcErrorObject, ParsedResponse } from "../types/index.js";

const responseErrorSchema = z.object({
  error: z.object({
    code: z.number(),
    message: z.string(),
    data: z.unknown().optional(),
  }),
});

/**
 * Interpret the first non-blank line of the server's stdout as JSON.
 * The value itself is not validated.
 */
export function parseResponse(stdout: string): ParsedResponse {
  const line = stdout
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l.length > 0);

  if (line === undefined) {
    return { kind: "empty" };
  }

  try {
    return { kind: "json", value: JSON.parse(line) };
  } catch {
    return { kind: "invalid", raw: stdout.trim() };
  }
}

/**
 * Heuristic used to decide whether server stderr is worth showing
 */
export function stderrHasError(stderr: string): boolean {
  return stderr.toLowerCase().includes("error");
}

/**
 * Extract the JSON-RPC error member of a response, if it has one
 */
export function responseErrorOf(value: unknown): JsonRpcErrorObject | undefined {
  const result = responseErrorSchema.safeParse(value);
  return result.success ? result.data.error : undefined;
}
