import { vi } from "vitest";
import type {
  JsonRpcRequest,
  Printer,
  TransportResult,
} from "../src/types/index.js";

export interface CapturedOutput {
  logs: string[];
  errors: string[];
  printer: Printer;
}

export function captureOutput(): CapturedOutput {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    printer: {
      log: (message) => {
        logs.push(message);
      },
      error: (message) => {
        errors.push(message);
      },
    },
  };
}

export function result(partial: Partial<TransportResult> = {}): TransportResult {
  return { stdout: "", stderr: "", exitCode: 0, signal: null, ...partial };
}

/**
 * Transport stand-in that answers every request with the given result
 */
export function stubTransport(answer: TransportResult = result()) {
  const send = vi.fn(async (_request: JsonRpcRequest) => answer);
  return { send };
}
