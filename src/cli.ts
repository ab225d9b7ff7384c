import { COMMANDS, findCommand } from "./commands/index.js";
import {
  createTransportFromEnv,
  TransportTimeoutError,
} from "./transport/stdio-transport.js";
import type {
  Printer,
  RequestTransport,
  TransportResult,
} from "./types/index.js";
import {
  parseResponse,
  responseErrorOf,
  stderrHasError,
} from "./utils/response.js";

export const CLI_NAME = "eth-trade-mcp-client";

const RULE = "=".repeat(60);

export interface CliOptions {
  /** Defaults to a stdio transport configured from `env` */
  transport?: RequestTransport;
  printer?: Printer;
  env?: NodeJS.ProcessEnv;
}

const consolePrinter: Printer = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function usageLines(): string[] {
  return [
    "Usage examples:",
    ...COMMANDS.map((command) => `  ${CLI_NAME} ${command.usage}`),
  ];
}

/**
 * Print what the server sent back. Returns the exit code.
 */
function printResult(result: TransportResult, out: Printer): number {
  const response = parseResponse(result.stdout);
  let exitCode = 1;

  switch (response.kind) {
    case "json": {
      out.log("← Response:");
      out.log(JSON.stringify(response.value, null, 2));
      exitCode = responseErrorOf(response.value) ? 1 : 0;
      break;
    }
    case "empty":
      out.log("No response received");
      break;
    case "invalid":
      out.log("No response received");
      out.log("Unparsed output:");
      out.log(response.raw);
      break;
  }

  // stderr is shown whatever stdout held
  if (stderrHasError(result.stderr)) {
    out.error("");
    out.error(`Errors: ${result.stderr}`);
  }

  return exitCode;
}

/**
 * Run one CLI invocation: `<command> [args...]`. Returns the exit code.
 */
export async function runCli(
  argv: string[],
  options: CliOptions = {}
): Promise<number> {
  const out = options.printer ?? consolePrinter;

  out.log(RULE);
  out.log("MCP Server Test Client");
  out.log(RULE);
  out.log("");

  if (argv.length === 0) {
    for (const line of usageLines()) out.log(line);
    return 0;
  }

  const [name, ...args] = argv;
  const command = findCommand(name);

  if (!command) {
    out.log(`Unknown command: ${name}`);
    out.log(`Run ${CLI_NAME} without arguments to list the commands.`);
    return 0;
  }

  if (args.length < command.requiredArgs) {
    out.log(`Usage: ${CLI_NAME} ${command.usage}`);
    out.log(`Example: ${CLI_NAME} ${command.example}`);
    return 0;
  }

  const request = command.build(args);

  let transport: RequestTransport;
  try {
    transport = options.transport ?? createTransportFromEnv(options.env);
  } catch (error) {
    out.error(messageOf(error));
    return 1;
  }

  out.log(`→ Request: ${JSON.stringify(request)}`);
  out.log("");

  let result: TransportResult;
  try {
    result = await transport.send(request);
  } catch (error) {
    out.error(messageOf(error));
    if (error instanceof TransportTimeoutError && error.stderr.trim()) {
      out.error("");
      out.error(`Server stderr: ${error.stderr}`);
    }
    return 1;
  }

  return printResult(result, out);
}
