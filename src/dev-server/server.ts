import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";

import { DEFAULT_MARKET, type Market } from "./market.js";
import {
  getBalanceSchema,
  getBalanceTool,
  handleGetBalance,
} from "./tools/balance.js";
import {
  getTokenPriceSchema,
  getTokenPriceTool,
  handleGetTokenPrice,
} from "./tools/price.js";
import {
  handleSwapTokens,
  swapTokensSchema,
  swapTokensTool,
} from "./tools/swap.js";

/**
 * Tool definitions for the dev server
 */
export const TOOLS = [getBalanceTool, getTokenPriceTool, swapTokensTool];

// JSON-RPC server error for a tool that failed while running
const TOOL_FAILED = -32000;

function parseParams<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw new McpError(ErrorCode.InvalidParams, `Invalid parameters: ${result.error.message}`);
  }
  return result.data;
}

function runTool(handler: () => string) {
  try {
    return { content: [{ type: "text" as const, text: handler() }] };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new McpError(TOOL_FAILED, message);
  }
}

/**
 * Create an MCP server that answers the trading tools from fixed market data
 */
export function createDevServer(market: Market = DEFAULT_MARKET): Server {
  const server = new Server(
    {
      name: "eth-trade-dev-server",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    switch (name) {
      case "get_balance": {
        const params = parseParams(getBalanceSchema, args);
        return runTool(() => handleGetBalance(market, params));
      }
      case "get_token_price": {
        const params = parseParams(getTokenPriceSchema, args);
        return runTool(() => handleGetTokenPrice(market, params));
      }
      case "swap_tokens": {
        const params = parseParams(swapTokensSchema, args);
        return runTool(() => handleSwapTokens(market, params));
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  });

  return server;
}

/**
 * Run the dev server with stdio transport
 */
export async function runDevServer(): Promise<void> {
  const server = createDevServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // stdout carries the protocol
  console.error("eth-trade dev server ready on stdio");

  process.on("SIGINT", async () => {
    await server.close();
    process.exit(0);
  });
}
