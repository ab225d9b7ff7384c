import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { zeroAddress } from "viem";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_MARKET } from "../src/dev-server/market.js";
import { createDevServer } from "../src/dev-server/server.js";
import { handleGetBalance } from "../src/dev-server/tools/balance.js";
import { handleGetTokenPrice } from "../src/dev-server/tools/price.js";
import {
  buildSwapPath,
  handleSwapTokens,
  swapTokensSchema,
} from "../src/dev-server/tools/swap.js";

const WALLET = "0x70997970C51812dc3A010C7d01b50e0d17dc79C8";
const EMPTY_WALLET = "0x1111111111111111111111111111111111111111";
const WETH = "0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2";
const USDC = "0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48";
const DAI = "0x6B175474E89094C44Da98b954EedeAC495271d0F";

describe("get_balance", () => {
  it("returns the ETH balance by default", () => {
    expect(handleGetBalance(DEFAULT_MARKET, { wallet_address: WALLET })).toBe(
      [
        "Balance: 1.5 ETH",
        "Decimals: 18",
        `Wallet: ${WALLET}`,
        "Raw balance: 1500000000000000000",
      ].join("\n")
    );
  });

  it("returns an ERC20 balance for a lowercase token address", () => {
    const text = handleGetBalance(DEFAULT_MARKET, {
      wallet_address: WALLET.toLowerCase(),
      token_address: USDC.toLowerCase(),
    });
    expect(text.split("\n")).toEqual([
      "Balance: 2500 USDC",
      "Decimals: 6",
      `Wallet: ${WALLET.toLowerCase()}`,
      "Raw balance: 2500000000",
    ]);
  });

  it("reports zero for unknown wallets", () => {
    const text = handleGetBalance(DEFAULT_MARKET, { wallet_address: EMPTY_WALLET });
    expect(text.split("\n")[0]).toBe("Balance: 0 ETH");
  });

  it("rejects malformed addresses", () => {
    expect(() => handleGetBalance(DEFAULT_MARKET, { wallet_address: "0x123" })).toThrow(
      "Invalid wallet address: 0x123"
    );
    expect(() =>
      handleGetBalance(DEFAULT_MARKET, { wallet_address: WALLET, token_address: "usdc" })
    ).toThrow("Invalid token address: usdc");
  });
});

describe("get_token_price", () => {
  it("prices a token in USD and ETH", () => {
    expect(handleGetTokenPrice(DEFAULT_MARKET, { token_address: USDC }).split("\n")).toEqual([
      `Token: ${USDC}`,
      "Price (USD): 1",
      "Price (ETH): 0.000333333333333333",
      "Source: fixture",
    ]);
  });

  it("treats the zero address as ETH", () => {
    const lines = handleGetTokenPrice(DEFAULT_MARKET, { token_address: zeroAddress }).split("\n");
    expect(lines[1]).toBe("Price (USD): 3000");
    expect(lines[2]).toBe("Price (ETH): 1");
  });

  it("rejects tokens the market does not list", () => {
    expect(() => handleGetTokenPrice(DEFAULT_MARKET, { token_address: EMPTY_WALLET })).toThrow(
      `Unsupported token: ${EMPTY_WALLET}`
    );
  });
});

describe("swap_tokens", () => {
  it("defaults slippage to 50 bps", () => {
    const params = swapTokensSchema.parse({
      from_token: zeroAddress,
      to_token: USDC,
      amount: "0.1",
      wallet_address: WALLET,
    });
    expect(params.slippage_bps).toBe(50);
  });

  it("simulates ETH to USDC with ETH read as WETH", () => {
    const text = handleSwapTokens(DEFAULT_MARKET, {
      from_token: zeroAddress,
      to_token: USDC,
      amount: "0.1",
      wallet_address: WALLET,
      slippage_bps: 50,
    });
    expect(text.split("\n")).toEqual([
      "Swap Simulation:",
      `From: ${zeroAddress}`,
      `To: ${USDC}`,
      "Amount In: 0.1",
      "Estimated Output: 300 USDC",
      "Minimum Output (with slippage): 298.5 USDC",
      "Estimated Gas: 300000",
      "Slippage Tolerance: 50 bps (0.5%)",
      `Route: ${WETH} -> ${USDC}`,
    ]);
  });

  it("routes token to token swaps directly", () => {
    const lines = handleSwapTokens(DEFAULT_MARKET, {
      from_token: USDC,
      to_token: DAI,
      amount: "250",
      wallet_address: WALLET,
      slippage_bps: 100,
    }).split("\n");
    expect(lines[4]).toBe("Estimated Output: 250 DAI");
    expect(lines[5]).toBe("Minimum Output (with slippage): 247.5 DAI");
    expect(lines[6]).toBe("Estimated Gas: 300000");
    expect(lines[8]).toBe(`Route: ${USDC} -> ${DAI}`);
  });

  it("rejects unparseable and zero amounts", () => {
    const base = { from_token: USDC, to_token: DAI, wallet_address: WALLET, slippage_bps: 50 };
    expect(() => handleSwapTokens(DEFAULT_MARKET, { ...base, amount: "lots" })).toThrow(
      "Invalid amount: lots"
    );
    expect(() => handleSwapTokens(DEFAULT_MARKET, { ...base, amount: "0" })).toThrow(
      "Invalid amount: must be greater than zero"
    );
  });

  it("builds paths the way the router expects", () => {
    expect(buildSwapPath(USDC, zeroAddress, WETH)).toEqual([USDC, WETH]);
    expect(buildSwapPath(USDC, DAI, WETH)).toEqual([USDC, DAI]);
    expect(buildSwapPath(zeroAddress, WETH, WETH)).toEqual([WETH, WETH]);
  });
});

describe("dev server over MCP", () => {
  let client: Client;

  beforeEach(async () => {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await createDevServer().connect(serverTransport);
    client = new Client({ name: "dev-server-test", version: "1.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
  });

  async function callText(name: string, args: Record<string, unknown>) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    if (first?.type !== "text") throw new Error("expected text content");
    return { text: first.text, isError: result.isError };
  }

  it("lists the three trading tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name)).toEqual([
      "get_balance",
      "get_token_price",
      "swap_tokens",
    ]);
  });

  it("answers tool calls with text content", async () => {
    const { text, isError } = await callText("get_token_price", { token_address: zeroAddress });
    expect(isError).toBeFalsy();
    expect(text.split("\n")[0]).toBe(`Token: ${zeroAddress}`);
  });

  it("answers an unknown tool with method not found", async () => {
    const call = client.callTool({ name: "bridge_tokens", arguments: {} });
    await expect(call).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
    await expect(call).rejects.toThrow("Unknown tool: bridge_tokens");
  });

  it("answers missing parameters with invalid params", async () => {
    const call = client.callTool({ name: "get_token_price", arguments: {} });
    await expect(call).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    await expect(call).rejects.toThrow("Invalid parameters:");
  });

  it("answers handler failures with a server error", async () => {
    const call = client.callTool({ name: "get_balance", arguments: { wallet_address: "0xnope" } });
    await expect(call).rejects.toMatchObject({ code: -32000 });
    await expect(call).rejects.toThrow("Invalid wallet address: 0xnope");
  });
});
