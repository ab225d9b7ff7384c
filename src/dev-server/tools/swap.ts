import { formatUnits, parseUnits, zeroAddress, type Address } from "viem";
import { z } from "zod";
import {
  parseAmount,
  requireAddress,
  requireToken,
  type Market,
} from "../market.js";

// Gas reported when no node is available to estimate against
const DEFAULT_SWAP_GAS = 300_000n;

/**
 * Schema for swap_tokens tool parameters
 */
export const swapTokensSchema = z.object({
  from_token: z.string().describe("Source token address. Zero address for ETH."),
  to_token: z.string().describe("Destination token address"),
  amount: z.string().describe("Amount to swap in token units (e.g., \"1.5\")"),
  slippage_bps: z
    .number()
    .int()
    .min(0)
    .max(10_000)
    .optional()
    .default(50)
    .describe("Slippage tolerance in basis points (e.g., 50 = 0.5%). Default: 50"),
  wallet_address: z.string().describe("Wallet address for simulation (0x...)"),
});

export type SwapTokensParams = z.infer<typeof swapTokensSchema>;

export const swapTokensTool = {
  name: "swap_tokens",
  description:
    "Simulate a token swap. Returns estimated output and gas costs without executing.",
  inputSchema: {
    type: "object" as const,
    properties: {
      from_token: {
        type: "string",
        description:
          "Source token address (0x...). Use 0x0000000000000000000000000000000000000000 for ETH.",
      },
      to_token: {
        type: "string",
        description: "Destination token address (0x...)",
      },
      amount: {
        type: "string",
        description: "Amount to swap (in token units, e.g., '1.5' for 1.5 tokens)",
      },
      slippage_bps: {
        type: "number",
        description: "Slippage tolerance in basis points (e.g., 50 = 0.5%). Default: 50",
        default: 50,
      },
      wallet_address: {
        type: "string",
        description: "Wallet address for simulation (0x...)",
      },
    },
    required: ["from_token", "to_token", "amount", "wallet_address"],
  },
};

/**
 * Direct route between the two tokens. Native ETH trades as WETH.
 */
export function buildSwapPath(from: Address, to: Address, weth: Address): Address[] {
  const unwrap = (address: Address) =>
    address.toLowerCase() === zeroAddress ? weth : address;
  return [unwrap(from), unwrap(to)];
}

/**
 * Handle swap_tokens tool call
 */
export function handleSwapTokens(market: Market, params: SwapTokensParams): string {
  const from = requireToken(market, params.from_token, "from_token address");
  const to = requireToken(market, params.to_token, "to_token address");
  requireAddress(params.wallet_address, "wallet address");

  const amountIn = parseAmount(params.amount, from.decimals);
  if (amountIn === 0n) {
    throw new Error("Invalid amount: must be greater than zero");
  }

  // Value in USD with 18 decimals, then into the target token's base units
  const valueUsd = (amountIn * parseUnits(from.priceUsd, 18)) / 10n ** BigInt(from.decimals);
  const estimated = (valueUsd * 10n ** BigInt(to.decimals)) / parseUnits(to.priceUsd, 18);
  const minimum = (estimated * BigInt(10_000 - params.slippage_bps)) / 10_000n;

  const route = buildSwapPath(from.address, to.address, market.weth);

  return [
    "Swap Simulation:",
    `From: ${params.from_token}`,
    `To: ${params.to_token}`,
    `Amount In: ${params.amount}`,
    `Estimated Output: ${formatUnits(estimated, to.decimals)} ${to.symbol}`,
    `Minimum Output (with slippage): ${formatUnits(minimum, to.decimals)} ${to.symbol}`,
    `Estimated Gas: ${DEFAULT_SWAP_GAS}`,
    `Slippage Tolerance: ${params.slippage_bps} bps (${params.slippage_bps / 100}%)`,
    `Route: ${route.join(" -> ")}`,
  ].join("\n");
}
