import { z } from "zod";
import type { Command, JsonRpcRequest } from "../types/index.js";
import { EXAMPLE_WALLET, NATIVE_ETH, USDC_MAINNET } from "./examples.js";
import { toolCall } from "./request.js";

/**
 * Slippage tolerance sent with every swap, in basis points (0.5%)
 */
export const SWAP_SLIPPAGE_BPS = 50;

/**
 * Positional arguments of the swap command. Values are passed through
 * untouched: the server parses addresses and amounts.
 */
export const swapArgsSchema = z.object({
  fromToken: z.string().describe("Token to sell (0x...). Zero address for ETH."),
  toToken: z.string().describe("Token to buy (0x...)"),
  amount: z.string().describe("Amount in token units, e.g. \"0.1\""),
  walletAddress: z.string().describe("Wallet the swap is simulated for"),
});

export type SwapArgs = z.infer<typeof swapArgsSchema>;

/**
 * Build a swap_tokens tool call
 */
export function buildSwapRequest(args: SwapArgs): JsonRpcRequest {
  return toolCall("swap_tokens", {
    from_token: args.fromToken,
    to_token: args.toToken,
    amount: args.amount,
    wallet_address: args.walletAddress,
    slippage_bps: SWAP_SLIPPAGE_BPS,
  });
}

export const swapCommand: Command = {
  name: "swap",
  description: "Simulate a token swap",
  usage: "swap <from_token> <to_token> <amount> <wallet_address>",
  example: `swap ${NATIVE_ETH} ${USDC_MAINNET} 0.1 ${EXAMPLE_WALLET}`,
  requiredArgs: 4,
  build: ([fromToken, toToken, amount, walletAddress]) =>
    buildSwapRequest(
      swapArgsSchema.parse({ fromToken, toToken, amount, walletAddress })
    ),
};
