import { formatUnits } from "viem";
import { z } from "zod";
import {
  balanceOf,
  nativeToken,
  requireAddress,
  requireToken,
  type Market,
} from "../market.js";

/**
 * Schema for get_balance tool parameters
 */
export const getBalanceSchema = z.object({
  wallet_address: z.string().describe("The wallet address to query (0x...)"),
  token_address: z
    .string()
    .optional()
    .describe("Optional ERC20 token contract address. If not provided, returns ETH balance."),
});

export type GetBalanceParams = z.infer<typeof getBalanceSchema>;

export const getBalanceTool = {
  name: "get_balance",
  description: "Query ETH or ERC20 token balance for a wallet address",
  inputSchema: {
    type: "object" as const,
    properties: {
      wallet_address: {
        type: "string",
        description: "The wallet address to query (0x...)",
      },
      token_address: {
        type: "string",
        description:
          "Optional ERC20 token contract address. If not provided, returns ETH balance.",
      },
    },
    required: ["wallet_address"],
  },
};

/**
 * Handle get_balance tool call
 */
export function handleGetBalance(market: Market, params: GetBalanceParams): string {
  const wallet = requireAddress(params.wallet_address, "wallet address");
  const token =
    params.token_address === undefined
      ? nativeToken(market)
      : requireToken(market, params.token_address, "token address");

  const raw = balanceOf(market, wallet, token);

  return [
    `Balance: ${formatUnits(raw, token.decimals)} ${token.symbol}`,
    `Decimals: ${token.decimals}`,
    `Wallet: ${params.wallet_address}`,
    `Raw balance: ${raw}`,
  ].join("\n");
}
