import { z } from "zod";
import type { Command, JsonRpcRequest } from "../types/index.js";
import { EXAMPLE_WALLET } from "./examples.js";
import { toolCall } from "./request.js";

/**
 * Positional arguments of the balance command
 */
export const balanceArgsSchema = z.object({
  walletAddress: z.string().describe("Wallet address to query (0x...)"),
  tokenAddress: z
    .string()
    .optional()
    .describe("ERC20 contract address. Omit for the ETH balance."),
});

export type BalanceArgs = z.infer<typeof balanceArgsSchema>;

/**
 * Build a get_balance tool call
 */
export function buildBalanceRequest(args: BalanceArgs): JsonRpcRequest {
  return toolCall("get_balance", {
    wallet_address: args.walletAddress,
    ...(args.tokenAddress !== undefined ? { token_address: args.tokenAddress } : {}),
  });
}

export const balanceCommand: Command = {
  name: "balance",
  description: "Query the ETH (or ERC20) balance of a wallet",
  usage: "balance <wallet_address> [token_address]",
  example: `balance ${EXAMPLE_WALLET}`,
  requiredArgs: 1,
  build: ([walletAddress, tokenAddress]) =>
    buildBalanceRequest(balanceArgsSchema.parse({ walletAddress, tokenAddress })),
};
