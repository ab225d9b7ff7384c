import { z } from "zod";
import type { Command, JsonRpcRequest } from "../types/index.js";
import { USDC_MAINNET } from "./examples.js";
import { toolCall } from "./request.js";

export const priceArgsSchema = z.object({
  tokenAddress: z
    .string()
    .describe("Token contract address. The zero address stands for ETH."),
});

export type PriceArgs = z.infer<typeof priceArgsSchema>;

export function buildPriceRequest(args: PriceArgs): JsonRpcRequest {
  return toolCall("get_token_price", { token_address: args.tokenAddress });
}

export const priceCommand: Command = {
  name: "price",
  description: "Get the USD and ETH price of a token",
  usage: "price <token_address>",
  example: `price ${USDC_MAINNET}`,
  requiredArgs: 1,
  build: ([tokenAddress]) =>
    buildPriceRequest(priceArgsSchema.parse({ tokenAddress })),
};
