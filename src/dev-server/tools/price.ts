import { z } from "zod";
import { priceInEth, requireToken, type Market } from "../market.js";

/**
 * Schema for get_token_price tool parameters
 */
export const getTokenPriceSchema = z.object({
  token_address: z
    .string()
    .describe("The token contract address (0x...). Use the zero address for ETH."),
});

export type GetTokenPriceParams = z.infer<typeof getTokenPriceSchema>;

export const getTokenPriceTool = {
  name: "get_token_price",
  description: "Get current token price in USD and ETH",
  inputSchema: {
    type: "object" as const,
    properties: {
      token_address: {
        type: "string",
        description:
          "The token contract address (0x...). Use 0x0000000000000000000000000000000000000000 for ETH.",
      },
    },
    required: ["token_address"],
  },
};

export function handleGetTokenPrice(market: Market, params: GetTokenPriceParams): string {
  const token = requireToken(market, params.token_address, "token address");

  return [
    `Token: ${params.token_address}`,
    `Price (USD): ${token.priceUsd}`,
    `Price (ETH): ${priceInEth(market, token)}`,
    "Source: fixture",
  ].join("\n");
}
