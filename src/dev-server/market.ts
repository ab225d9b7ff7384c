import {
  formatUnits,
  getAddress,
  isAddress,
  parseUnits,
  zeroAddress,
  type Address,
} from "viem";

/**
 * A token the dev server knows about. The zero address is native ETH.
 */
export interface MarketToken {
  address: Address;
  symbol: string;
  decimals: number;
  priceUsd: string;
}

/**
 * Fixed market data served by the dev server
 */
export interface Market {
  tokens: MarketToken[];
  weth: Address;
  /** wallet address (lowercase) -> token address (lowercase) -> amount in token units */
  balances: Record<string, Record<string, string>>;
}

const WETH: Address = "0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2";

export const DEFAULT_MARKET: Market = {
  weth: WETH,
  tokens: [
    { address: zeroAddress, symbol: "ETH", decimals: 18, priceUsd: "3000" },
    { address: WETH, symbol: "WETH", decimals: 18, priceUsd: "3000" },
    {
      address: "0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48",
      symbol: "USDC",
      decimals: 6,
      priceUsd: "1",
    },
    {
      address: "0xdAC17F958D2ee523a2206206994597C13D831ec7",
      symbol: "USDT",
      decimals: 6,
      priceUsd: "1",
    },
    {
      address: "0x6B175474E89094C44Da98b954EedeAC495271d0F",
      symbol: "DAI",
      decimals: 18,
      priceUsd: "1",
    },
  ],
  balances: {
    "0x70997970c51812dc3a010c7d01b50e0d17dc79c8": {
      [zeroAddress]: "1.5",
      "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48": "2500",
    },
  },
};

/**
 * Validate an address, returning its checksummed form
 */
export function requireAddress(value: string, label: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return getAddress(value);
}

export function findToken(market: Market, address: string): MarketToken | undefined {
  const wanted = address.toLowerCase();
  return market.tokens.find((token) => token.address.toLowerCase() === wanted);
}

/**
 * Validate an address and look it up in the market
 */
export function requireToken(market: Market, value: string, label: string): MarketToken {
  const address = requireAddress(value, label);
  const token = findToken(market, address);
  if (!token) {
    throw new Error(`Unsupported token: ${value}`);
  }
  return token;
}

export function nativeToken(market: Market): MarketToken {
  const eth = findToken(market, zeroAddress);
  if (!eth) {
    throw new Error("Market has no native ETH entry");
  }
  return eth;
}

/**
 * Parse a decimal amount in token units into base units
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (!/^\d+(\.\d+)?$/.test(amount)) {
    throw new Error(`Invalid amount: ${amount}`);
  }
  return parseUnits(amount, decimals);
}

/**
 * Balance held by a wallet, in base units
 */
export function balanceOf(market: Market, wallet: Address, token: MarketToken): bigint {
  const amount =
    market.balances[wallet.toLowerCase()]?.[token.address.toLowerCase()] ?? "0";
  return parseUnits(amount, token.decimals);
}

/**
 * Price of `token` in ETH as a decimal string
 */
export function priceInEth(market: Market, token: MarketToken): string {
  const eth = nativeToken(market);
  const scaled = (parseUnits(token.priceUsd, 18) * 10n ** 18n) / parseUnits(eth.priceUsd, 18);
  return formatUnits(scaled, 18);
}
