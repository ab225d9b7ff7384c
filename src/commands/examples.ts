// Addresses used in usage examples
export const NATIVE_ETH = "0x0000000000000000000000000000000000000000";
export const USDC_MAINNET = "0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48";
export const EXAMPLE_WALLET = "0x70997970C51812dc3A010C7d01b50e0d17dc79C8";
