import type { Command } from "../types/index.js";
import { balanceCommand } from "./balance.js";
import { initCommand } from "./initialize.js";
import { priceCommand } from "./price.js";
import { swapCommand } from "./swap.js";
import { listCommand } from "./tools-list.js";

/**
 * Commands in the order they appear in the usage text
 */
export const COMMANDS: readonly Command[] = [
  initCommand,
  listCommand,
  balanceCommand,
  priceCommand,
  swapCommand,
];

export function findCommand(name: string): Command | undefined {
  return COMMANDS.find((command) => command.name === name);
}

export { createRequest } from "./request.js";
export { SWAP_SLIPPAGE_BPS } from "./swap.js";
