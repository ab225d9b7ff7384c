import type { Command } from "../types/index.js";
import { createRequest } from "./request.js";

export const MCP_PROTOCOL_VERSION = "2024-11-05";

export const CLIENT_INFO = {
  name: "eth-trade-client",
  version: "1.0",
} as const;

export const initCommand: Command = {
  name: "init",
  description: "Send the initialize handshake and print the server's capabilities",
  usage: "init",
  example: "init",
  requiredArgs: 0,
  build: () =>
    createRequest("initialize", {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { ...CLIENT_INFO },
    }),
};
