import type { Command } from "../types/index.js";
import { createRequest } from "./request.js";

export const listCommand: Command = {
  name: "list",
  description: "List the tools the server exposes",
  usage: "list",
  example: "list",
  requiredArgs: 0,
  build: () => createRequest("tools/list"),
};
