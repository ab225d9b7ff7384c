#!/usr/bin/env node
import { runDevServer } from "./server.js";

runDevServer().catch((error) => {
  console.error(error);
  process.exit(1);
});
