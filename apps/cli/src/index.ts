#!/usr/bin/env tsx
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { runMain } from "citty";
import { config } from "dotenv";
import { main } from "./commands/index.js";

// Load .env from the package root in development; real env vars win
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "..", ".env") });

runMain(main).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
