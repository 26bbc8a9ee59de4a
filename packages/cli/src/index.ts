#!/usr/bin/env node
import "dotenv/config";
import { errorMessage } from "@pubkit/schemas";
import { buildProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[pubkit] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[pubkit] Uncaught exception:", err);
  process.exit(1);
});

buildProgram().parseAsync().catch((err: unknown) => {
  console.error(`[pubkit] ${errorMessage(err)}`);
  process.exit(1);
});
