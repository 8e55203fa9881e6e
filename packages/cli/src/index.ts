#!/usr/bin/env node
import "dotenv/config";
import { ConfigError } from "@storyloom/schemas";
import { buildProgram } from "./program.js";

// Global error handlers: an unhandled failure ends the process loudly
process.on("unhandledRejection", (reason) => {
  console.error("[storyloom] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[storyloom] Uncaught exception:", err);
  process.exit(1);
});

buildProgram().parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`[storyloom] ${err.message}`);
  } else {
    console.error("[storyloom] Fatal:", err);
  }
  process.exit(1);
});
