#!/usr/bin/env tsx
import { runCli } from "./cli";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error("[agent-registry] Fatal error:", err);
    process.exitCode = 1;
  }
);
