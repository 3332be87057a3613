#!/usr/bin/env node
import { runCli } from "./commands.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Unexpected error:", err);
    process.exitCode = 1;
  }
);
