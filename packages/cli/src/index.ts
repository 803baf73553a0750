#!/usr/bin/env tsx
import "dotenv/config";
import { CommanderError } from "commander";
import { buildProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[gauntlet] Unhandled rejection:", reason);
  process.exit(1);
});

const program = buildProgram({
  env: process.env,
  io: {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  },
});

try {
  await program.parseAsync(process.argv);
} catch (err) {
  if (!(err instanceof CommanderError)) throw err;
  process.exitCode = err.exitCode;
}
