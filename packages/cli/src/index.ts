#!/usr/bin/env node
import path from "path";
import { config } from "dotenv";
import { runCli } from "./cli.js";
import { ConsoleTerminal } from "./ui/terminal.js";
import { getErrorMessage } from "./utils/error-utils.js";

// Load .env from the working directory before anything reads process.env
config({ path: path.resolve(process.cwd(), ".env") });

const terminal = new ConsoleTerminal();

runCli(process.argv.slice(2), { terminal, env: process.env, cwd: process.cwd() })
  .then((code) => {
    terminal.close();
    process.exit(code);
  })
  .catch((err: unknown) => {
    terminal.close();
    console.error("[plan] Unexpected error:", getErrorMessage(err));
    process.exit(1);
  });
