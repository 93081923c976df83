#!/usr/bin/env node

/**
 * JSON Netlist Reader Entry Point
 *
 * Run with: npx tsx src/index.ts [FILE]
 * Or after build: node dist/src/index.js [FILE]
 *
 * CLI flags:
 *   --version, -v          Print version and exit
 *   --help, -h             Show help
 *   --module, -m <name>    Print only one module of FILE
 *
 * Without FILE the MCP server runs on stdio.
 */

import {
  handleImportCommand,
  parseCliArgs,
  printHelp,
  printVersion,
} from "./cli/commands.js";
import { runServer } from "./server.js";
import { isErrorResult } from "./types.js";

const main = async (): Promise<void> => {
  const args = parseCliArgs(process.argv.slice(2));

  if (isErrorResult(args)) {
    console.error(args.error);
    printHelp();
    process.exitCode = 1;
    return;
  }

  // Handle --version / -v
  if (args.version) {
    printVersion();
    return;
  }

  // Handle --help / -h
  if (args.help) {
    printHelp();
    return;
  }

  if (args.file) {
    process.exitCode = await handleImportCommand(args.file, args.module);
    return;
  }

  await runServer();
};

main().catch((error) => {
  console.error("Server error:", error);
  process.exit(1);
});
