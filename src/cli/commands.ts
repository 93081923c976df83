/**
 * CLI command handlers for --version, --help and importing a file.
 */

import path from "node:path";
import { BINARY_NAME, VERSION } from "../version.js";
import { queryModule, summarizeDesignFile } from "../service.js";
import { isErrorResult } from "../types.js";

export interface CliArgs {
  version: boolean;
  help: boolean;
  file?: string;
  module?: string;
}

/**
 * Split raw arguments into flags, an optional `--module <name>` and the
 * first positional file path.
 */
export const parseCliArgs = (args: string[]): CliArgs | { error: string } => {
  const result: CliArgs = {
    version: args.includes("--version") || args.includes("-v"),
    help: args.includes("--help") || args.includes("-h"),
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--module" || arg === "-m") {
      const value = args[i + 1];
      if (value === undefined) {
        return { error: `Missing value for ${arg}` };
      }
      result.module = value;
      i++;
      continue;
    }
    if (arg.startsWith("-")) {
      if (!["--version", "-v", "--help", "-h"].includes(arg)) {
        return { error: `Unknown option ${arg}` };
      }
      continue;
    }
    result.file ??= arg;
  }

  return result;
};

/**
 * Print version information.
 */
export const printVersion = (): void => {
  console.log(`${BINARY_NAME} v${VERSION}`);
};

/**
 * Print help message.
 */
export const printHelp = (): void => {
  console.log(
    `
${BINARY_NAME} v${VERSION}

Reads a JSON netlist and prints a summary of the imported design.
Without a file argument, runs an MCP server on stdio.

USAGE:
  ${BINARY_NAME} [OPTIONS] [FILE]

OPTIONS:
  --version, -v          Print version and exit
  --help, -h             Show this help message
  --module, -m <name>    Print only the named module

ENVIRONMENT:
  JSON_NETLIST_VERBOSE=1                Log each imported module to stderr
  JSON_NETLIST_DUPLICATE_KEYS=reject    Reject duplicate keys in JSON objects
  JSON_NETLIST_ROOT=<dir>               Default directory for list_designs
`.trim(),
  );
};

/**
 * Import a file and print its summary as JSON.
 * Returns the process exit code.
 */
export const handleImportCommand = async (
  file: string,
  moduleName?: string,
): Promise<number> => {
  const designPath = path.resolve(file);
  const result = moduleName
    ? await queryModule(designPath, moduleName)
    : await summarizeDesignFile(designPath);

  if (isErrorResult(result)) {
    console.error(`Error: ${result.error}`);
    return 1;
  }

  console.log(JSON.stringify(result, null, 2));
  return 0;
};
