/**
 * Environment configuration.
 *
 *   JSON_NETLIST_VERBOSE=1                log one line per imported module
 *   JSON_NETLIST_DUPLICATE_KEYS=reject    fail on duplicate object keys
 *   JSON_NETLIST_ROOT=/path               default directory for list_designs
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { BINARY_NAME } from "./version.js";

const EnvSchema = z.object({
  JSON_NETLIST_VERBOSE: z.enum(["0", "1"]).optional(),
  JSON_NETLIST_DUPLICATE_KEYS: z.enum(["last-wins", "reject"]).optional(),
  JSON_NETLIST_ROOT: z.string().min(1).optional(),
});

export interface Config {
  verbose: boolean;
  duplicateKeys: "last-wins" | "reject";
  rootDir: string | undefined;
}

/**
 * Read configuration from environment variables.
 * Unset or empty variables fall back to defaults.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const relevant = Object.fromEntries(
    Object.keys(EnvSchema.shape)
      .map((key) => [key, env[key]] as const)
      .filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = EnvSchema.safeParse(relevant);
  if (!parsed.success) {
    const variables = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigError(
      `Invalid environment configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      variables,
    );
  }

  return {
    verbose: parsed.data.JSON_NETLIST_VERBOSE === "1",
    duplicateKeys: parsed.data.JSON_NETLIST_DUPLICATE_KEYS ?? "last-wins",
    rootDir: parsed.data.JSON_NETLIST_ROOT,
  };
};

/**
 * Diagnostic logger writing to stderr; stdout belongs to the CLI output
 * and the MCP transport.
 */
export const logInfo = (message: string): void => {
  console.error(`[${BINARY_NAME}] ${message}`);
};
