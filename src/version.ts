/**
 * Version information for the JSON netlist reader.
 */

import { createRequire } from "node:module";

/** Current version of the package. */
export const VERSION = (() => {
  // package.json sits one level up from src/ and two levels up from dist/src/
  const require = createRequire(import.meta.url);
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const pkg: unknown = require(candidate);
      if (
        typeof pkg === "object" &&
        pkg !== null &&
        "version" in pkg &&
        typeof pkg.version === "string"
      ) {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return "0.0.0-dev";
})();

/** Binary name used in CLI output and log prefixes. */
export const BINARY_NAME = "json-netlist-reader";
