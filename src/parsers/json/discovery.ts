/**
 * JSON netlist discovery module.
 * Finds .json files whose root object carries a "modules" key.
 */

import { readFile, readdir } from "fs/promises";
import path from "path";
import type { DiscoveredDesign } from "../../types.js";
import type { ParseOptions } from "./types.js";
import { parseValueText } from "./value-parser.js";

const JSON_EXTENSIONS = [".json"] as const;

/** Directories never searched for netlists. */
const SKIPPED_DIRECTORIES = new Set(["node_modules"]);

/**
 * Walk directory tree to find .json files.
 */
const walkForJsonFiles = async (rootDir: string): Promise<string[]> => {
  const files: string[] = [];

  const walk = async (currentDir: string): Promise<void> => {
    let entries;
    try {
      entries = await readdir(currentDir, { withFileTypes: true });
    } catch (error) {
      if (
        !(error instanceof Error) ||
        !("code" in error) ||
        error.code !== "EACCES"
      ) {
        throw error;
      }
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith(".") || SKIPPED_DIRECTORIES.has(entry.name)) {
          continue;
        }
        await walk(fullPath);
        continue;
      }

      if (entry.isFile() && isJsonNetlistFile(entry.name)) {
        files.push(fullPath);
      }
    }
  };

  await walk(rootDir);
  return files.sort((a, b) => a.localeCompare(b));
};

/**
 * Inspect one .json file. Returns undefined for JSON that is not a netlist.
 * Netlists that fail to parse are reported with an error.
 */
const inspectJsonFile = async (
  filePath: string,
  options: ParseOptions,
): Promise<DiscoveredDesign | undefined> => {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch {
    return undefined;
  }

  if (!content.includes('"modules"')) {
    return undefined;
  }

  const design: DiscoveredDesign = {
    name: path.basename(filePath, path.extname(filePath)),
    sourcePath: filePath,
    format: "json",
  };

  try {
    const root = parseValueText(content, options);
    if (root.kind !== "object" || !root.entries.has("modules")) {
      return undefined;
    }
  } catch (error) {
    design.error = error instanceof Error ? error.message : String(error);
  }

  return design;
};

/**
 * Discover JSON netlists in a directory.
 * Files are parsed with the given duplicate-key policy so that reported
 * errors agree with a later load.
 */
export const discoverJsonDesigns = async (
  rootDir: string,
  options: ParseOptions = {},
): Promise<DiscoveredDesign[]> => {
  const files = await walkForJsonFiles(path.resolve(rootDir));
  const designs: DiscoveredDesign[] = [];

  for (const filePath of files) {
    const design = await inspectJsonFile(filePath, { duplicateKeys: options.duplicateKeys });
    if (design) {
      designs.push(design);
    }
  }

  return designs;
};

/**
 * Check if a file path is a JSON file.
 */
export const isJsonNetlistFile = (filePath: string): boolean => {
  const ext = path.extname(filePath).toLowerCase();
  return JSON_EXTENSIONS.some((candidate) => candidate === ext);
};

/** JSON netlist file extensions */
export { JSON_EXTENSIONS };
