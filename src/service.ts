/**
 * Netlist Service
 *
 * Query methods for JSON netlists using absolute paths.
 * All methods take an absolute path to the design FILE as input and
 * report failures as `{ error }` results instead of throwing.
 */

import { stat } from "fs/promises";
import path from "path";
import { loadConfig, logInfo, type Config } from "./config.js";
import type { Design, NetlistModule } from "./netlist/design.js";
import { escapeId, unescapeId } from "./netlist/ids.js";
import type { DuplicateKeyPolicy } from "./parsers/json/types.js";
import { summarizeCell, summarizeDesign, summarizeModule } from "./netlist/summary.js";
import { discoverDesigns, findHandler, getSupportedExtensions, parseDesign } from "./parsers/index.js";
import {
  isErrorResult,
  type DesignInfo,
  type DesignSummary,
  type ErrorResult,
  type ListModulesResult,
  type ModuleSummary,
  type QueryCellResult,
  type SearchWiresResult,
} from "./types.js";

// =============================================================================
// Path Normalization
// =============================================================================

/**
 * Normalize a file path to use native separators.
 *
 * On Windows, path.normalize() converts / to \
 * On Unix, backslashes are converted to forward slashes first, since
 * agents often send Windows-style paths regardless of platform.
 */
const normalizePath = (inputPath: string): string => {
  if (process.platform === "win32") {
    return path.normalize(inputPath);
  }
  return path.normalize(inputPath.replace(/\\/g, "/"));
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : "Unknown error occurred";

const compileRegex = (pattern: string): RegExp | ErrorResult => {
  try {
    return new RegExp(pattern);
  } catch {
    return { error: `Invalid regex pattern '${pattern}'` };
  }
};

// =============================================================================
// Design Loading
// =============================================================================

interface CachedDesign {
  mtimeMs: number;
  duplicateKeys: DuplicateKeyPolicy;
  design: Design;
}

const designCache = new Map<string, CachedDesign>();

/**
 * Drop all cached designs.
 */
export const clearDesignCache = (): void => {
  designCache.clear();
};

/**
 * Load a design from an absolute file path.
 * Results are cached per duplicate-key policy until the file's
 * modification time changes.
 */
export const loadDesign = async (
  designPath: string,
  config?: Config,
): Promise<Design | ErrorResult> => {
  const normalizedPath = normalizePath(designPath);
  if (!findHandler(normalizedPath)) {
    const ext = path.extname(normalizedPath);
    return {
      error: `Unsupported design file format '${ext}'. Supported: ${getSupportedExtensions().join(", ")}`,
    };
  }

  try {
    const settings = config ?? loadConfig();
    const { mtimeMs } = await stat(normalizedPath);
    const cached = designCache.get(normalizedPath);
    if (cached && cached.mtimeMs === mtimeMs && cached.duplicateKeys === settings.duplicateKeys) {
      return cached.design;
    }

    const design = await parseDesign(normalizedPath, {
      duplicateKeys: settings.duplicateKeys,
      log: settings.verbose ? logInfo : undefined,
    });
    designCache.set(normalizedPath, {
      mtimeMs,
      duplicateKeys: settings.duplicateKeys,
      design,
    });
    return design;
  } catch (error) {
    return { error: errorMessage(error) };
  }
};

/**
 * Look up a module by its document name.
 */
const findModule = (
  design: Design,
  moduleName: string,
): NetlistModule | ErrorResult => {
  const module = design.module(escapeId(moduleName));
  if (module) {
    return module;
  }
  const available = Array.from(design.modules.keys(), unescapeId);
  return {
    error: `Module '${moduleName}' not found. Available modules: ${available.join(", ") || "(none)"}`,
  };
};

// =============================================================================
// Queries
// =============================================================================

/**
 * List JSON netlists under a directory.
 */
export const listDesigns = async (
  searchPath?: string,
  pattern = ".*",
  config?: Config,
): Promise<DesignInfo[] | ErrorResult> => {
  const regex = compileRegex(pattern);
  if (isErrorResult(regex)) {
    return regex;
  }

  try {
    const settings = config ?? loadConfig();
    const resolvedPath = normalizePath(searchPath ?? settings.rootDir ?? process.cwd());
    const designs = await discoverDesigns(resolvedPath, { duplicateKeys: settings.duplicateKeys });
    return designs
      .filter((design) => regex.test(design.name))
      .map((design) => ({
        name: design.name,
        path: design.sourcePath,
        error: design.error,
      }));
  } catch (error) {
    return { error: errorMessage(error) };
  }
};

/**
 * Summarize every module of a design.
 */
export const summarizeDesignFile = async (
  design: string,
): Promise<DesignSummary | ErrorResult> => {
  const loaded = await loadDesign(design);
  if (isErrorResult(loaded)) {
    return loaded;
  }
  return summarizeDesign(loaded);
};

/**
 * List modules with their port, wire and cell counts.
 */
export const listModules = async (
  design: string,
): Promise<ListModulesResult | ErrorResult> => {
  const loaded = await loadDesign(design);
  if (isErrorResult(loaded)) {
    return loaded;
  }

  const modules = Array.from(loaded.modules.values(), (module) => ({
    name: unescapeId(module.name),
    ports: module.ports.length,
    wires: module.wires.size,
    cells: module.cells.size,
  }));
  return { modules };
};

/**
 * Get a module's ports, wires, cells and connections.
 */
export const queryModule = async (
  design: string,
  moduleName: string,
): Promise<ModuleSummary | ErrorResult> => {
  const loaded = await loadDesign(design);
  if (isErrorResult(loaded)) {
    return loaded;
  }

  const module = findModule(loaded, moduleName);
  if (isErrorResult(module)) {
    return module;
  }
  return summarizeModule(module);
};

/**
 * Get one cell's type and port connections.
 */
export const queryCell = async (
  design: string,
  moduleName: string,
  cellName: string,
): Promise<QueryCellResult | ErrorResult> => {
  const loaded = await loadDesign(design);
  if (isErrorResult(loaded)) {
    return loaded;
  }

  const module = findModule(loaded, moduleName);
  if (isErrorResult(module)) {
    return module;
  }

  const cell = module.cell(escapeId(cellName));
  if (!cell) {
    return { error: `Cell '${cellName}' not found in module '${moduleName}'` };
  }
  return { module: unescapeId(module.name), cell: summarizeCell(cell) };
};

/**
 * Search wire names matching a regex pattern, grouped by module.
 */
export const searchWires = async (
  pattern: string,
  design: string,
): Promise<SearchWiresResult | ErrorResult> => {
  const regex = compileRegex(pattern);
  if (isErrorResult(regex)) {
    return regex;
  }

  const loaded = await loadDesign(design);
  if (isErrorResult(loaded)) {
    return loaded;
  }

  const results: Record<string, string[]> = {};
  let total = 0;
  for (const module of loaded.modules.values()) {
    const matches = Array.from(module.wires.keys(), unescapeId)
      .filter((name) => regex.test(name))
      .sort((a, b) => a.localeCompare(b));
    results[unescapeId(module.name)] = matches;
    total += matches.length;
  }

  if (total === 0) {
    return { results, notes: [`No wires matched pattern '${pattern}'`] };
  }
  return { results };
};
