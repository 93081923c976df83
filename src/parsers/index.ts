/**
 * Netlist Format Registry
 *
 * Unified discovery and parsing across supported netlist formats.
 * To add a new format:
 * 1. Create a parsers/<format>/ folder with discovery.ts and index.ts
 * 2. Implement NetlistFormatHandler in index.ts
 * 3. Import and register the handler here
 */

import type { Design } from '../netlist/design.js';
import type { DiscoveredDesign, NetlistFormatHandler, ReadOptions } from '../types.js';
import { jsonHandler } from './json/index.js';

// Re-export handlers for direct access
export { jsonHandler } from './json/index.js';

/**
 * Registry of all supported netlist format handlers.
 */
const handlers: NetlistFormatHandler[] = [jsonHandler];

/**
 * Find a handler that can process the given file path.
 */
export const findHandler = (filePath: string): NetlistFormatHandler | undefined =>
  handlers.find((h) => h.canHandle(filePath));

/**
 * Discover all designs of all supported formats in a directory.
 */
export const discoverDesigns = async (
  rootDir: string,
  options?: ReadOptions,
): Promise<DiscoveredDesign[]> => {
  const results = await Promise.all(handlers.map((h) => h.discoverDesigns(rootDir, options)));
  return results.flat().sort((a, b) => a.name.localeCompare(b.name));
};

/**
 * Parse a design file using the appropriate handler.
 */
export const parseDesign = async (
  designPath: string,
  options?: ReadOptions,
): Promise<Design> => {
  const handler = findHandler(designPath);
  if (!handler) {
    throw new Error(`Unsupported design format: ${designPath}`);
  }
  return handler.parse(designPath, options);
};

/**
 * Get all registered handlers.
 */
export const getHandlers = (): readonly NetlistFormatHandler[] => handlers;

/**
 * Get all supported file extensions across all handlers.
 */
export const getSupportedExtensions = (): string[] =>
  handlers.flatMap((h) => [...h.extensions]);
