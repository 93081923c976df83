/**
 * JSON Netlist Parser
 * Reads JSON netlist documents into an in-memory design
 */

import { readFile } from "fs/promises";
import { Design } from "../../netlist/design.js";
import type {
  NetlistContainer,
  NetlistFormatHandler,
  ReadOptions,
  WireHandle,
} from "../../types.js";
import { discoverJsonDesigns, isJsonNetlistFile, JSON_EXTENSIONS } from "./discovery.js";
import { importDesign } from "./importer.js";
import { parseValueText } from "./value-parser.js";

export { discoverJsonDesigns, isJsonNetlistFile } from "./discovery.js";
export { importDesign, importModule, classifyBit, type ImportOptions } from "./importer.js";
export { parseValue, parseValueText } from "./value-parser.js";
export { CharStream, type SourceLocation } from "./char-stream.js";
export * from "./types.js";

/**
 * Parse one value from the text and import it into the container.
 * Text after the root value is ignored.
 */
export const readJsonNetlist = <M, W extends WireHandle, C>(
  text: string,
  container: NetlistContainer<M, W, C>,
  options: ReadOptions = {},
): void => {
  const root = parseValueText(text, { duplicateKeys: options.duplicateKeys });
  importDesign(root, container, { log: options.log });
};

/**
 * Read a JSON netlist file into a new design.
 */
export const parseJsonDesign = async (
  designPath: string,
  options: ReadOptions = {},
): Promise<Design> => {
  const content = await readFile(designPath, "utf-8");
  const design = new Design();
  readJsonNetlist(content, design, options);
  return design;
};

/**
 * JSON netlist format handler.
 */
export const jsonHandler: NetlistFormatHandler = {
  name: "json",
  extensions: JSON_EXTENSIONS,

  canHandle: isJsonNetlistFile,

  discoverDesigns: discoverJsonDesigns,

  parse: parseJsonDesign,
};
