/**
 * Library entry point.
 */

export * from "./errors.js";
export * from "./types.js";
export { Cell, Design, NetlistModule, Wire, type Connection } from "./netlist/design.js";
export { escapeId, unescapeId } from "./netlist/ids.js";
export { formatBit, summarizeCell, summarizeDesign, summarizeModule } from "./netlist/summary.js";
export {
  CharStream,
  classifyBit,
  importDesign,
  importModule,
  parseJsonDesign,
  parseValue,
  parseValueText,
  readJsonNetlist,
  toPlain,
  MAX_INTEGER,
  MAX_NESTING_DEPTH,
  type DuplicateKeyPolicy,
  type ImportOptions,
  type JsonArray,
  type JsonInteger,
  type JsonObject,
  type JsonString,
  type JsonValue,
  type ParseOptions,
  type SourceLocation,
} from "./parsers/json/index.js";
export { loadConfig, type Config } from "./config.js";
