/**
 * TypeScript type definitions for netlist import and design queries
 */

import type { Design } from "./netlist/design.js";
import type { DuplicateKeyPolicy } from "./parsers/json/types.js";

/**
 * Compact single-element arrays to scalar values for token savings.
 * Returns the single element if array has length 1, otherwise returns the array.
 */
export const compactArray = <T>(arr: T[]): T | T[] =>
  arr.length === 1 ? arr[0] : arr;

// =============================================================================
// Signal References
// =============================================================================

/**
 * Fixed logic values: 0, 1, x (undefined) and z (high impedance).
 */
export type Constant = "0" | "1" | "x" | "z";

export const CONSTANTS: readonly Constant[] = ["0", "1", "x", "z"];

const CONSTANT_SET: ReadonlySet<string> = new Set(CONSTANTS);

export const isConstant = (value: string): value is Constant =>
  CONSTANT_SET.has(value);

/**
 * One entry of a `bits` array: a constant or a module-scoped signal id.
 */
export type BitRef =
  | { kind: "constant"; value: Constant }
  | { kind: "signal"; id: number };

/**
 * The view of a wire the importer needs from the container.
 */
export interface WireHandle {
  readonly name: string;
  readonly width: number;
  readonly portInput: boolean;
  readonly portOutput: boolean;
}

/**
 * One bit position of a wire.
 */
export interface WireBit<W extends WireHandle = WireHandle> {
  readonly wire: W;
  readonly offset: number;
}

/**
 * A wire bit or a constant value.
 */
export type SigBit<W extends WireHandle = WireHandle> = WireBit<W> | Constant;

export const isWireBit = <W extends WireHandle>(bit: SigBit<W>): bit is WireBit<W> =>
  typeof bit !== "string";

// =============================================================================
// Netlist Container
// =============================================================================

/**
 * Storage API the importer writes into. Names passed in are already
 * escaped. Implementations own every handle they return.
 */
export interface NetlistContainer<M, W extends WireHandle, C> {
  /** Create a module; throws NameConflictError if the name exists. */
  createModule(name: string): M;

  /** Return the named wire, creating it with the given width if missing. */
  getOrCreateWire(module: M, name: string, width: number): W;

  /** Add port direction flags to a wire. Flags are never cleared. */
  setWireFlags(wire: W, isInput: boolean, isOutput: boolean): void;

  /** Finalize port numbering after all port wires are flagged. */
  commitPorts(module: M): void;

  /** Record that `dst` is driven by `src`. */
  connect(module: M, dst: WireBit<W>, src: SigBit<W>): void;

  createCell(module: M, name: string, type: string): C;

  /** Create an internal wire with a generated name. */
  allocateAnonymousWire(module: M, width?: number): W;

  bindCellPort(cell: C, portName: string, signal: SigBit<W>[]): void;
}

// =============================================================================
// Design Summaries
// =============================================================================

export type PortDirection = "input" | "output" | "inout";

export interface PortSummary {
  name: string;
  direction: PortDirection;
  width: number;
}

export interface WireSummary {
  name: string;
  width: number;
}

export interface CellSummary {
  name: string;
  type: string;
  connections: Record<string, string[]>;
}

/**
 * Module contents with every bit rendered as text:
 * `name[i]` for a wire bit (`name` for 1-bit wires) or the constant.
 */
export interface ModuleSummary {
  name: string;
  ports: PortSummary[];
  wires: WireSummary[];
  cells: CellSummary[];
  connections: Array<[string, string]>;
}

export interface DesignSummary {
  modules: ModuleSummary[];
}

// =============================================================================
// Service Results
// =============================================================================

/**
 * Error result structure
 */
export interface ErrorResult {
  error: string;
}

/**
 * Type guard to check if result is an error
 */
export const isErrorResult = (result: unknown): result is ErrorResult =>
  typeof result === "object" &&
  result !== null &&
  "error" in result &&
  typeof result.error === "string";

/**
 * Discovered netlist document.
 */
export interface DiscoveredDesign {
  name: string;
  sourcePath: string;
  format: "json";
  error?: string;
}

/**
 * Design info returned from list_designs
 */
export interface DesignInfo {
  name: string;
  path: string;
  error?: string;
}

export interface ModuleInfo {
  name: string;
  ports: number;
  wires: number;
  cells: number;
}

export interface ListModulesResult {
  modules: ModuleInfo[];
}

export interface QueryCellResult {
  module: string;
  cell: CellSummary;
}

/**
 * Search wires results with optional notes for empty results.
 */
export interface SearchWiresResult {
  results: Record<string, string[]>;
  notes?: string[];
}

/**
 * Options accepted when reading a netlist document.
 */
export interface ReadOptions {
  duplicateKeys?: DuplicateKeyPolicy;
  /** Receives one progress line per imported module. */
  log?: (message: string) => void;
}

/**
 * Handler interface for netlist file format plugins.
 */
export interface NetlistFormatHandler {
  /** Unique identifier for this format (e.g., 'json') */
  readonly name: string;

  /** File extensions this handler recognizes (e.g., ['.json']) */
  readonly extensions: readonly string[];

  /** Check if this handler can process a file based on its path */
  canHandle(filePath: string): boolean;

  /** Discover all designs of this format in a directory */
  discoverDesigns(rootDir: string, options?: ReadOptions): Promise<DiscoveredDesign[]>;

  /** Read a design file into a new in-memory design */
  parse(designPath: string, options?: ReadOptions): Promise<Design>;
}
