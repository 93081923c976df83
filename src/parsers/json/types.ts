/**
 * JSON Netlist Parser - Type Definitions
 *
 * Value tree produced by the value parser. Only the subset of JSON the
 * netlist format uses is modeled: strings, non-negative integers,
 * arrays and objects.
 */

export interface JsonString {
  readonly kind: "string";
  readonly value: string;
}

export interface JsonInteger {
  readonly kind: "integer";
  readonly value: number;
}

export interface JsonArray {
  readonly kind: "array";
  readonly items: readonly JsonValue[];
}

/**
 * Object members in first-insertion order. Keys are unique.
 */
export interface JsonObject {
  readonly kind: "object";
  readonly entries: ReadonlyMap<string, JsonValue>;
}

export type JsonValue = JsonString | JsonInteger | JsonArray | JsonObject;

export type JsonValueKind = JsonValue["kind"];

/**
 * How the parser treats a key that appears twice in one object.
 * - last-wins: the later value replaces the earlier one
 * - reject: the duplicate raises a syntax error
 */
export type DuplicateKeyPolicy = "last-wins" | "reject";

export interface ParseOptions {
  duplicateKeys?: DuplicateKeyPolicy;
}

/** Largest integer literal the parser accepts (signed 32-bit maximum). */
export const MAX_INTEGER = 2147483647;

/** Deepest nesting of arrays and objects the parser accepts. */
export const MAX_NESTING_DEPTH = 512;

/**
 * Convert a value tree to plain JavaScript data.
 * Used for reporting and tests; the importer works on the tagged tree.
 */
export const toPlain = (value: JsonValue): unknown => {
  switch (value.kind) {
    case "string":
    case "integer":
      return value.value;
    case "array":
      return value.items.map(toPlain);
    case "object":
      return Object.fromEntries(
        Array.from(value.entries, ([key, child]) => [key, toPlain(child)]),
      );
  }
};
