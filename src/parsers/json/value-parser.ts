/**
 * JSON Value Parser
 *
 * Minimal recursive-descent reader for the JSON subset used by netlist
 * documents. The first significant character decides the value type and
 * the parser commits to that branch.
 *
 * Separators are handled loosely: runs of whitespace and commas between
 * array items or object members are skipped, and runs of whitespace and
 * colons between a key and its value are skipped. String escapes copy the
 * escaped character verbatim.
 */

import { JsonSyntaxError, StreamError } from "../../errors.js";
import { CharStream } from "./char-stream.js";
import {
  MAX_INTEGER,
  MAX_NESTING_DEPTH,
  type JsonArray,
  type JsonInteger,
  type JsonObject,
  type JsonString,
  type JsonValue,
  type ParseOptions,
} from "./types.js";

const isWhitespace = (ch: string): boolean =>
  ch === " " || ch === "\t" || ch === "\r" || ch === "\n";

const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";

const describeLocation = (stream: CharStream): string => {
  const { line, column } = stream.location();
  return `line ${line}, column ${column}`;
};

const unexpectedEnd = (context: string): StreamError =>
  new StreamError(`Unexpected end of input in JSON ${context}.`);

/**
 * Skip whitespace; stops in front of the first other character.
 */
const skipWhitespace = (stream: CharStream): void => {
  for (;;) {
    const ch = stream.get();
    if (ch === undefined) {
      return;
    }
    if (!isWhitespace(ch)) {
      stream.unget();
      return;
    }
  }
};

/**
 * Skip a run of whitespace and the given separator character.
 * End of input inside the run is an error since a value must follow.
 */
const skipSeparators = (stream: CharStream, separator: string, context: string): string => {
  for (;;) {
    const ch = stream.get();
    if (ch === undefined) {
      throw unexpectedEnd(context);
    }
    if (isWhitespace(ch) || ch === separator) {
      continue;
    }
    return ch;
  }
};

const parseString = (stream: CharStream): JsonString => {
  let value = "";

  for (;;) {
    const ch = stream.get();
    if (ch === undefined) {
      throw unexpectedEnd("string");
    }
    if (ch === '"') {
      break;
    }
    if (ch === "\\") {
      const escaped = stream.get();
      if (escaped === undefined) {
        throw unexpectedEnd("string");
      }
      value += escaped;
      continue;
    }
    value += ch;
  }

  return { kind: "string", value };
};

const parseInteger = (stream: CharStream, first: string): JsonInteger => {
  let value = Number(first);

  for (;;) {
    const ch = stream.get();
    if (ch === undefined) {
      break;
    }
    if (!isDigit(ch)) {
      stream.unget();
      break;
    }
    value = value * 10 + Number(ch);
    if (value > MAX_INTEGER) {
      throw new JsonSyntaxError(
        `Integer literal out of range in JSON file at ${describeLocation(stream)}.`,
      );
    }
  }

  return { kind: "integer", value };
};

const parseArray = (stream: CharStream, options: ParseOptions, depth: number): JsonArray => {
  const items: JsonValue[] = [];

  for (;;) {
    const ch = skipSeparators(stream, ",", "array");
    if (ch === "]") {
      break;
    }
    stream.unget();
    items.push(parseValueAt(stream, options, depth));
  }

  return { kind: "array", items };
};

const parseObject = (stream: CharStream, options: ParseOptions, depth: number): JsonObject => {
  const entries = new Map<string, JsonValue>();

  for (;;) {
    const ch = skipSeparators(stream, ",", "object");
    if (ch === "}") {
      break;
    }
    stream.unget();

    const key = parseValueAt(stream, options, depth);
    if (key.kind !== "string") {
      throw new JsonSyntaxError(
        `Unexpected non-string key in JSON object at ${describeLocation(stream)}.`,
      );
    }

    skipSeparators(stream, ":", "object");
    stream.unget();

    const value = parseValueAt(stream, options, depth);

    if (options.duplicateKeys === "reject" && entries.has(key.value)) {
      throw new JsonSyntaxError(
        `Duplicate key '${key.value}' in JSON object at ${describeLocation(stream)}.`,
      );
    }
    entries.set(key.value, value);
  }

  return { kind: "object", entries };
};

/**
 * Parse the value at the stream position. `depth` counts the arrays and
 * objects enclosing it.
 */
const parseValueAt = (stream: CharStream, options: ParseOptions, depth: number): JsonValue => {
  for (;;) {
    const ch = stream.get();

    if (ch === undefined) {
      throw unexpectedEnd("file");
    }
    if (isWhitespace(ch)) {
      continue;
    }
    if (ch === '"') {
      return parseString(stream);
    }
    if (isDigit(ch)) {
      return parseInteger(stream, ch);
    }
    if (ch === "[" || ch === "{") {
      if (depth >= MAX_NESTING_DEPTH) {
        throw new JsonSyntaxError(
          `Nesting deeper than ${MAX_NESTING_DEPTH} levels in JSON file at ${describeLocation(stream)}.`,
        );
      }
      return ch === "["
        ? parseArray(stream, options, depth + 1)
        : parseObject(stream, options, depth + 1);
    }

    throw new JsonSyntaxError(
      `Unexpected character in JSON file: '${ch}' at ${describeLocation(stream)}.`,
    );
  }
};

/**
 * Parse exactly one value from the front of the stream.
 * Whitespace around the value is consumed; anything after it is left
 * in the stream.
 */
export const parseValue = (stream: CharStream, options: ParseOptions = {}): JsonValue => {
  const value = parseValueAt(stream, options, 0);
  skipWhitespace(stream);
  return value;
};

/**
 * Parse one value from the start of a string (pure function for testing).
 */
export const parseValueText = (text: string, options: ParseOptions = {}): JsonValue =>
  parseValue(new CharStream(text), options);
