/**
 * JSON Netlist Importer
 *
 * Walks a parsed value tree of the form
 *   { "modules": { <name>: { "ports": ..., "netnames": ..., "cells": ... } } }
 * and writes wires, cells and connections into a netlist container.
 *
 * Integer bit entries are module-scoped signal ids: every occurrence of
 * the same id is the same electrical signal. The first occurrence becomes
 * the representative bit and later occurrences are connected to it.
 * Ports, netnames and cells are processed in that order, in one pass each.
 */

import { SchemaError } from "../../errors.js";
import { escapeId } from "../../netlist/ids.js";
import {
  isConstant,
  type BitRef,
  type NetlistContainer,
  type PortDirection,
  type SigBit,
  type WireBit,
  type WireHandle,
} from "../../types.js";
import type { JsonArray, JsonObject, JsonValue } from "./types.js";

export interface ImportOptions {
  /** Receives one progress line per module. */
  log?: (message: string) => void;
}

/**
 * Signal id -> representative bit, scoped to one module.
 */
type SignalTable<W extends WireHandle> = Map<number, WireBit<W>>;

interface ModuleContext<M, W extends WireHandle, C> {
  container: NetlistContainer<M, W, C>;
  module: M;
  moduleName: string;
  signals: SignalTable<W>;
}

const DIRECTIONS: readonly PortDirection[] = ["input", "output", "inout"];

const parseDirection = (value: string): PortDirection | undefined =>
  DIRECTIONS.find((direction) => direction === value);

const expectObject = (value: JsonValue, subject: string): JsonObject => {
  if (value.kind !== "object") {
    throw new SchemaError(`${subject} is not an object.`);
  }
  return value;
};

const requireKey = (node: JsonObject, key: string, subject: string): JsonValue => {
  const value = node.entries.get(key);
  if (value === undefined) {
    throw new SchemaError(`${subject} has no ${key} attribute.`);
  }
  return value;
};

const requireBits = (node: JsonObject, subject: string): JsonArray => {
  const bits = requireKey(node, "bits", subject);
  if (bits.kind !== "array") {
    throw new SchemaError(`${subject} has a non-array bits attribute.`);
  }
  return bits;
};

/**
 * Classify one `bits` entry: "0" | "1" | "x" | "z" or a signal id.
 */
export const classifyBit = (value: JsonValue, subject: string, index: number): BitRef => {
  if (value.kind === "integer") {
    return { kind: "signal", id: value.value };
  }
  if (value.kind === "string") {
    if (isConstant(value.value)) {
      return { kind: "constant", value: value.value };
    }
    throw new SchemaError(
      `${subject} has invalid '${value.value}' bit string value on bit ${index}.`,
    );
  }
  throw new SchemaError(`${subject} has invalid bit value on bit ${index}.`);
};

const sameBit = <W extends WireHandle>(a: WireBit<W>, b: WireBit<W>): boolean =>
  a.wire === b.wire && a.offset === b.offset;

/**
 * Wire bit at `offset`, checking it fits a wire that may have been
 * created earlier with a different width.
 */
const wireBit = <W extends WireHandle>(wire: W, offset: number, subject: string): WireBit<W> => {
  if (offset >= wire.width) {
    throw new SchemaError(
      `${subject} has more bits than the existing ${wire.width}-bit wire.`,
    );
  }
  return { wire, offset };
};

// =============================================================================
// Passes
// =============================================================================

const importPorts = <M, W extends WireHandle, C>(
  ctx: ModuleContext<M, W, C>,
  portsValue: JsonValue,
): void => {
  const { container, module, moduleName, signals } = ctx;
  const portsNode = expectObject(portsValue, `JSON ports node of module '${moduleName}'`);

  for (const [portName, portValue] of portsNode.entries) {
    const subject = `JSON port '${portName}' of module '${moduleName}'`;
    const portNode = expectObject(portValue, subject);

    const directionNode = requireKey(portNode, "direction", subject);
    const bits = requireBits(portNode, subject);

    if (directionNode.kind !== "string") {
      throw new SchemaError(`${subject} has a non-string direction attribute.`);
    }
    const direction = parseDirection(directionNode.value);
    if (!direction) {
      throw new SchemaError(
        `${subject} has invalid '${directionNode.value}' direction attribute.`,
      );
    }

    const wire = container.getOrCreateWire(module, escapeId(portName), bits.items.length);
    container.setWireFlags(wire, direction !== "output", direction !== "input");

    bits.items.forEach((item, index) => {
      const bit = classifyBit(item, subject, index);
      const sigbit = wireBit(wire, index, subject);

      if (bit.kind === "constant") {
        container.connect(module, sigbit, bit.value);
        return;
      }

      const existing = signals.get(bit.id);
      if (!existing) {
        signals.set(bit.id, sigbit);
      } else if (wire.portOutput) {
        container.connect(module, sigbit, existing);
      } else {
        // An input bit drives the earlier occurrence and takes over as
        // representative.
        container.connect(module, existing, sigbit);
        signals.set(bit.id, sigbit);
      }
    });
  }

  container.commitPorts(module);
};

const importNetnames = <M, W extends WireHandle, C>(
  ctx: ModuleContext<M, W, C>,
  netnamesValue: JsonValue,
): void => {
  const { container, module, moduleName, signals } = ctx;
  const netnamesNode = expectObject(netnamesValue, `JSON netnames node of module '${moduleName}'`);

  for (const [netName, netValue] of netnamesNode.entries) {
    const subject = `JSON netname '${netName}' of module '${moduleName}'`;
    const netNode = expectObject(netValue, subject);
    const bits = requireBits(netNode, subject);

    const wire = container.getOrCreateWire(module, escapeId(netName), bits.items.length);

    bits.items.forEach((item, index) => {
      const bit = classifyBit(item, subject, index);
      const sigbit = wireBit(wire, index, subject);

      if (bit.kind === "constant") {
        container.connect(module, sigbit, bit.value);
        return;
      }

      const existing = signals.get(bit.id);
      if (!existing) {
        signals.set(bit.id, sigbit);
      } else if (!sameBit(existing, sigbit)) {
        container.connect(module, sigbit, existing);
      }
    });
  }
};

const importCells = <M, W extends WireHandle, C>(
  ctx: ModuleContext<M, W, C>,
  cellsValue: JsonValue,
): void => {
  const { container, module, moduleName, signals } = ctx;
  const cellsNode = expectObject(cellsValue, `JSON cells node of module '${moduleName}'`);

  for (const [cellName, cellValue] of cellsNode.entries) {
    const subject = `JSON cell '${cellName}' of module '${moduleName}'`;
    const cellNode = expectObject(cellValue, subject);

    const typeNode = requireKey(cellNode, "type", subject);
    if (typeNode.kind !== "string") {
      throw new SchemaError(`${subject} has a non-string type attribute.`);
    }

    const cell = container.createCell(module, escapeId(cellName), escapeId(typeNode.value));

    const connectionsNode = requireKey(cellNode, "connections", subject);
    if (connectionsNode.kind !== "object") {
      throw new SchemaError(`${subject} has a non-object connections attribute.`);
    }

    for (const [connName, connValue] of connectionsNode.entries) {
      const connSubject = `JSON cell '${cellName}' connection '${connName}' of module '${moduleName}'`;
      if (connValue.kind !== "array") {
        throw new SchemaError(`${connSubject} is not an array.`);
      }

      const signal = connValue.items.map((item, index): SigBit<W> => {
        const bit = classifyBit(item, connSubject, index);
        if (bit.kind === "constant") {
          return bit.value;
        }

        const existing = signals.get(bit.id);
        if (existing) {
          return existing;
        }
        const fresh: WireBit<W> = {
          wire: container.allocateAnonymousWire(module, 1),
          offset: 0,
        };
        signals.set(bit.id, fresh);
        return fresh;
      });

      container.bindCellPort(cell, escapeId(connName), signal);
    }
  }
};

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Import one module description into the container.
 */
export const importModule = <M, W extends WireHandle, C>(
  container: NetlistContainer<M, W, C>,
  moduleName: string,
  moduleValue: JsonValue,
  options: ImportOptions = {},
): M => {
  options.log?.(`Importing module ${moduleName} from JSON tree.`);

  const moduleNode = expectObject(moduleValue, `JSON module '${moduleName}'`);
  const module = container.createModule(escapeId(moduleName));

  // Attributes and parameters are not imported.
  const ctx: ModuleContext<M, W, C> = {
    container,
    module,
    moduleName,
    signals: new Map(),
  };

  const ports = moduleNode.entries.get("ports");
  if (ports !== undefined) {
    importPorts(ctx, ports);
  }

  const netnames = moduleNode.entries.get("netnames");
  if (netnames !== undefined) {
    importNetnames(ctx, netnames);
  }

  const cells = moduleNode.entries.get("cells");
  if (cells !== undefined) {
    importCells(ctx, cells);
  }

  return module;
};

/**
 * Import every module of a parsed document, in document order.
 * A document without a "modules" key imports nothing.
 */
export const importDesign = <M, W extends WireHandle, C>(
  root: JsonValue,
  container: NetlistContainer<M, W, C>,
  options: ImportOptions = {},
): void => {
  const rootNode = expectObject(root, "JSON root node");

  const modules = rootNode.entries.get("modules");
  if (modules === undefined) {
    return;
  }

  const modulesNode = expectObject(modules, "JSON modules node");
  for (const [moduleName, moduleValue] of modulesNode.entries) {
    importModule(container, moduleName, moduleValue, options);
  }
};
