/**
 * In-memory Netlist
 *
 * Modules made of fixed-width wires, cells with named ports, and
 * bit-level connections. `Design` is the container the JSON importer
 * writes into.
 */

import { NameConflictError, SchemaError } from "../errors.js";
import type {
  NetlistContainer,
  PortDirection,
  SigBit,
  WireBit,
  WireHandle,
} from "../types.js";
import { AUTO_ID_PREFIX, unescapeId } from "./ids.js";

export class Wire implements WireHandle {
  readonly name: string;
  readonly width: number;
  portInput = false;
  portOutput = false;
  /** 1-based position in the module's port list; 0 for internal wires. */
  portId = 0;

  constructor(name: string, width: number) {
    this.name = name;
    this.width = width;
  }

  get isPort(): boolean {
    return this.portInput || this.portOutput;
  }

  get direction(): PortDirection | undefined {
    if (this.portInput && this.portOutput) return "inout";
    if (this.portInput) return "input";
    if (this.portOutput) return "output";
    return undefined;
  }
}

export class Cell {
  readonly name: string;
  readonly type: string;
  readonly connections = new Map<string, SigBit<Wire>[]>();

  constructor(name: string, type: string) {
    this.name = name;
    this.type = type;
  }
}

export type Connection = [dst: WireBit<Wire>, src: SigBit<Wire>];

const compareNames = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

export class NetlistModule {
  readonly name: string;
  readonly wires = new Map<string, Wire>();
  readonly cells = new Map<string, Cell>();
  readonly connections: Connection[] = [];
  /** Port wire names in port order, filled by fixupPorts(). */
  ports: string[] = [];
  private autoIndex = 0;

  constructor(name: string) {
    this.name = name;
  }

  wire(name: string): Wire | undefined {
    return this.wires.get(name);
  }

  cell(name: string): Cell | undefined {
    return this.cells.get(name);
  }

  addWire(name: string, width: number): Wire {
    if (this.wires.has(name)) {
      throw new SchemaError(
        `Duplicate wire ${unescapeId(name)} in module ${unescapeId(this.name)}.`,
      );
    }
    const wire = new Wire(name, width);
    this.wires.set(name, wire);
    return wire;
  }

  addCell(name: string, type: string): Cell {
    if (this.cells.has(name)) {
      throw new SchemaError(
        `Duplicate cell ${unescapeId(name)} in module ${unescapeId(this.name)}.`,
      );
    }
    const cell = new Cell(name, type);
    this.cells.set(name, cell);
    return cell;
  }

  /**
   * Generate a wire name not used in this module.
   */
  newId(): string {
    let name: string;
    do {
      name = `${AUTO_ID_PREFIX}${++this.autoIndex}`;
    } while (this.wires.has(name));
    return name;
  }

  /**
   * Number the port wires. Wires that already have a port id keep their
   * relative order and come first; new port wires follow, sorted by name.
   */
  fixupPorts(): void {
    const portWires: Wire[] = [];
    for (const wire of this.wires.values()) {
      if (wire.isPort) {
        portWires.push(wire);
      } else {
        wire.portId = 0;
      }
    }

    portWires.sort((a, b) => {
      if (a.portId && b.portId) return a.portId - b.portId;
      if (a.portId !== b.portId) return a.portId ? -1 : 1;
      return compareNames(a.name, b.name);
    });

    portWires.forEach((wire, index) => {
      wire.portId = index + 1;
    });
    this.ports = portWires.map((wire) => wire.name);
  }
}

export class Design implements NetlistContainer<NetlistModule, Wire, Cell> {
  readonly modules = new Map<string, NetlistModule>();

  module(name: string): NetlistModule | undefined {
    return this.modules.get(name);
  }

  createModule(name: string): NetlistModule {
    if (this.modules.has(name)) {
      throw new NameConflictError(unescapeId(name));
    }
    const module = new NetlistModule(name);
    this.modules.set(name, module);
    return module;
  }

  getOrCreateWire(module: NetlistModule, name: string, width: number): Wire {
    return module.wire(name) ?? module.addWire(name, width);
  }

  setWireFlags(wire: Wire, isInput: boolean, isOutput: boolean): void {
    if (isInput) wire.portInput = true;
    if (isOutput) wire.portOutput = true;
  }

  commitPorts(module: NetlistModule): void {
    module.fixupPorts();
  }

  connect(module: NetlistModule, dst: WireBit<Wire>, src: SigBit<Wire>): void {
    module.connections.push([dst, src]);
  }

  createCell(module: NetlistModule, name: string, type: string): Cell {
    return module.addCell(name, type);
  }

  allocateAnonymousWire(module: NetlistModule, width = 1): Wire {
    return module.addWire(module.newId(), width);
  }

  bindCellPort(cell: Cell, portName: string, signal: SigBit<Wire>[]): void {
    cell.connections.set(portName, [...signal]);
  }
}
