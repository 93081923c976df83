/**
 * Design summaries: JSON-serializable views of an in-memory design with
 * names unescaped and bits rendered as text.
 */

import { isWireBit, type CellSummary, type DesignSummary, type ModuleSummary, type SigBit } from "../types.js";
import type { Cell, Design, NetlistModule, Wire } from "./design.js";
import { unescapeId } from "./ids.js";

/**
 * Render one bit: the constant itself, the wire name for 1-bit wires,
 * or `name[offset]`.
 */
export const formatBit = (bit: SigBit<Wire>): string => {
  if (!isWireBit(bit)) {
    return bit;
  }
  const name = unescapeId(bit.wire.name);
  return bit.wire.width === 1 ? name : `${name}[${bit.offset}]`;
};

export const summarizeCell = (cell: Cell): CellSummary => ({
  name: unescapeId(cell.name),
  type: unescapeId(cell.type),
  connections: Object.fromEntries(
    Array.from(cell.connections, ([port, signal]) => [unescapeId(port), signal.map(formatBit)]),
  ),
});

export const summarizeModule = (module: NetlistModule): ModuleSummary => {
  const ports: ModuleSummary["ports"] = [];
  for (const name of module.ports) {
    const wire = module.wire(name);
    const direction = wire?.direction;
    if (wire && direction) {
      ports.push({ name: unescapeId(name), direction, width: wire.width });
    }
  }

  return {
    name: unescapeId(module.name),
    ports,
    wires: Array.from(module.wires.values(), (wire) => ({
      name: unescapeId(wire.name),
      width: wire.width,
    })),
    cells: Array.from(module.cells.values(), summarizeCell),
    connections: module.connections.map(
      ([dst, src]): [string, string] => [formatBit(dst), formatBit(src)],
    ),
  };
};

export const summarizeDesign = (design: Design): DesignSummary => ({
  modules: Array.from(design.modules.values(), summarizeModule),
});
