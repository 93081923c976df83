/**
 * Tests for the in-memory netlist and its summaries
 */

import { describe, it, expect } from "vitest";
import { NameConflictError, SchemaError } from "../errors.js";
import type { SigBit } from "../types.js";
import { Design, type Wire } from "./design.js";
import { escapeId, unescapeId } from "./ids.js";
import { formatBit, summarizeDesign } from "./summary.js";

describe("escapeId", () => {
  it("should prefix public names with a backslash", () => {
    expect(escapeId("clk")).toBe("\\clk");
  });

  it("should keep names that are already escaped or generated", () => {
    expect(escapeId("\\clk")).toBe("\\clk");
    expect(escapeId("$and")).toBe("$and");
  });

  it("should round-trip through unescapeId", () => {
    expect(unescapeId(escapeId("data_in"))).toBe("data_in");
    expect(unescapeId("$auto$json$1")).toBe("$auto$json$1");
  });
});

describe("Design", () => {
  it("should refuse to create a module twice", () => {
    const design = new Design();
    design.createModule("\\top");

    expect(() => design.createModule("\\top")).toThrow(NameConflictError);
    expect(() => design.createModule("\\top")).toThrow("Re-definition of module top.");
  });

  it("should return the existing wire regardless of the requested width", () => {
    const design = new Design();
    const module = design.createModule("\\m");

    const first = design.getOrCreateWire(module, "\\w", 4);
    const second = design.getOrCreateWire(module, "\\w", 8);

    expect(second).toBe(first);
    expect(second.width).toBe(4);
  });

  it("should accumulate wire flags", () => {
    const design = new Design();
    const module = design.createModule("\\m");
    const wire = design.getOrCreateWire(module, "\\p", 1);

    design.setWireFlags(wire, true, false);
    design.setWireFlags(wire, false, true);

    expect(wire.portInput).toBe(true);
    expect(wire.portOutput).toBe(true);
    expect(wire.direction).toBe("inout");
  });

  it("should reject duplicate cells", () => {
    const design = new Design();
    const module = design.createModule("\\m");
    design.createCell(module, "\\u1", "\\BUF");

    expect(() => design.createCell(module, "\\u1", "\\INV")).toThrow(SchemaError);
  });

  it("should generate anonymous wire names that skip existing wires", () => {
    const design = new Design();
    const module = design.createModule("\\m");
    design.getOrCreateWire(module, "$auto$json$1", 1);

    const wire = design.allocateAnonymousWire(module);

    expect(wire.name).toBe("$auto$json$2");
    expect(wire.width).toBe(1);
  });

  it("should copy the signal bound to a cell port", () => {
    const design = new Design();
    const module = design.createModule("\\m");
    const cell = design.createCell(module, "\\c", "\\X");
    const signal: SigBit<Wire>[] = ["0"];

    design.bindCellPort(cell, "\\A", signal);
    signal.push("1");

    expect(cell.connections.get("\\A")).toEqual(["0"]);
  });
});

describe("fixupPorts", () => {
  it("should keep existing port ids first and sort new ports by name", () => {
    const design = new Design();
    const module = design.createModule("\\m");
    const z = design.getOrCreateWire(module, "\\z", 1);
    const internal = design.getOrCreateWire(module, "\\internal", 1);
    design.setWireFlags(z, true, false);
    design.commitPorts(module);

    const b = design.getOrCreateWire(module, "\\b", 1);
    const a = design.getOrCreateWire(module, "\\a", 1);
    design.setWireFlags(b, false, true);
    design.setWireFlags(a, true, false);
    design.commitPorts(module);

    expect(module.ports).toEqual(["\\z", "\\a", "\\b"]);
    expect([z.portId, a.portId, b.portId, internal.portId]).toEqual([1, 2, 3, 0]);
  });
});

describe("summarizeDesign", () => {
  it("should render wire bits, constants and port directions", () => {
    const design = new Design();
    const module = design.createModule("\\top");
    const bus = design.getOrCreateWire(module, "\\bus", 2);
    const en = design.getOrCreateWire(module, "\\en", 1);
    design.setWireFlags(bus, false, true);
    design.setWireFlags(en, true, false);
    design.commitPorts(module);
    design.connect(module, { wire: bus, offset: 1 }, "z");
    const cell = design.createCell(module, "\\buf0", "$_BUF_");
    design.bindCellPort(cell, "\\A", [{ wire: en, offset: 0 }, "x"]);

    expect(summarizeDesign(design)).toEqual({
      modules: [
        {
          name: "top",
          ports: [
            { name: "bus", direction: "output", width: 2 },
            { name: "en", direction: "input", width: 1 },
          ],
          wires: [
            { name: "bus", width: 2 },
            { name: "en", width: 1 },
          ],
          cells: [{ name: "buf0", type: "$_BUF_", connections: { A: ["en", "x"] } }],
          connections: [["bus[1]", "z"]],
        },
      ],
    });
  });

  it("should format a single bit", () => {
    const design = new Design();
    const module = design.createModule("\\m");
    const wire = design.getOrCreateWire(module, "\\d", 8);

    expect(formatBit({ wire, offset: 7 })).toBe("d[7]");
    expect(formatBit("1")).toBe("1");
  });
});
