#!/usr/bin/env npx tsx
import { parseDesign } from "../src/parsers/index.js";
import { summarizeDesign } from "../src/netlist/summary.js";
import { saveGolden, type Format } from "../test/utils.js";

const [format, name, designPath] = process.argv.slice(2);

if (format !== "json" || !name || !designPath) {
  console.error("Usage: npx tsx scripts/gen-golden.ts json <name> <path>");
  process.exit(1);
}

const goldenFormat: Format = format;

console.log("Parsing:", designPath);
const summary = summarizeDesign(await parseDesign(designPath));
console.log("Modules:", summary.modules.length);
await saveGolden(goldenFormat, name, summary);
console.log("Saved:", `test/golden/${goldenFormat}/${name}.json`);
