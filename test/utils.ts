/**
 * Test utilities for golden reference testing.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { DesignSummary } from "../src/types.js";

const TEST_DIR = path.dirname(new URL(import.meta.url).pathname);
const FIXTURES_DIR = path.join(TEST_DIR, "fixtures");
const GOLDEN_DIR = path.join(TEST_DIR, "golden");

export type Format = "json";

export interface Fixture {
  name: string;
  path: string;
  format: Format;
}

/**
 * List all fixture directories for a given format.
 * Returns an empty array if no fixtures exist.
 */
export const listFixtures = async (format: Format): Promise<Fixture[]> => {
  const formatDir = path.join(FIXTURES_DIR, format);

  try {
    const entries = await fs.readdir(formatDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => ({
        name: entry.name,
        path: path.join(formatDir, entry.name),
        format,
      }));
  } catch {
    return [];
  }
};

/**
 * List all fixtures across all formats.
 */
export const listAllFixtures = async (): Promise<Fixture[]> => {
  const formats: Format[] = ["json"];
  const results = await Promise.all(formats.map(listFixtures));
  return results.flat();
};

/**
 * Load golden output JSON for a fixture.
 * Returns null if the golden file doesn't exist.
 */
export const loadGolden = async (
  format: Format,
  designName: string,
): Promise<DesignSummary | null> => {
  const goldenPath = path.join(GOLDEN_DIR, format, `${designName}.json`);

  let content: string;
  try {
    content = await fs.readFile(goldenPath, "utf-8");
  } catch {
    return null;
  }
  const golden: DesignSummary = JSON.parse(content);
  return golden;
};

/**
 * Save golden output JSON for a fixture.
 */
export const saveGolden = async (
  format: Format,
  designName: string,
  data: DesignSummary,
): Promise<void> => {
  const goldenDir = path.join(GOLDEN_DIR, format);
  await fs.mkdir(goldenDir, { recursive: true });

  const goldenPath = path.join(goldenDir, `${designName}.json`);
  await fs.writeFile(goldenPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
};

/**
 * Recursively find design files within a fixture directory.
 */
export const findDesignFiles = async (fixture: Fixture): Promise<string[]> => {
  const results: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && path.extname(entry.name).toLowerCase() === ".json") {
        results.push(fullPath);
      }
    }
  };

  await walk(fixture.path);
  return results.sort((a, b) => a.localeCompare(b));
};
