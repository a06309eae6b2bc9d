import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { parseMockCatalog, type MockCatalog } from "../../src/core/tools/mock_catalog";

export const DEFAULT_MOCK_CATALOG_PATH = fileURLToPath(
  new URL("../../data/mock_catalog.json", import.meta.url)
);

export function loadMockCatalog(filePath: string = DEFAULT_MOCK_CATALOG_PATH): MockCatalog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8")) as unknown;
  } catch (error) {
    throw new Error(
      `MOCK_CATALOG_PARSE_ERROR ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseMockCatalog(parsed);
}
