import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { ResultSet } from "@archive-sweep/shared";

/**
 * JSON object keyed by record id, in ResultSet order. Built by hand because
 * JSON.stringify on an object would move integer-like keys to the front.
 */
export function serializeResultSet(result: ResultSet): string {
  if (result.size === 0) return "{}\n";
  const entries: string[] = [];
  for (const [id, record] of result) {
    entries.push(`  ${JSON.stringify(id)}: ${JSON.stringify(record)}`);
  }
  return `{\n${entries.join(",\n")}\n}\n`;
}

/** `<saveDir>/<fileName>.json`, without doubling the extension. */
export function resultSetPath(fileName: string, saveDir: string): string {
  const name = fileName.endsWith(".json") ? fileName : `${fileName}.json`;
  return path.join(saveDir, name);
}

/** Write `result` to `resultSetPath(fileName, saveDir)` and return that path. */
export async function persistResultSet(
  result: ResultSet,
  fileName: string,
  saveDir: string,
): Promise<string> {
  await mkdir(saveDir, { recursive: true });
  const target = resultSetPath(fileName, saveDir);
  await writeFile(target, serializeResultSet(result), "utf8");
  return target;
}

export type PersistFn = typeof persistResultSet;
