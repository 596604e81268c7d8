// src/catalog/io.ts

import { readFile, writeFile, appendFile } from "node:fs/promises";
import path from "node:path";
import type { Frame } from "../types/frame";
import type { CatalogMeta, PidTable, Schema } from "../types/catalog";
import { CatalogError, errorMessage } from "../api/errors";
import { tlog } from "../api/settings";
import { synthesizeCatalog } from "./synthesize";
import { parseCatalogToml, schemaToToml } from "./toml";
import { parseDbc, readDbcMessageIds, schemaToDbc } from "./dbc";

export type CatalogFormat = "toml" | "dbc";

export interface MergeResult {
  format: CatalogFormat;
  /** Messages added by this merge */
  added: Schema;
  /** Identifiers the file already described */
  existingIds: Set<number>;
}

export function catalogFormat(filePath: string): CatalogFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".toml") return "toml";
  if (ext === ".dbc") return "dbc";
  throw new CatalogError(`Unsupported catalog type "${ext || filePath}" (expected .toml or .dbc)`);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw new CatalogError(`Cannot read catalog ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}

/** Load a TOML or DBC catalog for decoding */
export async function loadSchema(filePath: string): Promise<Schema> {
  const format = catalogFormat(filePath);
  const text = await readIfExists(filePath);
  if (text === null) {
    throw new CatalogError(`Catalog not found: ${filePath}`);
  }
  return format === "dbc" ? parseDbc(text) : parseCatalogToml(text).schema;
}

/**
 * Synthesize messages for identifiers the catalog does not describe yet and
 * write them to it. TOML catalogs are re-rendered whole; DBC catalogs are
 * appended to. A missing file is created.
 */
export async function mergeCatalogFile(
  filePath: string,
  frames: readonly Frame[],
  table: PidTable,
  meta: CatalogMeta = { name: path.parse(filePath).name, version: 1 }
): Promise<MergeResult> {
  const format = catalogFormat(filePath);
  const text = await readIfExists(filePath);

  let existing: Schema = new Map();
  let existingIds = new Set<number>();
  let catalogMeta = meta;
  if (text !== null) {
    if (format === "toml") {
      const parsed = parseCatalogToml(text);
      existing = parsed.schema;
      existingIds = new Set(existing.keys());
      catalogMeta = parsed.meta.name ? parsed.meta : meta;
    } else {
      existingIds = readDbcMessageIds(text);
    }
  }

  const added = synthesizeCatalog(frames, existingIds, table);
  if (added.size === 0 && text !== null) {
    tlog.info(`[catalog] ${filePath}: nothing new (${existingIds.size} known message(s))`);
    return { format, added, existingIds };
  }

  try {
    if (format === "toml") {
      const merged: Schema = new Map([...existing, ...added]);
      await writeFile(filePath, schemaToToml(merged, catalogMeta), "utf8");
    } else if (text === null) {
      await writeFile(filePath, schemaToDbc(added, { header: true }), "utf8");
    } else {
      await appendFile(filePath, "\n" + schemaToDbc(added, { header: false }), "utf8");
    }
  } catch (err) {
    throw new CatalogError(`Cannot write catalog ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  tlog.info(`[catalog] ${filePath}: added ${added.size} message(s)`);
  return { format, added, existingIds };
}
