// ─── Snapshot Loader ─────────────────────────────────────────────────────────
//
// Reads and writes the snapshot file. Accepts both the wrapped form
// ({ schema_version, index, systems }) and a bare system → collection map.
// ─────────────────────────────────────────────────────────────────────────────

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { FormatError, formatErrorMessage } from "../../errors.js";
import type { SystemEntry } from "../types.js";
import {
  SNAPSHOT_SCHEMA_VERSION,
  SnapshotFileSchema,
  describeIssues,
  type CatalogSnapshot,
  type SnapshotFile,
} from "./schema.js";

/**
 * Validate parsed JSON as a snapshot file.
 * Throws FormatError naming the first bad field.
 */
export function parseSnapshot(raw: unknown): SnapshotFile {
  const wrapped = isWrapped(raw) ? raw : { schema_version: SNAPSHOT_SCHEMA_VERSION, systems: raw };
  const result = SnapshotFileSchema.safeParse(wrapped);
  if (!result.success) {
    const [issue] = describeIssues(result.error);
    throw new FormatError(`Invalid snapshot: ${issue.field}: ${issue.message}`, { field: issue.field });
  }
  return result.data;
}

function isWrapped(raw: unknown): boolean {
  return typeof raw === "object" && raw !== null && "schema_version" in raw && "systems" in raw;
}

/** Read a snapshot file. Resolves null when the file does not exist. */
export async function readSnapshot(filePath: string): Promise<SnapshotFile | null> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new FormatError(`Snapshot ${filePath} is not valid JSON: ${formatErrorMessage(error)}`, {
      cause: error,
    });
  }
  return parseSnapshot(raw);
}

export function buildSnapshotFile(
  systems: CatalogSnapshot,
  index?: Record<string, SystemEntry>,
  savedAt: Date = new Date()
): SnapshotFile {
  return {
    schema_version: SNAPSHOT_SCHEMA_VERSION,
    saved_at: savedAt.toISOString(),
    ...(index ? { index } : {}),
    systems,
  };
}

/**
 * Write a snapshot file, creating parent directories as needed.
 * Returns the path written.
 */
export async function writeSnapshot(filePath: string, snapshot: SnapshotFile): Promise<string> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(snapshot, null, 2) + "\n", "utf8");
  return filePath;
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
