// ─── Snapshot Schema ────────────────────────────────────────────────────────
//
// The on-disk cache. A snapshot holds every populated system's songs plus
// the bootstrap index, so a catalog can be rebuilt without touching the
// network. Field names are snake_case.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

export const SNAPSHOT_SCHEMA_VERSION = 1;

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const SongRecordSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
  size: z.number().int().nonnegative(),
  author: z.string(),
  checksum: z.string(),
});

export const SerializedCollectionSchema = z.object({
  source_url: z.string().min(1),
  section_label: z.string(),
  games: z.record(z.array(SongRecordSchema)),
  last_updated: z.string().nullable().default(null),
  revision_tag: z.string().nullable().default(null),
  indexer_version: z.string().nullable().default(null),
});

export const IndexEntrySchema = z.object({
  url: z.string().min(1),
  section: z.string(),
});

export const SnapshotFileSchema = z.object({
  schema_version: z.literal(SNAPSHOT_SCHEMA_VERSION),
  saved_at: z.string().optional(),
  index: z.record(IndexEntrySchema).optional(),
  systems: z.record(SerializedCollectionSchema),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type SerializedSong = z.infer<typeof SongRecordSchema>;
export type SerializedCollection = z.infer<typeof SerializedCollectionSchema>;
export type CatalogSnapshot = Record<string, SerializedCollection>;
export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface SnapshotIssue {
  field: string;
  message: string;
}

/** Flatten zod issues into dotted field paths. */
export function describeIssues(error: z.ZodError): SnapshotIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}
