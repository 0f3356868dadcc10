// ─── Song Records ───────────────────────────────────────────────────────────

import { FormatError } from "../errors.js";
import { SONG_FIELDS, type SongRecord } from "./types.js";

/**
 * Build a frozen SongRecord, copying only the five record fields.
 * Throws FormatError if size is not a non-negative integer.
 */
export function createSongRecord(fields: SongRecord): SongRecord {
  if (!Number.isInteger(fields.size) || fields.size < 0) {
    throw new FormatError(`size must be a non-negative integer: got ${fields.size}`, {
      field: "size",
    });
  }
  return Object.freeze({
    url: fields.url,
    title: fields.title,
    size: fields.size,
    author: fields.author,
    checksum: fields.checksum,
  });
}

/** Two records are equal when every field matches. */
export function songRecordsEqual(a: SongRecord, b: SongRecord): boolean {
  return SONG_FIELDS.every((field) => a[field] === b[field]);
}
