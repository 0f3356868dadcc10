// ─── Songs Subsystem ────────────────────────────────────────────────────────
//
// Everything for the archive: types, collections, catalog, snapshot,
// page fetching and downloads.
// ─────────────────────────────────────────────────────────────────────────────

// Types
export type {
  SongRecord,
  SongField,
  ParsedSong,
  PageMetadata,
  PageListing,
  PageFetcher,
  SystemEntry,
  SystemIndex,
  IndexSource,
  SongPredicate,
  PatternField,
  SongPatterns,
  SongMatch,
} from "./types.js";

export { SONG_FIELDS, PATTERN_FIELDS } from "./types.js";

// Records
export { createSongRecord, songRecordsEqual } from "./record.js";

// Collections & catalog
export { SystemCollection } from "./collection.js";
export { Catalog, withCatalog } from "./catalog.js";
export type { CatalogOptions, OpenCatalogOptions, PopulateOptions } from "./catalog.js";

// Page fetching (HTML → records)
export { HtmlPageFetcher, HtmlIndexSource, SnapshotIndexSource, readPageMetadata } from "./fetcher.js";
export { parseSystemPage, parseIndexPage } from "./page-parser.js";
export type { SystemPage } from "./page-parser.js";

// Downloads
export { Downloader, verifySong, md5Hex, summarizeDownloads } from "./downloader.js";
export type { DownloadOptions, DownloadOutcome, DownloadStatus, DownloadSummary } from "./downloader.js";
export { toSafeFilename, extensionFromUrl, planFilenames } from "./filename.js";

// Snapshot schemas
export {
  SNAPSHOT_SCHEMA_VERSION,
  SongRecordSchema,
  SerializedCollectionSchema,
  IndexEntrySchema,
  SnapshotFileSchema,
  describeIssues,
} from "./snapshot/schema.js";
export type {
  SerializedSong,
  SerializedCollection,
  CatalogSnapshot,
  SnapshotFile,
  SnapshotIssue,
} from "./snapshot/schema.js";

// Snapshot loader
export { parseSnapshot, readSnapshot, buildSnapshotFile, writeSnapshot } from "./snapshot/loader.js";

// Formatting & queries
export {
  parseQuery,
  pickPatterns,
  formatMatchTable,
  formatMatchList,
  formatDownloadReport,
  padRight,
  truncate,
} from "./format.js";
