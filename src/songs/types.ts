// ─── Song Types ─────────────────────────────────────────────────────────────
//
// The archive is a three-level tree:
//   1. System   a console/computer page on the archive (NES, SNES, ...)
//   2. Game     a soundtrack heading on that page
//   3. Song     one downloadable MIDI file (SongRecord)
//
// Pages are fetched lazily; a system's songs exist only after its page has
// been fetched once or restored from a snapshot.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Song Record ────────────────────────────────────────────────────────────

/** One downloadable MIDI file. Frozen once created. */
export interface SongRecord {
  /** Absolute, direct URL of the file. */
  readonly url: string;

  /** Song name as listed on the system page. */
  readonly title: string;

  /** File size in bytes. */
  readonly size: number;

  /** Who sequenced the MIDI. */
  readonly author: string;

  /** Lowercase hex MD5 of the file, as published by the archive. */
  readonly checksum: string;
}

export const SONG_FIELDS = ["url", "title", "size", "author", "checksum"] as const;
export type SongField = (typeof SONG_FIELDS)[number];

// ─── Page Fetching ──────────────────────────────────────────────────────────

/** A song row as parsed from a system page, tagged with its game heading. */
export interface ParsedSong extends SongRecord {
  readonly game: string;
}

/** Page-level metadata that travels with a system's songs. */
export interface PageMetadata {
  /** ISO-8601 time the page was last modified (from Last-Modified). */
  lastUpdated?: string;

  /** Opaque revision tag (the page's ETag). */
  revisionTag?: string;

  /** Version of the archive's indexer that generated the page. */
  indexerVersion?: string;
}

export interface PageListing extends PageMetadata {
  records: ParsedSong[];
  sectionLabel?: string;
}

/**
 * Turns a system page URL into song records.
 * Rejects with ParseError for an unrecognised page and TransportError when
 * the page cannot be retrieved.
 */
export interface PageFetcher {
  fetchPage(url: string): Promise<PageListing>;
}

// ─── Bootstrap Index ────────────────────────────────────────────────────────

export interface SystemEntry {
  /** Absolute URL of the system page. */
  url: string;

  /** Menu section the system is listed under (usually the manufacturer). */
  section: string;
}

/** System name → where its page lives. Fixed for the life of a catalog. */
export type SystemIndex = ReadonlyMap<string, SystemEntry>;

export interface IndexSource {
  loadIndex(): Promise<SystemIndex>;
}

// ─── Search ─────────────────────────────────────────────────────────────────

export type SongPredicate = (system: string, game: string, record: SongRecord) => boolean;

export const PATTERN_FIELDS = ["system", "game", ...SONG_FIELDS] as const;
export type PatternField = (typeof PATTERN_FIELDS)[number];

/**
 * Per-field regular expressions. `system` and `game` match the container
 * names; the rest match the record's fields. Matching is unanchored.
 */
export type SongPatterns = Partial<Record<PatternField, string | RegExp>>;

export interface SongMatch {
  system: string;
  game: string;
  record: SongRecord;
}
