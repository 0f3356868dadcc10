// ─── vgm-archive ────────────────────────────────────────────────────────────
//
// Caching client for the vgmusic.com MIDI archive.
//
// Usage:
//   import { Catalog, Downloader, readSnapshot } from "vgm-archive";
//
//   const catalog = await Catalog.open({ snapshot: await readSnapshot("cache.json") });
//   const songs = await catalog.searchByPattern({ system: "^SNES$", title: "[Bb]attle" });
// ─────────────────────────────────────────────────────────────────────────────

export * from "./songs/index.js";

// Transport
export { UndiciTransport } from "./http/transport.js";
export type { HttpTransport, TextResponse, TransportOptions } from "./http/transport.js";

// Errors
export {
  ArchiveError,
  NotFoundError,
  TransportError,
  ParseError,
  VerificationError,
  FormatError,
  toArchiveError,
  formatErrorMessage,
} from "./errors.js";
export type { ArchiveErrorKind, ArchiveErrorOptions, VerificationMismatch } from "./errors.js";

// Configuration & logging
export {
  loadConfig,
  ConfigSchema,
  VERSION,
  DEFAULT_BASE_URL,
  DEFAULT_CACHE_FILE,
  DEFAULT_DOWNLOAD_CONCURRENCY,
  DEFAULT_PAGE_CONCURRENCY,
  DEFAULT_TIMEOUT_MS,
} from "./config.js";
export type { ArchiveConfig } from "./config.js";
export { loggerFor } from "./logger.js";
export type { PrefixedLogger, LogLevel } from "./logger.js";
