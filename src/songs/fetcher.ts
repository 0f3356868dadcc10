// ─── Page Fetcher ───────────────────────────────────────────────────────────
//
// Glue between the transport and the page parser: fetch a page, parse it,
// attach the HTTP metadata (ETag, Last-Modified) the cache keys on.
// ─────────────────────────────────────────────────────────────────────────────

import type { HttpTransport } from "../http/transport.js";
import { loggerFor } from "../logger.js";
import { DEFAULT_BASE_URL } from "../config.js";
import { parseIndexPage, parseSystemPage } from "./page-parser.js";
import type { SnapshotFile } from "./snapshot/schema.js";
import type {
  IndexSource,
  PageFetcher,
  PageListing,
  PageMetadata,
  SystemEntry,
  SystemIndex,
} from "./types.js";

const log = loggerFor("fetcher");

export class HtmlPageFetcher implements PageFetcher {
  constructor(private readonly transport: HttpTransport) {}

  async fetchPage(url: string): Promise<PageListing> {
    const response = await this.transport.getText(url);
    const page = parseSystemPage(response.body, response.url);
    return {
      records: page.records,
      ...readPageMetadata(response.headers),
      indexerVersion: page.indexerVersion,
    };
  }
}

/** Pull the cache metadata out of response headers. */
export function readPageMetadata(headers: Record<string, string>): PageMetadata {
  const metadata: PageMetadata = {};

  const etag = headers["etag"];
  if (etag) metadata.revisionTag = etag;

  const modified = headers["last-modified"];
  if (modified) {
    const parsed = new Date(modified);
    if (!Number.isNaN(parsed.getTime())) metadata.lastUpdated = parsed.toISOString();
  }

  return metadata;
}

// ─── Index Sources ──────────────────────────────────────────────────────────

/** Reads the system list from the archive's front page. */
export class HtmlIndexSource implements IndexSource {
  constructor(
    private readonly transport: HttpTransport,
    private readonly baseUrl: string = DEFAULT_BASE_URL
  ) {}

  async loadIndex(): Promise<SystemIndex> {
    const response = await this.transport.getText(this.baseUrl);
    const index = parseIndexPage(response.body, response.url);
    log.info(`indexed ${index.size} systems from ${this.baseUrl}`);
    return index;
  }
}

/**
 * Rebuilds the system list from a snapshot alone: the saved index first,
 * then every saved system (whose own URL and section win).
 */
export class SnapshotIndexSource implements IndexSource {
  constructor(private readonly snapshot: SnapshotFile) {}

  async loadIndex(): Promise<SystemIndex> {
    const index = new Map<string, SystemEntry>();
    for (const [name, entry] of Object.entries(this.snapshot.index ?? {})) {
      index.set(name, { url: entry.url, section: entry.section });
    }
    for (const [name, system] of Object.entries(this.snapshot.systems)) {
      index.set(name, { url: system.source_url, section: system.section_label });
    }
    return index;
  }
}
