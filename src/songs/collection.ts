// ─── System Collection ──────────────────────────────────────────────────────
//
// One system's songs, grouped by game. A collection starts empty and
// unpopulated; the first query fetches its page. Concurrent first queries
// share a single in-flight fetch, so a page is fetched at most once per
// collection unless refresh() is called. A failed fetch leaves the
// collection unpopulated and the next query tries again.
// ─────────────────────────────────────────────────────────────────────────────

import { FormatError, NotFoundError } from "../errors.js";
import { loggerFor } from "../logger.js";
import { createSongRecord } from "./record.js";
import {
  SerializedCollectionSchema,
  describeIssues,
  type SerializedCollection,
} from "./snapshot/schema.js";
import type { PageFetcher, PageListing, PageMetadata, SongRecord, SystemEntry } from "./types.js";

const log = loggerFor("collection");

export class SystemCollection {
  readonly name: string;
  readonly sourceUrl: string;

  private section: string;
  private games = new Map<string, SongRecord[]>();
  private metadata: PageMetadata = {};
  private populated = false;
  private pending: Promise<boolean> | null = null;

  constructor(name: string, entry: SystemEntry, private readonly fetcher: PageFetcher) {
    this.name = name;
    this.sourceUrl = entry.url;
    this.section = entry.section;
  }

  /**
   * Rebuild a populated collection from serialize() output. No fetch.
   * Throws FormatError naming the first bad field.
   */
  static deserialize(name: string, data: unknown, fetcher: PageFetcher): SystemCollection {
    const result = SerializedCollectionSchema.safeParse(data);
    if (!result.success) {
      const [issue] = describeIssues(result.error);
      throw new FormatError(`Invalid snapshot for system "${name}": ${issue.field}: ${issue.message}`, {
        field: `${name}.${issue.field}`,
      });
    }

    const saved = result.data;
    const collection = new SystemCollection(name, { url: saved.source_url, section: saved.section_label }, fetcher);
    for (const [game, songs] of Object.entries(saved.games)) {
      collection.games.set(game, songs.map((song) => createSongRecord(song)));
    }
    collection.metadata = {
      lastUpdated: saved.last_updated ?? undefined,
      revisionTag: saved.revision_tag ?? undefined,
      indexerVersion: saved.indexer_version ?? undefined,
    };
    collection.populated = true;
    return collection;
  }

  // ─── State ────────────────────────────────────────────────────────────────

  get isPopulated(): boolean {
    return this.populated;
  }

  get sectionLabel(): string {
    return this.section;
  }

  get lastUpdated(): string | undefined {
    return this.metadata.lastUpdated;
  }

  get revisionTag(): string | undefined {
    return this.metadata.revisionTag;
  }

  get indexerVersion(): string | undefined {
    return this.metadata.indexerVersion;
  }

  // ─── Queries (each populates first) ───────────────────────────────────────

  /** Songs for one game, in page order. */
  async get(game: string): Promise<readonly SongRecord[]> {
    await this.populate();
    const songs = this.games.get(game);
    if (!songs) {
      throw new NotFoundError(`Game not found in ${this.name}: "${game}"`, {
        details: { system: this.name, game },
      });
    }
    return songs;
  }

  async has(game: string): Promise<boolean> {
    await this.populate();
    return this.games.has(game);
  }

  async keys(): Promise<IterableIterator<string>> {
    await this.populate();
    return this.games.keys();
  }

  async entries(): Promise<IterableIterator<[string, readonly SongRecord[]]>> {
    await this.populate();
    return this.games.entries();
  }

  async gameCount(): Promise<number> {
    await this.populate();
    return this.games.size;
  }

  async totalSongs(): Promise<number> {
    await this.populate();
    let total = 0;
    for (const songs of this.games.values()) total += songs.length;
    return total;
  }

  /**
   * Plain-object form for the snapshot file. Populates first: an unpopulated
   * collection is fetched rather than saved empty. Games are emitted in
   * sorted order so identical data always serializes identically.
   */
  async serialize(): Promise<SerializedCollection> {
    await this.populate();
    return this.toSerialized();
  }

  /** serialize() without the population step; only valid once populated. */
  toSerialized(): SerializedCollection {
    const games: SerializedCollection["games"] = Object.fromEntries(
      [...this.games.keys()]
        .sort()
        .map((game) => [game, (this.games.get(game) ?? []).map((song) => ({ ...song }))] as const)
    );
    return {
      source_url: this.sourceUrl,
      section_label: this.section,
      games,
      last_updated: this.metadata.lastUpdated ?? null,
      revision_tag: this.metadata.revisionTag ?? null,
      indexer_version: this.metadata.indexerVersion ?? null,
    };
  }

  // ─── Population ───────────────────────────────────────────────────────────

  /** Fetch the page unless already populated. Joins a fetch already in flight. */
  async populate(): Promise<void> {
    if (this.populated) return;
    await this.load();
  }

  /**
   * Re-fetch the page. Keeps the current songs when the page's revision tag
   * is unchanged. Returns true when the songs were (re)loaded.
   */
  async refresh(): Promise<boolean> {
    return this.load();
  }

  private load(): Promise<boolean> {
    if (!this.pending) {
      this.pending = this.fetchAndApply().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async fetchAndApply(): Promise<boolean> {
    log.info(`fetching ${this.name}`, { url: this.sourceUrl });
    const listing = await this.fetcher.fetchPage(this.sourceUrl);

    if (
      this.populated &&
      listing.revisionTag !== undefined &&
      listing.revisionTag === this.metadata.revisionTag
    ) {
      log.debug(`${this.name} unchanged (revision ${listing.revisionTag})`);
      return false;
    }

    this.apply(listing);
    log.info(`${this.name} ok (${this.games.size} games)`);
    return true;
  }

  private apply(listing: PageListing): void {
    const games = new Map<string, SongRecord[]>();
    for (const { game, ...fields } of listing.records) {
      const record = createSongRecord(fields);
      const songs = games.get(game);
      if (songs) {
        songs.push(record);
      } else {
        games.set(game, [record]);
      }
    }

    this.games = games;
    this.metadata = {
      lastUpdated: listing.lastUpdated,
      revisionTag: listing.revisionTag,
      indexerVersion: listing.indexerVersion,
    };
    if (listing.sectionLabel) this.section = listing.sectionLabel;
    this.populated = true;
  }
}
