// ─── Catalog ────────────────────────────────────────────────────────────────
//
// The root of the archive: every system named by the bootstrap index, each
// a lazily populated SystemCollection. Point lookups fetch one page;
// anything that needs the whole archive (search, totals, serialize) fetches
// every page that is not populated yet.
// ─────────────────────────────────────────────────────────────────────────────

import pLimit from "p-limit";
import { DEFAULT_BASE_URL, DEFAULT_PAGE_CONCURRENCY } from "../config.js";
import { FormatError, NotFoundError, TransportError } from "../errors.js";
import { UndiciTransport, type HttpTransport } from "../http/transport.js";
import { loggerFor } from "../logger.js";
import { SystemCollection } from "./collection.js";
import { Downloader, type DownloadOptions, type DownloadOutcome } from "./downloader.js";
import { HtmlIndexSource, HtmlPageFetcher, SnapshotIndexSource } from "./fetcher.js";
import type { CatalogSnapshot, SnapshotFile } from "./snapshot/schema.js";
import {
  PATTERN_FIELDS,
  type IndexSource,
  type PageFetcher,
  type PatternField,
  type SongMatch,
  type SongRecord,
  type SongPatterns,
  type SongPredicate,
  type SystemEntry,
  type SystemIndex,
} from "./types.js";

const log = loggerFor("catalog");

export interface CatalogOptions {
  /** Every system the catalog knows about. */
  index: SystemIndex;
  fetcher: PageFetcher;
  /** Released by close(). */
  transport?: HttpTransport;
  /** serialize() output; listed systems start populated. */
  snapshot?: Readonly<Record<string, unknown>>;
  /** Default for populateAll(). */
  pageConcurrency?: number;
}

export interface OpenCatalogOptions {
  baseUrl?: string;
  /** A previously saved snapshot file. */
  snapshot?: SnapshotFile | null;
  /** Build the index from the snapshot only, never from the front page. */
  offline?: boolean;
  /** Re-read the front page even when a snapshot is given. */
  refreshIndex?: boolean;
  /** Defaults to a new UndiciTransport owned by the catalog. */
  transport?: HttpTransport;
  userAgent?: string;
  timeoutMs?: number;
  pageConcurrency?: number;
}

export interface PopulateOptions {
  /** Maximum page fetches in flight. */
  concurrency?: number;
}

export class Catalog {
  private readonly collections = new Map<string, SystemCollection>();
  private readonly transport?: HttpTransport;
  private readonly pageConcurrency: number;
  private closed = false;

  constructor(options: CatalogOptions) {
    this.transport = options.transport;
    this.pageConcurrency = options.pageConcurrency ?? DEFAULT_PAGE_CONCURRENCY;

    for (const [name, entry] of options.index) {
      this.collections.set(name, new SystemCollection(name, entry, options.fetcher));
    }
    for (const [name, data] of Object.entries(options.snapshot ?? {})) {
      this.collections.set(name, SystemCollection.deserialize(name, data, options.fetcher));
    }
  }

  /**
   * Load the bootstrap index and build a catalog around a shared transport.
   * A snapshot that saved its index (unless refreshIndex is set), or offline
   * mode, skips the front page; otherwise the front page is read and the
   * snapshot's systems are laid over it. Either way, no system page is
   * fetched until that system is queried.
   */
  static async open(options: OpenCatalogOptions = {}): Promise<Catalog> {
    const transport = options.transport ?? new UndiciTransport({
      userAgent: options.userAgent,
      timeoutMs: options.timeoutMs,
    });
    const snapshot = options.snapshot ?? undefined;
    const useSnapshotIndex = options.offline || (snapshot?.index !== undefined && !options.refreshIndex);
    const source: IndexSource = useSnapshotIndex
      ? new SnapshotIndexSource(snapshot ?? { schema_version: 1, systems: {} })
      : new HtmlIndexSource(transport, options.baseUrl ?? DEFAULT_BASE_URL);

    let index: SystemIndex;
    try {
      index = await source.loadIndex();
    } catch (error) {
      if (!options.transport) await transport.close();
      throw error;
    }

    return new Catalog({
      index,
      fetcher: new HtmlPageFetcher(transport),
      transport,
      snapshot: snapshot?.systems,
      pageConcurrency: options.pageConcurrency,
    });
  }

  // ─── Lookup ───────────────────────────────────────────────────────────────

  /** The collection for a system, populated. */
  async get(name: string): Promise<SystemCollection> {
    const collection = this.peek(name);
    await collection.populate();
    return collection;
  }

  /** The collection for a system, without fetching it. */
  peek(name: string): SystemCollection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new NotFoundError(`System not found: "${name}"`, { details: { system: name } });
    }
    return collection;
  }

  has(name: string): boolean {
    return this.collections.has(name);
  }

  /** System names from the bootstrap index. Fetches nothing. */
  names(): IterableIterator<string> {
    return this.collections.keys();
  }

  get size(): number {
    return this.collections.size;
  }

  /** The system index this catalog was built from, for saving alongside a snapshot. */
  index(): Record<string, SystemEntry> {
    return Object.fromEntries(
      [...this.collections].map(([name, collection]): [string, SystemEntry] => [
        name,
        { url: collection.sourceUrl, section: collection.sectionLabel },
      ])
    );
  }

  // ─── Whole-archive operations ─────────────────────────────────────────────

  /**
   * Populate every collection, at most `concurrency` pages at a time.
   * Waits for every fetch to settle, then rethrows the first failure.
   */
  async populateAll(options: PopulateOptions = {}): Promise<void> {
    const concurrency = options.concurrency ?? this.pageConcurrency;
    const pending = [...this.collections.values()].filter((c) => !c.isPopulated);
    if (pending.length === 0) return;

    log.info(`populating ${pending.length} systems`, { concurrency });
    const limit = pLimit(concurrency);
    const results = await Promise.allSettled(pending.map((c) => limit(() => c.populate())));

    const failures = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
    if (failures.length > 0) {
      log.warn(`${failures.length} of ${pending.length} systems failed to populate`);
      throw failures[0].reason;
    }
  }

  /**
   * Re-fetch one system's page. A populated system whose revision tag is
   * unchanged keeps its songs and resolves false.
   */
  async refresh(name: string): Promise<boolean> {
    return this.peek(name).refresh();
  }

  /**
   * Revalidate every populated system, at most `concurrency` pages at a
   * time. Unpopulated systems are left alone. Resolves the names whose
   * songs were reloaded; rethrows the first failure once all have settled.
   */
  async refreshAll(options: PopulateOptions = {}): Promise<string[]> {
    const concurrency = options.concurrency ?? this.pageConcurrency;
    const cached = [...this.collections.values()].filter((c) => c.isPopulated);
    if (cached.length === 0) return [];

    log.info(`revalidating ${cached.length} systems`, { concurrency });
    const limit = pLimit(concurrency);
    const results = await Promise.allSettled(cached.map((c) => limit(() => c.refresh())));

    const failures = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
    if (failures.length > 0) {
      log.warn(`${failures.length} of ${cached.length} systems failed to revalidate`);
      throw failures[0].reason;
    }
    return cached.filter((_, i) => {
      const result = results[i];
      return result.status === "fulfilled" && result.value;
    }).map((c) => c.name);
  }

  /** Every song for which the predicate holds, with its system and game. */
  async search(predicate: SongPredicate): Promise<SongMatch[]> {
    await this.populateAll();

    const matches: SongMatch[] = [];
    for (const [system, collection] of this.collections) {
      for (const [game, songs] of await collection.entries()) {
        for (const record of songs) {
          if (predicate(system, game, record)) matches.push({ system, game, record });
        }
      }
    }
    return matches;
  }

  /**
   * Search with one regular expression per field. Patterns are unanchored
   * (use ^ and $ for exact matches); fields without a pattern match
   * anything; keys that are not pattern fields are ignored.
   */
  async searchByPattern(patterns: SongPatterns): Promise<SongMatch[]> {
    const compiled = compilePatterns(patterns);
    return this.search((system, game, record) =>
      compiled.every(({ field, regex }) => {
        if (field === "system") return regex.test(system);
        if (field === "game") return regex.test(game);
        return regex.test(String(record[field]));
      })
    );
  }

  async allSongs(): Promise<SongMatch[]> {
    return this.search(() => true);
  }

  async totalSongs(): Promise<number> {
    await this.populateAll();
    let total = 0;
    for (const collection of this.collections.values()) {
      total += await collection.totalSongs();
    }
    return total;
  }

  /** Every system in serialized form, sorted by name. Populates everything. */
  async serialize(): Promise<CatalogSnapshot> {
    await this.populateAll();
    return this.serializePopulated();
  }

  /** Serialized form of the systems already populated. Fetches nothing. */
  serializePopulated(): CatalogSnapshot {
    const names = [...this.collections.keys()].sort().filter((name) => this.peek(name).isPopulated);
    return Object.fromEntries(names.map((name) => [name, this.peek(name).toSerialized()] as const));
  }

  // ─── Downloads ────────────────────────────────────────────────────────────

  /** Download songs over the catalog's shared transport. See Downloader. */
  async download(
    records: readonly SongRecord[],
    destination: string,
    options: DownloadOptions = {}
  ): Promise<DownloadOutcome[]> {
    if (!this.transport) {
      throw new TransportError("Catalog was built without a transport; use a Downloader directly");
    }
    return new Downloader(this.transport).download(records, destination, options);
  }

  // ─── Lifecycle ────────────────────────────────────────────────────────────

  get isClosed(): boolean {
    return this.closed;
  }

  /** Release the shared transport. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transport?.close();
  }
}

/** Open a catalog, run `fn`, and close the catalog however `fn` ends. */
export async function withCatalog<T>(
  options: OpenCatalogOptions,
  fn: (catalog: Catalog) => Promise<T>
): Promise<T> {
  const catalog = await Catalog.open(options);
  try {
    return await fn(catalog);
  } finally {
    await catalog.close();
  }
}

// ─── Patterns ───────────────────────────────────────────────────────────────

interface CompiledPattern {
  field: PatternField;
  regex: RegExp;
}

function compilePatterns(patterns: SongPatterns): CompiledPattern[] {
  const compiled: CompiledPattern[] = [];
  for (const field of PATTERN_FIELDS) {
    const pattern = patterns[field];
    if (pattern === undefined) continue;
    compiled.push({ field, regex: compilePattern(field, pattern) });
  }
  return compiled;
}

function compilePattern(field: PatternField, pattern: string | RegExp): RegExp {
  // test() on a global or sticky regex is stateful across calls
  if (pattern instanceof RegExp) return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new FormatError(`Invalid pattern for ${field}: ${pattern}`, { field, cause: error });
  }
}
