import { describe, it, expect } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Catalog, withCatalog } from "./catalog.js";
import { FormatError, NotFoundError, TransportError } from "../errors.js";
import { buildSnapshotFile, parseSnapshot, readSnapshot, writeSnapshot } from "./snapshot/loader.js";
import type { HttpTransport, TextResponse } from "../http/transport.js";
import type { PageFetcher, PageListing, ParsedSong, SystemEntry } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

class FakePageFetcher implements PageFetcher {
  readonly calls: string[] = [];

  constructor(private readonly pages: Record<string, PageListing | Error>) {}

  async fetchPage(url: string): Promise<PageListing> {
    this.calls.push(url);
    await new Promise((resolve) => setTimeout(resolve, 1));
    const page = this.pages[url];
    if (page === undefined) throw new TransportError(`GET ${url} failed: HTTP 404`, { url, status: 404 });
    if (page instanceof Error) throw page;
    return page;
  }
}

/** Transport that fails every request; proves an operation stays offline. */
class OfflineTransport implements HttpTransport {
  requests = 0;
  closed = 0;

  async getText(url: string): Promise<TextResponse> {
    this.requests++;
    throw new TransportError(`GET ${url} failed: offline`, { url });
  }

  async getBytes(url: string): Promise<Uint8Array> {
    this.requests++;
    throw new TransportError(`GET ${url} failed: offline`, { url });
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

function song(game: string, title: string, checksum = "ffff"): ParsedSong {
  return { game, url: `http://example.test/${title}.mid`, title, size: 10, author: "Tester", checksum };
}

function indexOf(entries: Record<string, SystemEntry>): Map<string, SystemEntry> {
  return new Map(Object.entries(entries));
}

const NES_URL = "http://example.test/nes";
const SNES_URL = "http://example.test/snes";

function twoSystemCatalog(fetcher: PageFetcher, transport?: HttpTransport): Catalog {
  return new Catalog({
    index: indexOf({
      NES: { url: NES_URL, section: "Nintendo" },
      SNES: { url: SNES_URL, section: "Nintendo" },
    }),
    fetcher,
    transport,
  });
}

const PAGES: Record<string, PageListing> = {
  [NES_URL]: {
    records: [song("Mega Man 2", "Wily"), song("Mega Man 2", "Air Man"), song("Metroid", "Brinstar")],
    revisionTag: '"nes-1"',
  },
  [SNES_URL]: {
    records: [song("Chrono Trigger", "Corridors of Time"), song("Super Metroid", "Brinstar Depths")],
  },
};

// ─── Example scenario ───────────────────────────────────────────────────────

describe("Catalog with a single system", () => {
  const record = {
    url: "http://example.test/sys/a.mid",
    title: "Song A",
    size: 100,
    author: "X",
    checksum: "abc123",
  };

  function testSysCatalog(fetcher: FakePageFetcher): Catalog {
    return new Catalog({
      index: indexOf({ TestSys: { url: "http://example.test/sys", section: "Test" } }),
      fetcher,
    });
  }

  it("returns the game's records after exactly one fetch", async () => {
    const fetcher = new FakePageFetcher({ "http://example.test/sys": { records: [{ game: "Game A", ...record }] } });
    const catalog = testSysCatalog(fetcher);

    const collection = await catalog.get("TestSys");
    const songs = await collection.get("Game A");

    expect(songs).toEqual([record]);
    expect(fetcher.calls).toEqual(["http://example.test/sys"]);
  });

  it("serializes the record's checksum", async () => {
    const fetcher = new FakePageFetcher({ "http://example.test/sys": { records: [{ game: "Game A", ...record }] } });
    const catalog = testSysCatalog(fetcher);

    await (await catalog.get("TestSys")).get("Game A");
    const snapshot = await catalog.serialize();

    expect(snapshot["TestSys"].games["Game A"][0].checksum).toBe("abc123");
    expect(fetcher.calls).toHaveLength(1);
  });
});

// ─── Lookup ─────────────────────────────────────────────────────────────────

describe("Catalog lookup", () => {
  it("lists names without fetching", () => {
    const fetcher = new FakePageFetcher(PAGES);
    const catalog = twoSystemCatalog(fetcher);
    expect([...catalog.names()]).toEqual(["NES", "SNES"]);
    expect(catalog.size).toBe(2);
    expect(catalog.has("NES")).toBe(true);
    expect(catalog.has("Genesis")).toBe(false);
    expect(fetcher.calls).toHaveLength(0);
  });

  it("populates only the requested system", async () => {
    const fetcher = new FakePageFetcher(PAGES);
    const catalog = twoSystemCatalog(fetcher);

    await catalog.get("SNES");
    expect(fetcher.calls).toEqual([SNES_URL]);
    expect(catalog.peek("NES").isPopulated).toBe(false);
  });

  it("throws NotFoundError for an unknown system without fetching", async () => {
    const fetcher = new FakePageFetcher(PAGES);
    const catalog = twoSystemCatalog(fetcher);

    await expect(catalog.get("Genesis")).rejects.toBeInstanceOf(NotFoundError);
    await expect(catalog.get("Genesis")).rejects.toThrow('System not found: "Genesis"');
    expect(fetcher.calls).toHaveLength(0);
  });

  it("keeps a system named __proto__ as an ordinary index key", () => {
    const catalog = new Catalog({
      index: new Map([["__proto__", { url: NES_URL, section: "Odd" }]]),
      fetcher: new FakePageFetcher(PAGES),
    });
    expect([...catalog.names()]).toEqual(["__proto__"]);

    const index = catalog.index();
    expect(Object.keys(index)).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(index)).toBe(Object.prototype);
    expect(JSON.stringify(index)).toBe(`{"__proto__":{"url":"${NES_URL}","section":"Odd"}}`);
  });

  it("exposes the index as a plain object", () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    expect(catalog.index()).toEqual({
      NES: { url: NES_URL, section: "Nintendo" },
      SNES: { url: SNES_URL, section: "Nintendo" },
    });
  });
});

// ─── Search ─────────────────────────────────────────────────────────────────

describe("Catalog.search", () => {
  it("populates every system and returns matches in index order", async () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    const matches = await catalog.search((_system, game) => game.includes("Metroid"));

    expect(matches.map((m) => `${m.system}/${m.game}/${m.record.title}`)).toEqual([
      "NES/Metroid/Brinstar",
      "SNES/Super Metroid/Brinstar Depths",
    ]);
    expect(catalog.peek("NES").isPopulated).toBe(true);
    expect(catalog.peek("SNES").isPopulated).toBe(true);
  });

  it("returns every record exactly once with no patterns", async () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    const matches = await catalog.searchByPattern({});
    expect(matches).toHaveLength(5);
    expect(await catalog.totalSongs()).toBe(5);
    expect(await catalog.allSongs()).toEqual(matches);
  });

  it("matches patterns unanchored, across all given fields", async () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    const matches = await catalog.searchByPattern({ system: "^NES$", title: "an" });
    expect(matches.map((m) => m.record.title)).toEqual(["Air Man"]);
  });

  it("matches the size field by its decimal form", async () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    expect(await catalog.searchByPattern({ size: "^10$" })).toHaveLength(5);
    expect(await catalog.searchByPattern({ size: "^100$" })).toHaveLength(0);
  });

  it("accepts RegExp patterns, ignoring the global flag", async () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    const matches = await catalog.searchByPattern({ title: /brinstar/gi });
    expect(matches.map((m) => m.record.title)).toEqual(["Brinstar", "Brinstar Depths"]);
  });

  it("ignores keys that are not song fields", async () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    const patterns = { game: "Chrono", composer: "nobody" };
    const matches = await catalog.searchByPattern(patterns);
    expect(matches.map((m) => m.record.title)).toEqual(["Corridors of Time"]);
  });

  it("rejects an invalid pattern before fetching anything", async () => {
    const fetcher = new FakePageFetcher(PAGES);
    const catalog = twoSystemCatalog(fetcher);
    await expect(catalog.searchByPattern({ title: "(" })).rejects.toBeInstanceOf(FormatError);
    expect(fetcher.calls).toHaveLength(0);
  });

  it("propagates a population failure and keeps the other systems", async () => {
    const failure = new TransportError("GET failed: HTTP 500", { status: 500 });
    const fetcher = new FakePageFetcher({ ...PAGES, [NES_URL]: failure });
    const catalog = twoSystemCatalog(fetcher);

    await expect(catalog.search(() => true)).rejects.toBe(failure);
    expect(catalog.peek("NES").isPopulated).toBe(false);
    expect(catalog.peek("SNES").isPopulated).toBe(true);
  });
});

// ─── Population ─────────────────────────────────────────────────────────────

describe("Catalog.populateAll", () => {
  it("keeps page fetches under the concurrency ceiling", async () => {
    let inFlight = 0;
    let peak = 0;
    const urls = Array.from({ length: 6 }, (_, i) => `http://example.test/sys${i}`);
    const fetcher: PageFetcher = {
      async fetchPage() {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return { records: [] };
      },
    };
    const catalog = new Catalog({
      index: new Map(urls.map((url, i): [string, SystemEntry] => [`Sys${i}`, { url, section: "Test" }])),
      fetcher,
    });

    await catalog.populateAll({ concurrency: 2 });
    expect(peak).toBe(2);
    expect([...catalog.names()].every((name) => catalog.peek(name).isPopulated)).toBe(true);
  });

  it("does nothing when every system is already populated", async () => {
    const fetcher = new FakePageFetcher(PAGES);
    const catalog = twoSystemCatalog(fetcher);
    await catalog.populateAll();
    await catalog.populateAll();
    expect(fetcher.calls).toHaveLength(2);
  });
});

// ─── Revalidation ───────────────────────────────────────────────────────────

describe("Catalog.refresh", () => {
  it("keeps a system's songs when its revision tag is unchanged", async () => {
    const fetcher = new FakePageFetcher(PAGES);
    const catalog = twoSystemCatalog(fetcher);
    const before = await (await catalog.get("NES")).get("Metroid");

    expect(await catalog.refresh("NES")).toBe(false);
    expect(await (await catalog.get("NES")).get("Metroid")).toBe(before);
    expect(fetcher.calls).toEqual([NES_URL, NES_URL]);
  });

  it("reloads a system whose revision tag changed", async () => {
    const pages: Record<string, PageListing> = { ...PAGES };
    const catalog = twoSystemCatalog(new FakePageFetcher(pages));
    await catalog.get("NES");

    pages[NES_URL] = { records: [song("Zelda", "Overworld")], revisionTag: '"nes-2"' };
    expect(await catalog.refresh("NES")).toBe(true);
    expect([...(await (await catalog.get("NES")).keys())]).toEqual(["Zelda"]);
    expect(catalog.peek("NES").revisionTag).toBe('"nes-2"');
  });

  it("throws NotFoundError for an unknown system", async () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    await expect(catalog.refresh("Genesis")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("revalidates a snapshot-restored system over the transport, keeping songs on a matching ETag", async () => {
    const original = twoSystemCatalog(new FakePageFetcher(PAGES));
    const snapshot = buildSnapshotFile(await original.serialize(), original.index());
    const requested: string[] = [];
    const transport: HttpTransport = {
      async getText(url) {
        requested.push(url);
        const body = "<table><tr><th>Song Title</th><th>File Size</th><th>Sequenced By</th></tr></table>";
        return { url, status: 200, headers: { etag: '"nes-1"' }, body };
      },
      async getBytes() {
        return new Uint8Array();
      },
      async close() {},
    };

    const restored = await Catalog.open({ snapshot, transport });

    expect(await restored.refresh("NES")).toBe(false);
    expect(await (await restored.get("NES")).totalSongs()).toBe(3);
    expect(requested).toEqual([NES_URL]);
  });
});

describe("Catalog.refreshAll", () => {
  it("revalidates only populated systems and names the ones reloaded", async () => {
    const fetcher = new FakePageFetcher(PAGES);
    const catalog = twoSystemCatalog(fetcher);
    await catalog.get("NES");

    expect(await catalog.refreshAll()).toEqual([]);
    expect(fetcher.calls).toEqual([NES_URL, NES_URL]);
    expect(catalog.peek("SNES").isPopulated).toBe(false);
  });

  it("reloads pages without a revision tag", async () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    await catalog.populateAll();
    expect(await catalog.refreshAll({ concurrency: 1 })).toEqual(["SNES"]);
  });

  it("does nothing when no system is populated", async () => {
    const fetcher = new FakePageFetcher(PAGES);
    expect(await twoSystemCatalog(fetcher).refreshAll()).toEqual([]);
    expect(fetcher.calls).toHaveLength(0);
  });

  it("rethrows a failure after the other systems settle, keeping the cached songs", async () => {
    const pages: Record<string, PageListing | Error> = { ...PAGES };
    const catalog = twoSystemCatalog(new FakePageFetcher(pages));
    await catalog.populateAll();

    const failure = new TransportError("GET failed: HTTP 503", { status: 503 });
    pages[NES_URL] = failure;
    await expect(catalog.refreshAll()).rejects.toBe(failure);
    expect(await (await catalog.get("NES")).totalSongs()).toBe(3);
  });
});

// ─── Snapshots ──────────────────────────────────────────────────────────────

describe("Catalog snapshots", () => {
  it("serializes populated systems only with serializePopulated", async () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    await catalog.get("SNES");
    expect(Object.keys(catalog.serializePopulated())).toEqual(["SNES"]);
  });

  it("round-trips two systems through a file with no network access", async () => {
    const dir = await mkdtemp(join(tmpdir(), "vgm-catalog-"));
    try {
      const original = twoSystemCatalog(new FakePageFetcher(PAGES));
      const path = join(dir, "cache.json");
      await writeSnapshot(path, buildSnapshotFile(await original.serialize(), original.index()));

      const transport = new OfflineTransport();
      const restored = await Catalog.open({ snapshot: await readSnapshot(path), transport });

      expect([...restored.names()]).toEqual(["NES", "SNES"]);
      for (const name of ["NES", "SNES"]) {
        const before = await (await original.get(name)).totalSongs();
        expect(await (await restored.get(name)).totalSongs()).toBe(before);
      }
      expect((await restored.get("NES")).revisionTag).toBe('"nes-1"');
      expect(await restored.serialize()).toEqual(await original.serialize());
      expect(transport.requests).toBe(0);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("lets snapshot systems override and extend the index", async () => {
    const fetcher = new FakePageFetcher(PAGES);
    const saved = await twoSystemCatalog(new FakePageFetcher(PAGES)).serialize();
    const catalog = new Catalog({
      index: indexOf({ NES: { url: NES_URL, section: "Nintendo" } }),
      fetcher,
      snapshot: { SNES: saved["SNES"] },
    });

    expect([...catalog.names()]).toEqual(["NES", "SNES"]);
    expect(catalog.peek("SNES").isPopulated).toBe(true);
    expect(catalog.peek("NES").isPopulated).toBe(false);
  });

  it("serializes a system named __proto__ like any other", async () => {
    const catalog = new Catalog({
      index: new Map([["__proto__", { url: SNES_URL, section: "Odd" }]]),
      fetcher: new FakePageFetcher(PAGES),
    });

    const snapshot = await catalog.serialize();
    expect(Object.keys(snapshot)).toEqual(["__proto__"]);
    expect(Object.keys(JSON.parse(JSON.stringify(snapshot)))).toEqual(["__proto__"]);
    expect(Object.keys(catalog.serializePopulated())).toEqual(["__proto__"]);
  });

  it("rejects a malformed snapshot entry", () => {
    expect(
      () =>
        new Catalog({
          index: new Map(),
          fetcher: new FakePageFetcher(PAGES),
          snapshot: { NES: { source_url: NES_URL, section_label: "Nintendo", games: { X: [{ size: "big" }] } } },
        })
    ).toThrow(FormatError);
  });
});

// ─── Opening & closing ──────────────────────────────────────────────────────

describe("Catalog lifecycle", () => {
  it("builds the index from the front page when there is no snapshot", async () => {
    const html = `
      <p class="menu">About</p>
      <p class="menularge">Nintendo</p>
      <p class="menu"><a href="/music/console/nintendo/nes/">NES</a></p>`;
    const transport: HttpTransport = {
      async getText(url) {
        return { url, status: 200, headers: {}, body: html };
      },
      async getBytes() {
        return new Uint8Array();
      },
      async close() {},
    };

    const catalog = await Catalog.open({ baseUrl: "http://example.test/", transport });
    expect(catalog.index()).toEqual({
      NES: { url: "http://example.test/music/console/nintendo/nes/", section: "Nintendo" },
    });
  });

  it("reads the front page for a snapshot saved without an index, keeping systems it lacks", async () => {
    const html = `
      <p class="menu">About</p>
      <p class="menularge">Nintendo</p>
      <p class="menu"><a href="/nes/">NES</a></p>
      <p class="menu"><a href="/snes/">SNES</a></p>`;
    const requested: string[] = [];
    const transport: HttpTransport = {
      async getText(url) {
        requested.push(url);
        return { url, status: 200, headers: {}, body: html };
      },
      async getBytes() {
        return new Uint8Array();
      },
      async close() {},
    };
    const saved = await twoSystemCatalog(new FakePageFetcher(PAGES)).serialize();

    const catalog = await Catalog.open({
      baseUrl: "http://example.test/",
      snapshot: parseSnapshot({ SNES: saved["SNES"] }),
      transport,
    });

    expect([...catalog.names()]).toEqual(["NES", "SNES"]);
    expect(catalog.peek("NES").isPopulated).toBe(false);
    expect(catalog.peek("NES").sourceUrl).toBe("http://example.test/nes/");
    expect(catalog.peek("SNES").isPopulated).toBe(true);
    expect(requested).toEqual(["http://example.test/"]);
  });

  it("uses only the snapshot's systems when offline, even without a saved index", async () => {
    const transport = new OfflineTransport();
    const saved = await twoSystemCatalog(new FakePageFetcher(PAGES)).serialize();

    const catalog = await Catalog.open({ snapshot: parseSnapshot({ SNES: saved["SNES"] }), transport, offline: true });

    expect([...catalog.names()]).toEqual(["SNES"]);
    expect(transport.requests).toBe(0);
  });

  it("closes the transport it was given once, however often close() is called", async () => {
    const transport = new OfflineTransport();
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES), transport);

    await catalog.close();
    await catalog.close();
    expect(catalog.isClosed).toBe(true);
    expect(transport.closed).toBe(1);
  });

  it("closes the catalog after the callback with withCatalog", async () => {
    const transport = new OfflineTransport();
    const saved = twoSystemCatalog(new FakePageFetcher(PAGES));
    const snapshot = buildSnapshotFile(await saved.serialize(), saved.index());

    const names = await withCatalog({ snapshot, transport }, async (catalog) => [...catalog.names()]);
    expect(names).toEqual(["NES", "SNES"]);
    expect(transport.closed).toBe(1);
  });

  it("closes the catalog when the callback throws", async () => {
    const transport = new OfflineTransport();
    const snapshot = buildSnapshotFile({});

    await expect(
      withCatalog({ snapshot, transport, offline: true }, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(transport.closed).toBe(1);
  });

  it("refuses to download without a transport", async () => {
    const catalog = twoSystemCatalog(new FakePageFetcher(PAGES));
    await expect(catalog.download([], "unused")).rejects.toBeInstanceOf(TransportError);
  });
});
