#!/usr/bin/env node
// ─── vgm-archive: MCP Server ────────────────────────────────────────────────
//
// Exposes the archive catalog as MCP tools. An LLM can browse systems,
// search songs by field and download matches, all through the standard
// MCP protocol. Pages are fetched lazily and kept in the snapshot file.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   list_systems    every system in the archive index
//   get_system      one system's games and song counts (optionally revalidated)
//   search_songs    search by per-field regular expressions
//   download_songs  download matching songs into a directory
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfig, VERSION } from "./config.js";
import { formatErrorMessage } from "./errors.js";
import {
  Catalog,
  buildSnapshotFile,
  formatDownloadReport,
  formatMatchList,
  pickPatterns,
  readSnapshot,
  writeSnapshot,
} from "./songs/index.js";

const MAX_LISTED_MATCHES = 200;

const config = loadConfig();
let catalog: Catalog | null = null;
let opening: Promise<Catalog> | null = null;

/** Open the catalog on first use, seeded from the snapshot file. */
function getCatalog(): Promise<Catalog> {
  if (!opening) {
    opening = openCatalog().then(
      (opened) => (catalog = opened),
      (error: unknown) => {
        opening = null;
        throw error;
      }
    );
  }
  return opening;
}

async function openCatalog(): Promise<Catalog> {
  return Catalog.open({
    baseUrl: config.baseUrl,
    snapshot: await readSnapshot(config.cacheFile),
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    pageConcurrency: config.pageConcurrency,
  });
}

function errorResult(error: unknown) {
  return {
    content: [{ type: "text" as const, text: `Error: ${formatErrorMessage(error)}` }],
    isError: true,
  };
}

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "vgm-archive",
  version: VERSION,
});

const patternShape = {
  system: z.string().optional().describe("Regex on the system name (e.g. '^SNES$')"),
  game: z.string().optional().describe("Regex on the game title"),
  url: z.string().optional().describe("Regex on the file URL"),
  title: z.string().optional().describe("Regex on the song title"),
  size: z.string().optional().describe("Regex on the file size in bytes"),
  author: z.string().optional().describe("Regex on the sequencer's name"),
  checksum: z.string().optional().describe("Regex on the MD5 checksum"),
};

// ─── Tool: list_systems ─────────────────────────────────────────────────────

server.tool(
  "list_systems",
  "List every system (console or computer) in the archive index, grouped by section.",
  {},
  async () => {
    try {
      const cat = await getCatalog();
      const index = cat.index();
      const text = [...cat.names()]
        .map((name) => `${name} (${index[name]?.section ?? "unknown"})${cat.peek(name).isPopulated ? " [cached]" : ""}`)
        .join("\n");
      return {
        content: [{ type: "text", text: `${cat.size} system(s):\n\n${text}` }],
      };
    } catch (error) {
      return errorResult(error);
    }
  }
);

// ─── Tool: get_system ───────────────────────────────────────────────────────

server.tool(
  "get_system",
  "Get one system's games with the number of songs for each. Fetches the system's page if it is not cached.",
  {
    system: z.string().describe("System name exactly as listed by list_systems"),
    refresh: z.boolean().optional().describe("Re-check a cached page against the archive and reload it if it changed"),
  },
  async ({ system, refresh }) => {
    try {
      const cat = await getCatalog();
      // An uncached page is fetched fresh by get() anyway.
      const revalidate = refresh === true && cat.peek(system).isPopulated;
      const reloaded = revalidate && (await cat.refresh(system));
      const collection = await cat.get(system);
      const lines = [
        `# ${system}`,
        ...(revalidate ? [reloaded ? "_Reloaded: the archive page changed._" : "_Up to date._"] : []),
        `**Section:** ${collection.sectionLabel}`,
        ...(collection.lastUpdated ? [`**Last updated:** ${collection.lastUpdated}`] : []),
        `**Games:** ${await collection.gameCount()} | **Songs:** ${await collection.totalSongs()}`,
        ``,
      ];
      for (const [game, songs] of await collection.entries()) {
        lines.push(`- ${game} (${songs.length})`);
      }
      return { content: [{ type: "text", text: lines.join("\n") }] };
    } catch (error) {
      return errorResult(error);
    }
  }
);

// ─── Tool: search_songs ─────────────────────────────────────────────────────

server.tool(
  "search_songs",
  "Search songs by per-field regular expressions (unanchored; use ^ and $ for exact matches). " +
    "Fields left out match anything. The first search fetches every system page, which takes a while.",
  patternShape,
  async (params) => {
    try {
      const matches = await (await getCatalog()).searchByPattern(pickPatterns(params));
      if (matches.length === 0) {
        return { content: [{ type: "text", text: "No songs found matching your criteria." }] };
      }
      const shown = matches.slice(0, MAX_LISTED_MATCHES);
      const more = matches.length > shown.length ? `\n\n…and ${matches.length - shown.length} more` : "";
      return {
        content: [{ type: "text", text: `Found ${matches.length} song(s):\n\n${formatMatchList(shown)}${more}` }],
      };
    } catch (error) {
      return errorResult(error);
    }
  }
);

// ─── Tool: download_songs ───────────────────────────────────────────────────

server.tool(
  "download_songs",
  "Download every song matching the given field patterns into a directory. " +
    "At least one pattern is required. Files already present are skipped.",
  {
    ...patternShape,
    destination: z.string().describe("Directory to write the files into (created if missing)"),
    verify: z.boolean().optional().describe("Check each file's size and MD5 against the archive listing"),
    concurrency: z.number().int().min(1).max(16).optional().describe("Downloads in flight (default 5)"),
  },
  async ({ destination, verify, concurrency, ...fields }) => {
    const patterns = pickPatterns(fields);
    if (Object.keys(patterns).length === 0) {
      return errorResult(new Error("Give at least one pattern; downloading the whole archive is not allowed here."));
    }

    try {
      const cat = await getCatalog();
      const matches = await cat.searchByPattern(patterns);
      const outcomes = await cat.download(
        matches.map((m) => m.record),
        destination,
        { verify, concurrency: concurrency ?? config.downloadConcurrency }
      );
      return {
        content: [{ type: "text", text: `${matches.length} song(s) matched.\n${formatDownloadReport(outcomes)}` }],
      };
    } catch (error) {
      return errorResult(error);
    }
  }
);

// ─── Shutdown ───────────────────────────────────────────────────────────────

async function shutdown(): Promise<void> {
  if (catalog) {
    const saved = await writeSnapshot(
      config.cacheFile,
      buildSnapshotFile(catalog.serializePopulated(), catalog.index())
    );
    console.error(`Snapshot saved to ${saved}`);
    await catalog.close();
  }
  await server.close();
}

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("vgm-archive MCP server running on stdio");

  const stop = () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  // The client closing stdin ends the session too.
  process.stdin.once("end", stop);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
