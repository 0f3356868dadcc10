#!/usr/bin/env node
// ─── vgm-archive: CLI Entry Point ───────────────────────────────────────────
//
// Usage:
//   vgm-archive                                # Show help
//   vgm-archive systems                        # List every system in the index
//   vgm-archive games SNES                     # List a system's games
//   vgm-archive search system=SNES title=Boss  # Search by field=regex
//   vgm-archive download title=Boss --to out   # Download matching songs
//   vgm-archive cache --all                    # Fetch every system into the snapshot
//   vgm-archive refresh                        # Re-check cached systems for changes
//
// Every command reads the snapshot file first and writes it back on exit,
// so pages fetched once are not fetched again in later runs.
// ─────────────────────────────────────────────────────────────────────────────

import { loadConfig, VERSION, type ArchiveConfig } from "./config.js";
import { FormatError, formatErrorMessage } from "./errors.js";
import {
  Catalog,
  buildSnapshotFile,
  formatDownloadReport,
  formatMatchTable,
  padRight,
  parseQuery,
  readSnapshot,
  summarizeDownloads,
  writeSnapshot,
} from "./songs/index.js";

/** Flags that take a value; everything else starting with "--" is boolean. */
const VALUE_FLAGS = ["--cache", "--to", "--jobs"];

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Arguments that are neither flags nor flag values. */
function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (VALUE_FLAGS.includes(args[i])) {
      i++;
    } else if (!args[i].startsWith("--")) {
      out.push(args[i]);
    }
  }
  return out;
}

function parseJobs(args: string[], fallback: number): number {
  const raw = getFlag(args, "--jobs");
  if (raw === null) return fallback;
  const jobs = Number(raw);
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new FormatError(`--jobs must be a positive integer: got "${raw}"`, { field: "--jobs" });
  }
  return jobs;
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdSystems(catalog: Catalog): void {
  const index = catalog.index();
  console.log("\n" + padRight("System", 28) + padRight("Section", 28) + "Cached");
  console.log("─".repeat(64));
  for (const name of catalog.names()) {
    const cached = catalog.peek(name).isPopulated ? "yes" : "";
    console.log(padRight(name, 28) + padRight(index[name]?.section ?? "", 28) + cached);
  }
  console.log(`\n${catalog.size} system(s).\n`);
}

async function cmdGames(catalog: Catalog, args: string[]): Promise<void> {
  const [system] = positionals(args);
  if (!system) {
    throw new FormatError("Usage: vgm-archive games <system>");
  }

  const collection = await catalog.get(system);
  console.log(`\n${system} (${collection.sectionLabel})`);
  if (collection.lastUpdated) console.log(`Last updated: ${collection.lastUpdated}`);
  console.log("─".repeat(64));
  for (const [game, songs] of await collection.entries()) {
    console.log(padRight(game, 56) + String(songs.length));
  }
  console.log(`\n${await collection.gameCount()} game(s), ${await collection.totalSongs()} song(s).\n`);
}

async function cmdSearch(catalog: Catalog, args: string[]): Promise<void> {
  const patterns = parseQuery(positionals(args));
  const matches = await catalog.searchByPattern(patterns);
  console.log("\n" + formatMatchTable(matches) + "\n");
}

async function cmdDownload(catalog: Catalog, args: string[], config: ArchiveConfig): Promise<void> {
  const terms = positionals(args);
  if (terms.length === 0 && !hasFlag(args, "--all")) {
    throw new FormatError("Refusing to download the whole archive without --all. Give a query or pass --all.");
  }

  const matches = await catalog.searchByPattern(parseQuery(terms));
  if (matches.length === 0) {
    console.log("No songs matched.");
    return;
  }

  const destination = getFlag(args, "--to") ?? "downloads";
  console.log(`Downloading ${matches.length} song(s) to ${destination}...`);
  const outcomes = await catalog.download(
    matches.map((m) => m.record),
    destination,
    {
      concurrency: parseJobs(args, config.downloadConcurrency),
      verify: hasFlag(args, "--verify"),
    }
  );

  console.log(formatDownloadReport(outcomes));
  if (summarizeDownloads(outcomes).failed > 0) process.exitCode = 1;
}

async function cmdCache(catalog: Catalog, args: string[]): Promise<void> {
  if (hasFlag(args, "--all")) {
    await catalog.populateAll();
  } else {
    for (const name of positionals(args)) await catalog.get(name);
  }

  let cached = 0;
  for (const name of catalog.names()) {
    if (catalog.peek(name).isPopulated) cached++;
  }
  console.log(`${cached} of ${catalog.size} system(s) cached.`);
}

async function cmdRefresh(catalog: Catalog, args: string[]): Promise<void> {
  const names = positionals(args);
  let changed: string[];
  if (names.length > 0) {
    changed = [];
    for (const name of names) {
      if (await catalog.refresh(name)) changed.push(name);
    }
  } else {
    changed = await catalog.refreshAll();
  }

  if (changed.length === 0) {
    console.log("Every checked system is up to date.");
  } else {
    console.log(`Reloaded ${changed.length} system(s): ${changed.join(", ")}`);
  }
}

function cmdHelp(): void {
  console.log(`
vgm-archive ${VERSION} — browse and download the vgmusic.com MIDI archive

Usage:
  vgm-archive systems                         List every system
  vgm-archive games <system>                  List a system's games
  vgm-archive search <field=regex>...         Search songs
  vgm-archive download <field=regex>...       Download matching songs
        [--to DIR] [--verify] [--jobs N] [--all]
  vgm-archive cache [<system>...] [--all]     Fetch systems into the snapshot
  vgm-archive refresh [<system>...]           Re-fetch cached systems whose page changed
  vgm-archive help                            Show this help

Query fields: system, game, url, title, size, author, checksum
Patterns are unanchored regular expressions; use ^ and $ for exact matches.

Options:
  --cache FILE    Snapshot file (default: $VGM_CACHE_FILE or cache.json)
  --offline       Use only the snapshot's system index
  --refresh       Re-read the archive's front page even with a snapshot
  --verbose       Log every request to stderr

Environment:
  VGM_BASE_URL, VGM_CACHE_FILE, VGM_USER_AGENT, VGM_DOWNLOAD_CONCURRENCY,
  VGM_PAGE_CONCURRENCY, VGM_TIMEOUT_MS, LOG_LEVEL
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";
  const rest = args.slice(1);

  if (command === "help" || command === "--help" || command === "-h") {
    cmdHelp();
    return;
  }
  if (!["systems", "games", "search", "download", "cache", "refresh"].includes(command)) {
    console.error(`Unknown command: "${command}". Run 'vgm-archive help' for usage.`);
    process.exit(1);
  }

  if (hasFlag(rest, "--verbose")) process.env.LOG_LEVEL = "debug";

  const config = loadConfig();
  const cacheFile = getFlag(rest, "--cache") ?? config.cacheFile;
  const snapshot = await readSnapshot(cacheFile);
  const catalog = await Catalog.open({
    baseUrl: config.baseUrl,
    snapshot,
    offline: hasFlag(rest, "--offline"),
    refreshIndex: hasFlag(rest, "--refresh"),
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    pageConcurrency: config.pageConcurrency,
  });

  try {
    switch (command) {
      case "systems":
        cmdSystems(catalog);
        break;
      case "games":
        await cmdGames(catalog, rest);
        break;
      case "search":
        await cmdSearch(catalog, rest);
        break;
      case "download":
        await cmdDownload(catalog, rest, config);
        break;
      case "cache":
        await cmdCache(catalog, rest);
        break;
      case "refresh":
        await cmdRefresh(catalog, rest);
        break;
    }
  } finally {
    // Whatever was fetched before a failure is still worth keeping.
    await writeSnapshot(cacheFile, buildSnapshotFile(catalog.serializePopulated(), catalog.index()));
    await catalog.close();
  }
}

main().catch((err) => {
  console.error(formatErrorMessage(err));
  process.exit(1);
});
