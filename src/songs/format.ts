// ─── Formatting & Queries ───────────────────────────────────────────────────
//
// Text rendering shared by the CLI and the MCP server, and the
// "field=regex" query syntax both accept.
// ─────────────────────────────────────────────────────────────────────────────

import { FormatError } from "../errors.js";
import { summarizeDownloads, type DownloadOutcome } from "./downloader.js";
import { PATTERN_FIELDS, type PatternField, type SongMatch, type SongPatterns } from "./types.js";

// ─── Queries ────────────────────────────────────────────────────────────────

/**
 * Parse "field=regex" terms into a pattern map. Everything after the first
 * "=" is the regex, so patterns may contain "=". A repeated field keeps the
 * last term.
 */
export function parseQuery(terms: readonly string[]): SongPatterns {
  const patterns: SongPatterns = {};
  for (const term of terms) {
    const eq = term.indexOf("=");
    if (eq <= 0) {
      throw new FormatError(`Query term must look like field=regex: "${term}"`, { field: term });
    }
    const name = term.slice(0, eq);
    const field = PATTERN_FIELDS.find((f) => f === name);
    if (!field) {
      throw new FormatError(`Unknown query field "${name}". Available: ${PATTERN_FIELDS.join(", ")}`, {
        field: name,
      });
    }
    patterns[field] = term.slice(eq + 1);
  }
  return patterns;
}

/** Keep only the pattern fields that were given a non-empty value. */
export function pickPatterns(input: Partial<Record<PatternField, string | undefined>>): SongPatterns {
  const patterns: SongPatterns = {};
  for (const field of PATTERN_FIELDS) {
    const value = input[field];
    if (value) patterns[field] = value;
  }
  return patterns;
}

// ─── Tables ─────────────────────────────────────────────────────────────────

export function formatMatchTable(matches: readonly SongMatch[]): string {
  const lines = [
    padRight("System", 16) + padRight("Game", 32) + padRight("Title", 36) + padRight("Author", 20) + "Size",
    "─".repeat(112),
  ];
  for (const { system, game, record } of matches) {
    lines.push(
      padRight(truncate(system, 14), 16) +
        padRight(truncate(game, 30), 32) +
        padRight(truncate(record.title, 34), 36) +
        padRight(truncate(record.author, 18), 20) +
        String(record.size)
    );
  }
  lines.push("", `${matches.length} song(s) found.`);
  return lines.join("\n");
}

/** One line per match, for tool results. */
export function formatMatchList(matches: readonly SongMatch[]): string {
  return matches
    .map(({ system, game, record }) => `${system} / ${game} — ${record.title} (${record.author}, ${record.size} bytes) ${record.url}`)
    .join("\n");
}

export function formatDownloadReport(outcomes: readonly DownloadOutcome[]): string {
  const summary = summarizeDownloads(outcomes);
  const lines = outcomes
    .filter((o) => o.status === "failed")
    .map((o) => `  FAIL ${o.record.title}: ${o.error?.message ?? "unknown error"}`);
  lines.push(
    `Downloaded: ${summary.downloaded}  Skipped: ${summary.skipped}  Failed: ${summary.failed}`
  );
  return lines.join("\n");
}

export function padRight(s: string, len: number): string {
  return s.length >= len ? s.substring(0, len) : s + " ".repeat(len - s.length);
}

export function truncate(s: string, max: number): string {
  return s.length <= max ? s : s.substring(0, max - 1) + "…";
}
