// ─── Filenames ──────────────────────────────────────────────────────────────

import { posix } from "node:path";

const DEFAULT_EXTENSION = ".mid";

/**
 * Make a song title safe to use as a filename on any filesystem: every
 * character that is not a letter or digit becomes "_", runs of "_" collapse,
 * and leading/trailing "_" are dropped.
 */
export function toSafeFilename(title: string): string {
  const safe = Array.from(title, (ch) => (/[\p{L}\p{N}]/u.test(ch) ? ch : "_"))
    .join("")
    .replace(/_{2,}/g, "_")
    .replace(/^_+|_+$/g, "");
  return safe || "untitled";
}

/** Extension of the URL's path, lowercased, or ".mid" when there is none. */
export function extensionFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return DEFAULT_EXTENSION;
  }
  const ext = posix.extname(pathname).toLowerCase();
  return /^\.[a-z0-9]+$/.test(ext) ? ext : DEFAULT_EXTENSION;
}

/**
 * Filenames for a batch, in input order. Titles that collide (case
 * insensitively) get _2, _3, ... suffixes.
 */
export function planFilenames(songs: ReadonlyArray<{ title: string; url: string }>): string[] {
  const used = new Set<string>();
  return songs.map((song) => {
    const base = toSafeFilename(song.title);
    const ext = extensionFromUrl(song.url);
    let candidate = `${base}${ext}`;
    for (let n = 2; used.has(candidate.toLowerCase()); n++) {
      candidate = `${base}_${n}${ext}`;
    }
    used.add(candidate.toLowerCase());
    return candidate;
  });
}
