// ─── Page Parser ────────────────────────────────────────────────────────────
//
// Reads the archive's HTML. Two page kinds:
//   - the front page, whose menu paragraphs list every system by section
//   - a system page, one table with a header row per game and a row per song
//
// Song rows look like:
//   <tr><td><a href="song.mid">Title</a></td><td>1234 bytes</td>
//       <td>Author</td><td><a href="/file/<md5>.html">info</a></td></tr>
// ─────────────────────────────────────────────────────────────────────────────

import * as cheerio from "cheerio";
import { ParseError } from "../errors.js";
import type { ParsedSong, SystemEntry } from "./types.js";

const RE_CHECKSUM_LINK = /\/file\/([0-9a-f]+)\.html/i;
const RE_INDEXER_VERSION = /(\d+(?:\.\d+)+)/;

interface ColumnLayout {
  title: number;
  size: number;
  author: number;
}

const DEFAULT_LAYOUT: ColumnLayout = { title: 0, size: 1, author: 2 };

export interface SystemPage {
  records: ParsedSong[];
  indexerVersion?: string;
}

// ─── System Pages ───────────────────────────────────────────────────────────

/**
 * Parse a system page into song rows, in page order.
 * A page whose table has no song rows yields an empty list.
 */
export function parseSystemPage(html: string, pageUrl: string): SystemPage {
  const $ = cheerio.load(html);
  const table = $("table").first();
  if (table.length === 0) {
    throw new ParseError(`No song table found on ${pageUrl}`, { details: { url: pageUrl } });
  }

  const layout = readColumnLayout(table.find("th").toArray().map((th) => cleanText($(th).text())));
  const records: ParsedSong[] = [];
  let game: string | undefined;

  for (const tr of table.find("tr").toArray()) {
    const row = $(tr);

    // column headings
    if (row.children("th").length > 0) continue;

    if (row.hasClass("header")) {
      const heading = cleanText(row.text());
      if (heading) game = heading;
      continue;
    }

    // visual padding
    if (!cleanText(row.text())) continue;

    const cells = row.children("td");
    if (cells.length < 3) {
      throw new ParseError(`Unexpected row on ${pageUrl}: "${cleanText(row.text())}"`, {
        details: { url: pageUrl },
      });
    }
    if (game === undefined) {
      throw new ParseError(`Song row before any game heading on ${pageUrl}`, {
        details: { url: pageUrl },
      });
    }

    const titleCell = cells.eq(layout.title);
    const href = titleCell.find("a[href]").first().attr("href");
    if (!href) {
      throw new ParseError(`Song row without a file link on ${pageUrl}`, { details: { url: pageUrl, game } });
    }

    const sizeText = cleanText(cells.eq(layout.size).text());
    const sizeToken = sizeText.split(" ")[0] ?? "";
    if (!/^\d+$/.test(sizeToken)) {
      throw new ParseError(`Unreadable file size "${sizeText}" on ${pageUrl}`, { details: { url: pageUrl, game } });
    }

    records.push({
      game,
      url: resolveUrl(href, pageUrl),
      title: cleanText(titleCell.text()),
      size: Number.parseInt(sizeToken, 10),
      author: cleanText(cells.eq(layout.author).text()),
      checksum: readChecksum(row.find("a[href]").toArray().map((a) => $(a).attr("href") ?? ""), pageUrl),
    });
  }

  const version = RE_INDEXER_VERSION.exec(cleanText($("address").text()));
  return { records, indexerVersion: version?.[1] };
}

function readColumnLayout(headings: string[]): ColumnLayout {
  const names = headings.map((h) => h.toLowerCase().replace(/ /g, "_"));
  const layout = {
    title: names.indexOf("song_title"),
    size: names.indexOf("file_size"),
    author: names.indexOf("sequenced_by"),
  };
  if (layout.title < 0 || layout.size < 0 || layout.author < 0) return DEFAULT_LAYOUT;
  return layout;
}

function readChecksum(hrefs: string[], pageUrl: string): string {
  for (const href of hrefs) {
    const match = RE_CHECKSUM_LINK.exec(href);
    if (match) return match[1].toLowerCase();
  }
  throw new ParseError(`Song row without a checksum link on ${pageUrl}`, { details: { url: pageUrl } });
}

// ─── Front Page ─────────────────────────────────────────────────────────────

/**
 * Parse the front page menu into the system index.
 * The first menu paragraph describes the site itself and is skipped.
 */
export function parseIndexPage(html: string, baseUrl: string): Map<string, SystemEntry> {
  const $ = cheerio.load(html);
  const menus = $("p.menu").toArray().slice(1);
  if (menus.length === 0) {
    throw new ParseError(`No system menu found on ${baseUrl}`, { details: { url: baseUrl } });
  }

  const index = new Map<string, SystemEntry>();
  for (const menu of menus) {
    const section = cleanText($(menu).prevAll("p.menularge").first().text());
    for (const link of $(menu).find("a[href]").toArray()) {
      const name = cleanText($(link).text());
      const href = $(link).attr("href");
      if (!name || !href || index.has(name)) continue;
      index.set(name, { url: resolveUrl(href, baseUrl), section });
    }
  }
  return index;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function resolveUrl(href: string, base: string): string {
  try {
    return new URL(href, base).toString();
  } catch (error) {
    throw new ParseError(`Invalid link "${href}" on ${base}`, { cause: error, details: { url: base } });
  }
}
