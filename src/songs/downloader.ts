// ─── Downloader ─────────────────────────────────────────────────────────────
//
// Batch download of song files with a ceiling on requests in flight. Each
// song succeeds or fails on its own; a failure is reported in that song's
// outcome and never cancels the rest of the batch.
// ─────────────────────────────────────────────────────────────────────────────

import { createHash } from "node:crypto";
import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import pLimit from "p-limit";
import { DEFAULT_DOWNLOAD_CONCURRENCY } from "../config.js";
import { ArchiveError, VerificationError, formatErrorMessage, toArchiveError } from "../errors.js";
import type { HttpTransport } from "../http/transport.js";
import { loggerFor } from "../logger.js";
import { planFilenames } from "./filename.js";
import type { SongRecord } from "./types.js";

const log = loggerFor("download");

export interface DownloadOptions {
  /** Maximum downloads in flight. Default 5. */
  concurrency?: number;
  /** Check each file's size and MD5 against the record. Default false. */
  verify?: boolean;
  /** Leave files that already exist alone instead of fetching them. Default true. */
  skipExisting?: boolean;
}

export type DownloadStatus = "downloaded" | "skipped" | "failed";

export interface DownloadOutcome {
  record: SongRecord;
  /** Where the file was (or would have been) written. */
  path: string;
  status: DownloadStatus;
  /** Bytes written, for downloaded files. */
  bytes?: number;
  /** TransportError, VerificationError, or an "io" ArchiveError. */
  error?: ArchiveError;
}

export type DownloadSummary = Record<DownloadStatus, number>;

export class Downloader {
  constructor(private readonly transport: HttpTransport) {}

  /**
   * Download songs into `destination` (created if missing).
   * Resolves with one outcome per record, in input order.
   */
  async download(
    records: readonly SongRecord[],
    destination: string,
    options: DownloadOptions = {}
  ): Promise<DownloadOutcome[]> {
    const concurrency = options.concurrency ?? DEFAULT_DOWNLOAD_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer: got ${concurrency}`);
    }

    await mkdir(destination, { recursive: true });

    const filenames = planFilenames(records);
    const limit = pLimit(concurrency);
    log.info(`downloading ${records.length} songs to ${destination}`, { concurrency });

    return Promise.all(
      records.map((record, i) =>
        limit(() => this.retrieve(record, join(destination, filenames[i]), options))
      )
    );
  }

  private async retrieve(
    record: SongRecord,
    path: string,
    options: DownloadOptions
  ): Promise<DownloadOutcome> {
    if ((options.skipExisting ?? true) && existsSync(path)) {
      log.warn(`${path} already exists, skipping`);
      return { record, path, status: "skipped" };
    }

    try {
      const data = await this.transport.getBytes(record.url);
      if (options.verify) verifySong(record, data);
      await writeFile(path, data);
      log.info(`saved ${record.url} to ${path}`);
      return { record, path, status: "downloaded", bytes: data.byteLength };
    } catch (err) {
      const error = toArchiveError(err);
      log.warn(`failed ${record.url}: ${formatErrorMessage(error)}`, { kind: error.kind });
      return { record, path, status: "failed", error };
    }
  }
}

/** Throw VerificationError unless the bytes match the record's size and MD5. */
export function verifySong(record: SongRecord, data: Uint8Array): void {
  const actualSize = data.byteLength;
  const actualChecksum = md5Hex(data);
  const expectedChecksum = record.checksum.toLowerCase();

  if (actualSize !== record.size || actualChecksum !== expectedChecksum) {
    throw new VerificationError(
      `Check failed for ${record.url}: expected ${expectedChecksum} (${record.size} bytes), ` +
        `got ${actualChecksum} (${actualSize} bytes)`,
      {
        expectedSize: record.size,
        actualSize,
        expectedChecksum,
        actualChecksum,
      }
    );
  }
}

export function md5Hex(data: Uint8Array): string {
  return createHash("md5").update(data).digest("hex");
}

export function summarizeDownloads(outcomes: readonly DownloadOutcome[]): DownloadSummary {
  const summary: DownloadSummary = { downloaded: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) summary[outcome.status]++;
  return summary;
}
