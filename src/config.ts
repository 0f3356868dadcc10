// ─── Configuration ──────────────────────────────────────────────────────────
//
// Runtime settings come from environment variables, validated with zod.
// CLI flags and MCP tool arguments override individual values.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { FormatError } from "./errors.js";

export const VERSION = "1.0.0";

export const DEFAULT_BASE_URL = "https://vgmusic.com";
export const DEFAULT_CACHE_FILE = "cache.json";
export const DEFAULT_DOWNLOAD_CONCURRENCY = 5;
export const DEFAULT_PAGE_CONCURRENCY = 4;
export const DEFAULT_TIMEOUT_MS = 30_000;

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const ConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  cacheFile: z.string().min(1).default(DEFAULT_CACHE_FILE),
  userAgent: z.string().min(1).default(`vgm-archive/${VERSION}`),
  downloadConcurrency: positiveInt(DEFAULT_DOWNLOAD_CONCURRENCY),
  pageConcurrency: positiveInt(DEFAULT_PAGE_CONCURRENCY),
  timeoutMs: positiveInt(DEFAULT_TIMEOUT_MS),
});

export type ArchiveConfig = z.infer<typeof ConfigSchema>;

type ConfigKey = keyof ArchiveConfig;

const CONFIG_KEYS = ConfigSchema.keyof().options;

const ENV_KEYS: Record<ConfigKey, string> = {
  baseUrl: "VGM_BASE_URL",
  cacheFile: "VGM_CACHE_FILE",
  userAgent: "VGM_USER_AGENT",
  downloadConcurrency: "VGM_DOWNLOAD_CONCURRENCY",
  pageConcurrency: "VGM_PAGE_CONCURRENCY",
  timeoutMs: "VGM_TIMEOUT_MS",
};

/**
 * Build the configuration from environment variables.
 * Unset or blank variables fall back to the defaults above.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ArchiveConfig {
  const raw: Partial<Record<ConfigKey, string>> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[ENV_KEYS[key]]?.trim();
    if (value) raw[key] = value;
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = CONFIG_KEYS.find((k) => k === issue.path[0]);
    const field = key ? ENV_KEYS[key] : "config";
    throw new FormatError(`Invalid ${field}: ${issue.message}`, { field });
  }
  return result.data;
}
