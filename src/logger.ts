// ─── Logger ─────────────────────────────────────────────────────────────────
//
// Prefixed console loggers. Everything goes to stderr: stdout belongs to the
// CLI's table output and to the MCP stdio channel.
// ─────────────────────────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_LEVEL: LogLevel = "info";

const LOGGER_CACHE = new Map<string, PrefixedLogger>();

export interface PrefixedLogger {
  readonly prefix: string;
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

export function loggerFor(prefix: string): PrefixedLogger {
  const cached = LOGGER_CACHE.get(prefix);
  if (cached) return cached;

  const logger = createPrefixedLogger(prefix);
  LOGGER_CACHE.set(prefix, logger);
  return logger;
}

function createPrefixedLogger(prefix: string): PrefixedLogger {
  const render = (level: LogLevel, message: string, details?: Record<string, unknown>) => {
    if (shouldSkip(level)) return;
    const write = level === "warn" ? console.warn : console.error;
    const label = `[${prefix}] ${message}`;
    if (details && Object.keys(details).length > 0) {
      write(label, details);
    } else {
      write(label);
    }
  };

  return {
    prefix,
    debug(message, details) {
      render("debug", message, details);
    },
    info(message, details) {
      render("info", message, details);
    },
    warn(message, details) {
      render("warn", message, details);
    },
    error(message, details) {
      render("error", message, details);
    },
  };
}

// Read per call so LOG_LEVEL set by the CLI (--verbose) takes effect.
function shouldSkip(level: LogLevel): boolean {
  if (process.env.NODE_ENV === "test") return true;
  const active = normaliseLevel(process.env.LOG_LEVEL) ?? DEFAULT_LEVEL;
  return LEVEL_ORDER[level] < LEVEL_ORDER[active];
}

export function normaliseLevel(raw?: string): LogLevel | undefined {
  if (!raw) return undefined;
  const lowered = raw.trim().toLowerCase();
  if (lowered === "debug" || lowered === "info" || lowered === "warn" || lowered === "error") {
    return lowered;
  }
  return undefined;
}
