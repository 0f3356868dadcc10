// ─── HTTP Transport ─────────────────────────────────────────────────────────
//
// The one shared connection pool. Every page fetch and every file download
// in a session goes through the same undici Agent; closing the transport
// closes the pool.
// ─────────────────────────────────────────────────────────────────────────────

import { Agent, fetch, type Dispatcher, type Response } from "undici";
import { TransportError, formatErrorMessage } from "../errors.js";
import { loggerFor } from "../logger.js";
import { DEFAULT_TIMEOUT_MS, VERSION } from "../config.js";

const log = loggerFor("http");

export interface TextResponse {
  /** Final URL after redirects. */
  url: string;
  status: number;
  /** Response headers, lowercased names. */
  headers: Record<string, string>;
  body: string;
}

/**
 * What the archive needs from HTTP. Implementations are shared read-only by
 * concurrent callers; non-2xx responses reject with a TransportError.
 */
export interface HttpTransport {
  getText(url: string): Promise<TextResponse>;
  getBytes(url: string): Promise<Uint8Array>;
  /** Release pooled connections. Safe to call more than once. */
  close(): Promise<void>;
}

export interface TransportOptions {
  userAgent?: string;
  timeoutMs?: number;
  /** Maximum sockets per origin. */
  connections?: number;
  /** Use this dispatcher instead of creating an Agent (tests pass a MockAgent). */
  dispatcher?: Dispatcher;
}

export class UndiciTransport implements HttpTransport {
  private readonly dispatcher: Dispatcher;
  private readonly userAgent: string;
  private closed = false;

  constructor(options: TransportOptions = {}) {
    const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.dispatcher = options.dispatcher ?? new Agent({
      connections: options.connections ?? 8,
      headersTimeout: timeout,
      bodyTimeout: timeout,
    });
    this.userAgent = options.userAgent ?? `vgm-archive/${VERSION}`;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async getText(url: string): Promise<TextResponse> {
    const response = await this.request(url);
    const body = await this.readBody(url, () => response.text());
    const headers: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      headers[name.toLowerCase()] = value;
    });
    return { url: response.url || url, status: response.status, headers, body };
  }

  async getBytes(url: string): Promise<Uint8Array> {
    const response = await this.request(url);
    const buffer = await this.readBody(url, () => response.arrayBuffer());
    return new Uint8Array(buffer);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.dispatcher.close();
  }

  private async request(url: string): Promise<Response> {
    if (this.closed) {
      throw new TransportError(`GET ${url} failed: transport is closed`, { url });
    }

    const startedAt = Date.now();
    let response: Response;
    try {
      response = await fetch(url, {
        dispatcher: this.dispatcher,
        headers: { "user-agent": this.userAgent, accept: "*/*" },
        redirect: "follow",
      });
    } catch (error) {
      const message = formatErrorMessage(error);
      log.warn(`GET ${url} status=ERR latencyMs=${Date.now() - startedAt} error=${message}`);
      throw new TransportError(`GET ${url} failed: ${message}`, { url, cause: error });
    }

    const latency = Date.now() - startedAt;
    if (!response.ok) {
      log.warn(`GET ${url} status=${response.status} latencyMs=${latency}`);
      await response.body?.cancel();
      throw new TransportError(`GET ${url} failed: HTTP ${response.status}`, {
        url,
        status: response.status,
      });
    }

    log.info(`GET ${url} status=${response.status} latencyMs=${latency}`);
    return response;
  }

  private async readBody<T>(url: string, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      throw new TransportError(`GET ${url} failed while reading body: ${formatErrorMessage(error)}`, {
        url,
        cause: error,
      });
    }
  }
}
