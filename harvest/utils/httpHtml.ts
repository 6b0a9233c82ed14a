import fetch from "node-fetch";
import type { FetchedResource, Fetcher, FetchKind } from "../people.types.js";
import {
  FETCH_TIMEOUT_MS, JITTER_MS, MAX_HTML_BYTES, MAX_SCRIPT_BYTES, RATE_MS, USER_AGENT,
} from "../config.js";
import { hostOf } from "../url.js";
import { log } from "./log.js";

const sleep = (ms: number) => new Promise(r => setTimeout(r, ms));

const DEFAULT_HEADERS = {
  "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "User-Agent": USER_AGENT,
};

const ALLOWED_TYPES: Record<FetchKind, RegExp> = {
  page: /text\/html|application\/xhtml\+xml/i,
  script: /javascript|json|text/i,
};

export type HttpFetcherOptions = {
  rateMs?: number;
  jitterMs?: number;
  timeoutMs?: number;
  retries?: number;
  maxBytes?: Partial<Record<FetchKind, number>>;
};

/**
 * Polite HTTP client for site scans: one request per host at a time, spaced
 * by RATE_MS plus random jitter, bounded by a timeout and a size cap.
 * Every failure resolves to null.
 */
export class HttpFetcher implements Fetcher {
  private readonly nextSlot = new Map<string, number>();
  private readonly rateMs: number;
  private readonly jitterMs: number;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly maxBytes: Record<FetchKind, number>;

  constructor(opts: HttpFetcherOptions = {}) {
    this.rateMs = opts.rateMs ?? RATE_MS;
    this.jitterMs = opts.jitterMs ?? JITTER_MS;
    this.timeoutMs = opts.timeoutMs ?? FETCH_TIMEOUT_MS;
    this.retries = opts.retries ?? 3;
    this.maxBytes = { page: MAX_HTML_BYTES, script: MAX_SCRIPT_BYTES, ...opts.maxBytes };
  }

  async fetch(url: string, kind: FetchKind): Promise<FetchedResource | null> {
    const host = hostOf(url);
    if (!host) {
      log.debug(`invalid URL skipped: ${url}`);
      return null;
    }
    try {
      return await this.request(url, host, kind);
    } catch (e) {
      log.debug(`GET ${url} failed: ${(e as Error).message}`);
      return null;
    }
  }

  private async throttle(host: string) {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot.get(host) ?? 0);
    this.nextSlot.set(host, slot + this.rateMs + Math.floor(Math.random() * this.jitterMs));
    if (slot > now) await sleep(slot - now);
  }

  private async request(url: string, host: string, kind: FetchKind): Promise<FetchedResource> {
    for (let i = 0; i <= this.retries; i++) {
      await this.throttle(host);

      const ctrl = new AbortController();
      const timer = setTimeout(() => ctrl.abort(), this.timeoutMs);
      try {
        const res = await fetch(url, { headers: DEFAULT_HEADERS, redirect: "follow", signal: ctrl.signal });

        if (res.ok) {
          const contentType = res.headers.get("content-type") ?? "";
          if (!ALLOWED_TYPES[kind].test(contentType)) throw new Error(`content-type ${contentType || "(none)"}`);
          const declared = Number(res.headers.get("content-length") ?? 0);
          if (declared > this.maxBytes[kind]) throw new Error(`too large (${declared} bytes)`);
          const body = await res.text();
          if (Buffer.byteLength(body) > this.maxBytes[kind]) throw new Error(`too large (${Buffer.byteLength(body)} bytes)`);
          return { status: res.status, finalUrl: res.url || url, contentType, body };
        }

        // Handle 429/5xx and be gentler on 403
        if (res.status === 429 || res.status >= 500 || res.status === 403) {
          if (i === this.retries) throw new Error(`GET ${url} -> ${res.status} (exhausted)`);
          const retryAfter = Number(res.headers.get("retry-after")) || 0;
          await sleep(retryAfter > 0 ? retryAfter * 1000 : Math.min(2000 * (i + 1), 10000));
          continue;
        }

        throw new Error(`GET ${url} -> ${res.status}`);
      } finally {
        clearTimeout(timer);
      }
    }

    throw new Error("unreachable");
  }
}
