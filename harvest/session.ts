import { load } from "cheerio";
import type { Fetcher, FetchKind, ParsedPage, ScanOptions } from "./people.types.js";
import { DECISION_LIMIT, KEYWORDS, MAX_PAGES } from "./config.js";
import { collectScripts } from "./extractors/index.js";
import { PatternCache } from "./patterns.js";
import { pageKey } from "./url.js";
import { log } from "./utils/log.js";

export const DEFAULT_SCAN_OPTIONS: ScanOptions = {
  maxPages: MAX_PAGES,
  decisionLimit: DECISION_LIMIT,
  fallbackPaths: KEYWORDS.teamPaths,
};

type Resource = { finalUrl: string; body: string };

/**
 * State shared by the scans of one run: the fetcher, a resource cache
 * (page key -> body) and the compiled-pattern cache. Both caches only grow;
 * a session covers a bounded list of sites. Cached entries are promises so
 * concurrent scans asking for the same URL share one download.
 */
export class ScanSession {
  readonly patterns = new PatternCache();
  readonly options: ScanOptions;
  private readonly resources = new Map<string, Promise<Resource | null>>();

  constructor(private readonly fetcher: Fetcher, options: Partial<ScanOptions> = {}) {
    this.options = { ...DEFAULT_SCAN_OPTIONS, ...options };
  }

  get cachedResources(): number {
    return this.resources.size;
  }

  loadResource(url: string, kind: FetchKind): Promise<Resource | null> {
    const key = `${kind}:${pageKey(url)}`;
    let pending = this.resources.get(key);
    if (!pending) {
      pending = this.fetcher.fetch(url, kind).then(
        res => (res ? { finalUrl: res.finalUrl || url, body: res.body } : null),
        (e: unknown) => {
          log.debug(`fetch of ${url} threw: ${(e as Error).message}`);
          return null;
        },
      );
      this.resources.set(key, pending);
    }
    return pending;
  }

  async loadPage(url: string): Promise<ParsedPage | null> {
    const res = await this.loadResource(url, "page");
    if (!res) return null;
    const $ = load(res.body);
    const scripts = await collectScripts($, res.finalUrl, async src => (await this.loadResource(src, "script"))?.body ?? null);
    return { url: res.finalUrl, $, scripts };
  }
}
