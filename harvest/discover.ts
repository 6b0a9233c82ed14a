import type { ParsedPage } from "./people.types.js";
import { hostOf, originOf, pageKey, resolveUrl, stripWww } from "./url.js";
import { textOf } from "./text.js";

export const TEAM_ANCHOR_HINT = new RegExp(
  "\\b(team|people|leadership|management|board|partners|crew|about|" +
    "who[-\\s]+we[-\\s]+are|ons[-\\s]?team|over[-\\s]?ons|wie\\s+zijn\\s+wij|organisatie)\\b",
  "i",
);

export type DiscoverOptions = {
  maxPages: number;
  fallbackPaths: readonly string[];
};

/**
 * Pages likely to list people, in scan order: the site root, the usual
 * team/about paths, then same-host home-page links that look like people
 * pages. Without a home page only the root and the fixed paths are tried;
 * with no fixed paths either, nothing is returned.
 */
export function discoverCandidatePages(rootUrl: string, home: ParsedPage | null, opts: DiscoverOptions): string[] {
  const origin = originOf(rootUrl);
  if (!origin || opts.maxPages <= 0) return [];
  if (!home && opts.fallbackPaths.length === 0) return [];

  const candidates: string[] = [origin];
  for (const path of opts.fallbackPaths) candidates.push(resolveUrl(path, origin));

  if (home) {
    const homeHost = stripWww(hostOf(home.url));
    for (const a of home.$("a[href]").toArray()) {
      const href = (a.attribs.href ?? "").trim();
      const full = resolveUrl(href, home.url);
      if (!full || stripWww(hostOf(full)) !== homeHost) continue;
      if (TEAM_ANCHOR_HINT.test(href) || TEAM_ANCHOR_HINT.test(textOf(a))) candidates.push(full);
    }
  }

  const seen = new Set<string>();
  const out: string[] = [];
  for (const c of candidates) {
    const key = pageKey(c);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(key);
    if (out.length >= opts.maxPages) break;
  }
  return out;
}
