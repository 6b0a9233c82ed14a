import type { ParsedPage, SiteSignals } from "./people.types.js";
import type { Element } from "domhandler";
import { KEYWORDS, PROFILE_DOMAIN, THIN_TEXT_WORDS } from "./config.js";
import { escapeRegex } from "./patterns.js";
import { rawText, textOf } from "./text.js";
import { isProfileHref, normalizeProfileUrl, pathOf } from "./url.js";
import { log } from "./utils/log.js";

const PROFILE_IN_TEXT = new RegExp(
  `https?:\\/\\/(?:[\\w-]+\\.)?${escapeRegex(PROFILE_DOMAIN)}\\/[^\\s"'<>\\]}),]+`,
  "gi",
);
const COMPANY_PATH = /^\/(company|showcase)\//i;
const PERSON_PATH = /^\/in\//i;
const SHARE_PATH = /share|embed/i;

/**
 * Canonical company page link, or "" for anything that is not one.
 * Share and embed widgets are dropped; personal profiles pass as a last resort.
 */
export function companyLink(raw: string, base?: string): string {
  const link = normalizeProfileUrl(raw, base);
  if (!link) return "";
  const path = pathOf(link);
  if (SHARE_PATH.test(path)) return "";
  return COMPANY_PATH.test(path) || PERSON_PATH.test(path) ? link : "";
}

const linksIn = (text: string): string[] => [...text.matchAll(PROFILE_IN_TEXT)].map(m => m[0]);

function sameAsLinks(v: unknown, out: string[]): void {
  if (Array.isArray(v)) {
    v.forEach(x => sameAsLinks(x, out));
    return;
  }
  if (typeof v !== "object" || v === null) return;
  for (const [key, value] of Object.entries(v)) {
    if (key === "sameAs") {
      for (const s of Array.isArray(value) ? value : [value]) if (typeof s === "string") out.push(s);
    } else {
      sameAsLinks(value, out);
    }
  }
}

function parseLdJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    log.debug(`ld+json block skipped: ${(e as Error).message}`);
    return undefined;
  }
}

/**
 * Company page links on one page, best first: company and showcase pages
 * before personal profiles, shorter before longer. Looks at anchors, any
 * attribute naming the network, ld+json `sameAs` and finally the raw markup.
 */
export function companyLinkCandidates(page: ParsedPage): string[] {
  const { $, url } = page;
  const raw: string[] = [];

  for (const a of $("a[href]").toArray()) raw.push(a.attribs.href ?? "");
  for (const el of $<Element, "*">("*").toArray()) {
    for (const value of Object.values(el.attribs)) if (isProfileHref(value)) raw.push(...linksIn(value));
  }
  for (const el of $("script[type]").toArray()) {
    if ((el.attribs.type ?? "").toLowerCase().includes("ld+json")) sameAsLinks(parseLdJson(rawText(el)), raw);
  }
  raw.push(...linksIn($.html()));

  const links = [...new Set(raw.map(r => companyLink(r, url)).filter(Boolean))];
  const rank = (link: string) => (PERSON_PATH.test(pathOf(link)) ? 1 : 0);
  return links.sort((a, b) => rank(a) - rank(b) || a.length - b.length);
}

export function findCompanyProfile(pages: readonly ParsedPage[]): string {
  for (const page of pages) {
    const [best] = companyLinkCandidates(page);
    if (best) return best;
  }
  return "";
}

/** Sector terms and amount of visible text on a home page. */
export function siteSignals(page: ParsedPage, sectorKeywords: readonly string[] = KEYWORDS.sectorKeywords): SiteSignals {
  const text = textOf(page.$.root().toArray()[0]).toLowerCase();
  const wordCount = text ? text.split(" ").length : 0;
  return {
    sectorKeywords: sectorKeywords.filter(k => text.includes(k.toLowerCase())),
    wordCount,
    thinText: wordCount < THIN_TEXT_WORDS,
  };
}
