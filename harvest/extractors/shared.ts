import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { PersonRecord } from "../people.types.js";
import { cleanEmail, isNameLike, NAME_RE, textLines, textOf, TITLE_AFTER_NAME_RE } from "../text.js";
import { isProfileHref, normalizeProfileUrl, resolveUrl } from "../url.js";

export const NAME_SELECTORS = [
  "h1", "h2", "h3", "h4", "strong", "b",
  ".name", ".person-name", ".member-name", ".team__name", ".profile-name",
] as const;

const BLOCK_NAME_SELECTORS = [
  "strong", "b", "h1", "h2", "h3", "h4",
  ".name", ".team__name", ".member-name", ".person-name", ".profile-name",
] as const;

/** Short inline elements that usually carry a role line. */
export const TITLE_TAGS = "em, small, span, p";

export type RawPerson = {
  name?: string;
  title?: string;
  profileLink?: string;      // raw href; canonicalized here
  email?: string;            // raw text; cleaned here
};

/**
 * Builds an admissible record for a page, or null when every identifying
 * field comes out empty after cleaning.
 */
export function makeRecord(raw: RawPerson, sourcePage: string): PersonRecord | null {
  const rec: PersonRecord = {
    name: (raw.name ?? "").trim(),
    title: (raw.title ?? "").trim(),
    profileLink: normalizeProfileUrl(raw.profileLink ?? "", sourcePage),
    email: cleanEmail(raw.email ?? ""),
    sourcePage,
    score: 0,
    rankReason: "",
  };
  return isAdmissible(rec) ? rec : null;
}

export function isAdmissible(p: Pick<PersonRecord, "name" | "title" | "profileLink" | "email">): boolean {
  return Boolean(p.name || p.title || p.profileLink || p.email);
}

export class RecordSink {
  readonly records: PersonRecord[] = [];

  constructor(private readonly sourcePage: string) {}

  add(raw: RawPerson): boolean {
    const rec = makeRecord(raw, this.sourcePage);
    if (rec) this.records.push(rec);
    return rec !== null;
  }
}

export function firstText(
  $: CheerioAPI,
  root: Element,
  selectors: readonly string[],
  accept: (text: string) => boolean,
): string {
  for (const sel of selectors) {
    const t = textOf($(root).find(sel).get(0));
    if (t && accept(t)) return t;
  }
  return "";
}

export function nameFromBlock($: CheerioAPI, block: Element, text: string): string {
  const byTag = firstText($, block, BLOCK_NAME_SELECTORS, isNameLike);
  if (byTag) return byTag;
  const m = text.match(NAME_RE);
  return m && isNameLike(m[0]) ? m[0].trim() : "";
}

/**
 * Role phrase in the text right after `name` (rest of its line, else the
 * next line), else the first short inline text in the block.
 */
export function titleFromBlock($: CheerioAPI, block: Element, name: string): string {
  if (name) {
    const lines = textLines(block);
    const at = lines.findIndex(l => l.includes(name));
    if (at >= 0) {
      const rest = lines[at].slice(lines[at].indexOf(name) + name.length).trim();
      const next = rest || lines[at + 1] || "";
      const m = next.match(TITLE_AFTER_NAME_RE);
      if (m) return m[1].trim();
    }
  }
  return shortInlineText($, block);
}

export function profileHrefIn($: CheerioAPI, root: Element, base: string): string {
  for (const a of $(root).find("a[href]").toArray()) {
    const href = $(a).attr("href") ?? "";
    if (isProfileHref(href)) {
      const link = normalizeProfileUrl(resolveUrl(href, base));
      if (link) return link;
    }
  }
  return "";
}

export function mailtoIn($: CheerioAPI, root: Element): string {
  for (const a of $(root).find("a[href]").toArray()) {
    const href = $(a).attr("href") ?? "";
    if (/^mailto:/i.test(href)) return decodeMailto(href);
  }
  return "";
}

export function decodeMailto(href: string): string {
  const addr = href.replace(/^mailto:/i, "").split("?", 1)[0];
  try {
    return decodeURIComponent(addr);
  } catch {
    return addr;
  }
}

export function shortInlineText($: CheerioAPI, root: Element): string {
  const t = textOf($(root).find(TITLE_TAGS).get(0));
  return t.length >= 3 && t.length <= 120 ? t : "";
}
