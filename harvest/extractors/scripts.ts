import type { CheerioAPI } from "cheerio";
import type { Extractor, ScriptSource } from "../people.types.js";
import type { PatternCache } from "../patterns.js";
import { MAX_SCRIPT_BYTES, SCRIPT_SCAN_LIMIT, SCRIPT_WINDOW_AFTER, SCRIPT_WINDOW_BEFORE } from "../config.js";
import { cleanEmail, isNameLike, rawText, squash, unescapeJsString } from "../text.js";
import { hostOf, normalizeProfileUrl, resolveUrl } from "../url.js";
import { RecordSink } from "./shared.js";

export type ScriptLoader = (url: string) => Promise<string | null>;

const NAME_FIELD = /["']?name["']?\s*:\s*(["'`])(.+?)\1/gis;

const TITLE_KEYS = ["position", "title", "role"];
const PROFILE_KEYS = ["linkedin", "linkedinUrl", "profile"];
const EMAIL_KEYS = ["email", "mail"];

/**
 * Script bodies worth scanning on a page: inline scripts and same-host
 * `src` scripts (through `load`), ld+json excluded, at most
 * SCRIPT_SCAN_LIMIT of them. Without a loader only inline scripts count.
 */
export async function collectScripts($: CheerioAPI, pageUrl: string, load?: ScriptLoader): Promise<ScriptSource[]> {
  const pageHost = hostOf(pageUrl);
  const out: ScriptSource[] = [];

  for (const el of $("script").toArray()) {
    if (out.length >= SCRIPT_SCAN_LIMIT) break;
    if ((el.attribs.type ?? "").toLowerCase().includes("ld+json")) continue;

    const src = el.attribs.src;
    if (src) {
      if (!load) continue;
      const full = resolveUrl(src, pageUrl);
      if (!full || hostOf(full) !== pageHost) continue;
      const text = await load(full);
      if (text) out.push({ origin: full, text: text.slice(0, MAX_SCRIPT_BYTES) });
      continue;
    }
    const inline = rawText(el);
    if (inline.trim()) out.push({ origin: pageUrl, text: inline.slice(0, MAX_SCRIPT_BYTES) });
  }
  return out;
}

export function findScriptField(chunk: string, keys: readonly string[], patterns: PatternCache): string {
  for (const key of keys) {
    const m = chunk.match(patterns.scriptField(key));
    if (m) {
      const value = squash(unescapeJsString(m[2]));
      if (value) return value;
    }
  }
  return "";
}

/** `name: "..."` objects inside one script body that also carry a role, profile or email. */
export function peopleInScript(text: string, pageUrl: string, patterns: PatternCache, sink: RecordSink): void {
  for (const m of text.matchAll(NAME_FIELD)) {
    const name = unescapeJsString(m[2]);
    if (!isNameLike(name)) continue;

    const start = m.index ?? 0;
    const end = start + m[0].length;
    // Window stays inside the object holding the name
    const from = Math.max(0, start - SCRIPT_WINDOW_BEFORE);
    const before = text.slice(from, start);
    const open = Math.max(before.lastIndexOf("{"), before.lastIndexOf("}"));
    const brace = text.indexOf("}", end);
    const stop = Math.min(brace === -1 ? text.length : brace + 1, end + SCRIPT_WINDOW_AFTER);
    const chunk = text.slice(open === -1 ? from : from + open + 1, stop);

    const title = findScriptField(chunk, TITLE_KEYS, patterns);
    const profileLink = normalizeProfileUrl(findScriptField(chunk, PROFILE_KEYS, patterns), pageUrl);
    const email = cleanEmail(findScriptField(chunk, EMAIL_KEYS, patterns));

    if (!title && !profileLink && !email) continue;
    sink.add({ name, title, profileLink, email });
  }
}

/** Person-shaped objects in inline scripts and same-host bundles. */
export const extractScripts: Extractor = (page, patterns) => {
  const sink = new RecordSink(page.url);
  for (const script of page.scripts) peopleInScript(script.text, page.url, patterns, sink);
  return sink.records;
};
