import type { Extractor } from "../people.types.js";
import { rawText } from "../text.js";
import { log } from "../utils/log.js";
import { normalizeProfileUrl } from "../url.js";
import { RecordSink } from "./shared.js";

type JsonObject = { [key: string]: unknown };

const isObject = (v: unknown): v is JsonObject =>
  typeof v === "object" && v !== null && !Array.isArray(v);

const str = (v: unknown): string =>
  typeof v === "string" || typeof v === "number" ? String(v).trim() : "";

function isPersonType(t: unknown): boolean {
  if (Array.isArray(t)) return t.some(isPersonType);
  return typeof t === "string" && t.trim().toLowerCase() === "person";
}

function firstProfile(sameAs: unknown): string {
  const entries = Array.isArray(sameAs) ? sameAs : [sameAs];
  for (const entry of entries) {
    const link = normalizeProfileUrl(str(entry));
    if (link) return link;
  }
  return "";
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    log.debug(`ld+json block skipped: ${(e as Error).message}`);
    return undefined;
  }
}

/** schema.org Person objects anywhere inside ld+json blocks. */
export const extractStructuredData: Extractor = (page) => {
  const { $, url } = page;
  const sink = new RecordSink(url);

  const walk = (v: unknown): void => {
    if (Array.isArray(v)) {
      v.forEach(walk);
      return;
    }
    if (!isObject(v)) return;
    if (isPersonType(v["@type"])) {
      sink.add({
        name: str(v.name),
        title: str(v.jobTitle),
        email: str(v.email),
        profileLink: firstProfile(v.sameAs),
      });
    }
    Object.values(v).forEach(walk);
  };

  for (const el of $("script[type]").toArray()) {
    if (!(el.attribs.type ?? "").toLowerCase().includes("ld+json")) continue;
    const text = rawText(el).trim();
    if (text) walk(parseJson(text));
  }
  return sink.records;
};
