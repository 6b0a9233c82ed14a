import { readFileSync } from "fs";
import { z } from "zod";
import { log } from "./utils/log.js";

const WebsiteEntry = z.union([
  z.string(),
  z.object({ website: z.string().optional(), url: z.string().optional() }).passthrough(),
]);
const WebsiteFile = z.union([
  z.array(WebsiteEntry),
  z.object({ websites: z.array(z.unknown()).optional(), urls: z.array(z.unknown()).optional() }).passthrough(),
]);

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Websites listed in one file: a JSON array of strings or `{website|url}`
 * objects, a JSON object with a `websites` or `urls` array, or plain text
 * with one site per line.
 */
export function parseWebsiteList(raw: string): string[] {
  const parsed = WebsiteFile.safeParse(parseJson(raw));
  if (!parsed.success) return raw.split(/\r?\n/);

  const data = parsed.data;
  if (Array.isArray(data)) {
    return data.map(e => (typeof e === "string" ? e : e.website || e.url || ""));
  }
  const items = data.websites ?? data.urls ?? [];
  return items.filter((e): e is string => typeof e === "string");
}

/**
 * Inline URLs first, then each file in order; stdin lines are used only when
 * nothing else produced a site. Blank entries are dropped and duplicates
 * keep their first position.
 */
export function loadWebsites(files: readonly string[], inlineUrls: readonly string[], stdinText?: string): string[] {
  const websites: string[] = [...inlineUrls];

  for (const path of files.map(f => f.trim()).filter(Boolean)) {
    let raw: string;
    try {
      raw = readFileSync(path, "utf8");
    } catch (e) {
      log.warn(`Failed to read ${path}: ${(e as Error).message}`);
      continue;
    }
    websites.push(...parseWebsiteList(raw));
  }

  const cleaned = websites.map(w => w.trim()).filter(Boolean);
  if (cleaned.length === 0 && stdinText) cleaned.push(...stdinText.split(/\r?\n/).map(l => l.trim()).filter(Boolean));

  return [...new Set(cleaned)];
}

export function parsePositiveInt(raw: string | undefined, fallback: number, flag: string): number {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(n) || n < 1) throw new Error(`${flag} expects a positive integer, got "${raw}"`);
  return n;
}
