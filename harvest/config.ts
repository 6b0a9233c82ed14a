import "dotenv/config";
import { readFileSync } from "fs";
import { z } from "zod";

const num = (v: string | undefined, fallback: number) => {
  const n = Number(v);
  return v !== undefined && v.trim() !== "" && Number.isFinite(n) ? n : fallback;
};

export const MAX_PAGES = num(process.env.MAX_PAGES, 25);
export const DECISION_LIMIT = num(process.env.DECISION_LIMIT, 5);
export const SITE_CONCURRENCY = Math.max(1, num(process.env.SITE_CONCURRENCY, 2));

export const RATE_MS = num(process.env.RATE_MS, 350);
export const JITTER_MS = num(process.env.JITTER_MS, 350);
export const FETCH_TIMEOUT_MS = num(process.env.FETCH_TIMEOUT_MS, 18_000);
export const MAX_HTML_BYTES = num(process.env.MAX_HTML_BYTES, 1_800_000);
export const MAX_SCRIPT_BYTES = num(process.env.MAX_SCRIPT_BYTES, 1_500_000);
export const USER_AGENT = process.env.HTTP_USER_AGENT
  ?? "Mozilla/5.0 (Macintosh; Intel Mac OS X 12_6) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0 Safari/537.36";

// Script/bundle scan limits
export const SCRIPT_SCAN_LIMIT = 5;
export const SCRIPT_WINDOW_BEFORE = 50;
export const SCRIPT_WINDOW_AFTER = 600;

export const PROFILE_DOMAIN = "linkedin.com";

// Home pages with fewer visible words are likely rendered client-side
export const THIN_TEXT_WORDS = 100;

const KeywordTables = z.object({
  teamPaths: z.array(z.string().startsWith("/")),
  pageHints: z.array(z.string().min(1)),
  decisionKeywords: z.record(z.string().min(1), z.number().positive()),
  sectorKeywords: z.array(z.string().min(1)),
});
export type KeywordTables = z.infer<typeof KeywordTables>;

export const KEYWORDS: KeywordTables = KeywordTables.parse(
  JSON.parse(readFileSync(new URL("./data/keywords.json", import.meta.url), "utf8")),
);
