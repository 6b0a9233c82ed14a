import type { CheerioAPI } from "cheerio";
import type { PatternCache } from "./patterns.js";

export type PersonRecord = {
  name: string;
  title: string;
  profileLink: string;       // canonical network profile URL
  email: string;
  sourcePage: string;        // page the record was observed on
  score: number;
  rankReason: string;
};

export type ErrorTag = "invalid_url" | "no_candidate_pages" | "no_people_found";

export type ScanMeta = {
  pagesScanned: number;
  peopleFound: number;
};

export type SiteSignals = {
  sectorKeywords: string[];  // sector terms present in the home page text
  wordCount: number;
  thinText: boolean;
};

export type SiteScanResult = {
  readonly website: string;
  readonly normalizedUrl: string;
  readonly candidatePages: readonly string[];
  readonly people: readonly PersonRecord[];
  readonly decisionMakers: readonly PersonRecord[];
  readonly companyProfileLink: string;
  readonly signals: Readonly<SiteSignals> | null;
  readonly errors: readonly ErrorTag[];
  readonly meta: Readonly<ScanMeta>;
};

export type ScriptSource = {
  origin: string;            // page URL for inline scripts, script URL otherwise
  text: string;
};

export type ParsedPage = {
  url: string;               // final URL after redirects
  $: CheerioAPI;
  scripts: ScriptSource[];
};

export type Extractor = (page: ParsedPage, patterns: PatternCache) => PersonRecord[];

export type FetchKind = "page" | "script";

export type FetchedResource = {
  status: number;
  finalUrl: string;
  contentType: string;
  body: string;
};

/** Network collaborator. Implementations resolve to null on any failure. */
export interface Fetcher {
  fetch(url: string, kind: FetchKind): Promise<FetchedResource | null>;
}

export type ScanOptions = {
  maxPages: number;
  decisionLimit: number;
  fallbackPaths: readonly string[];
};
