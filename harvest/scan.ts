import pLimit from "p-limit";
import type { ErrorTag, ParsedPage, PersonRecord, SiteScanResult, SiteSignals } from "./people.types.js";
import type { ScanSession } from "./session.js";
import { findCompanyProfile, siteSignals } from "./company.js";
import { dedupePeople } from "./dedupe.js";
import { discoverCandidatePages } from "./discover.js";
import { extractPeople } from "./extractors/index.js";
import { rankPeople, scorePerson, selectDecisionMakers } from "./score.js";
import { normalizeSiteUrl, originOf } from "./url.js";
import { log } from "./utils/log.js";

type Outcome = {
  candidatePages?: string[];
  people?: PersonRecord[];
  decisionMakers?: PersonRecord[];
  companyProfileLink?: string;
  signals?: SiteSignals | null;
  errors?: ErrorTag[];
  pagesScanned?: number;
};

function finish(website: string, normalizedUrl: string, outcome: Outcome): SiteScanResult {
  const people = outcome.people ?? [];
  return {
    website,
    normalizedUrl,
    candidatePages: outcome.candidatePages ?? [],
    people,
    decisionMakers: outcome.decisionMakers ?? [],
    companyProfileLink: outcome.companyProfileLink ?? "",
    signals: outcome.signals ?? null,
    errors: outcome.errors ?? [],
    meta: { pagesScanned: outcome.pagesScanned ?? 0, peopleFound: people.length },
  };
}

/**
 * Discovers people pages on one site, extracts and merges the people on
 * them, and short-lists the likely decision makers. Never throws: problems
 * end up as error tags on the result.
 */
export async function scanSite(website: string, session: ScanSession): Promise<SiteScanResult> {
  const { maxPages, decisionLimit, fallbackPaths } = session.options;

  const normalizedUrl = normalizeSiteUrl(website);
  if (!normalizedUrl) {
    log.info(`${website}: invalid URL`);
    return finish(website, "", { errors: ["invalid_url"] });
  }

  const home = await session.loadPage(`${originOf(normalizedUrl)}/`);
  const signals = home ? siteSignals(home) : null;
  const candidatePages = discoverCandidatePages(normalizedUrl, home, { maxPages, fallbackPaths });
  log.debug(`candidate pages for ${normalizedUrl}: ${candidatePages.join(", ")}`);
  if (candidatePages.length === 0) {
    log.info(`${normalizedUrl}: no candidate pages`);
    const companyProfileLink = findCompanyProfile(home ? [home] : []);
    return finish(website, normalizedUrl, { companyProfileLink, signals, errors: ["no_candidate_pages"] });
  }

  const loaded: ParsedPage[] = home ? [home] : [];
  const found: PersonRecord[] = [];
  let pagesScanned = 0;
  for (const pageUrl of candidatePages) {
    if (pagesScanned >= maxPages) break;
    pagesScanned += 1;
    try {
      const page = await session.loadPage(pageUrl);
      if (!page) continue;
      loaded.push(page);
      found.push(...extractPeople(page, session.patterns));
    } catch (e) {
      log.info(`${pageUrl}: page skipped (${(e as Error).message})`);
    }
  }

  const companyProfileLink = findCompanyProfile(loaded);
  if (found.length === 0) {
    log.info(`${normalizedUrl}: no people found on ${pagesScanned} page(s)`);
    return finish(website, normalizedUrl, { candidatePages, companyProfileLink, signals, errors: ["no_people_found"], pagesScanned });
  }

  const merged = dedupePeople(found);
  const people = rankPeople(merged.map(p => scorePerson(p, session.patterns)));
  const decisionMakers = selectDecisionMakers(merged, decisionLimit, session.patterns);
  log.info(`${normalizedUrl}: ${people.length} people, ${decisionMakers.length} decision maker(s)`);
  return finish(website, normalizedUrl, { candidatePages, people, decisionMakers, companyProfileLink, signals, pagesScanned });
}

export async function scanSites(websites: readonly string[], session: ScanSession, concurrency = 1): Promise<SiteScanResult[]> {
  const limit = pLimit(Math.max(1, concurrency));
  return Promise.all(websites.map(w => limit(() => scanSite(w, session))));
}

export type PersonJson = Pick<PersonRecord, "name" | "title" | "profileLink" | "email" | "sourcePage" | "score" | "rankReason">;

export type SiteScanJson = {
  website: string;
  normalizedUrl: string;
  candidatePages: string[];
  decisionMakers: PersonJson[];
  people?: PersonJson[];
  companyProfileLink: string;
  signals: SiteSignals | null;
  errors: string[];
  meta: { pagesScanned: number; peopleFound: number };
};

const personJson = (p: PersonRecord): PersonJson => ({
  name: p.name,
  title: p.title,
  profileLink: p.profileLink,
  email: p.email,
  sourcePage: p.sourcePage,
  score: p.score,
  rankReason: p.rankReason,
});

/** Plain-data form handed to writers and reporting; `people` only on request. */
export function toRecord(result: SiteScanResult, includeAllPeople = false): SiteScanJson {
  return {
    website: result.website,
    normalizedUrl: result.normalizedUrl,
    candidatePages: [...result.candidatePages],
    decisionMakers: result.decisionMakers.map(personJson),
    ...(includeAllPeople ? { people: result.people.map(personJson) } : {}),
    companyProfileLink: result.companyProfileLink,
    signals: result.signals ? { ...result.signals, sectorKeywords: [...result.signals.sectorKeywords] } : null,
    errors: [...result.errors],
    meta: { ...result.meta },
  };
}
