import type { PersonRecord } from "./people.types.js";
import type { PatternCache } from "./patterns.js";
import { KEYWORDS } from "./config.js";
import { pathOf } from "./url.js";

/**
 * Decision-maker scoring knobs. The thresholds and weights were tuned by
 * hand against real team pages; changing any of them changes which people
 * get short-listed.
 */
export type ScoringConfig = {
  keywords: Readonly<Record<string, number>>;
  chiefBonus: number;
  vpBonus: number;
  profileBonus: number;
  emailBonus: number;
  pageBonus: number;
  pageHints: readonly string[];
  admitThreshold: number;
  firstAdmitThreshold: number;
  maxReasonKeywords: number;
};

export const DEFAULT_SCORING: ScoringConfig = {
  keywords: KEYWORDS.decisionKeywords,
  chiefBonus: 2,
  vpBonus: 1,
  profileBonus: 1.5,
  emailBonus: 1.5,
  pageBonus: 0.5,
  pageHints: KEYWORDS.pageHints,
  admitThreshold: 3.0,
  firstAdmitThreshold: 1.5,
  maxReasonKeywords: 3,
};

export function scorePerson(
  person: PersonRecord,
  patterns: PatternCache,
  cfg: ScoringConfig = DEFAULT_SCORING,
): PersonRecord {
  const title = person.title.toLowerCase();
  let score = 0;

  const hits: string[] = [];
  for (const [keyword, weight] of Object.entries(cfg.keywords)) {
    if (patterns.matches(title, keyword)) {
      score += weight;
      hits.push(keyword);
    }
  }
  if (title.includes("chief")) score += cfg.chiefBonus;
  if (patterns.matches(title, "vp") && !title.includes("vice")) score += cfg.vpBonus;
  if (person.profileLink) score += cfg.profileBonus;
  if (person.email) score += cfg.emailBonus;

  const path = pathOf(person.sourcePage).toLowerCase();
  if (cfg.pageHints.some(h => path.includes(h))) score += cfg.pageBonus;

  const reasons: string[] = [];
  if (person.email) reasons.push("email");
  if (person.profileLink) reasons.push("profile-link");
  reasons.push(...hits.slice(0, cfg.maxReasonKeywords));

  return { ...person, score, rankReason: reasons.join(", ") };
}

export function rankPeople(people: readonly PersonRecord[]): PersonRecord[] {
  return [...people].sort((a, b) => b.score - a.score);
}

/**
 * Short-list of likely decision makers, best first. Anyone at or above the
 * admit threshold qualifies; the first pick may come in at the lower
 * threshold. When nobody qualifies the top-scored person is returned,
 * marked `fallback`, so a site with people always yields a candidate.
 */
export function selectDecisionMakers(
  people: readonly PersonRecord[],
  limit: number,
  patterns: PatternCache,
  cfg: ScoringConfig = DEFAULT_SCORING,
): PersonRecord[] {
  const ranked = rankPeople(people.map(p => scorePerson(p, patterns, cfg)));

  const selected: PersonRecord[] = [];
  for (const person of ranked) {
    if (selected.length >= limit) break;
    const first = selected.length === 0;
    if (person.score >= cfg.admitThreshold || (first && person.score >= cfg.firstAdmitThreshold)) {
      selected.push(person);
    }
  }

  if (selected.length === 0 && ranked.length > 0) {
    const top = ranked[0];
    selected.push({ ...top, rankReason: top.rankReason ? `${top.rankReason}, fallback` : "fallback" });
  }
  return selected;
}
