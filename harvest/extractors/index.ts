import type { Extractor, ParsedPage, PersonRecord } from "../people.types.js";
import type { PatternCache } from "../patterns.js";
import { dedupePeople } from "../dedupe.js";
import { log } from "../utils/log.js";
import { extractAnchors } from "./anchors.js";
import { extractCards } from "./cards.js";
import { extractHeadings } from "./headings.js";
import { extractMicrodata } from "./microdata.js";
import { extractScripts } from "./scripts.js";
import { extractStructuredData } from "./structuredData.js";

export { collectScripts } from "./scripts.js";

/** Order matters: earlier strategies win attribute conflicts in dedup. */
export const EXTRACTORS: ReadonlyArray<readonly [string, Extractor]> = [
  ["cards", extractCards],
  ["structured-data", extractStructuredData],
  ["microdata", extractMicrodata],
  ["anchors", extractAnchors],
  ["headings", extractHeadings],
  ["scripts", extractScripts],
];

export function extractPeople(page: ParsedPage, patterns: PatternCache): PersonRecord[] {
  const found: PersonRecord[] = [];
  for (const [id, extract] of EXTRACTORS) {
    try {
      const records = extract(page, patterns);
      log.debug(`${id}: ${records.length} record(s) on ${page.url}`);
      found.push(...records);
    } catch (e) {
      log.debug(`${id} failed on ${page.url}: ${(e as Error).message}`);
    }
  }
  return dedupePeople(found);
}
