import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { Extractor } from "../people.types.js";
import { EMAIL_RE, textLines, textOf } from "../text.js";
import { PROFILE_DOMAIN } from "../config.js";
import { resolveUrl } from "../url.js";
import {
  firstText, mailtoIn, NAME_SELECTORS, nameFromBlock, profileHrefIn, RecordSink,
  shortInlineText, titleFromBlock,
} from "./shared.js";

export const PEOPLE_CLASS_HINT = /(team|member|person|people|staff|leadership|management|board|bio|list-team|list-team-inner)/i;

const CARD_SELECTORS = [
  ".list-team-inner",
  "article", "li",
  ".team-member", ".member", ".person", ".profile", ".staff",
  ".card", ".team__item", ".grid > div", ".col", ".item",
];

function hintBlob(el: Element): string {
  return [el.attribs.class ?? "", el.attribs.id ?? "", el.name].join(" ");
}

function cardsIn($: CheerioAPI, container: Element): Element[] {
  const seen = new Set<Element>();
  const cards: Element[] = [];
  for (const sel of CARD_SELECTORS) {
    for (const el of $(container).find(sel).toArray()) {
      if (!seen.has(el)) {
        seen.add(el);
        cards.push(el);
      }
    }
  }
  return cards;
}

function readCards($: CheerioAPI, container: Element, pageUrl: string, sink: RecordSink): number {
  let count = 0;
  for (const card of cardsIn($, container)) {
    const lines = textLines(card);

    const name = firstText($, card, NAME_SELECTORS, t => t.length <= 120) || lines[0] || "";
    const title = lines.length >= 2 ? lines[1] : shortInlineText($, card);

    const li = $(card).find(`a[href*="${PROFILE_DOMAIN}"]`).first().attr("href");
    const profileLink = li ? resolveUrl(li, pageUrl) : "";
    const email = textOf(card).match(EMAIL_RE)?.[0] ?? "";

    if (name || title || profileLink || email) {
      sink.add({ name, title, profileLink, email });
      count += 1;
    }
  }
  return count;
}

/**
 * Team/people containers: reads each nested card, or the container as a
 * single person block when it has no usable cards.
 */
export const extractCards: Extractor = (page) => {
  const { $, url } = page;
  const sink = new RecordSink(url);

  for (const block of $<Element, "*">("*").toArray()) {
    if (!PEOPLE_CLASS_HINT.test(hintBlob(block))) continue;
    if (readCards($, block, url, sink) > 0) continue;

    const text = textOf(block);
    if (!text) continue;
    const name = nameFromBlock($, block, text);
    sink.add({
      name,
      title: titleFromBlock($, block, name),
      profileLink: profileHrefIn($, block, url),
      email: mailtoIn($, block) || text,
    });
  }
  return sink.records;
};
