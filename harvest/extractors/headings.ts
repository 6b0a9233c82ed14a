import type { Element } from "domhandler";
import type { Extractor } from "../people.types.js";
import { KEYWORDS } from "../config.js";
import { isNameLike, NAME_RE, squash, textLines, textOf } from "../text.js";
import { isProfileHref, resolveUrl } from "../url.js";
import { RecordSink } from "./shared.js";

/**
 * Headings that sit next to a decision-maker role ("Jane Doe" + "Managing
 * Director"). The heading text is the title, unless the heading is the
 * name itself; then the first line of the next element is.
 */
export const extractHeadings: Extractor = (page, patterns) => {
  const { $, url } = page;
  const sink = new RecordSink(url);
  const keywords = Object.keys(KEYWORDS.decisionKeywords);
  const hasRole = (text: string) => {
    const lower = text.toLowerCase();
    return keywords.some(k => patterns.matches(lower, k));
  };

  for (const heading of $("h1, h2, h3, h4").toArray()) {
    const headingText = textOf(heading);
    const sibling: Element | undefined = $(heading).next().get(0);
    const block = squash(sibling ? `${headingText} ${textOf(sibling)}` : headingText);
    if (!block || !hasRole(block)) continue;

    const name = [headingText, sibling ? textOf(sibling) : ""].find(t => isNameLike(t) && !hasRole(t))
      ?? block.match(NAME_RE)?.[0].trim() ?? "";
    const scope = sibling ? [heading, sibling] : [heading];
    const href = $(scope).find("a[href]").toArray()
      .map(a => a.attribs.href ?? "")
      .find(isProfileHref);

    const roleLine = sibling ? textLines(sibling)[0] ?? "" : "";
    sink.add({
      name,
      // "<h3>Jane Doe</h3><p>Managing Director</p>": role comes from the sibling
      title: name && name === headingText ? roleLine : headingText,
      profileLink: href ? resolveUrl(href, url) : "",
      email: block,
    });
  }
  return sink.records;
};
