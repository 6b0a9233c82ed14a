import type { Element } from "domhandler";
import type { Extractor } from "../people.types.js";
import { cleanEmail, isNameLike, textOf } from "../text.js";
import { isProfileHref, resolveUrl } from "../url.js";
import { decodeMailto, firstText, NAME_SELECTORS, RecordSink, titleFromBlock } from "./shared.js";

const MAX_ANCESTORS = 3;
const MAX_BLOCK_TEXT = 2000;

/** Anchor labels that name the network rather than a person. */
const NETWORK_LABEL = /linked\s*in/i;

/**
 * Mailto links and profile links anywhere on the page. A profile link
 * borrows its name and role from the smallest surrounding block (at most
 * three levels up) that still reads like a single person.
 */
export const extractAnchors: Extractor = (page) => {
  const { $, url } = page;
  const sink = new RecordSink(url);

  for (const anchor of $("a[href]").toArray()) {
    const href = anchor.attribs.href ?? "";

    if (/^mailto:/i.test(href)) {
      const email = cleanEmail(decodeMailto(href));
      if (email) sink.add({ name: textOf(anchor), email });
      continue;
    }
    if (!isProfileHref(href)) continue;

    let block: Element = anchor;
    for (let i = 0; i < MAX_ANCESTORS; i++) {
      const parent = $(block).parent().get(0);
      if (!parent) break;
      const txt = textOf(parent);
      if (!txt || txt.length > MAX_BLOCK_TEXT) break;
      block = parent;
    }

    let name = textOf(anchor);
    if (!isNameLike(name) || NETWORK_LABEL.test(name)) {
      name = firstText($, block, NAME_SELECTORS, isNameLike);
    }
    const title = titleFromBlock($, block, name);
    sink.add({ name, title, profileLink: resolveUrl(href, url) });
  }
  return sink.records;
};
