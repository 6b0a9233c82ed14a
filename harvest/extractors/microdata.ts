import type { Extractor } from "../people.types.js";
import { cleanEmail, textOf } from "../text.js";
import { normalizeProfileUrl, resolveUrl } from "../url.js";
import { mailtoIn, RecordSink } from "./shared.js";

export const extractMicrodata: Extractor = (page) => {
  const { $, url } = page;
  const sink = new RecordSink(url);

  const scopes = $("[itemtype]").toArray().filter(el => /person/i.test(el.attribs.itemtype ?? ""));
  for (const scope of scopes) {
    const props = $(scope).find("[itemprop]").toArray();
    const prop = (re: RegExp) => props.find(el => re.test(el.attribs.itemprop ?? ""));

    const name = (scope.attribs.itemprop ?? "") === "name" ? textOf(scope) : textOf(prop(/^name$/i));
    const title = textOf(prop(/jobTitle/i));

    let profileLink = "";
    for (const a of $(scope).find("a[href]").toArray()) {
      profileLink = normalizeProfileUrl(resolveUrl(a.attribs.href ?? "", url));
      if (profileLink) break;
    }

    const email = cleanEmail(mailtoIn($, scope)) || cleanEmail(textOf(scope));
    sink.add({ name, title, profileLink, email });
  }
  return sink.records;
};
