import { load } from "cheerio";
import { describe, expect, it } from "vitest";
import type { ParsedPage } from "./people.types.js";
import { companyLink, companyLinkCandidates, findCompanyProfile, siteSignals } from "./company.js";

const page = (html: string, url = "https://acme.test/"): ParsedPage => ({ url, $: load(html), scripts: [] });

describe("companyLink", () => {
  it("canonicalizes company, showcase and personal pages", () => {
    expect(companyLink("https://nl.linkedin.com/company/acme/?trk=footer")).toBe("https://www.linkedin.com/company/acme");
    expect(companyLink("//linkedin.com/showcase/acme-labs/")).toBe("https://www.linkedin.com/showcase/acme-labs");
    expect(companyLink("https://www.linkedin.com/in/jane-doe")).toBe("https://www.linkedin.com/in/jane-doe");
  });

  it("rejects share widgets, other paths and other hosts", () => {
    expect(companyLink("https://www.linkedin.com/shareArticle?url=https://acme.test")).toBe("");
    expect(companyLink("https://www.linkedin.com/embed/feed/update/1")).toBe("");
    expect(companyLink("https://www.linkedin.com/feed/")).toBe("");
    expect(companyLink("https://www.linkedin.com/company/")).toBe("");
    expect(companyLink("https://twitter.com/company/acme")).toBe("");
  });
});

describe("companyLinkCandidates", () => {
  it("ranks company pages before personal profiles, shorter first", () => {
    const html = `
      <a href="https://www.linkedin.com/in/jane-doe">Jane</a>
      <a href="https://www.linkedin.com/company/acme-holding-group">Group</a>
      <a href="https://www.linkedin.com/company/acme">Acme</a>
      <a href="https://www.linkedin.com/company/acme/">Acme again</a>`;
    expect(companyLinkCandidates(page(html))).toEqual([
      "https://www.linkedin.com/company/acme",
      "https://www.linkedin.com/company/acme-holding-group",
      "https://www.linkedin.com/in/jane-doe",
    ]);
  });

  it("finds links in attributes, ld+json sameAs and raw markup", () => {
    expect(companyLinkCandidates(page(`<button data-url="https://linkedin.com/company/acme-a">Follow</button>`)))
      .toEqual(["https://www.linkedin.com/company/acme-a"]);

    const ld = `<script type="application/ld+json">{"@type":"Organization","sameAs":["https://x.test/acme","https://www.linkedin.com/company/acme-b"]}</script>`;
    expect(companyLinkCandidates(page(ld))).toEqual(["https://www.linkedin.com/company/acme-b"]);

    expect(companyLinkCandidates(page(`<p>Follow us: https://www.linkedin.com/company/acme-c, or call.</p>`)))
      .toEqual(["https://www.linkedin.com/company/acme-c"]);
  });

  it("ignores broken ld+json", () => {
    expect(companyLinkCandidates(page(`<script type="application/ld+json">{"sameAs": [</script>`))).toEqual([]);
  });
});

describe("findCompanyProfile", () => {
  it("takes the best link of the first page that has one", () => {
    const pages = [
      page(`<p>Welcome</p>`),
      page(`<a href="https://www.linkedin.com/in/jane-doe">Jane</a>`, "https://acme.test/team"),
      page(`<a href="https://www.linkedin.com/company/acme">Acme</a>`, "https://acme.test/about"),
    ];
    expect(findCompanyProfile(pages)).toBe("https://www.linkedin.com/in/jane-doe");
    expect(findCompanyProfile([])).toBe("");
  });
});

describe("siteSignals", () => {
  it("lists the sector terms in the visible text and counts its words", () => {
    const home = page(`<h1>Acme Capital</h1><p>Wealth and asset management.</p><script>var fund = 1;</script>`);
    expect(siteSignals(home, ["capital", "fund", "asset", "wealth", "mortgage"])).toEqual({
      sectorKeywords: ["capital", "asset", "wealth"],
      wordCount: 6,
      thinText: true,
    });
  });

  it("does not flag a page with enough text", () => {
    const home = page(`<p>${"word ".repeat(120)}</p>`);
    expect(siteSignals(home, [])).toEqual({ sectorKeywords: [], wordCount: 120, thinText: false });
  });
});
