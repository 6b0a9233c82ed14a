import { describe, expect, it } from "vitest";
import type { FetchedResource, Fetcher, FetchKind } from "./people.types.js";
import { scanSite, scanSites, toRecord } from "./scan.js";
import { ScanSession } from "./session.js";

/** In-memory site: URL -> HTML body; anything else is unreachable. */
class FakeFetcher implements Fetcher {
  readonly calls: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string, kind: FetchKind): Promise<FetchedResource | null> {
    this.calls.push(`${kind} ${url}`);
    const body = this.pages[url];
    if (body === undefined) return null;
    return { status: 200, finalUrl: url, contentType: "text/html", body };
  }
}

const LEADERSHIP = `
  <div class="team">
    <div class="card">
      <h3>Jane Doe</h3>
      <p>Chief Executive Officer</p>
      <a href="https://nl.linkedin.com/in/jane-doe/"><img alt=""></a>
      <span>jane@acme.test</span>
    </div>
    <div class="card">
      <h3>Mark Visser</h3>
      <p>Office Manager</p>
    </div>
  </div>`;

describe("scanSite", () => {
  it("tags unusable input as invalid_url", async () => {
    const result = await scanSite("http://", new ScanSession(new FakeFetcher({})));
    expect(result.errors).toEqual(["invalid_url"]);
    expect(result.normalizedUrl).toBe("");
    expect(result.meta).toEqual({ pagesScanned: 0, peopleFound: 0 });
  });

  it("reports no candidate pages when the home page is unreachable and no fallback paths are set", async () => {
    const result = await scanSite("acme.test", new ScanSession(new FakeFetcher({}), { fallbackPaths: [] }));
    expect(result).toEqual({
      website: "acme.test",
      normalizedUrl: "https://acme.test/",
      candidatePages: [],
      people: [],
      decisionMakers: [],
      companyProfileLink: "",
      signals: null,
      errors: ["no_candidate_pages"],
      meta: { pagesScanned: 0, peopleFound: 0 },
    });
  });

  it("still scans the fallback paths when the home page is down", async () => {
    const fetcher = new FakeFetcher({ "https://acme.test/team": LEADERSHIP });
    const result = await scanSite("acme.test", new ScanSession(fetcher, { fallbackPaths: ["/team"] }));

    expect(result.errors).toEqual([]);
    expect(result.candidatePages).toEqual(["https://acme.test", "https://acme.test/team"]);
    expect(fetcher.calls).toEqual(["page https://acme.test/", "page https://acme.test/team"]);
    expect(result.decisionMakers.map(p => [p.name, p.sourcePage])).toEqual([["Jane Doe", "https://acme.test/team"]]);
    expect(result.signals).toBeNull();
    expect(result.meta).toEqual({ pagesScanned: 2, peopleFound: 2 });
  });

  it("reports no people when the candidate pages list nobody", async () => {
    const fetcher = new FakeFetcher({ "https://acme.test/": "<p>Welcome</p>" });
    const result = await scanSite("acme.test", new ScanSession(fetcher, { fallbackPaths: [] }));
    expect(result.errors).toEqual(["no_people_found"]);
    expect(result.candidatePages).toEqual(["https://acme.test"]);
    expect(result.meta).toEqual({ pagesScanned: 1, peopleFound: 0 });
  });

  it("finds, merges and ranks the people on a site", async () => {
    const fetcher = new FakeFetcher({
      "https://acme.test/": `<a href="/leadership">Leadership</a>`,
      "https://acme.test/leadership": LEADERSHIP,
    });
    const result = await scanSite("acme.test", new ScanSession(fetcher, { fallbackPaths: ["/team"] }));

    expect(result.errors).toEqual([]);
    expect(result.candidatePages).toEqual([
      "https://acme.test",
      "https://acme.test/team",
      "https://acme.test/leadership",
    ]);
    expect(fetcher.calls).toEqual([
      "page https://acme.test/",
      "page https://acme.test/team",
      "page https://acme.test/leadership",
    ]);
    expect(result.people.map(p => [p.name, p.score])).toEqual([["Jane Doe", 25.5], ["Mark Visser", 0.5]]);
    expect(result.decisionMakers).toEqual([
      {
        name: "Jane Doe",
        title: "Chief Executive Officer",
        profileLink: "https://www.linkedin.com/in/jane-doe",
        email: "jane@acme.test",
        sourcePage: "https://acme.test/leadership",
        score: 25.5,
        rankReason: "email, profile-link, chief executive, chief executive officer",
      },
    ]);
    expect(result.meta).toEqual({ pagesScanned: 3, peopleFound: 2 });
    expect(result.companyProfileLink).toBe("https://www.linkedin.com/in/jane-doe");
    expect(result.signals).toEqual({ sectorKeywords: [], wordCount: 1, thinText: true });
  });

  it("prefers the company page linked from the home page", async () => {
    const fetcher = new FakeFetcher({
      "https://acme.test/": `<a href="/leadership">Leadership</a><footer><a href="https://www.linkedin.com/company/acme-capital/">LinkedIn</a></footer>`,
      "https://acme.test/leadership": LEADERSHIP,
    });
    const result = await scanSite("acme.test", new ScanSession(fetcher, { fallbackPaths: [] }));
    expect(result.companyProfileLink).toBe("https://www.linkedin.com/company/acme-capital");
    expect(toRecord(result).companyProfileLink).toBe("https://www.linkedin.com/company/acme-capital");
  });

  it("stops after maxPages pages", async () => {
    const fetcher = new FakeFetcher({
      "https://acme.test/": `<a href="/leadership">Leadership</a>`,
      "https://acme.test/leadership": LEADERSHIP,
    });
    const result = await scanSite("acme.test", new ScanSession(fetcher, { fallbackPaths: ["/team"], maxPages: 2 }));
    expect(result.candidatePages).toEqual(["https://acme.test", "https://acme.test/team"]);
    expect(result.errors).toEqual(["no_people_found"]);
    expect(result.meta.pagesScanned).toBe(2);
  });
});

describe("scanSites", () => {
  it("keeps input order and shares one session cache", async () => {
    const fetcher = new FakeFetcher({
      "https://acme.test/": `<a href="/leadership">Leadership</a>`,
      "https://acme.test/leadership": LEADERSHIP,
    });
    const session = new ScanSession(fetcher, { fallbackPaths: [] });
    const results = await scanSites(["acme.test", "not a site", "https://acme.test"], session, 2);

    expect(results.map(r => r.website)).toEqual(["acme.test", "not a site", "https://acme.test"]);
    expect(results.map(r => r.errors)).toEqual([[], ["invalid_url"], []]);
    expect(fetcher.calls.filter(c => c === "page https://acme.test/leadership")).toHaveLength(1);
  });
});

describe("toRecord", () => {
  it("includes people only on request", async () => {
    const fetcher = new FakeFetcher({
      "https://acme.test/": `<a href="/leadership">Leadership</a>`,
      "https://acme.test/leadership": LEADERSHIP,
    });
    const result = await scanSite("acme.test", new ScanSession(fetcher, { fallbackPaths: [] }));

    expect(toRecord(result)).not.toHaveProperty("people");
    expect(toRecord(result, true).people?.map(p => p.name)).toEqual(["Jane Doe", "Mark Visser"]);
    expect(toRecord(result).decisionMakers.map(p => p.name)).toEqual(["Jane Doe"]);
  });
});
