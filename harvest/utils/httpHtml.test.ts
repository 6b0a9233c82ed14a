import fetch, { Response } from "node-fetch";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HttpFetcher } from "./httpHtml.js";

vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});

const mockFetch = vi.mocked(fetch);

const reply = (body: string, status: number, headers: Record<string, string>) =>
  new Response(body, { status, headers });

const fetcher = () => new HttpFetcher({ rateMs: 0, jitterMs: 0, retries: 0, maxBytes: { page: 64 } });

describe("HttpFetcher", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("returns the body of an HTML page", async () => {
    mockFetch.mockResolvedValueOnce(reply("<h1>Team</h1>", 200, { "content-type": "text/html; charset=utf-8" }));
    expect(await fetcher().fetch("https://acme.test/team", "page")).toEqual({
      status: 200,
      finalUrl: "https://acme.test/team",
      contentType: "text/html; charset=utf-8",
      body: "<h1>Team</h1>",
    });
  });

  it("accepts scripts only as script resources", async () => {
    mockFetch.mockResolvedValueOnce(reply("var x = 1;", 200, { "content-type": "application/javascript" }));
    expect(await fetcher().fetch("https://acme.test/app.js", "page")).toBeNull();

    mockFetch.mockResolvedValueOnce(reply("var x = 1;", 200, { "content-type": "application/javascript" }));
    expect((await fetcher().fetch("https://acme.test/app.js", "script"))?.body).toBe("var x = 1;");
  });

  it("resolves error statuses, oversized bodies and network failures to null", async () => {
    mockFetch.mockResolvedValueOnce(reply("missing", 404, { "content-type": "text/html" }));
    expect(await fetcher().fetch("https://acme.test/team", "page")).toBeNull();

    mockFetch.mockResolvedValueOnce(reply("x".repeat(100), 200, { "content-type": "text/html" }));
    expect(await fetcher().fetch("https://acme.test/big", "page")).toBeNull();

    mockFetch.mockResolvedValueOnce(reply("busy", 503, { "content-type": "text/html" }));
    expect(await fetcher().fetch("https://acme.test/busy", "page")).toBeNull();

    mockFetch.mockRejectedValueOnce(new Error("ECONNRESET"));
    expect(await fetcher().fetch("https://acme.test/down", "page")).toBeNull();
  });

  it("never requests an invalid URL", async () => {
    expect(await fetcher().fetch("not a url", "page")).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe("HttpFetcher timing", () => {
  const html = () => reply("<p>ok</p>", 200, { "content-type": "text/html" });

  beforeEach(() => {
    mockFetch.mockReset();
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("spaces requests to one host by rateMs", async () => {
    const sentAt: number[] = [];
    mockFetch.mockImplementation(async () => {
      sentAt.push(Date.now());
      return html();
    });
    const f = new HttpFetcher({ rateMs: 1000, jitterMs: 0, retries: 0 });

    const both = Promise.all([f.fetch("https://acme.test/a", "page"), f.fetch("https://acme.test/b", "page")]);
    await vi.advanceTimersByTimeAsync(999);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(mockFetch).toHaveBeenCalledTimes(2);

    expect((await both).map(r => r?.body)).toEqual(["<p>ok</p>", "<p>ok</p>"]);
    expect(sentAt[1] - sentAt[0]).toBe(1000);
  });

  it("waits for Retry-After before retrying", async () => {
    mockFetch
      .mockResolvedValueOnce(reply("slow down", 429, { "content-type": "text/html", "retry-after": "2" }))
      .mockResolvedValueOnce(html());
    const f = new HttpFetcher({ rateMs: 0, jitterMs: 0, retries: 1, timeoutMs: 60_000 });

    const pending = f.fetch("https://acme.test/team", "page");
    await vi.advanceTimersByTimeAsync(1999);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect((await pending)?.body).toBe("<p>ok</p>");
  });

  it("aborts a request that outlives timeoutMs", async () => {
    mockFetch.mockImplementationOnce((_url, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
    }));
    const f = new HttpFetcher({ rateMs: 0, jitterMs: 0, retries: 0, timeoutMs: 500 });

    const pending = f.fetch("https://acme.test/slow", "page");
    await vi.advanceTimersByTimeAsync(500);
    expect(await pending).toBeNull();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
