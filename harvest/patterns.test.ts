import { describe, expect, it } from "vitest";
import { PatternCache, scriptFieldPattern } from "./patterns.js";

describe("PatternCache", () => {
  it("treats spaces, hyphens, dashes and ampersands as one separator", () => {
    const p = new PatternCache();
    expect(p.matches("co founder & ceo", "co-founder")).toBe(true);
    expect(p.matches("co – founder", "co-founder")).toBe(true);
    expect(p.matches("managing-director", "managing director")).toBe(true);
    expect(p.matches("cofounder", "co-founder")).toBe(false);
  });

  it("matches whole words only", () => {
    const p = new PatternCache();
    expect(p.matches("director of sales", "director")).toBe(true);
    expect(p.matches("directors", "director")).toBe(false);
    expect(p.matches("cto", "cto")).toBe(true);
    expect(p.matches("doctorate", "cto")).toBe(false);
  });

  it("compiles each keyword once", () => {
    const p = new PatternCache();
    const first = p.keyword("ceo");
    expect(p.keyword("ceo")).toBe(first);
    p.scriptField("title");
    expect(p.size).toBe(2);
  });

  it("never matches empty text or keywords", () => {
    const p = new PatternCache();
    expect(p.matches("", "ceo")).toBe(false);
    expect(p.matches("ceo", "  ")).toBe(false);
  });
});

describe("scriptFieldPattern", () => {
  it("reads quoted and unquoted keys", () => {
    expect(`{ 'title': "CEO" }`.match(scriptFieldPattern("title"))?.[2]).toBe("CEO");
    expect("{role:`Partner`}".match(scriptFieldPattern("role"))?.[2]).toBe("Partner");
  });
});
