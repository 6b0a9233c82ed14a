const SEP = "[\\s\\u00A0\\u2011\\u2012\\u2013\\u2014\\u2212\\-&]+";
const SEP_SPLIT = /[\s ‑‒–—−\-&]+/;

export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-word, case-insensitive pattern for a keyword in which any run of
 * spaces, hyphens, dashes or ampersands matches any other such run, so
 * "co-founder", "co founder" and "co – founder" are one keyword.
 */
export function keywordPattern(keyword: string): RegExp {
  const parts = keyword.trim().split(SEP_SPLIT).filter(Boolean).map(escapeRegex);
  const body = parts.join(SEP);
  const wordy = /[A-Za-zÀ-ÖØ-öø-ÿ]/.test(keyword);
  return new RegExp(wordy ? `\\b${body}\\b` : body, "i");
}

/** `key: "value"` in script text, with optional quotes around the key. */
export function scriptFieldPattern(key: string): RegExp {
  return new RegExp(`["']?${escapeRegex(key)}["']?\\s*:\\s*(["'\`])(.+?)\\1`, "is");
}

/**
 * Compiled patterns for one scan session, built lazily once per distinct
 * keyword or script field. Entries are never evicted; a session covers a
 * bounded list of sites.
 */
export class PatternCache {
  private readonly keywords = new Map<string, RegExp>();
  private readonly fields = new Map<string, RegExp>();

  keyword(keyword: string): RegExp {
    let re = this.keywords.get(keyword);
    if (!re) {
      re = keywordPattern(keyword);
      this.keywords.set(keyword, re);
    }
    return re;
  }

  scriptField(key: string): RegExp {
    let re = this.fields.get(key);
    if (!re) {
      re = scriptFieldPattern(key);
      this.fields.set(key, re);
    }
    return re;
  }

  matches(text: string, keyword: string): boolean {
    if (!text || !keyword.trim()) return false;
    return this.keyword(keyword).test(text);
  }

  get size(): number {
    return this.keywords.size + this.fields.size;
  }
}
