import { PROFILE_DOMAIN } from "./config.js";

function parse(raw: string, base?: string): URL | null {
  try {
    return base ? new URL(raw, base) : new URL(raw);
  } catch {
    return null;
  }
}

/**
 * Canonical site URL: `https://` when the scheme is missing, no query or
 * fragment. Empty when the input has no usable host.
 */
export function normalizeSiteUrl(raw: string): string {
  let s = (raw ?? "").trim();
  if (!s) return "";
  if (!/^https?:\/\//i.test(s)) s = `https://${s}`;
  const u = parse(s);
  if (!u || !u.hostname) return "";
  u.search = "";
  u.hash = "";
  return u.toString();
}

/**
 * Canonical professional-network profile link.
 *
 * Relative and protocol-relative hrefs are resolved (against `base` when given),
 * any subdomain of the network collapses to `www`, and trailing slashes, query and
 * fragment are dropped, so `https://nl.linkedin.com/in/x/` and `//www.linkedin.com/in/x`
 * compare equal. Anything off the network yields "".
 */
export function normalizeProfileUrl(raw: string, base?: string): string {
  let s = (raw ?? "").trim();
  if (!s) return "";
  if (s.startsWith("//")) s = `https:${s}`;
  const u = parse(s, base);
  if (!u) return "";
  const host = u.hostname.toLowerCase();
  if (host !== PROFILE_DOMAIN && !host.endsWith(`.${PROFILE_DOMAIN}`)) return "";
  const path = u.pathname.replace(/\/+$/, "");
  return `https://www.${PROFILE_DOMAIN}${path || "/"}`;
}

export function isProfileHref(href: string): boolean {
  return href.toLowerCase().includes(PROFILE_DOMAIN);
}

export function resolveUrl(href: string, base: string): string {
  return parse(href.trim(), base)?.toString() ?? "";
}

export function hostOf(url: string): string {
  return parse(url)?.hostname.toLowerCase() ?? "";
}

export function originOf(url: string): string {
  const u = parse(url);
  return u && u.hostname ? u.origin : "";
}

export function stripWww(host: string): string {
  const h = host.toLowerCase();
  return h.startsWith("www.") ? h.slice(4) : h;
}

export function pageKey(url: string): string {
  // no fragment, no trailing slash
  return url.split("#", 1)[0].replace(/\/+$/, "");
}

export function pathOf(url: string): string {
  return parse(url)?.pathname ?? "";
}
