import { hasChildren, isTag, isText, type AnyNode, type Element } from "domhandler";

const UPPER = "A-ZÀ-ÖØ-Ý";
const WORD = "A-Za-z0-9_À-ÖØ-öø-ÿ'’ \\-";
const NAME_GROUP = `[${UPPER}][${WORD}]+`;
const NAME_SOURCE = `${NAME_GROUP}(?: ${NAME_GROUP}){0,3}`;

/** First capitalized run in free text ("Jane Doe", "Jean-Luc O’Neil"). */
export const NAME_RE = new RegExp(NAME_SOURCE);
const NAME_FULL_RE = new RegExp(`^(?:${NAME_SOURCE})$`);

/** Capitalized phrase used as a role when it follows a name in a text block. */
export const TITLE_AFTER_NAME_RE = /([A-Z][A-Za-zÀ-ÖØ-öø-ÿ0-9&.,'’ \-/]{3,100})/;

export const EMAIL_RE = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i;

const DEOBFUSCATIONS: Array<[RegExp, string]> = [
  [/\s*\[\s*at\s*\]\s*/gi, "@"],
  [/\s*\(\s*at\s*\)\s*/gi, "@"],
  [/\s+at\s+/gi, "@"],
  [/\s*\[\s*dot\s*\]\s*/gi, "."],
  [/\s*\(\s*dot\s*\)\s*/gi, "."],
  [/\s+dot\s+/gi, "."],
];

export function squash(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

export function isNameLike(value: string): boolean {
  const v = (value ?? "").trim();
  if (v.length < 2 || v.length > 120) return false;
  return NAME_FULL_RE.test(v);
}

/** First email in the text after undoing "[at]"/"(dot)"-style obfuscation. */
export function cleanEmail(value: string): string {
  if (!value) return "";
  let text = value;
  for (const [re, sub] of DEOBFUSCATIONS) text = text.replace(re, sub);
  const m = text.match(EMAIL_RE);
  return m ? m[0].toLowerCase() : "";
}

const SKIP_TEXT = new Set(["script", "style", "noscript", "template"]);

export function textLines(node: AnyNode): string[] {
  const out: string[] = [];
  const walk = (n: AnyNode) => {
    if (isText(n)) {
      for (const line of n.data.split("\n")) {
        const t = line.trim();
        if (t) out.push(t);
      }
      return;
    }
    if (isTag(n) && SKIP_TEXT.has(n.name)) return;
    if (hasChildren(n)) n.children.forEach(walk);
  };
  walk(node);
  return out;
}

export function textOf(node: AnyNode | undefined): string {
  return node ? squash(textLines(node).join(" ")) : "";
}

export function rawText(el: Element): string {
  return el.children.map(c => (isText(c) ? c.data : "")).join("");
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n", r: "\r", t: "\t", b: "\b", f: "\f", v: "\v", "0": "\0",
};

/** Decodes string-literal escapes found in inline scripts and bundles. */
export function unescapeJsString(value: string): string {
  if (!value) return "";
  const decoded = value.replace(
    /\\(u\{[0-9a-fA-F]{1,6}\}|u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|[\s\S])/g,
    (m, esc: string) => {
      if (esc.startsWith("u{")) {
        const cp = parseInt(esc.slice(2, -1), 16);
        return cp <= 0x10ffff ? String.fromCodePoint(cp) : m;
      }
      if (esc.length > 1) return String.fromCharCode(parseInt(esc.slice(1), 16));
      return SIMPLE_ESCAPES[esc] ?? esc;
    },
  );
  return decoded.trim();
}
