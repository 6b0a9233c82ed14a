import "dotenv/config";
import { readFileSync, existsSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";

const Person = z.object({
  name: z.string(),
  title: z.string(),
  profileLink: z.string(),
  email: z.string(),
});

const SiteRow = z.object({
  website: z.string(),
  decisionMakers: z.array(Person),
  errors: z.array(z.string()).default([]),
  meta: z.object({ pagesScanned: z.number(), peopleFound: z.number() }).partial().default({}),
});
export type SiteRow = z.infer<typeof SiteRow>;

export function readResults(text: string): SiteRow[] {
  const t = text.trim();
  if (!t) return [];
  const raw: unknown[] = t.startsWith("[")
    ? z.array(z.unknown()).parse(JSON.parse(t))
    : t.split("\n").filter(l => l.trim()).map((l): unknown => JSON.parse(l));
  return raw.flatMap(r => {
    const parsed = SiteRow.safeParse(r);
    return parsed.success ? [parsed.data] : [];
  });
}

const pct = (n: number, d: number) => (d ? Number(((n / d) * 100).toFixed(1)) : 0);

export function summarize(rows: SiteRow[]) {
  const dms = rows.flatMap(r => r.decisionMakers);
  const errorCounts: Record<string, number> = {};
  for (const tag of rows.flatMap(r => r.errors)) errorCounts[tag] = (errorCounts[tag] ?? 0) + 1;

  return {
    sites: rows.length,
    pagesScanned: rows.reduce((n, r) => n + (r.meta.pagesScanned ?? 0), 0),
    peopleFound: rows.reduce((n, r) => n + (r.meta.peopleFound ?? 0), 0),
    decisionMakers: dms.length,
    pctSitesWithDecisionMaker: pct(rows.filter(r => r.decisionMakers.length > 0).length, rows.length),
    pctDecisionMakerEmailCoverage: pct(dms.filter(p => p.email).length, dms.length),
    pctDecisionMakerProfileCoverage: pct(dms.filter(p => p.profileLink).length, dms.length),
    errors: errorCounts,
  };
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const file = process.argv[2] ?? "enriched_people.json";
  if (!existsSync(file)) {
    console.error(`No results at ${file}`);
    process.exit(1);
  }
  console.log(JSON.stringify(summarize(readResults(readFileSync(file, "utf8"))), null, 2));
}
