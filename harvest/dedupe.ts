import type { PersonRecord } from "./people.types.js";

type Identity = Pick<PersonRecord, "name" | "title" | "profileLink" | "email">;

const FIELDS = ["name", "title", "profileLink", "email"] as const;
const BACKFILL = ["sourcePage", "name", "title", "profileLink", "email"] as const;

const norm = (s: string) => s.trim().toLowerCase();

export function identityKey(p: Identity): string {
  return FIELDS.map(f => norm(p[f])).join("\u0001");
}

/**
 * Same person seen twice: they share a non-empty name, profile link or
 * email, and no field holds two different non-empty values.
 */
export function sameIdentity(a: Identity, b: Identity): boolean {
  const anchored = (["name", "profileLink", "email"] as const)
    .some(f => norm(a[f]) !== "" && norm(a[f]) === norm(b[f]));
  if (!anchored) return false;
  return FIELDS.every(f => !norm(a[f]) || !norm(b[f]) || norm(a[f]) === norm(b[f]));
}

/** Fills blank fields of `into` from `from`; non-empty values are never replaced. */
export function backfill(into: PersonRecord, from: PersonRecord): void {
  for (const f of BACKFILL) {
    if (!into[f] && from[f]) into[f] = from[f];
  }
}

/**
 * Merges observations of the same person, keeping first-seen order. The
 * earliest record wins every conflict; later ones only fill its gaps.
 * Inputs are not mutated.
 */
export function dedupePeople(records: readonly PersonRecord[]): PersonRecord[] {
  const merged: PersonRecord[] = [];
  const byKey = new Map<string, PersonRecord>();

  for (const rec of records) {
    const key = identityKey(rec);
    const target = byKey.get(key) ?? merged.find(m => sameIdentity(m, rec));
    if (target) {
      backfill(target, rec);
      byKey.set(key, target);
      continue;
    }
    const copy = { ...rec };
    merged.push(copy);
    byKey.set(key, copy);
  }
  return merged;
}
