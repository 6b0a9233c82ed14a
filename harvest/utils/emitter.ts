import { writeFileSync, mkdirSync } from "fs";
import { dirname } from "path";

export function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

export function emitJSON(file: string, rows: unknown[]) {
  ensureDir(dirname(file));
  writeFileSync(file, JSON.stringify(rows, null, 2) + "\n");
}

export function emitNDJSON(file: string, rows: unknown[]) {
  ensureDir(dirname(file));
  writeFileSync(file, rows.map(r => JSON.stringify(r)).join("\n") + (rows.length ? "\n" : ""));
}

/** Writes `.ndjson` paths one row per line, anything else as a JSON array. */
export function emitResults(file: string, rows: unknown[]) {
  if (file.toLowerCase().endsWith(".ndjson")) emitNDJSON(file, rows);
  else emitJSON(file, rows);
}
