#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "fs";
import { parseArgs } from "util";
import { DECISION_LIMIT, MAX_PAGES, SITE_CONCURRENCY } from "./config.js";
import { loadWebsites, parsePositiveInt } from "./input.js";
import { scanSites, toRecord } from "./scan.js";
import { ScanSession } from "./session.js";
import { emitResults } from "./utils/emitter.js";
import { HttpFetcher } from "./utils/httpHtml.js";
import { levelForVerbosity, log, setLogLevel } from "./utils/log.js";

const USAGE = `Usage: enrich-people [--url <site>]... [--input-file <file>]... [options]

  -u, --url <site>          website to scan (repeatable)
  -i, --input-file <file>   JSON list or newline-separated websites (repeatable)
  -o, --output <file>       output path, .ndjson for one site per line (default enriched_people.json)
      --max-pages <n>       candidate pages scanned per site (default ${MAX_PAGES})
      --decision-limit <n>  decision makers kept per site (default ${DECISION_LIMIT})
      --include-all-people  also write every person found
  -v, --verbose             more logging (-vv for debug)`;

function readStdin(): string {
  if (process.stdin.isTTY) return "";
  try {
    return readFileSync(0, "utf8");
  } catch {
    return "";
  }
}

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      url: { type: "string", short: "u", multiple: true, default: [] },
      "input-file": { type: "string", short: "i", multiple: true, default: [] },
      output: { type: "string", short: "o", default: "enriched_people.json" },
      "max-pages": { type: "string" },
      "decision-limit": { type: "string" },
      "include-all-people": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", multiple: true, default: [] },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }
  const verbosity = (values.verbose ?? []).length;
  if (verbosity > 0) setLogLevel(levelForVerbosity(verbosity));

  const inputFiles = values["input-file"] ?? [];
  const urls = values.url ?? [];
  const output = values.output ?? "enriched_people.json";
  const websites = loadWebsites(inputFiles, urls, inputFiles.length || urls.length ? undefined : readStdin());
  if (websites.length === 0) {
    log.error("No websites provided. Use --url or --input-file, or pipe URLs via stdin.");
    console.error(USAGE);
    return 1;
  }

  const session = new ScanSession(new HttpFetcher(), {
    maxPages: parsePositiveInt(values["max-pages"], MAX_PAGES, "--max-pages"),
    decisionLimit: parsePositiveInt(values["decision-limit"], DECISION_LIMIT, "--decision-limit"),
  });

  log.info(`Scanning ${websites.length} site(s)`);
  const results = await scanSites(websites, session, SITE_CONCURRENCY);
  const rows = results.map(r => toRecord(r, values["include-all-people"] === true));

  try {
    emitResults(output, rows);
  } catch (e) {
    log.error(`Failed to write ${output}: ${(e as Error).message}`);
    return 2;
  }
  log.info(`Wrote ${rows.length} site result(s) to ${output}`);
  return 0;
}

main(process.argv.slice(2)).then(code => {
  process.exitCode = code;
}).catch(err => {
  console.error(err);
  process.exit(1);
});
