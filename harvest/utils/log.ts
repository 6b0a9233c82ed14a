export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function parseLevel(raw: string | undefined): LogLevel {
  const v = (raw ?? "").toLowerCase();
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : "warn";
}

let threshold: LogLevel = parseLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

/** Maps a repeated `-v` count onto a level: 0 warn, 1 info, 2+ debug. */
export function levelForVerbosity(count: number): LogLevel {
  if (count >= 2) return "debug";
  if (count === 1) return "info";
  return "warn";
}

const enabled = (level: LogLevel) => ORDER[level] >= ORDER[threshold];
const stamp = () => new Date().toISOString();

export const log = {
  debug: (msg: string) => { if (enabled("debug")) console.debug(`${stamp()} [DEBUG] ${msg}`); },
  info: (msg: string) => { if (enabled("info")) console.log(`${stamp()} [INFO] ${msg}`); },
  warn: (msg: string) => { if (enabled("warn")) console.warn(`${stamp()} [WARN] ${msg}`); },
  error: (msg: string) => { if (enabled("error")) console.error(`${stamp()} [ERROR] ${msg}`); },
};
