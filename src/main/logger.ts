import fs from "node:fs";
import path from "node:path";

export type LogLevel = "info" | "warn" | "error" | "debug";

type LoggerOptions = {
  directory?: string;
  console?: boolean;
};

type LogEntry = {
  time: string;
  level: LogLevel;
  appid?: number;
  message: string;
  meta?: Record<string, unknown>;
};

const LOG_FILE = "steam-shelf.log";

let logDirectory = path.join(process.cwd(), "logs");
let consoleEnabled = true;

export function configureLogger(options: LoggerOptions): void {
  if (options.directory) logDirectory = options.directory;
  if (options.console !== undefined) consoleEnabled = options.console;
}

export function getLogPath(): string {
  fs.mkdirSync(logDirectory, { recursive: true });
  return path.join(logDirectory, LOG_FILE);
}

// Most entries concern one game, so its appid is lifted out of meta for grepping.
export function toLogEntry(level: LogLevel, message: string, meta?: Record<string, unknown>): LogEntry {
  const entry: LogEntry = { time: new Date().toISOString(), level, message };
  if (!meta) return entry;
  const { appid, ...rest } = meta;
  if (typeof appid === "number") entry.appid = appid;
  const remaining = typeof appid === "number" ? rest : meta;
  if (Object.keys(remaining).length > 0) entry.meta = remaining;
  return entry;
}

export function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  const entry = toLogEntry(level, message, meta);
  try {
    fs.appendFileSync(getLogPath(), JSON.stringify(entry) + "\n");
  } catch {
    // the log file is best effort
  }
  if (!consoleEnabled) return;
  // stderr keeps stdout free for command output such as `list`.
  const tag = entry.appid === undefined ? "" : ` [${entry.appid}]`;
  process.stderr.write(`${entry.time} ${level.toUpperCase()}${tag} ${message}\n`);
}
