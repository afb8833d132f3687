/**
 * Minimal logger for Conclave: zero dependencies.
 *
 * Two output channels:
 *  1. stderr (console.error): controlled by --verbose/--debug/CONCLAVE_LOG_LEVEL
 *  2. Log files (<dataDir>/logs/): active once initFileLogging() is called
 *     - info.log        : global, info level+, append (lightweight metrics)
 *     - runs/<id>.log   : one per run, all levels, full prompts/responses
 *
 * Purge strategies (configurable per channel in conclave.config.json):
 *  - info.log : "date" (max days) or "size" (max bytes, truncates oldest lines)
 *  - runs/    : "count" (keep N newest), "date" (max days), or "size" (max total bytes)
 *
 * CRITICAL: the MCP server uses stdio (stdout for JSON-RPC). All log output
 * MUST go to stderr via console.error() to avoid corrupting the protocol.
 */

import {
  appendFileSync, readFileSync, writeFileSync,
  mkdirSync, statSync, readdirSync, unlinkSync,
} from "node:fs";
import { join } from "node:path";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };
const LEVEL_TAGS: Record<LogLevel, string> = { error: "ERR", warn: "WRN", info: "INF", debug: "DBG" };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVELS, value);
}

// ── stderr level (interactive) ──────────────────────────────────────────

const envLevel = process.env.CONCLAVE_LOG_LEVEL;
let stderrLevel: number = isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS.warn;

export function setLogLevel(l: LogLevel): void {
  stderrLevel = LEVELS[l] ?? LEVELS.warn;
}

export function getLogLevel(): LogLevel {
  const names: LogLevel[] = ["error", "warn", "info", "debug"];
  const found = names.find((k) => LEVELS[k] === stderrLevel);
  return found ?? "warn";
}

// ── File logging config ─────────────────────────────────────────────────

export interface FileLoggingConfig {
  info?: {
    purge?: "date" | "size";
    maxDays?: number;
    maxBytes?: number;
  };
  runs?: {
    purge?: "count" | "date" | "size";
    maxFiles?: number;
    maxDays?: number;
    maxBytes?: number;
  };
}

interface ResolvedConfig {
  logsDir: string;
  runsDir: string;
  infoLogPath: string;
  info: { purge: "date" | "size"; maxDays: number; maxBytes: number };
  runs: { purge: "count" | "date" | "size"; maxFiles: number; maxDays: number; maxBytes: number };
}

let cfg: ResolvedConfig | null = null;

/**
 * Initialize file logging. Call once at startup.
 * @param userDataDir  Base data directory for the user (e.g. "data/default")
 * @param config       Logging config from conclave.config.json
 */
export function initFileLogging(userDataDir: string, config?: FileLoggingConfig): void {
  const logsDir = join(userDataDir, "logs");
  const runsDir = join(logsDir, "runs");

  cfg = {
    logsDir,
    runsDir,
    infoLogPath: join(logsDir, "info.log"),
    info: {
      purge: config?.info?.purge ?? "date",
      maxDays: config?.info?.maxDays ?? 30,
      maxBytes: config?.info?.maxBytes ?? 50 * 1024 * 1024,
    },
    runs: {
      purge: config?.runs?.purge ?? "count",
      maxFiles: config?.runs?.maxFiles ?? 50,
      maxDays: config?.runs?.maxDays ?? 14,
      maxBytes: config?.runs?.maxBytes ?? 100 * 1024 * 1024,
    },
  };

  mkdirSync(logsDir, { recursive: true });
  mkdirSync(runsDir, { recursive: true });

  // Purge on startup
  purgeInfoLog();
  purgeRunLogs();
}

/** Disable file logging again. Exported for tests. */
export function resetFileLogging(): void {
  cfg = null;
}

// ── Formatting ──────────────────────────────────────────────────────────

function ts(): string {
  return new Date().toISOString().slice(11, 23);
}

function fullTs(): string {
  return new Date().toISOString();
}

/** Truncate a string for display. Full content goes to run log files. */
export function truncate(s: string, maxLen = 500): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen) + `... (${s.length} chars total)`;
}

function formatArgs(args: unknown[]): string {
  return args.map((a) => (typeof a === "string" ? a : JSON.stringify(a))).join(" ");
}

// File writes never take the engine down; a failed append reports once on stderr.
let fileWriteWarned = false;

function appendLine(path: string, line: string): void {
  try {
    appendFileSync(path, line);
  } catch (err) {
    if (!fileWriteWarned) {
      fileWriteWarned = true;
      console.error(ts(), LEVEL_TAGS.warn, "[logger]", `log file write failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

// ── Core log function (stderr + info.log) ───────────────────────────────

const STDERR_MAX_LINE = 800;

function log(level: LogLevel, tag: string, args: unknown[]): void {
  const lvl = LEVELS[level];
  const levelTag = LEVEL_TAGS[level];
  const message = formatArgs(args);

  // stderr: truncated for readability
  if (stderrLevel >= lvl) {
    const short = message.length > STDERR_MAX_LINE
      ? message.slice(0, STDERR_MAX_LINE) + `... (${message.length} chars, full in run log)`
      : message;
    console.error(ts(), levelTag, tag, short);
  }

  // info.log: info level and above only
  if (cfg && lvl <= LEVELS.info) {
    appendLine(cfg.infoLogPath, `${fullTs()} ${levelTag} ${tag} ${message}\n`);
  }
}

// ── Per-run log ─────────────────────────────────────────────────────────

export interface RunLog {
  /** Write a line to the run log file (with timestamp). */
  write: (level: LogLevel, message: string) => void;
  /** Absolute path to this run's log file. */
  readonly path: string;
}

/** Run ids are UUIDs; anything else is rejected before touching the filesystem. */
const SAFE_RUN_ID = /^[a-zA-Z0-9_-]+$/;

export function isValidRunId(runId: string): boolean {
  return SAFE_RUN_ID.test(runId) && runId.length <= 128;
}

/**
 * Create a per-run log file: <dataDir>/logs/runs/<runId>.log
 * Captures full prompts, responses, and debug details for this run.
 */
export function createRunLog(runId: string): RunLog | null {
  if (!cfg) return null;
  if (!isValidRunId(runId)) {
    log("warn", "[logger]", [`Invalid runId for log file (rejected): ${runId}`]);
    return null;
  }

  const path = join(cfg.runsDir, `${runId}.log`);

  return {
    write(level: LogLevel, message: string): void {
      appendLine(path, `${fullTs()} ${LEVEL_TAGS[level]} ${message}\n`);
    },
    path,
  };
}

// ── Purge: info.log ─────────────────────────────────────────────────────

function purgeInfoLog(): void {
  if (!cfg) return;
  switch (cfg.info.purge) {
    case "date": purgeInfoByDate(cfg.infoLogPath, cfg.info.maxDays); break;
    case "size": purgeInfoBySize(cfg.infoLogPath, cfg.info.maxBytes); break;
  }
}

function readIfExists(path: string): string | null {
  try {
    return readFileSync(path, "utf-8");
  } catch {
    return null; // first start: nothing to purge
  }
}

function purgeInfoByDate(path: string, maxDays: number): void {
  const content = readIfExists(path);
  if (content === null) return;
  const cutoff = new Date();
  cutoff.setDate(cutoff.getDate() - maxDays);
  const cutoffStr = cutoff.toISOString();

  const kept = content.split("\n").filter((line) => {
    const lineTs = line.slice(0, 24);
    return lineTs >= cutoffStr || line.trim() === "";
  });
  writeFileSync(path, kept.join("\n"));
}

function purgeInfoBySize(path: string, maxBytes: number): void {
  const content = readIfExists(path);
  if (content === null || Buffer.byteLength(content) <= maxBytes) return;

  const trimmed = content.slice(content.length - maxBytes);
  const firstNewline = trimmed.indexOf("\n");
  writeFileSync(path, firstNewline >= 0 ? trimmed.slice(firstNewline + 1) : trimmed);
}

// ── Purge: run logs ─────────────────────────────────────────────────────

interface RunFileInfo {
  name: string;
  path: string;
  size: number;
  mtimeMs: number;
}

function listRunFiles(runsDir: string): RunFileInfo[] {
  return readdirSync(runsDir)
    .filter((f) => f.endsWith(".log"))
    .map((name) => {
      const path = join(runsDir, name);
      const stats = statSync(path);
      return { name, path, size: stats.size, mtimeMs: stats.mtimeMs };
    })
    .sort((a, b) => b.mtimeMs - a.mtimeMs); // newest first
}

function purgeRunLogs(): void {
  if (!cfg) return;
  const files = listRunFiles(cfg.runsDir);
  switch (cfg.runs.purge) {
    case "count": {
      for (const file of files.slice(cfg.runs.maxFiles)) unlinkSync(file.path);
      break;
    }
    case "date": {
      const cutoff = Date.now() - cfg.runs.maxDays * 24 * 60 * 60 * 1000;
      for (const file of files) {
        if (file.mtimeMs < cutoff) unlinkSync(file.path);
      }
      break;
    }
    case "size": {
      let totalSize = 0;
      for (const file of files) { // newest first
        totalSize += file.size;
        if (totalSize > cfg.runs.maxBytes) unlinkSync(file.path);
      }
      break;
    }
  }
}

// ── Logger factory ──────────────────────────────────────────────────────

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

export function createLogger(namespace: string): Logger {
  const tag = `[${namespace}]`;
  return {
    error: (...args: unknown[]) => log("error", tag, args),
    warn:  (...args: unknown[]) => log("warn", tag, args),
    info:  (...args: unknown[]) => log("info", tag, args),
    debug: (...args: unknown[]) => log("debug", tag, args),
  };
}
