/**
 * Minimal logger for peer-consensus: zero dependencies.
 *
 * Two output channels:
 *  1. stderr (console.error): controlled by --verbose/--debug/PEER_CONSENSUS_LOG_LEVEL
 *  2. Session log (<session folder>/discussion.log): all levels, full prompts/responses,
 *     active once createSessionLog() is called for a run
 *
 * All log output goes to stderr so stdout stays reserved for the CLI's own output.
 */

import { appendFileSync } from "node:fs";
import { join } from "node:path";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };
const LEVEL_TAGS: Record<LogLevel, string> = { error: "ERR", warn: "WRN", info: "INF", debug: "DBG" };

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVELS, value);
}

// ── stderr level (interactive) ──────────────────────────────────────────

const envLevel = process.env.PEER_CONSENSUS_LOG_LEVEL;
let stderrLevel: number = isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS.warn;

export function setLogLevel(l: LogLevel): void {
  stderrLevel = LEVELS[l] ?? LEVELS.warn;
}

export function getLogLevel(): LogLevel {
  const entries = Object.entries(LEVELS);
  const found = entries.find(([, v]) => v === stderrLevel)?.[0];
  return isLogLevel(found) ? found : "warn";
}

// ── Formatting ──────────────────────────────────────────────────────────

function ts(): string {
  return new Date().toISOString().slice(11, 23);
}

/** Truncate a string for display. Full content goes to the session log file. */
export function truncate(s: string, maxLen = 500): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen) + `... (${s.length} chars total)`;
}

function formatArgs(args: unknown[]): string {
  return args.map((a) => (typeof a === "string" ? a : JSON.stringify(a))).join(" ");
}

// ── Core log function ───────────────────────────────────────────────────

const STDERR_MAX_LINE = 800;

function log(level: LogLevel, tag: string, args: unknown[]): void {
  if (stderrLevel < LEVELS[level]) return;
  const message = formatArgs(args);
  const short = message.length > STDERR_MAX_LINE
    ? message.slice(0, STDERR_MAX_LINE) + `... (${message.length} chars, full in session log)`
    : message;
  console.error(ts(), LEVEL_TAGS[level], tag, short);
}

// ── Per-session log ─────────────────────────────────────────────────────

export const SESSION_LOG_FILENAME = "discussion.log";

export interface SessionLog {
  /** Append a timestamped line to the session log file. */
  write: (level: LogLevel, message: string) => void;
  /** Absolute path to this session's log file. */
  readonly path: string;
}

/**
 * Create the log file for a discussion session: <sessionFolder>/discussion.log.
 * Captures full prompts, responses and per-round averages.
 * The folder must already exist.
 */
export function createSessionLog(sessionFolder: string): SessionLog {
  const path = join(sessionFolder, SESSION_LOG_FILENAME);
  return {
    write(level: LogLevel, message: string): void {
      const line = `${new Date().toISOString()} ${LEVEL_TAGS[level]} ${message}\n`;
      try {
        appendFileSync(path, line);
      } catch (err) {
        log("warn", "[logger]", [`session log write failed: ${err instanceof Error ? err.message : String(err)}`]);
      }
    },
    path,
  };
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
