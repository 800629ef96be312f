/**
 * Fixed-width `YYYY-MM-DD HH:MM:SS` (UTC) timestamps for the SQLite store.
 * The string form sorts lexically in chronological order.
 */

import { createLogger } from "../utils/logger.js";

const log = createLogger("timestamp");

const TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad(n: number, width = 2): string {
  return n.toString().padStart(width, "0");
}

export function truncateToSecond(ms: number): number {
  return Math.floor(ms / 1000) * 1000;
}

export function ceilToSecond(ms: number): number {
  return Math.ceil(ms / 1000) * 1000;
}

export function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

/** Parse a stored timestamp, or null when it is malformed or out of range. */
export function tryParseTimestamp(text: string): number | null {
  const match = TIMESTAMP_RE.exec(text);
  if (!match) return null;

  const [, y, mo, d, h, mi, s] = match.map(Number);
  const ms = Date.UTC(y, mo - 1, d, h, mi, s);
  // Date.UTC rolls over out-of-range fields; reject those instead.
  return formatTimestamp(ms) === text ? ms : null;
}

/**
 * Parse a stored timestamp. Malformed values fall back to the current time so
 * one corrupt value does not break the caller.
 */
export function parseTimestamp(text: string, now: () => number = Date.now): number {
  const ms = tryParseTimestamp(text);
  if (ms !== null) return ms;

  log.warn({ value: text }, "invalid stored timestamp, using current time");
  return truncateToSecond(now());
}
