import { describe, expect, it } from "vitest";
import {
  ceilToSecond,
  formatTimestamp,
  parseTimestamp,
  truncateToSecond,
  tryParseTimestamp,
} from "../timestamp.js";

describe("timestamp codec", () => {
  it("formats as fixed-width UTC", () => {
    expect(formatTimestamp(Date.UTC(2024, 0, 5, 9, 3, 7))).toBe("2024-01-05 09:03:07");
  });

  it("parses what it formats", () => {
    const ms = Date.UTC(2023, 11, 31, 23, 59, 59);
    expect(parseTimestamp(formatTimestamp(ms))).toBe(ms);
  });

  it("drops sub-second precision when formatting", () => {
    expect(formatTimestamp(Date.UTC(2024, 5, 1, 0, 0, 0) + 999)).toBe("2024-06-01 00:00:00");
  });

  it("sorts lexically in chronological order", () => {
    const values = [
      Date.UTC(2024, 9, 1, 0, 0, 0),
      Date.UTC(2024, 1, 10, 12, 0, 0),
      Date.UTC(2023, 11, 31, 23, 59, 59),
    ].map(formatTimestamp);

    expect([...values].sort()).toEqual([
      "2023-12-31 23:59:59",
      "2024-02-10 12:00:00",
      "2024-10-01 00:00:00",
    ]);
  });

  it("falls back to the current time for malformed input", () => {
    const now = () => Date.UTC(2025, 2, 3, 4, 5, 6) + 250;
    expect(parseTimestamp("yesterday", now)).toBe(Date.UTC(2025, 2, 3, 4, 5, 6));
  });

  it("rejects out-of-range fields instead of rolling over", () => {
    const now = () => 0;
    expect(parseTimestamp("2024-02-30 10:00:00", now)).toBe(0);
    expect(parseTimestamp("2024-01-01 24:00:00", now)).toBe(0);
  });

  it("reports unparseable values as null", () => {
    expect(tryParseTimestamp("2024-01-01 12:00:00")).toBe(Date.UTC(2024, 0, 1, 12, 0, 0));
    expect(tryParseTimestamp("not-a-time")).toBeNull();
    expect(tryParseTimestamp("2024-02-30 10:00:00")).toBeNull();
  });

  it("rounds to whole seconds", () => {
    expect(truncateToSecond(12_345)).toBe(12_000);
    expect(ceilToSecond(12_345)).toBe(13_000);
    expect(ceilToSecond(12_000)).toBe(12_000);
  });
});
