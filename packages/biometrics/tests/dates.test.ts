import { describe, expect, it } from "vitest";
import { ValidationError } from "@pulse/shared";
import {
  addDays,
  daysBetween,
  eachDate,
  isValidDate,
  isoDatePart,
  lastNDays,
  parseDays,
} from "../src/dates.ts";

describe("calendar arithmetic", () => {
  it("crosses month and year boundaries", () => {
    expect(addDays("2026-10-31", 1)).toBe("2026-11-01");
    expect(addDays("2027-01-01", -1)).toBe("2026-12-31");
    expect(addDays("2028-02-28", 1)).toBe("2028-02-29");
  });

  it("counts days between dates", () => {
    expect(daysBetween("2026-10-01", "2026-10-15")).toBe(14);
    expect(daysBetween("2026-10-15", "2026-10-01")).toBe(-14);
  });

  it("lists every date in a range", () => {
    expect(eachDate({ start: "2026-10-30", end: "2026-11-02" }))
      .toEqual(["2026-10-30", "2026-10-31", "2026-11-01", "2026-11-02"]);
    expect(eachDate({ start: "2026-10-02", end: "2026-10-01" })).toEqual([]);
  });

  it("rejects malformed dates", () => {
    expect(isValidDate("2026-02-30")).toBe(false);
    expect(isValidDate("2026-2-3")).toBe(false);
    expect(() => addDays("yesterday", 1)).toThrow('Invalid date "yesterday" (expected YYYY-MM-DD)');
  });

  it("ends lastNDays on the local date", () => {
    expect(lastNDays(3, new Date(2026, 9, 5, 12))).toEqual({ start: "2026-10-03", end: "2026-10-05" });
  });

  it("takes the date part of a timestamp", () => {
    expect(isoDatePart("2026-10-18T06:55:00Z")).toBe("2026-10-18");
  });
});

describe("parseDays", () => {
  it("uses the fallback when omitted", () => {
    expect(parseDays(undefined, 14)).toBe(14);
    expect(parseDays("90", 14)).toBe(90);
  });

  it.each(["0", "91", "1.5", "abc"])("rejects %s", (input) => {
    expect(() => parseDays(input, 14)).toThrow(ValidationError);
  });

  it("names the bad input", () => {
    expect(() => parseDays("0", 14)).toThrow('Days must be an integer between 1 and 90, got "0"');
  });
});
