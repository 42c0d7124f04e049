import { describe, expect, it } from "vitest";
import {
  addCalendarDays,
  countCalendarDays,
  isIsoDate,
  normalizeTimestamp,
  todayInTimeZone,
  toTimeOfDay
} from "../../pipeline/utils/calendar.js";

describe("calendar helpers", () => {
  it("does day arithmetic across month, year and leap boundaries", () => {
    expect(addCalendarDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addCalendarDays("2023-12-31", 1)).toBe("2024-01-01");
    expect(addCalendarDays("2024-03-01", -1)).toBe("2024-02-29");
    expect(countCalendarDays("2024-01-01", "2024-12-31")).toBe(366);
  });

  it("validates ISO dates", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("2023-02-29")).toBe(false);
    expect(isIsoDate("2024-1-01")).toBe(false);
  });

  it("normalizes archive and dataset timestamps", () => {
    expect(normalizeTimestamp("2024-01-01T05:00")).toBe("2024-01-01 05:00:00");
    expect(normalizeTimestamp("2024-01-01 05:00:30")).toBe("2024-01-01 05:00:30");
    expect(normalizeTimestamp("2024-01-01T05:00:30.000")).toBe("2024-01-01 05:00:30");
    expect(normalizeTimestamp("2024-01-01")).toBe("2024-01-01 00:00:00");
    expect(normalizeTimestamp("2024-01-01T24:00")).toBeNull();
    expect(normalizeTimestamp("yesterday")).toBeNull();
  });

  it("extracts the time of day", () => {
    expect(toTimeOfDay("2024-01-01T05:42")).toBe("05:42");
    expect(toTimeOfDay("2024-01-01")).toBeNull();
  });

  it("reads today in the requested timezone", () => {
    const instant = new Date("2024-06-30T20:30:00Z");
    expect(todayInTimeZone(instant, "Asia/Ho_Chi_Minh")).toBe("2024-07-01");
    expect(todayInTimeZone(instant, "UTC")).toBe("2024-06-30");
  });
});
