import { describe, expect, it } from "vitest";
import { addDays, daysBetween, localDateOf, resolveTimezone, toLocal, weekdayOf, zonedToUtc } from "./timezone";

describe("timezone", () => {
  describe("toLocal", () => {
    it("should read the wall clock in the given zone", () => {
      expect(toLocal(new Date("2025-06-02T22:30:15Z"), "Europe/Amsterdam")).toEqual({
        year: 2025,
        month: 6,
        day: 3,
        hour: 0,
        minute: 30,
        second: 15,
      });
    });
  });

  describe("calendar arithmetic", () => {
    it("should add days across month and year ends", () => {
      expect(addDays({ year: 2025, month: 1, day: 31 }, 1)).toEqual({ year: 2025, month: 2, day: 1 });
      expect(addDays({ year: 2025, month: 1, day: 1 }, -1)).toEqual({ year: 2024, month: 12, day: 31 });
    });

    it("should count days between dates", () => {
      expect(daysBetween({ year: 2025, month: 5, day: 8 }, { year: 2025, month: 6, day: 2 })).toBe(25);
    });

    it("should number weekdays from Monday", () => {
      expect(weekdayOf({ year: 2025, month: 6, day: 2 })).toBe(0);
      expect(weekdayOf({ year: 2025, month: 6, day: 1 })).toBe(6);
    });

    it("should take the date on the zone's calendar", () => {
      expect(localDateOf(new Date("2025-06-02T23:00:00Z"), "Asia/Tokyo")).toEqual({ year: 2025, month: 6, day: 3 });
    });
  });

  describe("zonedToUtc", () => {
    it("should convert an ordinary wall-clock time", () => {
      expect(zonedToUtc({ year: 2025, month: 6, day: 2 }, 9, 0, "Europe/Amsterdam").toISOString()).toBe(
        "2025-06-02T07:00:00.000Z"
      );
    });

    it("should move a time skipped by clocks going forward one hour later", () => {
      expect(zonedToUtc({ year: 2025, month: 3, day: 30 }, 2, 30, "Europe/Amsterdam").toISOString()).toBe(
        "2025-03-30T01:30:00.000Z"
      );
    });

    it("should pick the earlier of two instants when clocks go back", () => {
      expect(zonedToUtc({ year: 2025, month: 10, day: 26 }, 2, 30, "Europe/Amsterdam").toISOString()).toBe(
        "2025-10-26T00:30:00.000Z"
      );
    });
  });

  it("should fall back to UTC for unknown zones", () => {
    expect(resolveTimezone("Nowhere/Special")).toBe("UTC");
    expect(resolveTimezone(null)).toBe("UTC");
    expect(resolveTimezone("Asia/Tokyo")).toBe("Asia/Tokyo");
  });
});
