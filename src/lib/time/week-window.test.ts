import { describe, expect, it } from "vitest";
import { getWeekWindowFromKickoffs, isWithinWeekWindow } from "./week-window";

describe("getWeekWindowFromKickoffs", () => {
  it("spans local start-of-day of the first game to end-of-day of the last", () => {
    const thursday = new Date(2026, 9, 15, 20, 15);
    const monday = new Date(2026, 9, 19, 20, 15);
    const sunday = new Date(2026, 9, 18, 13, 0);

    const window = getWeekWindowFromKickoffs(7, [sunday.getTime(), monday.toISOString(), thursday]);

    expect(window?.week).toBe(7);
    expect(window?.start).toEqual(new Date(2026, 9, 15, 0, 0, 0, 0));
    expect(window?.end).toEqual(new Date(2026, 9, 19, 23, 59, 59, 999));
  });

  it("ignores unparsable kick-offs and returns null when none remain", () => {
    expect(getWeekWindowFromKickoffs(3, ["not a date"])).toBeNull();
    expect(getWeekWindowFromKickoffs(3, [])).toBeNull();
  });
});

describe("isWithinWeekWindow", () => {
  const window = {
    week: 7,
    start: new Date("2026-10-15T00:00:00.000Z"),
    end: new Date("2026-10-20T23:59:59.999Z"),
  };

  it("includes both bounds", () => {
    expect(isWithinWeekWindow("2026-10-15T00:00:00Z", window)).toBe(true);
    expect(isWithinWeekWindow("2026-10-20T23:59:59.999Z", window)).toBe(true);
  });

  it("rejects games outside the window", () => {
    expect(isWithinWeekWindow("2026-10-25T17:00:00Z", window)).toBe(false);
    expect(isWithinWeekWindow("2026-10-14T23:59:59Z", window)).toBe(false);
  });

  it("returns null for an unparsable timestamp", () => {
    expect(isWithinWeekWindow("next sunday", window)).toBeNull();
  });
});
