import { describe, expect, it } from "vitest";
import {
  addDaysToDateKey,
  getDateKey,
  isDateKey,
  isHappyHour,
  photoExpiresAt,
  zonedDayStart
} from "./clock.js";

describe("clock", () => {
  it("resolves the civil day in the bot zone, not UTC", () => {
    // 2026-02-14 22:30 UTC is already 2026-02-15 01:30 in Moscow
    expect(getDateKey(Date.UTC(2026, 1, 14, 22, 30))).toBe("2026-02-15");
    expect(getDateKey(Date.UTC(2026, 1, 14, 22, 30), "UTC")).toBe("2026-02-14");
  });

  it("finds local midnight", () => {
    expect(zonedDayStart("2026-02-16")).toBe(Date.UTC(2026, 1, 15, 21, 0, 0));
    expect(zonedDayStart("2026-02-16", "UTC")).toBe(Date.UTC(2026, 1, 16));
  });

  it("handles daylight saving shifts", () => {
    // 2026-03-29 Europe/Berlin switches to +02:00 at 02:00 local time
    expect(zonedDayStart("2026-03-29", "Europe/Berlin")).toBe(Date.UTC(2026, 2, 28, 23, 0, 0));
    expect(zonedDayStart("2026-03-30", "Europe/Berlin")).toBe(Date.UTC(2026, 2, 29, 22, 0, 0));
  });

  it("expires a photo one unit before the start of submit day + 2", () => {
    expect(photoExpiresAt("2026-02-14")).toBe(Date.UTC(2026, 1, 15, 21, 0, 0) - 1);
  });

  it("adds days across month boundaries", () => {
    expect(addDaysToDateKey("2026-02-27", 2)).toBe("2026-03-01");
    expect(addDaysToDateKey("2026-03-01", -1)).toBe("2026-02-28");
  });

  it("validates date keys", () => {
    expect(isDateKey("2026-02-14")).toBe(true);
    expect(isDateKey("2026-02-30")).toBe(false);
    expect(isDateKey("14.02.2026")).toBe(false);
  });

  it("checks the happy hour window including windows over midnight", () => {
    const window = { start: "15:00", end: "16:00" };
    expect(isHappyHour(Date.UTC(2026, 1, 14, 12, 30), window)).toBe(true); // 15:30 MSK
    expect(isHappyHour(Date.UTC(2026, 1, 14, 13, 0), window)).toBe(false); // 16:00 MSK
    const night = { start: "23:00", end: "01:00" };
    expect(isHappyHour(Date.UTC(2026, 1, 14, 21, 30), night)).toBe(true); // 00:30 MSK
    expect(isHappyHour(Date.UTC(2026, 1, 14, 19, 0), night)).toBe(false); // 22:00 MSK
  });
});
