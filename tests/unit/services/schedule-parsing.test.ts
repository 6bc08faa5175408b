import { describe, expect, it } from "vitest";
import fc from "fast-check";
import {
  inDateRange,
  inTimeWindow,
  parseClockTime,
  parseDateRange,
  parseTimeWindow,
} from "../../../src/services/schedule-parsing.js";
import { ValidationError } from "../../../src/services/errors.js";

describe("parseDateRange", () => {
  it("reads 'start to end'", () => {
    expect(parseDateRange("2025-07-01 to 2025-07-15")).toEqual({ start: "2025-07-01", end: "2025-07-15" });
  });

  it("treats a single date as a one-day range", () => {
    expect(parseDateRange("2025-07-01")).toEqual({ start: "2025-07-01", end: "2025-07-01" });
  });

  it("rejects impossible calendar dates", () => {
    expect(() => parseDateRange("2025-02-30 to 2025-03-01")).toThrow(ValidationError);
  });

  it("rejects ranges that end before they start", () => {
    expect(() => parseDateRange("2025-07-15 to 2025-07-01")).toThrow("ends before it starts");
  });
});

describe("parseClockTime", () => {
  it.each([
    ["4 PM", "16:00"],
    ["4:30 pm", "16:30"],
    ["12 AM", "00:00"],
    ["12 PM", "12:00"],
    ["16:00", "16:00"],
    ["10:00:00", "10:00"],
    ["9", "09:00"],
  ])("%s -> %s", (text, expected) => {
    expect(parseClockTime(text)).toBe(expected);
  });

  it.each(["13 PM", "25:00", "10:75", "noon"])("rejects %s", (text) => {
    expect(parseClockTime(text)).toBeUndefined();
  });
});

describe("parseTimeWindow", () => {
  it("reads relative windows", () => {
    expect(parseTimeWindow("After 4 PM")).toEqual({ from: "16:00" });
    expect(parseTimeWindow("before 11 am")).toEqual({ to: "11:00" });
  });

  it("reads named periods", () => {
    expect(parseTimeWindow("Morning")).toEqual({ to: "12:00" });
    expect(parseTimeWindow("afternoon")).toEqual({ from: "12:00" });
  });

  it("reads between windows", () => {
    expect(parseTimeWindow("Between 9 AM and 1 PM")).toEqual({ from: "09:00", to: "13:00" });
  });

  it("turns an exact time into a one-minute window", () => {
    expect(parseTimeWindow("10:00:00")).toEqual({ from: "10:00", to: "10:01" });
  });

  it("rejects text it cannot read", () => {
    expect(() => parseTimeWindow("whenever works")).toThrow(ValidationError);
  });
});

describe("window membership", () => {
  it("includes `from` and excludes `to`", () => {
    const window = { from: "16:00", to: "17:00" };
    expect(inTimeWindow("16:00", window)).toBe(true);
    expect(inTimeWindow("16:59", window)).toBe(true);
    expect(inTimeWindow("17:00", window)).toBe(false);
    expect(inTimeWindow("15:59", window)).toBe(false);
  });

  it("includes both ends of a date range", () => {
    const range = { start: "2025-07-01", end: "2025-07-03" };
    expect(inDateRange("2025-07-01", range)).toBe(true);
    expect(inDateRange("2025-07-03", range)).toBe(true);
    expect(inDateRange("2025-07-04", range)).toBe(false);
  });

  it("accepts everything without a window", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 23 }), fc.integer({ min: 0, max: 59 }), (h, m) => {
        const time = `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
        expect(inTimeWindow(time)).toBe(true);
      })
    );
  });

  it("an exact-time window matches only that minute", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 22 }), fc.integer({ min: 0, max: 59 }), (h, m) => {
        const time = `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
        const window = parseTimeWindow(time);
        expect(inTimeWindow(time, window)).toBe(true);
        const next = parseClockTime(m === 59 ? `${h + 1}:00` : `${h}:${String(m + 1).padStart(2, "0")}`);
        expect(next).toBeDefined();
        if (next) expect(inTimeWindow(next, window)).toBe(false);
      })
    );
  });
});
