/**
 * Parsing for the free-text date ranges and time windows patients give
 * when asking for an appointment.
 */

import type { DateRange, TimeWindow } from "../types/appointment.js";
import { ValidationError } from "./errors.js";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isValidDate(text: string): boolean {
  if (!ISO_DATE.test(text)) return false;
  const date = new Date(`${text}T00:00:00Z`);
  return !isNaN(date.getTime()) && date.toISOString().slice(0, 10) === text;
}

/**
 * "2025-07-01 to 2025-07-15", or a single "2025-07-01".
 */
export function parseDateRange(text: string): DateRange {
  const parts = text.trim().split(/\s+(?:to|-|through)\s+/i).map((p) => p.trim());
  const [start = "", end = start] = parts;

  if (parts.length > 2 || !isValidDate(start) || !isValidDate(end)) {
    throw new ValidationError(`Unrecognized date range: "${text}"`);
  }
  if (end < start) {
    throw new ValidationError(`Date range ends before it starts: "${text}"`);
  }
  return { start, end };
}

/**
 * "4 PM", "4:30 pm", "16:00", "10:00:00" -> "HH:MM".
 */
export function parseClockTime(text: string): string | undefined {
  const match = text.trim().match(/^(\d{1,2})(?::(\d{2}))?(?::\d{2})?\s*([ap]\.?m\.?)?$/i);
  if (!match) return undefined;

  const [, hourText = "", minuteText = "00", meridiem] = match;
  let hour = parseInt(hourText, 10);
  const minute = parseInt(minuteText, 10);

  if (meridiem) {
    if (hour < 1 || hour > 12) return undefined;
    const pm = meridiem.toLowerCase().startsWith("p");
    hour = (hour % 12) + (pm ? 12 : 0);
  }
  if (hour > 23 || minute > 59) return undefined;

  return `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;
}

function addMinute(time: string): string {
  const [h = 0, m = 0] = time.split(":").map((p) => parseInt(p, 10));
  const total = Math.min(h * 60 + m + 1, 24 * 60 - 1);
  return `${String(Math.floor(total / 60)).padStart(2, "0")}:${String(total % 60).padStart(2, "0")}`;
}

/**
 * "After 4 PM" -> { from: "16:00" }, "Before 11 AM" -> { to: "11:00" },
 * "Morning" / "Afternoon", or an exact time ("10:00:00") which matches
 * only that minute. `from` is inclusive, `to` exclusive.
 */
export function parseTimeWindow(text: string): TimeWindow {
  const trimmed = text.trim();
  const lower = trimmed.toLowerCase();

  if (lower === "morning") return { to: "12:00" };
  if (lower === "afternoon") return { from: "12:00" };

  const relative = trimmed.match(/^(after|before)\s+(.+)$/i);
  if (relative) {
    const [, direction = "", timeText = ""] = relative;
    const time = parseClockTime(timeText);
    if (time) {
      return direction.toLowerCase() === "after" ? { from: time } : { to: time };
    }
  }

  const between = trimmed.match(/^between\s+(.+?)\s+and\s+(.+)$/i);
  if (between) {
    const from = parseClockTime(between[1] ?? "");
    const to = parseClockTime(between[2] ?? "");
    if (from && to) return { from, to };
  }

  const exact = parseClockTime(trimmed);
  if (exact) return { from: exact, to: addMinute(exact) };

  throw new ValidationError(`Unrecognized time window: "${text}"`);
}

export function inDateRange(date: string, range?: DateRange): boolean {
  return !range || (date >= range.start && date <= range.end);
}

export function inTimeWindow(time: string, window?: TimeWindow): boolean {
  if (!window) return true;
  if (window.from !== undefined && time < window.from) return false;
  if (window.to !== undefined && time >= window.to) return false;
  return true;
}
