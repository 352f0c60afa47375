import type { NightWindowConfig } from "../config/types.js";
import { DayKey } from "../utils/types.js";

const DAY_MS = 86_400_000;

export type NightWindow = (timestamp: number) => boolean;

function pad(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

function formatDay(year: number, month: number, day: number): DayKey {
  return DayKey.make(`${year}-${pad(month)}-${pad(day)}`);
}

/** Local calendar day of a timestamp. */
export function dayKeyOf(timestamp: number): DayKey {
  const d = new Date(timestamp);
  return formatDay(d.getFullYear(), d.getMonth() + 1, d.getDate());
}

function dayNumber(day: string): number {
  const [y, m, d] = day.split("-").map(Number);
  return Date.UTC(y, m - 1, d) / DAY_MS;
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
  return dayNumber(to) - dayNumber(from);
}

export function addDays(day: string, days: number): DayKey {
  const shifted = new Date((dayNumber(day) + days) * DAY_MS);
  return formatDay(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}

export function parseClockTime(time: string): number {
  const [h, m] = time.split(":").map(Number);
  return h * 60 + m;
}

/**
 * Build a predicate for the configured night window. `end` is exclusive;
 * a start later than the end wraps past midnight (23:00 - 04:00).
 */
export function createNightWindow(config: NightWindowConfig): NightWindow {
  const start = parseClockTime(config.start);
  const end = parseClockTime(config.end);

  return (timestamp: number) => {
    const d = new Date(timestamp);
    const minute = d.getHours() * 60 + d.getMinutes();
    if (start <= end) {
      return minute >= start && minute < end;
    }
    return minute >= start || minute < end;
  };
}
