import type { HappyHourWindow } from "../config.js";

export const defaultTimeZone = "Europe/Moscow";

const dateKeyPattern = /^\d{4}-\d{2}-\d{2}$/;

export function getDateKey(ts: number, timeZone = defaultTimeZone): string {
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).format(new Date(ts));
}

export function isDateKey(value: string): boolean {
  if (!dateKeyPattern.test(value)) return false;
  return dateKeyToUtcDate(value).toISOString().slice(0, 10) === value;
}

export function addDaysToDateKey(dateKey: string, days: number): string {
  const date = dateKeyToUtcDate(dateKey);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

/** Instant of local midnight that opens `dateKey` in the given zone. */
export function zonedDayStart(dateKey: string, timeZone = defaultTimeZone): number {
  const wallClock = dateKeyToUtcDate(dateKey).getTime();
  const firstGuess = wallClock - zoneOffsetMs(wallClock, timeZone);
  // второй проход поправляет смещение на стыке перехода на летнее время
  return wallClock - zoneOffsetMs(firstGuess, timeZone);
}

/**
 * Last instant a photo submitted on `submitDay` stays active: one unit before
 * local midnight of `submitDay + 2`, so the window covers the submission day
 * and the whole next day.
 */
export function photoExpiresAt(submitDay: string, timeZone = defaultTimeZone): number {
  return zonedDayStart(addDaysToDateKey(submitDay, 2), timeZone) - 1;
}

export function getLocalMinutes(ts: number, timeZone = defaultTimeZone): number {
  const parts = localParts(ts, timeZone);
  return parts.hour * 60 + parts.minute;
}

export function isHappyHour(ts: number, window: HappyHourWindow, timeZone = defaultTimeZone): boolean {
  const local = getLocalMinutes(ts, timeZone);
  const start = clockTimeToMinutes(window.start);
  const end = clockTimeToMinutes(window.end);
  if (start <= end) return local >= start && local < end;
  // окно через полночь
  return local >= start || local < end;
}

function clockTimeToMinutes(value: string): number {
  const [h, m] = value.split(":").map((n) => Number(n));
  return (h ?? 0) * 60 + (m ?? 0);
}

function zoneOffsetMs(ts: number, timeZone: string): number {
  const p = localParts(ts, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(ts / 1000) * 1000;
}

function localParts(ts: number, timeZone: string) {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit"
  }).formatToParts(new Date(ts));
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((part) => part.type === type)?.value ?? 0);
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour"),
    minute: get("minute"),
    second: get("second")
  };
}

function dateKeyToUtcDate(dateKey: string): Date {
  const [y, m, d] = dateKey.split("-").map((n) => Number(n));
  return new Date(Date.UTC(y ?? 1970, (m ?? 1) - 1, d ?? 1));
}
