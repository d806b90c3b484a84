import { InvalidRangeError } from "./errors.js";
import type { SampleInstant } from "./types.js";

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;
const MINUTE_MS = 60 * 1000;

type ZonedParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = formatterCache.get(timeZone);
  if (cached) return cached;

  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit"
    });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new InvalidRangeError(`unknown time zone: ${timeZone}`);
    }
    throw error;
  }

  formatterCache.set(timeZone, formatter);
  return formatter;
}

function zonedParts(epochMs: number, timeZone: string): ZonedParts {
  const parts = getFormatter(timeZone).formatToParts(new Date(epochMs));
  const read = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((part) => part.type === type)?.value ?? 0);

  return {
    year: read("year"),
    month: read("month"),
    day: read("day"),
    hour: read("hour"),
    minute: read("minute"),
    second: read("second")
  };
}

/** Offset of the zone from UTC at the given instant, in ms (negative west of Greenwich). */
function zoneOffsetMs(epochMs: number, timeZone: string): number {
  const wholeSecondMs = Math.floor(epochMs / 1000) * 1000;
  const p = zonedParts(wholeSecondMs, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - wholeSecondMs;
}

/**
 * Resolve a wall-clock time in a zone to an absolute instant.
 * Two passes so the offset used is the one in force at the result. A wall time
 * inside a spring-forward gap does not exist; it is read with the offset from
 * before the change, which lands the same distance past the gap (02:30 → 03:30).
 */
function zonedWallTimeToEpochMs(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  timeZone: string
): number {
  const wallAsUtc = Date.UTC(year, month - 1, day, hour, minute);
  const guess = wallAsUtc - zoneOffsetMs(wallAsUtc, timeZone);
  const offset = zoneOffsetMs(guess, timeZone);
  const resolved = wallAsUtc - offset;
  const offsetAtResolved = zoneOffsetMs(resolved, timeZone);
  if (offsetAtResolved === offset) {
    return resolved;
  }

  // In a gap the clock jumped forward, so the earlier offset is the smaller one
  return wallAsUtc - Math.min(offset, offsetAtResolved);
}

const pad2 = (value: number) => String(value).padStart(2, "0");

function formatOffset(offsetMs: number): string {
  const totalMinutes = Math.round(offsetMs / MINUTE_MS);
  const sign = totalMinutes < 0 ? "-" : "+";
  const abs = Math.abs(totalMinutes);
  return `${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`;
}

export function toSampleInstant(epochMs: number, timeZone: string): SampleInstant {
  const p = zonedParts(epochMs, timeZone);
  const localDate = `${p.year}-${pad2(p.month)}-${pad2(p.day)}`;
  const localTime = `${pad2(p.hour)}:${pad2(p.minute)}`;
  const offset = formatOffset(zoneOffsetMs(epochMs, timeZone));

  return {
    epochMs,
    timeZone,
    localDate,
    localTime,
    iso: `${localDate}T${localTime}:${pad2(p.second)}${offset}`
  };
}

export function epochSeconds(instant: SampleInstant): number {
  return Math.floor(instant.epochMs / 1000);
}

export function localHour(instant: SampleInstant): number {
  return Number(instant.localTime.slice(0, 2));
}

export function localMinute(instant: SampleInstant): number {
  return Number(instant.localTime.slice(3, 5));
}

function parseDate(date: string) {
  const match = date.match(DATE_PATTERN);
  if (!match) {
    throw new InvalidRangeError(`date must be YYYY-MM-DD, got "${date}"`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const check = new Date(Date.UTC(year, month - 1, day));
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    throw new InvalidRangeError(`not a calendar date: ${date}`);
  }
  return { year, month, day };
}

function parseTime(label: string, time: string) {
  const match = time.match(TIME_PATTERN);
  const hour = Number(match?.[1]);
  const minute = Number(match?.[2]);
  if (!match || hour > 23 || minute > 59) {
    throw new InvalidRangeError(`${label} must be HH:MM (24h), got "${time}"`);
  }
  return { hour, minute };
}

/**
 * Departure instants from start to end (inclusive) every intervalMinutes,
 * on the given date in the given zone. Steps are in absolute time, so a DST
 * change inside the window shows up as a jump in the local labels.
 */
export function buildTimeGrid(
  date: string,
  start: string,
  end: string,
  intervalMinutes: number,
  timeZone: string
): SampleInstant[] {
  if (!Number.isInteger(intervalMinutes) || intervalMinutes <= 0) {
    throw new InvalidRangeError(`interval must be a positive whole number of minutes, got ${intervalMinutes}`);
  }

  const { year, month, day } = parseDate(date);
  const startTime = parseTime("start", start);
  const endTime = parseTime("end", end);

  const startMs = zonedWallTimeToEpochMs(year, month, day, startTime.hour, startTime.minute, timeZone);
  const endMs = zonedWallTimeToEpochMs(year, month, day, endTime.hour, endTime.minute, timeZone);

  if (endMs <= startMs) {
    throw new InvalidRangeError(`end (${end}) must be after start (${start})`);
  }

  const stepMs = intervalMinutes * MINUTE_MS;
  const count = Math.floor((endMs - startMs) / stepMs) + 1;

  return Array.from({ length: count }, (_, i) => toSampleInstant(startMs + i * stepMs, timeZone));
}
