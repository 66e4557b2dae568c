import { ConverterInputError } from "@mission-time/converter-contract";
import { FLOAT_SOURCE } from "@mission-time/core";

import { DAY2SEC, SEC2DAY } from "./instant.js";

/** MJD of 1972-01-01, the calendar origin used by the date arithmetic below. */
export const MJD1972 = 41_317;

export const MONTH_NAMES = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
] as const;

export type DateKind = "d" | "c" | "f";

// The calendar uses the plain divisible-by-4 leap rule (valid 1901..2099).
function isLeapYear(year: number): boolean {
  return year % 4 === 0;
}

function daysInMonth(year: number, monthIndex: number): number {
  if (monthIndex === 1) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][monthIndex] ?? 0;
}

const DATE_RE = new RegExp(String.raw`^\s*(\d+):(\d+):(\d+):(\d+):(${FLOAT_SOURCE})\s*$`);
const CALDATE_RE = new RegExp(
  String.raw`^\s*(\d+)([A-Za-z]{3})(\d+)\s+at\s+(\d+):(\d+):(${FLOAT_SOURCE})\s*$`,
);
const FITS_RE = new RegExp(String.raw`^\s*(\d+)-(\d+)-(\d+)(?:T(\d+):(\d+):(${FLOAT_SOURCE}))?\s*$`);

type DateFields = {
  year: number;
  /** Day of year; may overflow past the end of the year. */
  yday: number;
  hour: number;
  minute: number;
  second: number;
};

function monthIndexOf(name: string): number {
  const normalized = name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
  return MONTH_NAMES.findIndex((m) => m === normalized);
}

function dayOfYear(year: number, monthIndex: number, day: number): number {
  let yday = day;
  for (let m = 0; m < monthIndex; m++) {
    yday += daysInMonth(year, m);
  }
  return yday;
}

function readDateFields(text: string, kind: DateKind): DateFields | undefined {
  switch (kind) {
    case "d": {
      const m = DATE_RE.exec(text);
      if (!m) return undefined;
      return {
        year: Number(m[1]),
        yday: Number(m[2]),
        hour: Number(m[3]),
        minute: Number(m[4]),
        second: Number(m[5]),
      };
    }
    case "c": {
      const m = CALDATE_RE.exec(text);
      if (!m) return undefined;
      const year = Number(m[1]);
      const monthIndex = monthIndexOf(m[2] ?? "");
      if (monthIndex < 0) return undefined;
      return {
        year,
        yday: dayOfYear(year, monthIndex, Number(m[3])),
        hour: Number(m[4]),
        minute: Number(m[5]),
        second: Number(m[6]),
      };
    }
    case "f": {
      const m = FITS_RE.exec(text);
      if (!m) return undefined;
      const year = Number(m[1]);
      const month = Number(m[2]);
      if (month < 1 || month > 12) return undefined;
      return {
        year,
        yday: dayOfYear(year, month - 1, Number(m[3])),
        hour: Number(m[4] ?? 0),
        minute: Number(m[5] ?? 0),
        second: Number(m[6] ?? 0),
      };
    }
  }
}

/**
 * Parse a date string into an MJD day number and day fraction, both in the
 * date's own time system.
 *
 * Fields may overflow (`1996:367` is 1997-01-01, `23:59:60.5` gives a
 * fraction above 1).
 */
export function parseDate(text: string, kind: DateKind): { day: number; fraction: number } {
  const fields = readDateFields(text, kind);
  if (fields === undefined) {
    throw new ConverterInputError(text, `Cannot read ${JSON.stringify(text)} as a ${describeKind(kind)}`);
  }

  const { year, yday, hour, minute, second } = fields;
  const day = yday + (year - 1972) * 365 - 1 + Math.floor((year - 1969) / 4) + MJD1972;
  const fraction = (hour * 3600 + minute * 60 + second) * SEC2DAY;
  return { day, fraction };
}

function describeKind(kind: DateKind): string {
  switch (kind) {
    case "d":
      return "YYYY:DDD:hh:mm:ss date";
    case "c":
      return "YYYYMonDD at hh:mm:ss date";
    case "f":
      return "YYYY-MM-DDThh:mm:ss date";
  }
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Format a day number and fraction as `YYYY:DDD:hh:mm:ss[.s...]`.
 *
 * With `inLeapSecond`, the fraction is one second short of the leap second
 * and the seconds field reads 60.
 */
export function formatDayOfYear(
  day: number,
  fraction: number,
  decimals: number,
  inLeapSecond: boolean,
): string {
  // Round up front so 59.9999 carries into the minute instead of printing 60.
  const half = 0.5 * 10 ** -decimals;
  let second = fraction * DAY2SEC + half;
  let dayCount = day - MJD1972;

  let leap = inLeapSecond;
  if (leap) {
    second += 1;
    // 23:59:60.9996 rounds to 61: carry into 00:00:00 of the next day.
    if (second >= DAY2SEC + 1) {
      second -= DAY2SEC + 1;
      dayCount++;
      leap = false;
    }
  }

  let hour: number;
  let minute: number;
  if (leap) {
    hour = Math.min(Math.trunc(second / 3600), 23);
    second -= hour * 3600;
    minute = Math.min(Math.trunc(second / 60), 59);
    second -= minute * 60;
  } else {
    hour = Math.trunc(second / 3600);
    second -= hour * 3600;
    minute = Math.trunc(second / 60);
    second -= minute * 60;
  }
  if (hour > 23) {
    hour -= 24;
    dayCount++;
  }
  second = Math.max(second - half, 0);

  // dayCount is now the 1-based day counted from 1972-01-01.
  dayCount++;
  let year = 1972;
  while (dayCount < 1) {
    year--;
    dayCount += isLeapYear(year) ? 366 : 365;
  }
  while (dayCount > (isLeapYear(year) ? 366 : 365)) {
    dayCount -= isLeapYear(year) ? 366 : 365;
    year++;
  }

  const secondsText = second.toFixed(decimals).padStart(decimals > 0 ? decimals + 3 : 2, "0");
  return `${pad(year, 4)}:${pad(dayCount, 3)}:${pad(hour, 2)}:${pad(minute, 2)}:${secondsText}`;
}

/** Re-express a `YYYY:DDD:...` string as a calendar (`c`) or FITS (`f`) date. */
export function toMonthDay(dayOfYearText: string, kind: "c" | "f"): string {
  const year = Number(dayOfYearText.slice(0, 4));
  let day = Number(dayOfYearText.slice(5, 8));
  const time = dayOfYearText.slice(9);

  let monthIndex = 0;
  while (monthIndex < 11 && day > daysInMonth(year, monthIndex)) {
    day -= daysInMonth(year, monthIndex);
    monthIndex++;
  }

  if (kind === "c") {
    const name = MONTH_NAMES[monthIndex] ?? "Dec";
    return `${pad(year, 4)}${name}${pad(day, 2)} at ${time}`;
  }
  return `${pad(year, 4)}-${pad(monthIndex + 1, 2)}-${pad(day, 2)}T${time}`;
}

/** Format a day number and fraction as a `d`, `c` or `f` date with `decimals` digits. */
export function formatDate(
  day: number,
  fraction: number,
  kind: DateKind,
  decimals: number,
  inLeapSecond: boolean,
): string {
  const text = formatDayOfYear(day, fraction, decimals, inLeapSecond);
  return kind === "d" ? text : toMonthDay(text, kind);
}
