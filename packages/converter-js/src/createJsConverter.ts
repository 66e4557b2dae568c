import type {
  FormatCode,
  ParsedFormatCode,
  TimeSystemCode,
  TimeSystemConverter,
} from "@mission-time/converter-contract";
import { ConverterInputError, parseFormatCode, parseSystemCode } from "@mission-time/converter-contract";
import { FLOAT_SOURCE, assertNever, parseFloatText } from "@mission-time/core";

import { formatDate, parseDate } from "./calendar.js";
import type { Instant } from "./instant.js";
import {
  MJD0,
  instantFromDay,
  instantFromSeconds,
  instantToDay,
  instantToSeconds,
  instantToSystemDay,
} from "./instant.js";
import type { LeapSecondTable } from "./leapSeconds.js";
import { loadDefaultLeapSecondTable, readLeapSecondTable } from "./leapSeconds.js";

export const JS_CONVERTER_VERSION = "mission-time-js-converter@0.1.0";

export type JsConverterOptions = {
  /**
   * Leap-second table to use.
   *
   * - omitted: the bundled `data/leap-seconds.yml`
   * - `{ path }`: a YAML file with the same layout
   * - a {@link LeapSecondTable} value
   */
  leapSeconds?: LeapSecondTable | { path: string };

  /**
   * Called once per converter the first time a UTC conversion falls after
   * the table's `validUntilMjd`. Defaults to `console.warn`.
   */
  onWarning?: (message: string) => void;
};

export type JsConverter = TimeSystemConverter & {
  kind: "js";
  readonly leapSeconds: LeapSecondTable;
};

const NUMDAY_RE = new RegExp(String.raw`^\s*([+-]?\d+):(\d+):(\d+):(${FLOAT_SOURCE})\s*$`);

function resolveTable(option: JsConverterOptions["leapSeconds"]): LeapSecondTable {
  if (option === undefined) {
    return loadDefaultLeapSecondTable();
  }
  if ("path" in option) {
    return readLeapSecondTable(option.path);
  }
  return option;
}

function readNumber(value: string): number {
  const parsed = parseFloatText(value);
  if (parsed === undefined) {
    throw new ConverterInputError(value, `Cannot read ${JSON.stringify(value)} as a number`);
  }
  return parsed;
}

/** `D:h:m:s.s` elapsed days to seconds. */
function readElapsedDays(value: string): number {
  const m = NUMDAY_RE.exec(value);
  if (!m) {
    throw new ConverterInputError(value, `Cannot read ${JSON.stringify(value)} as D:h:m:s elapsed time`);
  }
  const days = Number(m[1]);
  const sign = days < 0 || (m[1] ?? "").startsWith("-") ? -1 : 1;
  const rest = Number(m[2]) * 3600 + Number(m[3]) * 60 + Number(m[4]);
  return days * 86_400 + sign * rest;
}

/** Seconds as `D:h:m:s.s`; a negative value carries one sign, on the day field. */
function formatElapsedDays(seconds: number): string {
  const sign = seconds < 0 ? "-" : "";
  let t = Math.abs(seconds);
  const day = Math.trunc(Math.trunc(t) / 86_400);
  t -= day * 86_400;
  const hour = Math.trunc(Math.trunc(t) / 3600);
  t -= hour * 3600;
  const minute = Math.trunc(Math.trunc(t) / 60);
  t -= minute * 60;
  return `${sign}${day}:${hour}:${minute}:${t.toFixed(10)}`;
}

function readInstant(
  table: LeapSecondTable,
  value: string,
  system: TimeSystemCode,
  format: ParsedFormatCode,
): Instant {
  switch (format.kind) {
    case "s":
      return instantFromSeconds(table, readNumber(value), system);
    case "n":
      return instantFromSeconds(table, readElapsedDays(value), system);
    case "m":
    case "j": {
      const t = readNumber(value);
      let day = Math.trunc(t);
      let fraction = t - day;
      if (format.kind === "j") {
        // Rebase on the integer part of MJD0 first to keep the fraction exact.
        day -= Math.trunc(MJD0);
        fraction -= MJD0 - Math.trunc(MJD0);
      }
      return instantFromDay(table, day, fraction, system);
    }
    case "d":
    case "c":
    case "f": {
      const { day, fraction } = parseDate(value, format.kind);
      return instantFromDay(table, day, fraction, system);
    }
    default:
      return assertNever(format.kind, "Unknown format kind");
  }
}

function writeInstant(
  table: LeapSecondTable,
  instant: Instant,
  system: TimeSystemCode,
  format: ParsedFormatCode,
): string {
  switch (format.kind) {
    case "s":
      return instantToSeconds(table, instant, system).toFixed(9);
    case "n":
      return formatElapsedDays(instantToSeconds(table, instant, system));
    case "m":
      return instantToDay(table, instant, system, false).toFixed(9);
    case "j":
      return instantToDay(table, instant, system, true).toFixed(9);
    case "d":
    case "c":
    case "f": {
      const { day, fraction, inLeapSecond } = instantToSystemDay(table, instant, system);
      return formatDate(day, fraction, format.kind, format.decimals, inLeapSecond);
    }
    default:
      return assertNever(format.kind, "Unknown format kind");
  }
}

/**
 * Pure-TS, leap-second-aware implementation of {@link TimeSystemConverter}.
 *
 * Instants are held as TT Modified Julian Days. MET seconds count from
 * MJD 50814.0 TT.
 */
export function createJsConverter(options: JsConverterOptions = {}): JsConverter {
  const table = resolveTable(options.leapSeconds);
  const onWarning = options.onWarning ?? ((message: string) => console.warn(message));
  let warnedExpiry = false;

  const last = table.entries[table.entries.length - 1];
  const version = `${JS_CONVERTER_VERSION} (TAI-UTC ${last?.taiMinusUtc ?? "?"}s, valid until MJD ${table.validUntilMjd})`;

  const checkExpiry = (instant: Instant): void => {
    if (warnedExpiry) return;
    const utcDay = Math.floor(instantToDay(table, instant, "u", false));
    if (utcDay > table.validUntilMjd) {
      warnedExpiry = true;
      onWarning(
        `UTC conversion at MJD ${utcDay} is past the leap-second table (valid until MJD ${table.validUntilMjd}); results may be off by any leap seconds announced since.`,
      );
    }
  };

  return {
    kind: "js",
    leapSeconds: table,

    version: () => version,

    convertTime: (
      value: string,
      sysIn: TimeSystemCode,
      fmtIn: FormatCode,
      sysOut: TimeSystemCode,
      fmtOut: FormatCode,
    ): string => {
      const systemIn = parseSystemCode(sysIn);
      const systemOut = parseSystemCode(sysOut);
      const formatIn = parseFormatCode(fmtIn);
      const formatOut = parseFormatCode(fmtOut);

      const instant = readInstant(table, value, systemIn, formatIn);
      if (systemIn === "u" || systemOut === "u") {
        checkExpiry(instant);
      }
      return writeInstant(table, instant, systemOut, formatOut);
    },
  };
}
