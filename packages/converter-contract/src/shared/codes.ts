import { ConverterContractError } from "./errors.js";

/**
 * Time system codes understood by a converter.
 *
 * - `m`: Mission Elapsed Time
 * - `t`: Terrestrial Time
 * - `a`: International Atomic Time
 * - `u`: Coordinated Universal Time
 */
export const TIME_SYSTEM_CODES = ["m", "t", "a", "u"] as const;
export type TimeSystemCode = (typeof TIME_SYSTEM_CODES)[number];

/**
 * Base format kinds.
 *
 * - `s`: seconds since the mission reference epoch
 * - `j`: Julian Day
 * - `m`: Modified Julian Day
 * - `n`: elapsed days (`D:h:m:s.s`)
 * - `d`: `YYYY:DDD:hh:mm:ss.s`
 * - `c`: `YYYYMonDD at hh:mm:ss.s`
 * - `f`: `YYYY-MM-DDThh:mm:ss.s`
 */
export const FORMAT_KINDS = ["s", "j", "m", "n", "d", "c", "f"] as const;
export type FormatKind = (typeof FORMAT_KINDS)[number];

type Digit = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9";

/** Date-like kinds take an optional digit: the number of decimals in the seconds field. */
export type DateFormatCode = `${"d" | "c" | "f"}${"" | Digit}`;

export type FormatCode = "s" | "j" | "m" | "n" | "n3" | DateFormatCode;

export type ParsedFormatCode = {
  kind: FormatKind;
  /** Seconds-field decimals for `d`/`c`/`f`; `0` for every other kind. */
  decimals: number;
};

function isFormatKind(value: string): value is FormatKind {
  return FORMAT_KINDS.some((kind) => kind === value);
}

/** Exact one-letter codes only; see {@link parseSystemCode} for the lenient reading. */
export function isTimeSystemCode(value: string): value is TimeSystemCode {
  return TIME_SYSTEM_CODES.some((code) => code === value);
}

const FORMAT_CODE_RE = /^(?:[sjm]|n3?|[dcf][0-9]?)$/;

/** Canonical lowercase format codes, such as `"s"`, `"n3"` or `"d3"`. */
export function isFormatCode(value: string): value is FormatCode {
  return FORMAT_CODE_RE.test(value);
}

/**
 * Interpret a time system code.
 *
 * Only the leading character is significant (case-insensitive), except that
 * `ta...` selects TAI rather than TT. So `"utc"`, `"U"` and `"u"` are equivalent.
 */
export function parseSystemCode(code: string): TimeSystemCode {
  const lower = code.trim().toLowerCase();
  const head = lower.charAt(0);

  if (head === "t") {
    return lower.charAt(1) === "a" ? "a" : "t";
  }
  if (isTimeSystemCode(head)) {
    return head;
  }
  throw new ConverterContractError(`Unknown time system code: ${JSON.stringify(code)}`);
}

/** Interpret a format code such as `"s"`, `"d3"` or `"F2"`. */
export function parseFormatCode(code: string): ParsedFormatCode {
  const trimmed = code.trim();
  const kind = trimmed.charAt(0).toLowerCase();
  if (!isFormatKind(kind)) {
    throw new ConverterContractError(`Unknown time format code: ${JSON.stringify(code)}`);
  }

  if (kind !== "d" && kind !== "c" && kind !== "f") {
    return { kind, decimals: 0 };
  }

  const digit = trimmed.charAt(1);
  const decimals = /^[0-9]$/.test(digit) ? Number(digit) : 0;
  return { kind, decimals };
}
