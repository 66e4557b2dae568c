/** A single raw time value: text in any registered format, or a number. */
export type TimeValue = string | number;

/** Arbitrarily nested arrays of `T`. `T` itself must never be an array. */
export type Batch<T> = readonly (T | Batch<T>)[];

/** Output of one conversion: numbers for numeric formats, text otherwise. */
export type TimeResult = string | number;

export const TIME_SYSTEM_NAMES = ["met", "tt", "tai", "utc"] as const;
export type TimeSystemName = (typeof TIME_SYSTEM_NAMES)[number];

export type DayStart = "midnight" | "noon";

/**
 * Options for a scalar or batch conversion.
 *
 * Names are validated when the conversion runs.
 */
export type ConvertOptions = {
  /** Overrides the input format's own time system. */
  sysIn?: string;
  /** Forces the input format instead of auto-detecting it. */
  fmtIn?: string;
  /** Overrides the output format's own time system. */
  sysOut?: string;
  /** Defaults to `"secs"`. */
  fmtOut?: string;
};
