import { invariant } from "@mission-time/core";

import { getDefaultEngine } from "../defaults.js";
import type { TimeEngine } from "../engine/createTimeEngine.js";
import { MissionTimeError } from "../errors.js";
import type { Batch, TimeResult, TimeValue } from "../types.js";
import { isNested, mapBatch, zipBatch } from "./broadcast.js";
import type { CalendarAttributes } from "./calendarAttributes.js";
import { REFERENCE_MONDAY, decomposeCalendar } from "./calendarAttributes.js";

/** Marker for "the current time"; honours the engine's now override. */
export const NOW: unique symbol = Symbol("mission-time.now");
export type NowMarker = typeof NOW;

/** A time object from another library that exposes a date string and MET seconds. */
export type ExternalTime = {
  readonly date: string;
  readonly secs: number;
};

export type DateTimeOptions = {
  /** Forces the input format instead of auto-detecting it. */
  format?: string;
  /** Defaults to the process-wide default engine. */
  engine?: TimeEngine;
};

export type DateTimeInput = TimeValue | DateTime | NowMarker;

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  if (typeof value === "object") return "an object";
  return `${typeof value} ${String(value)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTimeBatch(value: unknown): value is Batch<TimeValue> {
  return Array.isArray(value);
}

function isTimeValue(value: unknown): value is TimeValue {
  return typeof value === "string" || typeof value === "number";
}

function requireString(result: TimeResult, format: string): string {
  invariant(typeof result === "string", `format ${format} must produce a string`);
  return result;
}

function requireNumber(result: TimeResult, format: string): number {
  invariant(typeof result === "number", `format ${format} must produce a number`);
  return result;
}

function mondayMjd(engine: TimeEngine): number {
  return requireNumber(engine.convert(REFERENCE_MONDAY, { fmtIn: "date", fmtOut: "mjd" }), "mjd");
}

/** `YYYY:DDD` of a `date` string plus `days`, with the time of day reset. */
function shiftedDayStart(date: string, days: number): string {
  const [year = "", yday = ""] = date.split(":");
  return `${year}:${String(Number(yday) + days).padStart(3, "0")}:00:00:00`;
}

/**
 * One time value bound to an optional input format.
 *
 * Conversions run on request and are not cached; only the calendar
 * attributes are computed once per handle. A handle built without a value
 * resolves "now" immediately, so every later conversion agrees.
 */
export class DateTime {
  readonly value: TimeValue;
  readonly format: string | undefined;
  readonly engine: TimeEngine;

  private calendar: CalendarAttributes | undefined;

  constructor(input?: DateTimeInput, options: DateTimeOptions = {}) {
    if (input instanceof DateTime) {
      this.engine = options.engine ?? input.engine;
      this.value = input.value;
      this.format = options.format ?? input.format;
      return;
    }

    this.engine = options.engine ?? getDefaultEngine();

    if (input === undefined || input === NOW) {
      if (options.format !== undefined) {
        throw new MissionTimeError(
          "UnrecognizedInputValue",
          `Cannot supply format '${options.format}' without an input value`,
        );
      }
      const now = this.engine.now();
      this.value = now.value;
      this.format = now.format;
      return;
    }

    // Untyped callers can get here with anything.
    const raw: unknown = input;
    if (!isTimeValue(raw)) {
      throw new MissionTimeError("UnrecognizedInputValue", `Unrecognized input value: ${describeValue(raw)}`);
    }
    this.value = raw;
    this.format = options.format;
  }

  /** Build a handle from an {@link ExternalTime} (via its `secs`) or {@link NOW}. */
  static fromExternal(time: unknown, options: { engine?: TimeEngine } = {}): DateTime {
    if (time === NOW) {
      return new DateTime(NOW, options);
    }
    if (isRecord(time) && typeof time.date === "string" && typeof time.secs === "number") {
      return new DateTime(time.secs, { ...options, format: "secs" });
    }
    throw new MissionTimeError("UnrecognizedInputValue", `Unrecognized time object: ${describeValue(time)}`);
  }

  /** This time in `format` (any registry name). */
  get(format: string): TimeResult {
    return this.engine.convert(this.value, { fmtIn: this.format, fmtOut: format });
  }

  get secs(): number {
    return requireNumber(this.get("secs"), "secs");
  }
  get date(): string {
    return requireString(this.get("date"), "date");
  }
  get fits(): string {
    return requireString(this.get("fits"), "fits");
  }
  get iso(): string {
    return requireString(this.get("iso"), "iso");
  }
  get caldate(): string {
    return requireString(this.get("caldate"), "caldate");
  }
  get jd(): number {
    return requireNumber(this.get("jd"), "jd");
  }
  get mjd(): number {
    return requireNumber(this.get("mjd"), "mjd");
  }
  get greta(): string {
    return requireString(this.get("greta"), "greta");
  }
  get relday(): number {
    return requireNumber(this.get("relday"), "relday");
  }
  get fracYear(): number {
    return requireNumber(this.get("frac_year"), "frac_year");
  }
  get unix(): number {
    return requireNumber(this.get("unix"), "unix");
  }
  get yearMonDay(): string {
    return requireString(this.get("year_mon_day"), "year_mon_day");
  }
  get yearDoy(): string {
    return requireString(this.get("year_doy"), "year_doy");
  }
  get numday(): string {
    return requireString(this.get("numday"), "numday");
  }
  get plotdate(): number {
    return requireNumber(this.get("plotdate"), "plotdate");
  }

  /** `days` later, as a `jd` handle. */
  plus(days: number): DateTime;
  plus(days: Batch<number>): DateTimeBatch;
  plus(days: number | Batch<number>): DateTime | DateTimeBatch {
    const jd = this.jd;
    if (isNested(days)) {
      return new DateTimeBatch(
        mapBatch(days, (d) => jd + d),
        { format: "jd", engine: this.engine },
      );
    }
    return new DateTime(jd + days, { format: "jd", engine: this.engine });
  }

  /** Another handle: the Julian Day difference. Days: a handle that many days earlier. */
  minus(other: DateTime): number;
  minus(other: DateTimeBatch): Batch<number>;
  minus(days: number): DateTime;
  minus(days: Batch<number>): DateTimeBatch;
  minus(
    operand: DateTime | DateTimeBatch | number | Batch<number>,
  ): number | Batch<number> | DateTime | DateTimeBatch {
    if (operand instanceof DateTime) {
      return this.jd - operand.jd;
    }
    if (operand instanceof DateTimeBatch) {
      return zipBatch(this.jd, operand.jd, (a, b) => a - b);
    }
    if (isNested(operand)) {
      return this.plus(mapBatch(operand, (d) => -d));
    }
    return this.plus(-operand);
  }

  /** `YYYY:DDD:00:00:00` of this time's UTC day. */
  dayStart(): DateTime {
    return new DateTime(shiftedDayStart(this.date, 0), { engine: this.engine });
  }

  /** Start of the following day; the converter rolls `DDD + 1` into the next year. */
  dayEnd(): DateTime {
    return new DateTime(shiftedDayStart(this.date, 1), { engine: this.engine });
  }

  /** Calendar fields, computed together on first use. */
  get calendarAttributes(): CalendarAttributes {
    this.calendar ??= decomposeCalendar(this.date, this.iso, this.mjd, mondayMjd(this.engine));
    return this.calendar;
  }

  get year(): number {
    return this.calendarAttributes.year;
  }
  get yday(): number {
    return this.calendarAttributes.yday;
  }
  get hour(): number {
    return this.calendarAttributes.hour;
  }
  get min(): number {
    return this.calendarAttributes.min;
  }
  get sec(): number {
    return this.calendarAttributes.sec;
  }
  get mon(): number {
    return this.calendarAttributes.mon;
  }
  get day(): number {
    return this.calendarAttributes.day;
  }
  get wday(): number {
    return this.calendarAttributes.wday;
  }
}

/** {@link DateTime} over nested arrays; every result keeps the input's shape. */
export class DateTimeBatch {
  readonly value: Batch<TimeValue>;
  readonly format: string | undefined;
  readonly engine: TimeEngine;

  private calendar: Batch<CalendarAttributes> | undefined;

  constructor(input: Batch<TimeValue> | DateTimeBatch, options: DateTimeOptions = {}) {
    if (input instanceof DateTimeBatch) {
      this.engine = options.engine ?? input.engine;
      this.value = input.value;
      this.format = options.format ?? input.format;
      return;
    }
    const raw: unknown = input;
    if (!isTimeBatch(raw)) {
      throw new MissionTimeError("UnrecognizedInputValue", `Unrecognized input value: ${describeValue(raw)}`);
    }
    this.engine = options.engine ?? getDefaultEngine();
    this.value = input;
    this.format = options.format;
  }

  get(format: string): Batch<TimeResult> {
    return this.engine.convertMany(this.value, { fmtIn: this.format, fmtOut: format });
  }

  private strings(format: string): Batch<string> {
    return mapBatch(this.get(format), (r) => requireString(r, format));
  }

  private numbers(format: string): Batch<number> {
    return mapBatch(this.get(format), (r) => requireNumber(r, format));
  }

  get secs(): Batch<number> {
    return this.numbers("secs");
  }
  get date(): Batch<string> {
    return this.strings("date");
  }
  get fits(): Batch<string> {
    return this.strings("fits");
  }
  get iso(): Batch<string> {
    return this.strings("iso");
  }
  get caldate(): Batch<string> {
    return this.strings("caldate");
  }
  get jd(): Batch<number> {
    return this.numbers("jd");
  }
  get mjd(): Batch<number> {
    return this.numbers("mjd");
  }
  get greta(): Batch<string> {
    return this.strings("greta");
  }
  get relday(): Batch<number> {
    return this.numbers("relday");
  }
  get fracYear(): Batch<number> {
    return this.numbers("frac_year");
  }
  get unix(): Batch<number> {
    return this.numbers("unix");
  }
  get yearMonDay(): Batch<string> {
    return this.strings("year_mon_day");
  }
  get yearDoy(): Batch<string> {
    return this.strings("year_doy");
  }
  get numday(): Batch<string> {
    return this.strings("numday");
  }
  get plotdate(): Batch<number> {
    return this.numbers("plotdate");
  }

  plus(days: number | Batch<number>): DateTimeBatch {
    return new DateTimeBatch(
      zipBatch(this.jd, days, (jd, d) => jd + d),
      { format: "jd", engine: this.engine },
    );
  }

  minus(other: DateTime | DateTimeBatch): Batch<number>;
  minus(days: number | Batch<number>): DateTimeBatch;
  minus(operand: DateTime | DateTimeBatch | number | Batch<number>): Batch<number> | DateTimeBatch {
    if (operand instanceof DateTime || operand instanceof DateTimeBatch) {
      return zipBatch(this.jd, operand.jd, (a, b) => a - b);
    }
    if (isNested(operand)) {
      return this.plus(mapBatch(operand, (d) => -d));
    }
    return this.plus(-operand);
  }

  dayStart(): DateTimeBatch {
    return new DateTimeBatch(
      mapBatch(this.date, (date) => shiftedDayStart(date, 0)),
      { engine: this.engine },
    );
  }

  dayEnd(): DateTimeBatch {
    return new DateTimeBatch(
      mapBatch(this.date, (date) => shiftedDayStart(date, 1)),
      { engine: this.engine },
    );
  }

  get calendarAttributes(): Batch<CalendarAttributes> {
    if (this.calendar === undefined) {
      const monday = mondayMjd(this.engine);
      this.calendar = mapBatch(this.value, (value) => {
        const one = new DateTime(value, { format: this.format, engine: this.engine });
        return decomposeCalendar(one.date, one.iso, one.mjd, monday);
      });
    }
    return this.calendar;
  }

  get year(): Batch<number> {
    return mapBatch(this.calendarAttributes, (c) => c.year);
  }
  get yday(): Batch<number> {
    return mapBatch(this.calendarAttributes, (c) => c.yday);
  }
  get hour(): Batch<number> {
    return mapBatch(this.calendarAttributes, (c) => c.hour);
  }
  get min(): Batch<number> {
    return mapBatch(this.calendarAttributes, (c) => c.min);
  }
  get sec(): Batch<number> {
    return mapBatch(this.calendarAttributes, (c) => c.sec);
  }
  get mon(): Batch<number> {
    return mapBatch(this.calendarAttributes, (c) => c.mon);
  }
  get day(): Batch<number> {
    return mapBatch(this.calendarAttributes, (c) => c.day);
  }
  get wday(): Batch<number> {
    return mapBatch(this.calendarAttributes, (c) => c.wday);
  }
}

/** A {@link DateTimeBatch} for arrays, a {@link DateTime} for everything else. */
export function dateTime(input: Batch<TimeValue> | DateTimeBatch, options?: DateTimeOptions): DateTimeBatch;
export function dateTime(input?: DateTimeInput, options?: DateTimeOptions): DateTime;
export function dateTime(
  input?: DateTimeInput | Batch<TimeValue> | DateTimeBatch,
  options: DateTimeOptions = {},
): DateTime | DateTimeBatch {
  if (input instanceof DateTimeBatch || isTimeBatch(input)) {
    return new DateTimeBatch(input, options);
  }
  return new DateTime(input, options);
}
