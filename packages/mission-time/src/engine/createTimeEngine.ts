import type { TimeSystemConverter } from "@mission-time/converter-contract";
import { createJsConverter } from "@mission-time/converter-js";
import { formatFloat, invariant } from "@mission-time/core";

import { isBatch, mapBatch } from "../datetime/broadcast.js";
import { MissionTimeError } from "../errors.js";
import type { FormatDescriptor, FormatRegistry, FormatSpec } from "../formats/registry.js";
import { SYSTEM_CODES, createFormatRegistry } from "../formats/registry.js";
import type { TransformContext } from "../formats/transforms.js";
import type { Batch, ConvertOptions, DayStart, TimeResult, TimeValue } from "../types.js";
import type { ConversionContext } from "./convert.js";
import { convertScalar } from "./convert.js";
import type { Clock, Environment, NowValue } from "./now.js";
import { resolveNow, systemClock } from "./now.js";

export type TimeEngineOptions = {
  /** Defaults to the leap-second aware JS converter with the bundled table. */
  converter?: TimeSystemConverter;
  /** Time of day appended to `year_mon_day` and `year_doy` inputs. Default `"midnight"`. */
  dayStart?: DayStart;
  /** Replaces the built-in format table. */
  formatTable?: readonly FormatSpec[];
  /** Unix seconds; defaults to the system clock. */
  clock?: Clock;
  /** Source of the now override; defaults to `process.env`. */
  env?: Environment;
};

/**
 * Bundles a converter, a format registry and a clock.
 *
 * Engines are cheap; tests create one per case instead of touching the
 * process-wide default.
 */
export class TimeEngine {
  readonly registry: FormatRegistry;
  readonly converter: TimeSystemConverter;

  private readonly clock: Clock;
  private readonly env: Environment;
  private readonly yearSecs = new Map<number, readonly [number, number]>();
  private readonly context: ConversionContext;

  constructor(options: TimeEngineOptions = {}) {
    this.registry = createFormatRegistry({
      dayStart: options.dayStart ?? "midnight",
      ...(options.formatTable !== undefined ? { table: options.formatTable } : {}),
    });
    this.converter = options.converter ?? createJsConverter();
    this.clock = options.clock ?? systemClock;
    this.env = options.env ?? process.env;

    const transforms: TransformContext = {
      dayStartTime: this.registry.dayStartTime,
      nowUnixSeconds: () => this.clock(),
      yearBounds: (year) => this.yearBounds(year),
      yearOfSecs: (secs) => this.yearOfSecs(secs),
    };
    this.context = { registry: this.registry, converter: this.converter, transforms };
  }

  get dayStart(): DayStart {
    return this.registry.dayStart;
  }

  /** Current time, from the environment override or the clock. Read on every call. */
  now(): NowValue {
    return resolveNow(this.env, this.clock);
  }

  nowUnixSeconds(): number {
    return this.clock();
  }

  /**
   * Convert one value.
   *
   * `null`/`undefined` means now; `fmtIn` and `sysIn` are then ignored in
   * favour of the resolved now's own format.
   */
  convert(value?: TimeValue | null, options: ConvertOptions = {}): TimeResult {
    if (value === undefined || value === null) {
      const now = this.now();
      return convertScalar(this.context, now.value, {
        fmtIn: now.format,
        sysOut: options.sysOut,
        fmtOut: options.fmtOut,
      });
    }
    return convertScalar(this.context, value, options);
  }

  /**
   * Convert every element.
   *
   * Arrays keep their nesting; any other iterable yields a flat array.
   * Strings are scalars and are rejected here.
   */
  convertMany(values: Batch<TimeValue>, options?: ConvertOptions): Batch<TimeResult>;
  convertMany(values: Iterable<TimeValue>, options?: ConvertOptions): TimeResult[];
  convertMany(
    values: Batch<TimeValue> | Iterable<TimeValue>,
    options: ConvertOptions = {},
  ): Batch<TimeResult> | TimeResult[] {
    if (typeof values === "string") {
      throw new MissionTimeError(
        "UnrecognizedInputValue",
        `convertMany expects an array or iterable, got the string ${JSON.stringify(values)}`,
      );
    }
    if (isBatch(values)) {
      return mapBatch(values, (value) => convertScalar(this.context, value, options));
    }
    return Array.from(values, (value) => convertScalar(this.context, value, options));
  }

  private fastDescriptor(name: string): FormatDescriptor {
    const descriptor = this.registry.get(name);
    if (descriptor === undefined || descriptor.element === undefined) {
      const allowed = this.registry.descriptors.filter((d) => d.element !== undefined).map((d) => d.name);
      throw new MissionTimeError(
        "UnsupportedFastFormat",
        `Format '${name}' is not supported by convertVals; use one of: ${allowed.join(", ")}`,
      );
    }
    return descriptor;
  }

  /**
   * Convert values between two formats that declare an element type,
   * straight through the converter.
   *
   * No detection, no transforms and no checking of the converter's output:
   * a malformed element yields a garbage element (`NaN` for numbers).
   */
  convertVals(vals: TimeValue, fmtIn: string, fmtOut: string): TimeResult;
  convertVals(vals: readonly TimeValue[] | Float64Array, fmtIn: string, fmtOut: string): Float64Array | string[];
  convertVals(
    vals: TimeValue | readonly TimeValue[] | Float64Array,
    fmtIn: string,
    fmtOut: string,
  ): TimeResult | Float64Array | string[] {
    const input = this.fastDescriptor(fmtIn);
    const output = this.fastDescriptor(fmtOut);

    const convertOne = (value: TimeValue): string =>
      this.converter.convertTime(
        typeof value === "number" ? formatFloat(value) : value,
        SYSTEM_CODES[input.system],
        input.converterFormat,
        SYSTEM_CODES[output.system],
        output.converterFormat,
      );
    const numeric = output.element === "float64";

    if (typeof vals === "string" || typeof vals === "number") {
      const raw = convertOne(vals);
      return numeric ? Number(raw) : raw;
    }

    const items: TimeValue[] = vals instanceof Float64Array ? Array.from(vals) : [...vals];
    if (numeric) {
      return Float64Array.from(items, (value) => Number(convertOne(value)));
    }
    return items.map(convertOne);
  }

  /** `date` strings to MET seconds via {@link convertVals}. */
  dateToSecs(dates: string): number;
  dateToSecs(dates: readonly string[]): Float64Array;
  dateToSecs(dates: string | readonly string[]): number | Float64Array {
    if (typeof dates === "string") {
      const secs = this.convertVals(dates, "date", "secs");
      invariant(typeof secs === "number", "secs output must be numeric");
      return secs;
    }
    const secs = this.convertVals(dates, "date", "secs");
    invariant(secs instanceof Float64Array, "secs output must be a Float64Array");
    return secs;
  }

  /** MET seconds to `date` strings via {@link convertVals}. */
  secsToDate(secs: number): string;
  secsToDate(secs: readonly number[] | Float64Array): string[];
  secsToDate(secs: number | readonly number[] | Float64Array): string | string[] {
    if (typeof secs === "number") {
      const date = this.convertVals(secs, "secs", "date");
      invariant(typeof date === "string", "date output must be a string");
      return date;
    }
    const dates = this.convertVals(secs, "secs", "date");
    invariant(Array.isArray(dates), "date output must be an array");
    return dates;
  }

  /** MET seconds at the start of `year` and of the following year. Cached per engine. */
  yearBounds(year: number): readonly [number, number] {
    let bounds = this.yearSecs.get(year);
    if (bounds === undefined) {
      bounds = [this.yearStartSecs(year), this.yearStartSecs(year + 1)];
      this.yearSecs.set(year, bounds);
    }
    return bounds;
  }

  /** Year of the UTC `date` for MET seconds `secs`. */
  yearOfSecs(secs: string): number {
    const date = convertScalar(this.context, secs, { fmtIn: "secs", fmtOut: "date" });
    return Number(String(date).slice(0, 4));
  }

  private yearStartSecs(year: number): number {
    const start = `${String(year).padStart(4, "0")}:001:00:00:00`;
    const secs = convertScalar(this.context, start, { fmtIn: "date", fmtOut: "secs" });
    invariant(typeof secs === "number", "secs output must be numeric");
    return secs;
  }
}

/** Build a {@link TimeEngine}; every option has a default. */
export function createTimeEngine(options: TimeEngineOptions = {}): TimeEngine {
  return new TimeEngine(options);
}
