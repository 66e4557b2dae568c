import { isBatch } from "./datetime/broadcast.js";
import type { TimeEngineOptions } from "./engine/createTimeEngine.js";
import { TimeEngine, createTimeEngine } from "./engine/createTimeEngine.js";
import type { Batch, ConvertOptions, TimeResult, TimeValue } from "./types.js";

let defaultOptions: TimeEngineOptions = {};
let defaultEngine: TimeEngine | undefined;

/** The engine behind the top-level functions and handles built without one. Created on first use. */
export function getDefaultEngine(): TimeEngine {
  defaultEngine ??= createTimeEngine(defaultOptions);
  return defaultEngine;
}

/** Replace the default engine, or build a new one from `options`. */
export function configureDefaultEngine(options: TimeEngineOptions | TimeEngine): TimeEngine {
  if (options instanceof TimeEngine) {
    defaultEngine = options;
    return options;
  }
  defaultOptions = { ...options };
  defaultEngine = createTimeEngine(defaultOptions);
  return defaultEngine;
}

/** Switch date-only inputs on the default engine to 12:00:00 for the rest of the process. */
export function useNoonDayStart(): void {
  configureDefaultEngine({ ...defaultOptions, dayStart: "noon" });
}

/** Forget any configuration; the next use builds a fresh midnight-based default engine. */
export function resetDefaultEngine(): void {
  defaultOptions = {};
  defaultEngine = undefined;
}

/** {@link TimeEngine.convert} on the default engine. */
export function convert(value?: TimeValue | null, options?: ConvertOptions): TimeResult {
  return getDefaultEngine().convert(value, options);
}

/** {@link TimeEngine.convertMany} on the default engine. */
export function convertMany(values: Batch<TimeValue>, options?: ConvertOptions): Batch<TimeResult>;
export function convertMany(values: Iterable<TimeValue>, options?: ConvertOptions): TimeResult[];
export function convertMany(
  values: Batch<TimeValue> | Iterable<TimeValue>,
  options?: ConvertOptions,
): Batch<TimeResult> | TimeResult[] {
  const engine = getDefaultEngine();
  return isBatch(values) ? engine.convertMany(values, options) : engine.convertMany(values, options);
}

/** {@link TimeEngine.convertVals} on the default engine. */
export function convertVals(vals: TimeValue, fmtIn: string, fmtOut: string): TimeResult;
export function convertVals(
  vals: readonly TimeValue[] | Float64Array,
  fmtIn: string,
  fmtOut: string,
): Float64Array | string[];
export function convertVals(
  vals: TimeValue | readonly TimeValue[] | Float64Array,
  fmtIn: string,
  fmtOut: string,
): TimeResult | Float64Array | string[] {
  const engine = getDefaultEngine();
  if (typeof vals === "string" || typeof vals === "number") {
    return engine.convertVals(vals, fmtIn, fmtOut);
  }
  return engine.convertVals(vals, fmtIn, fmtOut);
}

/** `date` strings to MET seconds on the default engine. */
export function dateToSecs(dates: string): number;
export function dateToSecs(dates: readonly string[]): Float64Array;
export function dateToSecs(dates: string | readonly string[]): number | Float64Array {
  const engine = getDefaultEngine();
  return typeof dates === "string" ? engine.dateToSecs(dates) : engine.dateToSecs(dates);
}

/** MET seconds to `date` strings on the default engine. */
export function secsToDate(secs: number): string;
export function secsToDate(secs: readonly number[] | Float64Array): string[];
export function secsToDate(secs: number | readonly number[] | Float64Array): string | string[] {
  const engine = getDefaultEngine();
  return typeof secs === "number" ? engine.secsToDate(secs) : engine.secsToDate(secs);
}
