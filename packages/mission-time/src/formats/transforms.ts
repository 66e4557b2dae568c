import { formatFloat, invariant, parseFloatText } from "@mission-time/core";

import { MissionTimeError } from "../errors.js";
import type { TimeResult } from "../types.js";
import { PATTERNS, PLOTDATE_JD_OFFSET, UNIX_AT_MET_EPOCH } from "./patterns.js";

const SECONDS_PER_DAY = 86_400;

const GRETA_RE = new RegExp(PATTERNS.greta);
const DATE_RE = new RegExp(PATTERNS.date);

/** What a transform may consult besides its own text. */
export interface TransformContext {
  /** `hh:mm:ss` appended to date-only inputs. */
  readonly dayStartTime: string;
  nowUnixSeconds(): number;
  /** MET seconds at the start of `year` and of `year + 1`. */
  yearBounds(year: number): readonly [number, number];
  /** Calendar year (UTC) containing MET seconds `secs`. */
  yearOfSecs(secs: string): number;
}

export type InputTransform = (text: string, ctx: TransformContext) => string;
export type OutputTransform = (text: string, ctx: TransformContext) => TimeResult;

/** Converter output that must be numeric. */
export function readNumber(text: string): number {
  const value = parseFloatText(text);
  if (value === undefined) {
    throw new MissionTimeError("ConversionFailed", `Expected a number from the converter, got ${JSON.stringify(text)}`);
  }
  return value;
}

function gretaToDate(text: string): string {
  // Nine decimals cover hhmmss plus milliseconds.
  const m = GRETA_RE.exec(Number(text).toFixed(9));
  invariant(m, `greta value does not reformat: ${text}`);
  const [, year, doy, hour, minute, second, frac] = m;
  invariant(year && doy && hour && minute && second, `greta value does not reformat: ${text}`);
  const base = `${year}:${doy}:${hour}:${minute}:${second}`;
  return frac === undefined ? base : `${base}.${frac}`;
}

function dateToGreta(text: string): string {
  const m = DATE_RE.exec(text);
  if (!m) {
    throw new MissionTimeError("ConversionFailed", `Expected a YYYY:DDD:hh:mm:ss date from the converter, got ${JSON.stringify(text)}`);
  }
  const [, year, doy, hour, minute, second, frac] = m;
  const base = `${year ?? ""}${doy ?? ""}.${hour ?? ""}${minute ?? ""}${second ?? ""}`;
  return frac === undefined ? base : `${base}${frac.replace(".", "")}`;
}

function fracYearToSecs(text: string, ctx: TransformContext): string {
  const fracYear = Number(text);
  const year = Math.trunc(fracYear);
  const [start, end] = ctx.yearBounds(year);
  return formatFloat((fracYear - year) * (end - start) + start);
}

function secsToFracYear(text: string, ctx: TransformContext): number {
  const year = ctx.yearOfSecs(text);
  const [start, end] = ctx.yearBounds(year);
  return (readNumber(text) - start) / (end - start) + year;
}

/** Input transforms: raw matched text to converter input. */
export const INPUT_TRANSFORMS = {
  appendFitsTimeOfDay: (text, ctx) => `${text}T${ctx.dayStartTime}`,
  appendDateTimeOfDay: (text, ctx) => `${text}:${ctx.dayStartTime}`,
  reldayToSecs: (text, ctx) =>
    formatFloat(ctx.nowUnixSeconds() + Number(text) * SECONDS_PER_DAY - UNIX_AT_MET_EPOCH),
  gretaToDate,
  fracYearToSecs,
  unixToSecs: (text) => formatFloat(Number(text) - UNIX_AT_MET_EPOCH),
  isoToFits: (text) => text.replace(" ", "T"),
  plotdateToJd: (text) => formatFloat(Number(text) + PLOTDATE_JD_OFFSET),
} satisfies Record<string, InputTransform>;

/** Output transforms: converter output to the value handed back to callers. */
export const OUTPUT_TRANSFORMS = {
  stripFitsTimeOfDay: (text) => text.replace(/T\d{2}:\d{2}:\d{2}\.\d+$/, ""),
  stripDateTimeOfDay: (text) => text.replace(/:\d{2}:\d{2}:\d{2}\.\d+$/, ""),
  secsToRelday: (text, ctx) => (readNumber(text) + UNIX_AT_MET_EPOCH - ctx.nowUnixSeconds()) / SECONDS_PER_DAY,
  dateToGreta,
  toNumber: (text) => readNumber(text),
  secsToFracYear,
  secsToUnix: (text) => readNumber(text) + UNIX_AT_MET_EPOCH,
  fitsToIso: (text) => text.replace("T", " "),
  jdToPlotdate: (text) => readNumber(text) - PLOTDATE_JD_OFFSET,
} satisfies Record<string, OutputTransform>;

export type InputTransformName = keyof typeof INPUT_TRANSFORMS;
export type OutputTransformName = keyof typeof OUTPUT_TRANSFORMS;

/** Whether `name` keys {@link INPUT_TRANSFORMS}. */
export function isInputTransformName(name: string): name is InputTransformName {
  return Object.prototype.hasOwnProperty.call(INPUT_TRANSFORMS, name);
}

/** Whether `name` keys {@link OUTPUT_TRANSFORMS}. */
export function isOutputTransformName(name: string): name is OutputTransformName {
  return Object.prototype.hasOwnProperty.call(OUTPUT_TRANSFORMS, name);
}
