import type { FormatCode } from "@mission-time/converter-contract";
import { isFormatCode } from "@mission-time/converter-contract";

import type { DayStart, TimeSystemName } from "../types.js";
import { TIME_SYSTEM_NAMES } from "../types.js";
import { GRETA_LIMIT, PATTERNS } from "./patterns.js";
import type { InputTransformName, OutputTransformName } from "./transforms.js";
import { isInputTransformName, isOutputTransformName } from "./transforms.js";

export type DetectRule =
  | { kind: "pattern"; source: string }
  /** Pattern plus an exclusive upper bound on the numeric value. */
  | { kind: "greta"; source: string; below: number };

export const ELEMENT_TYPES = ["string", "float64"] as const;
export type ElementType = (typeof ELEMENT_TYPES)[number];

/** One row of a format table, as plain data. Names are checked by {@link validateFormatTable}. */
export type FormatSpec = {
  name: string;
  detect: DetectRule;
  system: string;
  converterFormat: string;
  input?: string;
  output?: string;
  element?: string;
};

/** Compiled, validated form of a {@link FormatSpec}. */
export type FormatDescriptor = {
  readonly name: string;
  readonly pattern: RegExp;
  /** Exclusive upper bound on the numeric value, when the rule has one. */
  readonly below?: number;
  readonly system: TimeSystemName;
  readonly converterFormat: FormatCode;
  readonly input?: InputTransformName;
  readonly output?: OutputTransformName;
  readonly element?: ElementType;
};

const pattern = (source: string): DetectRule => ({ kind: "pattern", source });

// Order is detection priority.
export const FORMAT_TABLE = [
  { name: "fits", detect: pattern(PATTERNS.fits), system: "tt", converterFormat: "f3", element: "string" },
  {
    name: "year_mon_day",
    detect: pattern(PATTERNS.yearMonDay),
    system: "utc",
    converterFormat: "f3",
    input: "appendFitsTimeOfDay",
    output: "stripFitsTimeOfDay",
  },
  {
    name: "relday",
    detect: pattern(PATTERNS.signedFloat),
    system: "utc",
    converterFormat: "s",
    input: "reldayToSecs",
    output: "secsToRelday",
  },
  {
    name: "greta",
    detect: { kind: "greta", source: PATTERNS.greta, below: GRETA_LIMIT },
    system: "utc",
    converterFormat: "d3",
    input: "gretaToDate",
    output: "dateToGreta",
  },
  {
    name: "secs",
    detect: pattern(PATTERNS.float),
    system: "met",
    converterFormat: "s",
    output: "toNumber",
    element: "float64",
  },
  {
    name: "frac_year",
    detect: pattern(PATTERNS.float),
    system: "met",
    converterFormat: "s",
    input: "fracYearToSecs",
    output: "secsToFracYear",
  },
  {
    name: "unix",
    detect: pattern(PATTERNS.float),
    system: "utc",
    converterFormat: "s",
    input: "unixToSecs",
    output: "secsToUnix",
  },
  {
    name: "iso",
    detect: pattern(PATTERNS.iso),
    system: "utc",
    converterFormat: "f3",
    input: "isoToFits",
    output: "fitsToIso",
  },
  { name: "caldate", detect: pattern(PATTERNS.caldate), system: "utc", converterFormat: "c3", element: "string" },
  { name: "date", detect: pattern(PATTERNS.date), system: "utc", converterFormat: "d3", element: "string" },
  {
    name: "year_doy",
    detect: pattern(PATTERNS.yearDoy),
    system: "utc",
    converterFormat: "d3",
    input: "appendDateTimeOfDay",
    output: "stripDateTimeOfDay",
  },
  { name: "jd", detect: pattern(PATTERNS.float), system: "utc", converterFormat: "j", output: "toNumber", element: "float64" },
  { name: "mjd", detect: pattern(PATTERNS.float), system: "utc", converterFormat: "m", output: "toNumber", element: "float64" },
  { name: "numday", detect: pattern(PATTERNS.numday), system: "utc", converterFormat: "n3" },
  {
    name: "plotdate",
    detect: pattern(PATTERNS.float),
    system: "utc",
    converterFormat: "j",
    input: "plotdateToJd",
    output: "jdToPlotdate",
  },
] as const satisfies readonly FormatSpec[];

export type FormatName = (typeof FORMAT_TABLE)[number]["name"];

export const FORMAT_NAMES: readonly FormatName[] = FORMAT_TABLE.map((spec) => spec.name);

/** Converter code for each system name. */
export const SYSTEM_CODES = {
  met: "m",
  tt: "t",
  tai: "a",
  utc: "u",
} as const satisfies Record<TimeSystemName, string>;

/** Whether `value` is one of {@link TIME_SYSTEM_NAMES}. */
export function isTimeSystemName(value: string): value is TimeSystemName {
  return TIME_SYSTEM_NAMES.some((name) => name === value);
}

function isElementType(value: string): value is ElementType {
  return ELEMENT_TYPES.some((t) => t === value);
}

/** Error used for a format table that fails {@link validateFormatTable}. */
export class FormatTableError extends Error {
  override name = "FormatTableError";

  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`invalid format table:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
    this.problems = problems;
  }
}

function compilePattern(source: string): RegExp | string {
  try {
    return new RegExp(source);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/** List every problem in `table`; empty when it is usable. */
export function validateFormatTable(table: readonly FormatSpec[]): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();

  for (const spec of table) {
    const at = `format ${JSON.stringify(spec.name)}`;

    if (seen.has(spec.name)) {
      problems.push(`${at}: duplicate name`);
    }
    seen.add(spec.name);

    const compiled = compilePattern(spec.detect.source);
    if (typeof compiled === "string") {
      problems.push(`${at}: pattern does not compile: ${compiled}`);
    }
    if (!isTimeSystemName(spec.system)) {
      problems.push(`${at}: unknown time system ${JSON.stringify(spec.system)}`);
    }
    if (!isFormatCode(spec.converterFormat)) {
      problems.push(`${at}: unknown converter format ${JSON.stringify(spec.converterFormat)}`);
    }
    if (spec.input !== undefined && !isInputTransformName(spec.input)) {
      problems.push(`${at}: unknown input transform ${JSON.stringify(spec.input)}`);
    }
    if (spec.output !== undefined && !isOutputTransformName(spec.output)) {
      problems.push(`${at}: unknown output transform ${JSON.stringify(spec.output)}`);
    }
    if (spec.element !== undefined && !isElementType(spec.element)) {
      problems.push(`${at}: unknown element type ${JSON.stringify(spec.element)}`);
    }
  }

  return problems;
}

function compileSpec(spec: FormatSpec): FormatDescriptor | undefined {
  const compiled = compilePattern(spec.detect.source);
  const { system, converterFormat, input, output, element } = spec;
  if (
    typeof compiled === "string" ||
    !isTimeSystemName(system) ||
    !isFormatCode(converterFormat) ||
    (input !== undefined && !isInputTransformName(input)) ||
    (output !== undefined && !isOutputTransformName(output)) ||
    (element !== undefined && !isElementType(element))
  ) {
    return undefined;
  }

  return {
    name: spec.name,
    pattern: compiled,
    system,
    converterFormat,
    ...(spec.detect.kind === "greta" ? { below: spec.detect.below } : {}),
    ...(input !== undefined ? { input } : {}),
    ...(output !== undefined ? { output } : {}),
    ...(element !== undefined ? { element } : {}),
  };
}

export const DAY_START_TIMES = {
  midnight: "00:00:00",
  noon: "12:00:00",
} as const satisfies Record<DayStart, string>;

export type FormatRegistryOptions = {
  dayStart?: DayStart;
  table?: readonly FormatSpec[];
};

/** Ordered, validated formats plus the day-start convention their transforms use. */
export interface FormatRegistry {
  readonly descriptors: readonly FormatDescriptor[];
  readonly dayStart: DayStart;
  /** `hh:mm:ss` for {@link FormatRegistry.dayStart}. */
  readonly dayStartTime: string;
  get(name: string): FormatDescriptor | undefined;
}

/**
 * Validate and compile a format table (the built-in one by default).
 *
 * Throws {@link FormatTableError} listing every problem in the table.
 */
export function createFormatRegistry(options: FormatRegistryOptions = {}): FormatRegistry {
  const table = options.table ?? FORMAT_TABLE;
  const dayStart = options.dayStart ?? "midnight";

  const problems = validateFormatTable(table);
  if (problems.length > 0) {
    throw new FormatTableError(problems);
  }

  const descriptors: FormatDescriptor[] = [];
  for (const spec of table) {
    const descriptor = compileSpec(spec);
    if (descriptor !== undefined) {
      descriptors.push(descriptor);
    }
  }
  const byName = new Map<string, FormatDescriptor>(descriptors.map((d) => [d.name, d]));

  return {
    descriptors,
    dayStart,
    dayStartTime: DAY_START_TIMES[dayStart],
    get: (name) => byName.get(name),
  };
}
