import fs from "node:fs";
import { createRequire } from "node:module";

import YAML from "yaml";

export type LeapSecondEntry = {
  /** First UTC day (MJD) on which `taiMinusUtc` applies. */
  mjd: number;
  /** TAI - UTC in seconds. */
  taiMinusUtc: number;
};

export type LeapSecondTable = {
  /** Sorted by `mjd`, strictly increasing. */
  entries: readonly LeapSecondEntry[];
  /** Last UTC day (MJD) the table is known to be complete for. */
  validUntilMjd: number;
};

export class LeapSecondTableError extends Error {
  override name = "LeapSecondTableError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export const DEFAULT_LEAP_SECONDS_SPECIFIER = "@mission-time/converter-js/data/leap-seconds.yml";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertEntry(value: unknown, index: number, sourceName: string): LeapSecondEntry {
  if (!isRecord(value)) {
    throw new LeapSecondTableError(`${sourceName}: leapSeconds[${index}] must be an object`);
  }

  const { mjd, taiMinusUtc } = value;
  if (typeof mjd !== "number" || !Number.isInteger(mjd)) {
    throw new LeapSecondTableError(`${sourceName}: leapSeconds[${index}].mjd must be an integer`);
  }
  if (typeof taiMinusUtc !== "number" || !Number.isFinite(taiMinusUtc)) {
    throw new LeapSecondTableError(
      `${sourceName}: leapSeconds[${index}].taiMinusUtc must be a finite number`,
    );
  }
  return { mjd, taiMinusUtc };
}

/**
 * Validate an already-parsed leap-second document.
 *
 * Expected shape: `{ validUntilMjd: number, leapSeconds: [{ mjd, taiMinusUtc }, ...] }`.
 */
export function toLeapSecondTable(doc: unknown, sourceName = "<inline>"): LeapSecondTable {
  if (!isRecord(doc)) {
    throw new LeapSecondTableError(`${sourceName}: root must be an object`);
  }

  const rawEntries = doc.leapSeconds;
  if (!Array.isArray(rawEntries) || rawEntries.length === 0) {
    throw new LeapSecondTableError(`${sourceName}: leapSeconds must be a non-empty array`);
  }

  const entries = rawEntries.map((entry: unknown, i) => assertEntry(entry, i, sourceName));
  for (let i = 1; i < entries.length; i++) {
    const prev = entries[i - 1];
    const cur = entries[i];
    if (prev !== undefined && cur !== undefined && cur.mjd <= prev.mjd) {
      throw new LeapSecondTableError(
        `${sourceName}: leapSeconds must be sorted by mjd (entry ${i} has mjd ${cur.mjd} after ${prev.mjd})`,
      );
    }
  }

  const validUntilMjd = doc.validUntilMjd;
  if (typeof validUntilMjd !== "number" || !Number.isInteger(validUntilMjd)) {
    throw new LeapSecondTableError(`${sourceName}: validUntilMjd must be an integer`);
  }
  const last = entries[entries.length - 1];
  if (last !== undefined && validUntilMjd < last.mjd) {
    throw new LeapSecondTableError(
      `${sourceName}: validUntilMjd (${validUntilMjd}) precedes the last leap second (${last.mjd})`,
    );
  }

  return { entries, validUntilMjd };
}

/** Parse a leap-second table from YAML text. */
export function parseLeapSecondTable(text: string, sourceName = "<inline>"): LeapSecondTable {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new LeapSecondTableError(`invalid YAML in ${sourceName}: ${msg}`, { cause: error });
  }
  return toLeapSecondTable(doc, sourceName);
}

/** Read and parse a leap-second table from a YAML file. */
export function readLeapSecondTable(path: string): LeapSecondTable {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new LeapSecondTableError(`failed to read leap-second table ${path}: ${msg}`, {
      cause: error,
    });
  }
  return parseLeapSecondTable(text, path);
}

/** Absolute path of the bundled `data/leap-seconds.yml`. */
export function resolveDefaultLeapSecondsPath(): string {
  return createRequire(import.meta.url).resolve(DEFAULT_LEAP_SECONDS_SPECIFIER);
}

let defaultTable: LeapSecondTable | undefined;

/** The bundled table. Read once per process. */
export function loadDefaultLeapSecondTable(): LeapSecondTable {
  defaultTable ??= readLeapSecondTable(resolveDefaultLeapSecondsPath());
  return defaultTable;
}

/**
 * Index of the entry in effect on UTC day `mjdDay`.
 *
 * Days before the first entry use the first entry.
 */
export function entryIndexOn(table: LeapSecondTable, mjdDay: number): number {
  let i = table.entries.length - 1;
  while (i > 0) {
    const entry = table.entries[i];
    if (entry !== undefined && entry.mjd <= mjdDay) {
      break;
    }
    i--;
  }
  return i;
}

/** TAI - UTC of entry `index`. Throws `RangeError` outside the table. */
export function taiMinusUtcAt(table: LeapSecondTable, index: number): number {
  const entry = table.entries[index];
  if (entry === undefined) {
    throw new RangeError(`leap-second index out of range: ${index}`);
  }
  return entry.taiMinusUtc;
}

/** First UTC day of entry `index`. */
export function leapMjdAt(table: LeapSecondTable, index: number): number {
  const entry = table.entries[index];
  if (entry === undefined) {
    throw new RangeError(`leap-second index out of range: ${index}`);
  }
  return entry.mjd;
}
