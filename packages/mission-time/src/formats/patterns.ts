import { FLOAT_SOURCE } from "@mission-time/core";

const UNSIGNED_FLOAT_SOURCE = String.raw`(?:\d+[.]?\d*|[.]\d+)(?:[eE][+-]?\d+)?`;

/** Detection patterns, keyed by the format that uses them. */
export const PATTERNS = {
  float: `^${FLOAT_SOURCE}$`,
  signedFloat: `^[+-]${UNSIGNED_FLOAT_SOURCE}$`,
  fits: String.raw`^\d{4}-\d{1,2}-\d{1,2}T\d{1,2}:\d{1,2}:\d{1,2}(\.\d*)?$`,
  yearMonDay: String.raw`^\d{4}-\d{1,2}-\d{1,2}$`,
  greta: String.raw`^(\d{4})(\d{3})\.(\d{2})?(\d{2})?(\d{2})?(\d+)?$`,
  iso: String.raw`^\d{4}-\d{1,2}-\d{1,2} \d{1,2}:\d{1,2}:\d{1,2}(\.\d*)?$`,
  caldate: String.raw`^\d{4}\w{3}\d{1,2}\s+at\s+\d{1,2}:\d{1,2}:\d{1,2}(\.\d*)?$`,
  date: String.raw`^(\d{4}):(\d{3}):(\d{2}):(\d{2}):(\d{2})(\.\d*)?$`,
  yearDoy: String.raw`^(\d{4}):(\d{3})$`,
  numday: String.raw`^-?\d{1,4}:\d{1,2}:\d{1,2}:\d{1,2}(\.\d*)?$`,
} as const;

/** Greta values at or above this are not dates (they read as plain seconds). */
export const GRETA_LIMIT = 2_099_001;

/** Unix seconds at 1998-01-01T00:00:00 TT (the MET epoch). */
export const UNIX_AT_MET_EPOCH = 883_612_736.816;

/** Julian Day minus plot date (days since 0001-01-01). */
export const PLOTDATE_JD_OFFSET = 1_721_424.5;
