export { JS_CONVERTER_VERSION, createJsConverter } from "./createJsConverter.js";
export type { JsConverter, JsConverterOptions } from "./createJsConverter.js";

export {
  DEFAULT_LEAP_SECONDS_SPECIFIER,
  LeapSecondTableError,
  loadDefaultLeapSecondTable,
  parseLeapSecondTable,
  readLeapSecondTable,
  resolveDefaultLeapSecondsPath,
  toLeapSecondTable,
} from "./leapSeconds.js";
export type { LeapSecondEntry, LeapSecondTable } from "./leapSeconds.js";

export { MJD_REF, REF_LEAPS, TAI2TT } from "./instant.js";
