export { MissionTimeError, wrapConversionError } from "./errors.js";
export type { MissionTimeErrorKind } from "./errors.js";

export { TIME_SYSTEM_NAMES } from "./types.js";
export type {
  Batch,
  ConvertOptions,
  DayStart,
  TimeResult,
  TimeSystemName,
  TimeValue,
} from "./types.js";

export {
  DAY_START_TIMES,
  ELEMENT_TYPES,
  FORMAT_NAMES,
  FORMAT_TABLE,
  FormatTableError,
  SYSTEM_CODES,
  createFormatRegistry,
  isTimeSystemName,
  validateFormatTable,
} from "./formats/registry.js";
export type {
  DetectRule,
  ElementType,
  FormatDescriptor,
  FormatName,
  FormatRegistry,
  FormatRegistryOptions,
  FormatSpec,
} from "./formats/registry.js";
export { detect, matchFormat } from "./formats/match.js";
export type { FormatMatch } from "./formats/match.js";
export { INPUT_TRANSFORMS, OUTPUT_TRANSFORMS } from "./formats/transforms.js";
export type {
  InputTransform,
  InputTransformName,
  OutputTransform,
  OutputTransformName,
  TransformContext,
} from "./formats/transforms.js";

export { NOW_ENV_VAR, resolveNow, systemClock } from "./engine/now.js";
export type { Clock, Environment, NowValue } from "./engine/now.js";
export { stringifyTime } from "./engine/convert.js";
export { TimeEngine, createTimeEngine } from "./engine/createTimeEngine.js";
export type { TimeEngineOptions } from "./engine/createTimeEngine.js";

export { isNested, mapBatch, zipBatch } from "./datetime/broadcast.js";
export { CALENDAR_ATTRIBUTE_NAMES, REFERENCE_MONDAY, decomposeCalendar } from "./datetime/calendarAttributes.js";
export type { CalendarAttributeName, CalendarAttributes } from "./datetime/calendarAttributes.js";
export { DateTime, DateTimeBatch, NOW, dateTime } from "./datetime/dateTime.js";
export type { DateTimeInput, DateTimeOptions, ExternalTime, NowMarker } from "./datetime/dateTime.js";

export {
  configureDefaultEngine,
  convert,
  convertMany,
  convertVals,
  dateToSecs,
  getDefaultEngine,
  resetDefaultEngine,
  secsToDate,
  useNoonDayStart,
} from "./defaults.js";
