export { CONVERTER_KINDS } from "./converter.js";
export type { ConverterKind, TimeSystemConverter } from "./converter.js";

export {
  FORMAT_KINDS,
  TIME_SYSTEM_CODES,
  isFormatCode,
  isTimeSystemCode,
  parseFormatCode,
  parseSystemCode,
} from "./shared/codes.js";
export type {
  DateFormatCode,
  FormatCode,
  FormatKind,
  ParsedFormatCode,
  TimeSystemCode,
} from "./shared/codes.js";

export { ConverterContractError, ConverterInputError } from "./shared/errors.js";
