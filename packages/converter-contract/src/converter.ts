import type { FormatCode, TimeSystemCode } from "./shared/codes.js";

export const CONVERTER_KINDS = ["js", "custom"] as const;
export type ConverterKind = (typeof CONVERTER_KINDS)[number];

/**
 * Contract conventions:
 * - Values cross the boundary as text, in both directions. Numeric outputs keep
 *   enough digits to round-trip (implementations print 9 decimals).
 * - Methods throw on unknown codes or unreadable input; they never return an
 *   error string.
 * - Codes are read with {@link parseSystemCode} and {@link parseFormatCode}, so
 *   `"utc"` and `"U"` mean `"u"` for callers outside the type system.
 * - Implementations are synchronous and reentrant.
 */
export interface TimeSystemConverter {
  readonly kind: ConverterKind;

  /** Identifies the implementation and its data (e.g. leap-second table). */
  version(): string;

  /**
   * Convert one time value from one system/format to another.
   *
   * UTC conversions account for leap seconds, both for date-like formats
   * and for elapsed seconds.
   */
  convertTime(
    value: string,
    sysIn: TimeSystemCode,
    fmtIn: FormatCode,
    sysOut: TimeSystemCode,
    fmtOut: FormatCode,
  ): string;
}
