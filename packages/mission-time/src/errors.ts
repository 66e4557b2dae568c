export type MissionTimeErrorKind =
  | "InvalidInputFormat"
  | "InvalidOutputFormat"
  | "InvalidInputSystem"
  | "InvalidOutputSystem"
  | "UnrecognizedInputValue"
  | "UnsupportedFastFormat"
  | "ShapeMismatch"
  | "ConversionFailed";

/** The single error type surfaced by the conversion engine; `kind` says what went wrong. */
export class MissionTimeError extends Error {
  override name = "MissionTimeError";

  readonly kind: MissionTimeErrorKind;

  constructor(kind: MissionTimeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
  }
}

/** Wrap an unknown error as `ConversionFailed`, keeping the original as `cause`. */
export function wrapConversionError(operation: string, error: unknown): MissionTimeError {
  if (error instanceof MissionTimeError) {
    return error;
  }
  const msg = error instanceof Error ? error.message : String(error);
  return new MissionTimeError("ConversionFailed", `${operation} failed: ${msg}`, { cause: error });
}

/** Error used for invalid CLI usage. */
export class UsageError extends Error {
  override name = "UsageError";
}
