export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
* Assert that a condition is truthy.
*
* Throws {@link InvariantError} when the assertion fails.
*/
export function invariant(condition: unknown, message = "Invariant violation"): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
* Exhaustiveness helper for `switch` statements.
*
* Throws an error if called.
*/
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}

/**
* Lexical shape of a bare floating point literal (no anchors).
*
* Shared by the format registry and the converter so both sides agree on what
* "looks like a number".
*/
export const FLOAT_SOURCE = String.raw`[+-]?(?:\d+[.]?\d*|[.]\d+)(?:[eE][+-]?\d+)?`;

const FLOAT_RE = new RegExp(`^${FLOAT_SOURCE}$`);

/**
* Parse `text` as a bare float literal.
*
* Returns `undefined` for anything that is not a complete float literal
* (surrounding whitespace is ignored). Unlike `Number()`, the empty string,
* hex literals and `Infinity` are rejected.
*/
export function parseFloatText(text: string): number | undefined {
  const trimmed = text.trim();
  if (!FLOAT_RE.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

/**
* Shortest round-trip text for a float that always reads back as a float.
*
* Integral values keep a trailing `.0` (`2007001` -> `"2007001.0"`), so the
* text never loses its decimal point on the way to format detection.
*/
export function formatFloat(value: number): string {
  const text = String(value);
  if (!Number.isFinite(value)) {
    return text;
  }
  if (/[.eE]/.test(text)) {
    return text;
  }
  return `${text}.0`;
}
