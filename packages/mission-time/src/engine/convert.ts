import type { TimeSystemConverter } from "@mission-time/converter-contract";
import { formatFloat, parseFloatText } from "@mission-time/core";

import { MissionTimeError, wrapConversionError } from "../errors.js";
import { matchFormat } from "../formats/match.js";
import type { FormatDescriptor, FormatRegistry } from "../formats/registry.js";
import { SYSTEM_CODES, isTimeSystemName } from "../formats/registry.js";
import type { InputTransform, OutputTransform, TransformContext } from "../formats/transforms.js";
import { INPUT_TRANSFORMS, OUTPUT_TRANSFORMS, readNumber } from "../formats/transforms.js";
import type { ConvertOptions, TimeResult, TimeSystemName, TimeValue } from "../types.js";

/** Everything one scalar conversion reads. */
export type ConversionContext = {
  registry: FormatRegistry;
  converter: TimeSystemConverter;
  transforms: TransformContext;
};

/**
 * Text handed to format detection.
 *
 * Numbers and numeric strings become shortest round-trip text that keeps a
 * decimal point (`2007001` -> `"2007001.0"`). A leading `+` survives so the
 * value still reads as `relday`.
 */
export function stringifyTime(value: TimeValue): string {
  if (typeof value === "number") {
    return formatFloat(value);
  }
  const parsed = parseFloatText(value);
  if (parsed === undefined) {
    return value;
  }
  const text = formatFloat(parsed);
  return value.trim().startsWith("+") ? `+${text}` : text;
}

function resolveSystem(
  name: string,
  kind: "InvalidInputSystem" | "InvalidOutputSystem",
): TimeSystemName {
  if (!isTimeSystemName(name)) {
    const side = kind === "InvalidInputSystem" ? "input" : "output";
    throw new MissionTimeError(kind, `Invalid ${side} system '${name}'`);
  }
  return name;
}

/** Converter output to the caller-facing value for `descriptor`. */
export function finishOutput(
  descriptor: FormatDescriptor,
  raw: string,
  transforms: TransformContext,
): TimeResult {
  if (descriptor.output !== undefined) {
    const transform: OutputTransform = OUTPUT_TRANSFORMS[descriptor.output];
    return transform(raw, transforms);
  }
  return descriptor.element === "float64" ? readNumber(raw) : raw;
}

/** Convert one value: detect, resolve systems, transform, delegate, transform back. */
export function convertScalar(ctx: ConversionContext, value: TimeValue, options: ConvertOptions = {}): TimeResult {
  const text = stringifyTime(value);
  const { descriptor: input } = matchFormat(ctx.registry, text, options.fmtIn);
  const sysIn = resolveSystem(options.sysIn ?? input.system, "InvalidInputSystem");

  const fmtOut = options.fmtOut ?? "secs";
  const output = ctx.registry.get(fmtOut);
  if (output === undefined) {
    throw new MissionTimeError("InvalidOutputFormat", `Invalid output format '${fmtOut}'`);
  }
  const sysOut = resolveSystem(options.sysOut ?? output.system, "InvalidOutputSystem");

  let converterInput = text;
  if (input.input !== undefined) {
    const transform: InputTransform = INPUT_TRANSFORMS[input.input];
    converterInput = transform(text, ctx.transforms);
  }

  let raw: string;
  try {
    raw = ctx.converter.convertTime(
      converterInput,
      SYSTEM_CODES[sysIn],
      input.converterFormat,
      SYSTEM_CODES[sysOut],
      output.converterFormat,
    );
  } catch (error) {
    throw wrapConversionError(`Converting ${JSON.stringify(text)} from ${input.name} to ${output.name}`, error);
  }

  return finishOutput(output, raw, ctx.transforms);
}
