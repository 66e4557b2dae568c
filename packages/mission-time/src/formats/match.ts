import { MissionTimeError } from "../errors.js";
import type { FormatDescriptor, FormatRegistry } from "./registry.js";

export type FormatMatch = {
  descriptor: FormatDescriptor;
  /** Capture groups of the detection pattern; index 0 is the whole text. */
  groups: readonly (string | undefined)[];
};

/** Run `descriptor`'s detection rule against `text`. */
export function detect(descriptor: FormatDescriptor, text: string): FormatMatch | undefined {
  const m = descriptor.pattern.exec(text);
  if (!m) {
    return undefined;
  }
  if (descriptor.below !== undefined && !(Number(text) < descriptor.below)) {
    return undefined;
  }
  return { descriptor, groups: Array.from(m) };
}

/**
 * Find the format of `text`.
 *
 * With `forced`, only that format is tried. Otherwise the first registry
 * entry whose rule accepts the text wins.
 */
export function matchFormat(registry: FormatRegistry, text: string, forced?: string): FormatMatch {
  if (forced !== undefined) {
    const descriptor = registry.get(forced);
    if (descriptor === undefined) {
      throw new MissionTimeError("InvalidInputFormat", `Invalid input format '${forced}'`);
    }
    const match = detect(descriptor, text);
    if (match === undefined) {
      throw new MissionTimeError(
        "InvalidInputFormat",
        `Invalid input format '${forced}': ${JSON.stringify(text)} does not match`,
      );
    }
    return match;
  }

  for (const descriptor of registry.descriptors) {
    const match = detect(descriptor, text);
    if (match !== undefined) {
      return match;
    }
  }
  throw new MissionTimeError("InvalidInputFormat", `Invalid input format: no format matches ${JSON.stringify(text)}`);
}
