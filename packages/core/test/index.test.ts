import { describe, expect, it } from "vitest";

import {
  assertNever,
  formatFloat,
  invariant,
  InvariantError,
  parseFloatText,
} from "@mission-time/core";

describe("@mission-time/core", () => {
  it("throws when condition is false", () => {
    expect(() => invariant(false)).toThrow("Invariant violation");
    expect(() => invariant(0, "zero")).toThrow(InvariantError);
  });

  it("throws for assertNever", () => {
    expect(() => assertNever("nope" as never)).toThrow("Unexpected value: nope");
  });

  it("keeps a decimal point on integral floats", () => {
    expect(formatFloat(2007001)).toBe("2007001.0");
    expect(formatFloat(-3)).toBe("-3.0");
    expect(formatFloat(0.1)).toBe("0.1");
    expect(formatFloat(441763266.184)).toBe("441763266.184");
    expect(formatFloat(1e21)).toBe("1e+21");
    expect(formatFloat(Number.NaN)).toBe("NaN");
  });

  it("parses only complete float literals", () => {
    expect(parseFloatText(" 12.5 ")).toBe(12.5);
    expect(parseFloatText(".5")).toBe(0.5);
    expect(parseFloatText("1.")).toBe(1);
    expect(parseFloatText("-2e3")).toBe(-2000);
    expect(parseFloatText("+7")).toBe(7);

    expect(parseFloatText("")).toBeUndefined();
    expect(parseFloatText("0x10")).toBeUndefined();
    expect(parseFloatText("Infinity")).toBeUndefined();
    expect(parseFloatText("2012:001")).toBeUndefined();
  });
});
