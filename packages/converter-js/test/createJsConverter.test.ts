import { describe, expect, it } from "vitest";

import { ConverterContractError, ConverterInputError } from "@mission-time/converter-contract";
import { createJsConverter, toLeapSecondTable } from "@mission-time/converter-js";

describe("createJsConverter", () => {
  const c = createJsConverter({ onWarning: () => {} });

  it("identifies itself", () => {
    expect(c.kind).toBe("js");
    expect(c.version()).toContain("valid until MJD 61402");
  });

  it("converts MET seconds to a UTC date", () => {
    expect(c.convertTime("20483020", "m", "s", "u", "d3")).toBe("1998:238:01:42:36.816");
  });

  it("counts MET from 1998.0 TT", () => {
    expect(c.convertTime("1998-01-01T00:00:30", "t", "f3", "m", "s")).toBe("30.000000000");
    expect(Number(c.convertTime("1998:001:00:00:00.000", "u", "d3", "m", "s"))).toBeCloseTo(63.184, 6);
  });

  it("converts TT dates to UTC seconds, JD and MJD", () => {
    expect(c.convertTime("2007-01-01T00:00:00", "t", "f3", "u", "s")).toBe("283996798.000000000");
    expect(Number(c.convertTime("2007-01-01T00:00:00", "t", "f3", "u", "j"))).toBeCloseTo(
      2454101.4992455561,
      8,
    );
    expect(Number(c.convertTime("2007-01-01T00:00:00", "t", "f3", "u", "m"))).toBeCloseTo(
      54100.999245556,
      8,
    );
  });

  it("reads Julian Days", () => {
    expect(c.convertTime("2454101.5", "u", "j", "u", "f3")).toBe("2007-01-01T00:00:00.000");
  });

  it("offsets TAI from TT by 32.184 s", () => {
    expect(c.convertTime("0", "t", "s", "a", "m")).toBe("50813.999627500");
  });

  it("writes calendar dates and honours the decimals digit", () => {
    expect(c.convertTime("2007-01-01T00:00:00", "u", "f3", "u", "c3")).toBe(
      "2007Jan01 at 00:00:00.000",
    );
    expect(c.convertTime("2007Jan01 at 00:00:00", "u", "c3", "u", "d")).toBe("2007:001:00:00:00");
  });

  it("rolls day-of-year overflow into the next year", () => {
    expect(c.convertTime("1996:367:00:00:00.000", "u", "d3", "u", "d3")).toBe(
      "1997:001:00:00:00.000",
    );
  });

  it("handles dates before 1972", () => {
    expect(c.convertTime("1968-01-01T00:00:00", "t", "f3", "t", "d3")).toBe("1968:001:00:00:00.000");
  });

  it("reads and writes elapsed days", () => {
    expect(c.convertTime("1:02:03:04.5", "m", "n3", "m", "s")).toBe("93784.500000000");
    expect(c.convertTime("93784.5", "m", "s", "m", "n3")).toBe("1:2:3:4.5000000000");
  });

  it("signs negative elapsed days once", () => {
    expect(c.convertTime("-93784.5", "m", "s", "m", "n3")).toBe("-1:2:3:4.5000000000");
    expect(c.convertTime("-1:2:3:4.5", "m", "n3", "m", "s")).toBe("-93784.500000000");
    expect(c.convertTime("-0:0:0:30", "m", "n3", "m", "s")).toBe("-30.000000000");
  });

  it("reads system codes leniently", () => {
    // Callers outside the type system may pass full names.
    expect(Reflect.apply(c.convertTime, c, ["20483020", "MET", "s", "utc", "d3"])).toBe("1998:238:01:42:36.816");
    expect(Reflect.apply(c.convertTime, c, ["0", "tt", "s", "TAI", "m"])).toBe("50813.999627500");
    expect(() => Reflect.apply(c.convertTime, c, ["0", "gps", "s", "u", "s"])).toThrow(ConverterContractError);
  });

  it("rejects unreadable input", () => {
    expect(() => c.convertTime("garbage", "u", "d3", "m", "s")).toThrow(ConverterInputError);
    expect(() => c.convertTime("2007Foo01 at 00:00:00", "u", "c3", "m", "s")).toThrow(
      ConverterInputError,
    );
    expect(() => c.convertTime("2007-13-01T00:00:00", "u", "f3", "m", "s")).toThrow(
      ConverterInputError,
    );
  });
});

describe("leap seconds", () => {
  const c = createJsConverter({ onWarning: () => {} });
  const secs = (iso: string) => Number(c.convertTime(iso, "u", "f3", "m", "s"));

  it("counts four ticks across the end of June 2015", () => {
    expect(secs("2015-07-01T00:00:02") - secs("2015-06-30T23:59:59")).toBeCloseTo(4.0, 6);
    expect(secs("2015-06-30T23:59:60.5") - secs("2015-06-30T23:59:59")).toBeCloseTo(1.5, 6);
    expect(secs("2015-07-01T00:00:00") - secs("2015-06-30T23:59:60.")).toBeCloseTo(1.0, 6);
  });

  it("counts four ticks across the end of 2016", () => {
    expect(secs("2017-01-01T00:00:02") - secs("2016-12-31T23:59:59")).toBeCloseTo(4.0, 6);
    expect(secs("2016-12-31T23:59:60.5") - secs("2016-12-31T23:59:59")).toBeCloseTo(1.5, 6);
    expect(secs("2017-01-01T00:00:00") - secs("2016-12-31T23:59:60.")).toBeCloseTo(1.0, 6);
  });

  it("prints the inserted second as :60", () => {
    expect(c.convertTime("2015-06-30T23:59:60.500", "u", "f3", "u", "f3")).toBe(
      "2015-06-30T23:59:60.500",
    );
    expect(c.convertTime("552096067.184", "m", "s", "u", "d3")).toBe("2015:181:23:59:60.000");
  });

  it("carries a leap second that rounds up into the next day", () => {
    expect(c.convertTime("2016:366:23:59:60.9996", "u", "d3", "u", "d3")).toBe("2017:001:00:00:00.000");
    expect(c.convertTime("2016-12-31T23:59:60.9996", "u", "f3", "u", "f3")).toBe("2017-01-01T00:00:00.000");
    expect(c.convertTime("2016:366:23:59:60.9994", "u", "d3", "u", "d3")).toBe("2016:366:23:59:60.999");
    expect(c.convertTime("2016:366:23:59:60.6", "u", "d3", "u", "d0")).toBe("2017:001:00:00:00");
  });

  it("does not flag the seconds around the leap second", () => {
    expect(c.convertTime("2015-06-30T23:59:59", "u", "f3", "u", "d3")).toBe("2015:181:23:59:59.000");
    expect(c.convertTime("2015-07-01T00:00:00", "u", "f3", "u", "d3")).toBe("2015:182:00:00:00.000");
  });

  it("subtracts leap seconds from UTC seconds", () => {
    expect(Number(c.convertTime("552096067.184", "m", "s", "u", "s"))).toBeCloseTo(552096063.184, 5);
  });
});

describe("validity warning", () => {
  it("covers the second half of 2026 with the bundled table", () => {
    const warnings: string[] = [];
    const c = createJsConverter({ onWarning: (m) => warnings.push(m) });
    c.convertTime("2026:291:00:00:00.000", "u", "d3", "m", "s");
    c.convertTime("2026:362:00:00:00.000", "u", "d3", "m", "s");
    expect(warnings).toEqual([]);
  });

  const table = toLeapSecondTable({
    validUntilMjd: 51000,
    leapSeconds: [
      { mjd: 41317, taiMinusUtc: 10 },
      { mjd: 50630, taiMinusUtc: 31 },
    ],
  });

  it("warns once per converter for UTC conversions past the table", () => {
    const warnings: string[] = [];
    const c = createJsConverter({ leapSeconds: table, onWarning: (m) => warnings.push(m) });

    c.convertTime("2000-01-01T00:00:00", "t", "f3", "t", "s");
    expect(warnings).toEqual([]);

    c.convertTime("1998:001:00:00:00.000", "u", "d3", "m", "s");
    expect(warnings).toEqual([]);

    c.convertTime("2000:001:00:00:00.000", "u", "d3", "m", "s");
    c.convertTime("2001:001:00:00:00.000", "u", "d3", "m", "s");
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain("valid until MJD 51000");
  });
});
