import { describe, expect, it } from "vitest";

import { CALENDAR_ATTRIBUTE_NAMES } from "../src/datetime/calendarAttributes.js";
import { DateTime, DateTimeBatch, NOW, dateTime } from "../src/datetime/dateTime.js";
import { NOW_ENV_VAR } from "../src/engine/now.js";
import { MissionTimeError } from "../src/errors.js";
import { testEngine } from "./testEngine.js";

describe("DateTime", () => {
  const engine = testEngine();

  it("fills in the configured day start", () => {
    expect(new DateTime("2007:001", { engine }).date).toBe("2007:001:00:00:00.000");
    expect(new DateTime("2007:001", { engine: testEngine({ dayStart: "noon" }) }).date).toBe(
      "2007:001:12:00:00.000",
    );
  });

  it("exposes every format", () => {
    const t = new DateTime("2007:001", { engine });
    expect(t.fits).toBe("2007-01-01T00:01:05.184");
    expect(t.caldate).toBe("2007Jan01 at 00:00:00.000");
    expect(t.iso).toBe("2007-01-01 00:00:00.000");
    expect(t.yearMonDay).toBe("2007-01-01");
    expect(t.yearDoy).toBe("2007:001");
    expect(t.greta).toBe("2007001.000000000");
    expect(t.secs).toBeCloseTo(283_996_865.184, 6);
    expect(t.jd).toBe(2_454_101.5);
    expect(t.mjd).toBe(54_101);
    expect(t.plotdate).toBe(732_677);
    expect(t.unix).toBeCloseTo(1_167_609_600, 5);
  });

  it("honours a forced format", () => {
    expect(new DateTime("2454101.5", { engine, format: "jd" }).date).toBe("2007:001:00:00:00.000");
    expect(new DateTime(2001.5, { engine, format: "frac_year" }).date).toBe("2001:183:12:00:00.000");
  });

  it("round-trips numday before the MET epoch", () => {
    const numday = new DateTime("1997:001:00:00:00.000", { engine }).numday;
    expect(numday.startsWith("-364:23:58:56.8")).toBe(true);
    expect(new DateTime(numday, { engine, format: "numday" }).date).toBe("1997:001:00:00:00.000");
    expect(engine.convert(numday, { fmtOut: "date" })).toBe("1997:001:00:00:00.000");
  });

  it("round-trips frac_year", () => {
    expect(new DateTime("2001:183:12:00:00", { engine }).fracYear).toBeCloseTo(2001.5, 9);
  });

  it("copies another handle", () => {
    const original = new DateTime("2454101.5", { engine, format: "jd" });
    const copy = new DateTime(original);
    expect(copy.value).toBe("2454101.5");
    expect(copy.format).toBe("jd");
    expect(copy.engine).toBe(engine);
    expect(new DateTime(original, { format: "mjd" }).format).toBe("mjd");
  });

  it("rejects values it cannot hold", () => {
    // Plain JS callers are not held to the signature.
    expect(() => Reflect.construct(DateTime, [{ when: "today" }, { engine }])).toThrow(
      "Unrecognized input value: an object",
    );
    expect(() => Reflect.construct(DateTime, [true, { engine }])).toThrow("Unrecognized input value: boolean true");
    expect(() => Reflect.construct(DateTimeBatch, ["2007:001", { engine }])).toThrow(
      "Unrecognized input value: string 2007:001",
    );
  });

  describe("arithmetic", () => {
    it("adds and subtracts days", () => {
      const t = new DateTime("2007:001", { engine });
      expect(t.plus(7).date).toBe("2007:008:00:00:00.000");
      expect(t.plus(7).format).toBe("jd");
      expect(t.minus(1).date).toBe("2006:365:00:00:00.000");
      expect(t.plus(0.5).date).toBe("2007:001:12:00:00.000");
    });

    it("takes the difference of two handles in days", () => {
      const a = new DateTime("2007:008", { engine });
      const b = new DateTime("2007:001", { engine });
      expect(a.minus(b)).toBe(7);
      expect(b.minus(a)).toBe(-7);
    });

    it("broadcasts a scalar handle against arrays", () => {
      const t = new DateTime("2007:011", { engine });
      expect(t.plus([1, 2]).date).toEqual(["2007:012:00:00:00.000", "2007:013:00:00:00.000"]);
      expect(t.minus(new DateTimeBatch(["2007:001", "2007:006"], { engine }))).toEqual([10, 5]);
    });

    it("adds element-wise over batches", () => {
      const days = new DateTimeBatch(["2007:001", "2007:002"], { engine });
      expect(days.plus([3, 4]).date).toEqual(["2007:004:00:00:00.000", "2007:006:00:00:00.000"]);
      expect(days.minus([7, 6]).date).toEqual(["2006:359:00:00:00.000", "2006:361:00:00:00.000"]);
      expect(days.plus(1).yearDoy).toEqual(["2007:002", "2007:003"]);
    });

    it("requires matching shapes", () => {
      const days = new DateTimeBatch(["2007:001", "2007:002"], { engine });
      let caught: unknown;
      try {
        days.plus([1, 2, 3]);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(MissionTimeError);
      expect(caught).toMatchObject({
        kind: "ShapeMismatch",
        message: "Shape mismatch at []: 2 elements against 3",
      });
    });
  });

  describe("day boundaries", () => {
    it("rounds down to the start of the day", () => {
      expect(new DateTime("1996365.010203", { engine }).dayStart().iso).toBe("1996-12-30 00:00:00.000");
      expect(new DateTime("1996367.010203", { engine }).dayStart().iso).toBe("1997-01-01 00:00:00.000");
    });

    it("rounds up to the start of the next day", () => {
      expect(new DateTime("1996365.010203", { engine }).dayEnd().iso).toBe("1996-12-31 00:00:00.000");
      expect(new DateTime("1996366.010203", { engine }).dayEnd().iso).toBe("1997-01-01 00:00:00.000");
    });

    it("works on batches", () => {
      const batch = new DateTimeBatch(["1996365.010203", "1996366.010203"], { engine });
      expect(batch.dayStart().iso).toEqual(["1996-12-30 00:00:00.000", "1996-12-31 00:00:00.000"]);
      expect(batch.dayEnd().iso).toEqual(["1996-12-31 00:00:00.000", "1997-01-01 00:00:00.000"]);
    });
  });

  describe("now", () => {
    it("is fixed when the handle is built", () => {
      let clock = 1_000_000_000;
      const ticking = testEngine({ clock: () => clock++ });
      const first = new DateTime(undefined, { engine: ticking });
      expect(first.value).toBe("1000000000.0");
      expect(first.format).toBe("unix");
      expect(first.unix).toBeCloseTo(1_000_000_000, 5);
      expect(first.unix).toBeCloseTo(1_000_000_000, 5);
      expect(new DateTime(NOW, { engine: ticking }).value).toBe("1000000001.0");
    });

    it("reads the environment override", () => {
      const pinned = testEngine({ env: { [NOW_ENV_VAR]: "2010:001" } });
      const t = new DateTime(NOW, { engine: pinned });
      expect(t.value).toBe("2010:001");
      expect(t.format).toBeUndefined();
      expect(t.date).toBe("2010:001:00:00:00.000");
      expect(DateTime.fromExternal(NOW, { engine: pinned }).date).toBe("2010:001:00:00:00.000");
    });

    it("cannot take a format", () => {
      expect(() => new DateTime(undefined, { engine, format: "secs" })).toThrow(
        "Cannot supply format 'secs' without an input value",
      );
    });
  });

  describe("fromExternal", () => {
    it("uses the object's MET seconds", () => {
      const t = DateTime.fromExternal({ date: "1998:001:00:00:01.234", secs: 64.418 }, { engine });
      expect(t.format).toBe("secs");
      expect(t.date).toBe("1998:001:00:00:01.234");
    });

    it("rejects anything else", () => {
      expect(() => DateTime.fromExternal({ date: "1998:001" }, { engine })).toThrow(
        "Unrecognized time object: an object",
      );
      expect(() => DateTime.fromExternal(42, { engine })).toThrow("Unrecognized time object: number 42");
      expect(() => DateTime.fromExternal(null, { engine })).toThrow("Unrecognized time object: null");
    });
  });

  describe("calendar attributes", () => {
    it("splits one time", () => {
      const t = new DateTime("2015:160:02:24:01.250", { engine });
      expect(t.calendarAttributes).toEqual({
        year: 2015,
        yday: 160,
        hour: 2,
        min: 24,
        sec: 1.25,
        mon: 6,
        day: 9,
        wday: 1,
      });
      expect(t.calendarAttributes).toBe(t.calendarAttributes);
    });

    it("exposes each attribute through its own getter", () => {
      const t = new DateTime("2015:160:02:24:01.250", { engine });
      const batch = new DateTimeBatch([["2015:160:02:24:01.250"]], { engine });
      for (const name of CALENDAR_ATTRIBUTE_NAMES) {
        expect(t[name]).toBe(t.calendarAttributes[name]);
        expect(batch[name]).toEqual([[t.calendarAttributes[name]]]);
      }
    });

    it("shows 60 seconds inside a leap second", () => {
      const t = new DateTime("2015:181:23:59:60.500", { engine });
      expect([t.hour, t.min, t.sec]).toEqual([23, 59, 60.5]);
      expect([t.mon, t.day]).toEqual([6, 30]);
    });

    it("splits every element of a batch", () => {
      const batch = new DateTimeBatch(
        ["2015:160:02:24:01.250", "2015:161:03:24:02.250", "2015:162:04:24:03.250"],
        { engine },
      );
      expect(batch.year).toEqual([2015, 2015, 2015]);
      expect(batch.yday).toEqual([160, 161, 162]);
      expect(batch.hour).toEqual([2, 3, 4]);
      expect(batch.min).toEqual([24, 24, 24]);
      expect(batch.sec).toEqual([1.25, 2.25, 3.25]);
      expect(batch.mon).toEqual([6, 6, 6]);
      expect(batch.day).toEqual([9, 10, 11]);
      expect(batch.wday).toEqual([1, 2, 3]);
    });

    it("counts weekdays from Monday", () => {
      expect(new DateTime("2015:159:23:59:59", { engine }).wday).toBe(0);
      expect(new DateTime("2015:165", { engine }).wday).toBe(6);
      expect(new DateTime("2015:158", { engine }).wday).toBe(6);
    });
  });
});

describe("DateTimeBatch", () => {
  const engine = testEngine();

  it("keeps nesting in every output", () => {
    const batch = new DateTimeBatch([["2007:001"], ["2007:002", "2007:003"]], { engine });
    expect(batch.yearMonDay).toEqual([["2007-01-01"], ["2007-01-02", "2007-01-03"]]);
    expect(batch.jd).toEqual([[2_454_101.5], [2_454_102.5, 2_454_103.5]]);
  });

  it("copies another batch", () => {
    const original = new DateTimeBatch([733_773], { engine, format: "plotdate" });
    const copy = new DateTimeBatch(original);
    expect(copy.format).toBe("plotdate");
    expect(copy.date).toEqual(["2010:001:00:00:00.000"]);
  });
});

describe("dateTime", () => {
  const engine = testEngine();

  it("picks the handle type from the input", () => {
    expect(dateTime(["2007:001"], { engine })).toBeInstanceOf(DateTimeBatch);
    expect(dateTime("2007:001", { engine })).toBeInstanceOf(DateTime);
    expect(dateTime(dateTime(["2007:001"], { engine }))).toBeInstanceOf(DateTimeBatch);
    expect(dateTime(NOW, { engine }).date).toBe("2007:001:00:00:00.000");
  });
});
