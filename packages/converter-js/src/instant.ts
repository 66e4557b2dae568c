import type { TimeSystemCode } from "@mission-time/converter-contract";
import { assertNever } from "@mission-time/core";

import type { LeapSecondTable } from "./leapSeconds.js";
import { entryIndexOn, leapMjdAt, taiMinusUtcAt } from "./leapSeconds.js";

export const DAY2SEC = 86_400;
export const SEC2DAY = 1 / DAY2SEC;

/** JD - MJD. */
export const MJD0 = 2_400_000.5;
/** TT - TAI in seconds. */
export const TAI2TT = 32.184;

/** MET reference epoch: MJD 50814.0 TT (1998-01-01T00:00:00 TT). */
export const MJD_REF = 50_814;
/** TAI - UTC at the reference epoch. */
export const REF_LEAPS = 31;

// Slack when comparing instants against leap-second boundaries, in seconds.
const BOUNDARY_EPS = 1e-6;

/** A TT instant as a Modified Julian Day, `0 <= mjdFrac < 1`. */
export type Instant = {
  mjdInt: number;
  mjdFrac: number;
};

export type LeapState = {
  /** TAI - UTC in effect. */
  leaps: number;
  /** Whether the instant falls inside an inserted leap second (`23:59:60`). */
  inLeapSecond: boolean;
};

/** Fold a day count plus an unnormalised fraction into an {@link Instant}. */
export function normalize(day: number, fraction: number): Instant {
  const whole = Math.floor(fraction);
  let mjdInt = day + whole;
  let mjdFrac = fraction - whole;
  if (mjdFrac >= 1) {
    mjdFrac -= 1;
    mjdInt += 1;
  }
  return { mjdInt, mjdFrac };
}

/**
 * TAI - UTC in effect at `instant`, and whether the instant falls inside an
 * inserted leap second.
 */
export function leapStateAt(table: LeapSecondTable, instant: Instant): LeapState {
  const { mjdInt, mjdFrac } = instant;
  // TAI seconds past the start of TT day `mjdInt`.
  const taiSeconds = mjdFrac * DAY2SEC - TAI2TT;

  // UTC seconds since the start of leap entry `i`, measured with its offset.
  const sinceEntry = (i: number): number =>
    (mjdInt - leapMjdAt(table, i)) * DAY2SEC + taiSeconds - taiMinusUtcAt(table, i);

  let i = entryIndexOn(table, Math.floor(mjdInt + taiSeconds * SEC2DAY));
  if (i > 0 && sinceEntry(i) < -BOUNDARY_EPS) {
    i--;
    const nextStart = (leapMjdAt(table, i + 1) - leapMjdAt(table, i)) * DAY2SEC;
    return { leaps: taiMinusUtcAt(table, i), inLeapSecond: sinceEntry(i) - nextStart >= -BOUNDARY_EPS };
  }
  return { leaps: taiMinusUtcAt(table, i), inLeapSecond: false };
}

/**
 * Set from seconds since the reference epoch.
 *
 * MET, TT and TAI seconds count uniformly from the reference. UTC seconds
 * additionally absorb the leap seconds inserted since the reference, so one
 * UTC second count covers both `23:59:60` and the following `00:00:00`.
 */
export function instantFromSeconds(
  table: LeapSecondTable,
  seconds: number,
  system: TimeSystemCode,
): Instant {
  const whole = Math.trunc(seconds);
  const days = Math.trunc(whole / DAY2SEC);
  let fraction = (whole - days * DAY2SEC + (seconds - whole)) * SEC2DAY;
  const day = MJD_REF + days;

  switch (system) {
    case "u": {
      // The UTC day is independent of the leap count: TT - UTC = leaps + 32.184.
      const utcDay = Math.floor(day + fraction - (REF_LEAPS + TAI2TT) * SEC2DAY);
      const leaps = taiMinusUtcAt(table, entryIndexOn(table, utcDay));
      fraction += (leaps - REF_LEAPS) * SEC2DAY;
      break;
    }
    case "a":
    case "t":
    case "m":
      break;
    default:
      assertNever(system, "Unknown time system");
  }

  return normalize(day, fraction);
}

/**
 * Set from a day number plus day fraction in `system` (MJD or JD with the
 * integer part already rebased to MJD).
 *
 * A UTC fraction in `[1, 1 + 1s)` is the leap second at the end of `day`.
 */
export function instantFromDay(
  table: LeapSecondTable,
  day: number,
  fraction: number,
  system: TimeSystemCode,
): Instant {
  let offset = 0;

  switch (system) {
    case "u": {
      const lookupDay = fraction >= 1 && fraction < 1 + SEC2DAY ? day : day + Math.floor(fraction);
      offset = taiMinusUtcAt(table, entryIndexOn(table, lookupDay)) + TAI2TT;
      break;
    }
    case "a":
      offset = TAI2TT;
      break;
    case "t":
    case "m":
      break;
    default:
      assertNever(system, "Unknown time system");
  }

  return normalize(day, fraction + offset * SEC2DAY);
}

/** Seconds since the reference epoch, in `system`. */
export function instantToSeconds(
  table: LeapSecondTable,
  instant: Instant,
  system: TimeSystemCode,
): number {
  const met = (instant.mjdInt - MJD_REF) * DAY2SEC + instant.mjdFrac * DAY2SEC;

  switch (system) {
    case "u":
      return met - leapStateAt(table, instant).leaps + REF_LEAPS;
    case "a":
    case "t":
    case "m":
      return met;
    default:
      return assertNever(system, "Unknown time system");
  }
}

/** Offset of `system` behind TT at `instant`, in seconds. */
function secondsBehindTT(table: LeapSecondTable, instant: Instant, system: TimeSystemCode): number {
  switch (system) {
    case "u":
      return leapStateAt(table, instant).leaps + TAI2TT;
    case "a":
      return TAI2TT;
    case "t":
    case "m":
      return 0;
    default:
      return assertNever(system, "Unknown time system");
  }
}

/** Modified Julian Day (or Julian Day when `julian`) in `system`. */
export function instantToDay(
  table: LeapSecondTable,
  instant: Instant,
  system: TimeSystemCode,
  julian: boolean,
): number {
  const base = julian ? MJD0 : 0;
  return base + instant.mjdInt + (instant.mjdFrac - secondsBehindTT(table, instant, system) * SEC2DAY);
}

/**
 * Day number and fraction in `system`, ready for calendar formatting.
 *
 * MET dates read as TT. During a UTC leap second the result is backed off by
 * one second and `inLeapSecond` is set, so callers print `23:59:60.x`.
 */
export function instantToSystemDay(
  table: LeapSecondTable,
  instant: Instant,
  system: TimeSystemCode,
): { day: number; fraction: number; inLeapSecond: boolean } {
  const behind = secondsBehindTT(table, instant, system);
  let { mjdInt: day, mjdFrac: fraction } = normalize(instant.mjdInt, instant.mjdFrac - behind * SEC2DAY);

  const inLeapSecond = system === "u" && leapStateAt(table, instant).inLeapSecond;
  if (inLeapSecond) {
    ({ mjdInt: day, mjdFrac: fraction } = normalize(day, fraction - SEC2DAY));
  }

  return { day, fraction, inLeapSecond };
}
