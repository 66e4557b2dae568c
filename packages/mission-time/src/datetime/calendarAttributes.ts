/** A Monday at 00:00 UTC; day-of-week counts from here. */
export const REFERENCE_MONDAY = "2015:159:00:00:00";

export type CalendarAttributes = {
  readonly year: number;
  readonly yday: number;
  readonly hour: number;
  readonly min: number;
  /** May reach 60 during a leap second. */
  readonly sec: number;
  readonly mon: number;
  readonly day: number;
  /** 0 = Monday .. 6 = Sunday. */
  readonly wday: number;
};

export const CALENDAR_ATTRIBUTE_NAMES = ["year", "yday", "hour", "min", "sec", "mon", "day", "wday"] as const;
export type CalendarAttributeName = (typeof CALENDAR_ATTRIBUTE_NAMES)[number];

/**
 * Split one resolved time into calendar fields.
 *
 * `date` is `YYYY:DDD:hh:mm:ss.sss`, `iso` is `YYYY-MM-DD hh:mm:ss.sss` and
 * `mjd` is the UTC Modified Julian Day of the same instant.
 */
export function decomposeCalendar(date: string, iso: string, mjd: number, mondayMjd: number): CalendarAttributes {
  return {
    year: Number(date.slice(0, 4)),
    yday: Number(date.slice(5, 8)),
    hour: Number(date.slice(9, 11)),
    min: Number(date.slice(12, 14)),
    sec: Number(date.slice(15)),
    mon: Number(iso.slice(5, 7)),
    day: Number(iso.slice(8, 10)),
    wday: ((Math.floor(mjd - mondayMjd) % 7) + 7) % 7,
  };
}
