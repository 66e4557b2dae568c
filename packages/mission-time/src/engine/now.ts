import { formatFloat } from "@mission-time/core";

/** Environment variable holding a literal time that stands in for "now". */
export const NOW_ENV_VAR = "MISSION_TIME_NOW";

/** Unix seconds. */
export type Clock = () => number;

export type Environment = Readonly<Record<string, string | undefined>>;

export const systemClock: Clock = () => Date.now() / 1000;

/** A resolved "now": raw text plus the format to read it with (auto-detect when absent). */
export type NowValue = {
  value: string;
  format?: string;
};

/**
 * Resolve the current time.
 *
 * A non-empty {@link NOW_ENV_VAR} wins and is read with format detection;
 * otherwise the clock is read as `unix` seconds.
 */
export function resolveNow(env: Environment, clock: Clock): NowValue {
  const override = env[NOW_ENV_VAR];
  if (override !== undefined && override.trim() !== "") {
    return { value: override.trim() };
  }
  return { value: formatFloat(clock()), format: "unix" };
}
