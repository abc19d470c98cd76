/**
 * Intervals are accepted either as plain seconds or as a duration object
 */

export interface Duration {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
  milliseconds?: number;
}

export type IntervalInput = number | Duration;

export function durationToSeconds(duration: Duration): number {
  return (
    (duration.days ?? 0) * 86_400 +
    (duration.hours ?? 0) * 3_600 +
    (duration.minutes ?? 0) * 60 +
    (duration.seconds ?? 0) +
    (duration.milliseconds ?? 0) / 1_000
  );
}

/**
 * Normalize an interval to seconds; `undefined` and `null` stay absent
 */
export function toSeconds(value: IntervalInput | null | undefined): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return typeof value === "number" ? value : durationToSeconds(value);
}
