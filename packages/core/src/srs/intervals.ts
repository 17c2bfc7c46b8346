export const SECONDS_PER_DAY = 24 * 60 * 60;

export const INITIAL_INTERVAL_SECONDS = SECONDS_PER_DAY;

export const MASTERY_INTERVAL_SECONDS = 60 * SECONDS_PER_DAY;

export interface IntervalBand {
  /** Exclusive upper bound of the current interval, in seconds. */
  below: number;
  next: number;
}

export const INTERVAL_LADDER: readonly IntervalBand[] = [
  { below: 2 * SECONDS_PER_DAY, next: 3 * SECONDS_PER_DAY },
  { below: 5 * SECONDS_PER_DAY, next: 7 * SECONDS_PER_DAY },
  { below: 10 * SECONDS_PER_DAY, next: 14 * SECONDS_PER_DAY },
  { below: 20 * SECONDS_PER_DAY, next: 30 * SECONDS_PER_DAY },
];

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}
