/** Millisecond wall clock; replaced by a replay clock when reading recorded runs. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Seconds between two clock readings, rounded to milliseconds. */
export const elapsedSeconds = (startMs: number, endMs: number): number =>
  Math.round(Math.max(0, endMs - startMs)) / 1000;
