/**
 * packages/core/src/clock.ts — Timestamp sources for pack headers.
 *
 * Why: A pack records both a continuous (monotonic) timestamp and the wall
 * clock at the moment of the call. Tests and alternate runtimes inject their
 * own clock; the default uses only globals present in every JS host.
 */

export type WallTime = Readonly<{
  seconds: bigint;
  /** 0..999_999_999 */
  nanos: number;
}>;

export interface PackClock {
  /** Monotonic nanoseconds; never decreases within a process. */
  continuousNs(): bigint;
  wallTime(): WallTime;
}

export const defaultPackClock: PackClock = Object.freeze({
  continuousNs(): bigint {
    return BigInt(Math.round(performance.now() * 1_000_000));
  },
  wallTime(): WallTime {
    const ms = Date.now();
    const seconds = Math.floor(ms / 1000);
    return { seconds: BigInt(seconds), nanos: (ms - seconds * 1000) * 1_000_000 };
  },
});

/**
 * Clock returning fixed values. Useful for byte-exact pack assertions.
 */
export function createFixedPackClock(continuousNs: bigint, wall: WallTime): PackClock {
  return Object.freeze({
    continuousNs: () => continuousNs,
    wallTime: () => wall,
  });
}
