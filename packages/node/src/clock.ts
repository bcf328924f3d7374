import { performance } from "node:perf_hooks";
import { hrtime } from "node:process";
import type { PackClock, WallTime } from "@tracepack/core";

/**
 * Nanosecond clock for packs: hrtime for continuous time, and the
 * performance timeline's origin for a sub-millisecond wall clock.
 */
export const hrtimePackClock: PackClock = Object.freeze({
  continuousNs(): bigint {
    return hrtime.bigint();
  },
  wallTime(): WallTime {
    const ms = performance.timeOrigin + performance.now();
    const seconds = Math.floor(ms / 1000);
    const nanos = Math.min(999_999_999, Math.round((ms - seconds * 1000) * 1_000_000));
    return { seconds: BigInt(seconds), nanos };
  },
});
