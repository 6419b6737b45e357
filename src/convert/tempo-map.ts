// ─── Tick-to-Time Conversion ────────────────────────────────────────────────
//
// Converts absolute MIDI ticks to seconds across tempo changes. One
// checkpoint is precomputed per tempo change; any tick is then resolved by
// binary search for the checkpoint in effect plus a linear remainder.
// ─────────────────────────────────────────────────────────────────────────────

import { ConversionError } from "./errors.js";
import type { TempoChange } from "../midi/types.js";

/** 120 BPM, the MIDI default until the first SetTempo. */
export const DEFAULT_MICROSECONDS_PER_QUARTER = 500_000;

interface Checkpoint {
  tick: number;
  seconds: number;
  microsecondsPerQuarter: number;
}

export class TempoMap {
  readonly ticksPerQuarter: number;
  private readonly checkpoints: Checkpoint[];

  /**
   * @param ticksPerQuarter MIDI resolution; must be a positive integer.
   * @param changes Tempo changes in non-decreasing tick order. A change at
   *   tick 0 is implied at 120 BPM when absent. Same-tick changes: last wins.
   */
  constructor(ticksPerQuarter: number, changes: readonly TempoChange[] = []) {
    if (!Number.isInteger(ticksPerQuarter) || ticksPerQuarter <= 0) {
      throw new ConversionError(
        "MalformedTempoMap",
        `Ticks per quarter note must be a positive integer: got ${ticksPerQuarter}`
      );
    }
    this.ticksPerQuarter = ticksPerQuarter;
    this.checkpoints = this.buildCheckpoints(changes);
  }

  /** Absolute seconds at the given tick. */
  toSeconds(tick: number): number {
    if (tick < 0) {
      throw new RangeError(`Tick must be non-negative: got ${tick}`);
    }
    const cp = this.checkpoints[this.checkpointIndex(tick)];
    return cp.seconds + this.span(tick - cp.tick, cp.microsecondsPerQuarter);
  }

  /** Tempo in BPM in effect at the given tick. */
  bpmAt(tick: number): number {
    const cp = this.checkpoints[this.checkpointIndex(Math.max(0, tick))];
    return 60_000_000 / cp.microsecondsPerQuarter;
  }

  /** Number of distinct tempo segments (after defaulting and same-tick collapse). */
  get segmentCount(): number {
    return this.checkpoints.length;
  }

  // ─── Internal ───────────────────────────────────────────────────────────

  private span(ticks: number, microsecondsPerQuarter: number): number {
    return (ticks / this.ticksPerQuarter) * (microsecondsPerQuarter / 1_000_000);
  }

  private buildCheckpoints(changes: readonly TempoChange[]): Checkpoint[] {
    const checkpoints: Checkpoint[] = [
      { tick: 0, seconds: 0, microsecondsPerQuarter: DEFAULT_MICROSECONDS_PER_QUARTER },
    ];
    let previousTick = 0;

    for (const change of changes) {
      if (!Number.isFinite(change.tick) || change.tick < 0) {
        throw new ConversionError(
          "MalformedTempoMap",
          `Tempo change at negative or invalid tick ${change.tick}`,
          { tick: change.tick }
        );
      }
      if (change.tick < previousTick) {
        throw new ConversionError(
          "MalformedTempoMap",
          `Tempo changes are not in tick order: ${change.tick} follows ${previousTick}`,
          { tick: change.tick }
        );
      }
      if (!Number.isFinite(change.microsecondsPerQuarter) || change.microsecondsPerQuarter <= 0) {
        throw new ConversionError(
          "MalformedTempoMap",
          `Tempo must be a positive number of microseconds per quarter: got ${change.microsecondsPerQuarter}`,
          { tick: change.tick }
        );
      }
      previousTick = change.tick;

      const last = checkpoints[checkpoints.length - 1];
      if (change.tick === last.tick) {
        last.microsecondsPerQuarter = change.microsecondsPerQuarter;
        continue;
      }
      checkpoints.push({
        tick: change.tick,
        seconds: last.seconds + this.span(change.tick - last.tick, last.microsecondsPerQuarter),
        microsecondsPerQuarter: change.microsecondsPerQuarter,
      });
    }

    return checkpoints;
  }

  /** Index of the last checkpoint at or before `tick`. */
  private checkpointIndex(tick: number): number {
    let lo = 0;
    let hi = this.checkpoints.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1;
      if (this.checkpoints[mid].tick <= tick) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo;
  }
}
