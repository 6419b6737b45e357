// ─── Overlap Resolution ─────────────────────────────────────────────────────
//
// Sweep-line over ordered note events. Between two consecutive event times
// the set of sounding notes is constant; each such span becomes one
// PitchInterval whose pitch is chosen by the overlap policy.
//
// States: idle → sweeping → finished. The active set always holds exactly
// the notes sounding in [openedAt, time of the next event).
// ─────────────────────────────────────────────────────────────────────────────

import type { TimedNoteEvent } from "../midi/types.js";
import type { EffectivePitch, PitchInterval } from "./types.js";
import { selectorFor, type OverlapPolicy, type PitchSelector } from "./policy.js";

export type ResolverState = "idle" | "sweeping" | "finished";

export class OverlapResolver {
  private _state: ResolverState = "idle";
  /** Multiset: pitch → sounding instances. */
  private readonly active = new Map<number, number>();
  private readonly intervals: PitchInterval[] = [];
  private readonly select: PitchSelector;
  private openedAt = 0;
  private lastTime = 0;

  constructor(readonly policy: OverlapPolicy) {
    this.select = selectorFor(policy);
  }

  get state(): ResolverState {
    return this._state;
  }

  /** Number of sounding note instances right now. */
  get activeCount(): number {
    let n = 0;
    for (const count of this.active.values()) n += count;
    return n;
  }

  /** Pitch the beeper would sound right now. */
  currentPitch(): EffectivePitch {
    return this.active.size === 0 ? "silence" : this.select(this.active);
  }

  /**
   * Feed the next event. Events must arrive in non-decreasing time order.
   */
  step(event: TimedNoteEvent): void {
    if (this._state === "finished") {
      throw new Error("OverlapResolver already finished; create a new one per conversion");
    }
    if (event.timeSeconds < this.lastTime) {
      throw new RangeError(
        `Events out of order: ${event.timeSeconds}s after ${this.lastTime}s (tick ${event.tick})`
      );
    }
    this._state = "sweeping";
    this.lastTime = event.timeSeconds;

    if (event.kind === "noteOn") {
      this.closeInterval(event.timeSeconds);
      this.active.set(event.pitch, (this.active.get(event.pitch) ?? 0) + 1);
      return;
    }

    const count = this.active.get(event.pitch);
    if (count === undefined) return; // nothing to release
    this.closeInterval(event.timeSeconds);
    if (count > 1) {
      this.active.set(event.pitch, count - 1);
    } else {
      this.active.delete(event.pitch);
    }
  }

  /**
   * End the sweep. Clears the active set and returns every non-empty interval
   * from time 0 to the last event.
   */
  finish(): PitchInterval[] {
    this.active.clear();
    this._state = "finished";
    return this.intervals;
  }

  // ─── Internal ─────────────────────────────────────────────────────────

  /** Close the span [openedAt, time) with the current pitch and reopen at time. */
  private closeInterval(time: number): void {
    if (time > this.openedAt) {
      this.intervals.push({
        startSeconds: this.openedAt,
        endSeconds: time,
        effectivePitch: this.currentPitch(),
      });
    }
    this.openedAt = time;
  }
}

/**
 * Resolve an ordered event stream into pitch intervals under one policy.
 */
export function resolveOverlaps(
  events: readonly TimedNoteEvent[],
  policy: OverlapPolicy
): PitchInterval[] {
  const resolver = new OverlapResolver(policy);
  for (const event of events) {
    resolver.step(event);
  }
  return resolver.finish();
}
