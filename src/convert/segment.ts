// ─── Tone Segmentation ──────────────────────────────────────────────────────
//
// Turns resolved pitch intervals into beeper commands: equal-tempered
// frequency, whole-millisecond duration, and the silence that precedes it.
// ─────────────────────────────────────────────────────────────────────────────

import type { EffectivePitch, PitchInterval, ToneSegment } from "./types.js";

/** A4 = MIDI 69 = 440 Hz. */
const A4_PITCH = 69;
const A4_HZ = 440;

/**
 * Equal-tempered frequency of a MIDI pitch, rounded to the nearest Hz.
 * 60 → 262, 64 → 330, 69 → 440.
 */
export function midiToFrequency(pitch: number): number {
  return Math.round(A4_HZ * Math.pow(2, (pitch - A4_PITCH) / 12));
}

/** Frequency for an interval's pitch; silence is 0 Hz. */
export function pitchToFrequency(pitch: EffectivePitch): number {
  return pitch === "silence" ? 0 : midiToFrequency(pitch);
}

/**
 * Collapse intervals into tone segments.
 *
 * - consecutive intervals with the same pitch merge
 * - silence (and any uncovered gap) becomes delayBeforeMs of the next tone
 * - trailing silence is dropped
 * - boundaries are rounded to whole ms before differencing, so rounding
 *   error never accumulates; a tone is at least 1 ms long
 */
export function segmentIntervals(intervals: readonly PitchInterval[]): ToneSegment[] {
  const segments: ToneSegment[] = [];
  let pendingDelayMs = 0;
  let previousEndMs = 0;

  for (const run of mergeRuns(intervals)) {
    const startMs = Math.round(run.startSeconds * 1000);
    const endMs = Math.round(run.endSeconds * 1000);
    pendingDelayMs += Math.max(0, startMs - previousEndMs);
    previousEndMs = Math.max(previousEndMs, endMs);

    if (run.effectivePitch === "silence") {
      pendingDelayMs += Math.max(0, endMs - startMs);
      continue;
    }

    segments.push({
      frequencyHz: midiToFrequency(run.effectivePitch),
      durationMs: Math.max(1, endMs - startMs),
      delayBeforeMs: pendingDelayMs,
    });
    pendingDelayMs = 0;
  }

  return segments;
}

/** End of the last sounding interval in seconds, or 0 when nothing sounds. */
export function soundingEndSeconds(intervals: readonly PitchInterval[]): number {
  for (let i = intervals.length - 1; i >= 0; i--) {
    if (intervals[i].effectivePitch !== "silence") return intervals[i].endSeconds;
  }
  return 0;
}

/** Σ delayBeforeMs + durationMs. */
export function totalDurationMs(segments: readonly ToneSegment[]): number {
  return segments.reduce((sum, s) => sum + s.delayBeforeMs + s.durationMs, 0);
}

// ─── Internal ───────────────────────────────────────────────────────────────

function mergeRuns(intervals: readonly PitchInterval[]): PitchInterval[] {
  const runs: PitchInterval[] = [];
  for (const interval of intervals) {
    const last = runs[runs.length - 1];
    if (
      last !== undefined &&
      last.effectivePitch === interval.effectivePitch &&
      last.endSeconds === interval.startSeconds
    ) {
      last.endSeconds = interval.endSeconds;
    } else {
      runs.push({ ...interval });
    }
  }
  return runs;
}
