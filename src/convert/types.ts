// ─── Conversion Types ───────────────────────────────────────────────────────
//
// Intermediate and final products of the MIDI → beep pipeline.
// ─────────────────────────────────────────────────────────────────────────────

import type { OverlapPolicy } from "./policy.js";

/** Effective pitch of an interval: a MIDI pitch, or nothing sounding. */
export type EffectivePitch = number | "silence";

/** A span of the performance during which one effective pitch holds. */
export interface PitchInterval {
  startSeconds: number;
  /** Always greater than startSeconds. */
  endSeconds: number;
  effectivePitch: EffectivePitch;
}

/** One beeper command: wait, then sound one frequency. */
export interface ToneSegment {
  /** Integer Hz. Never 0 in a segmenter's output. */
  readonly frequencyHz: number;
  /** Whole milliseconds, at least 1. */
  readonly durationMs: number;
  /** Silence before the tone, whole milliseconds. */
  readonly delayBeforeMs: number;
}

export type ConversionWarningKind =
  | "NoSoundableEvents"
  | "UnmatchedNoteOff"
  | "UnterminatedNoteOn";

/** A recovered anomaly, reported for diagnostics. */
export interface ConversionWarning {
  kind: ConversionWarningKind;
  message: string;
  tick?: number;
  timeSeconds?: number;
}

/** Output of a complete conversion. */
export interface ConversionResult {
  policy: OverlapPolicy;
  /** Tone segments in play order. Empty when nothing sounds. */
  segments: ToneSegment[];
  /** End of the last sounding note, in seconds. */
  durationSeconds: number;
  /** Σ delayBeforeMs + durationMs over all segments. */
  totalDurationMs: number;
  /**
   * Audible note-on events read from the selected channels, including ones
   * later dropped because they never sound.
   */
  noteCount: number;
  warnings: ConversionWarning[];
}
