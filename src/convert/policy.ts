// ─── Overlap Resolution Policy ──────────────────────────────────────────────
//
// Which single pitch a monophonic beeper sounds while several notes overlap.
// Parsed once per conversion into a selector; the sweep never re-dispatches
// on the policy name.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { ConversionError } from "./errors.js";

export const OVERLAP_POLICIES = ["highest", "lowest", "average"] as const;

export const OverlapPolicySchema = z.enum(OVERLAP_POLICIES);

export type OverlapPolicy = z.infer<typeof OverlapPolicySchema>;

/**
 * Picks one pitch from the sounding multiset.
 * `pitches` lists each distinct pitch once with its instance count.
 */
export type PitchSelector = (pitches: ReadonlyMap<number, number>) => number;

/**
 * Validate a user-supplied policy value.
 * Throws ConversionError("InvalidPolicy") for anything outside the enum.
 */
export function parsePolicy(value: unknown): OverlapPolicy {
  const result = OverlapPolicySchema.safeParse(value);
  if (!result.success) {
    throw new ConversionError(
      "InvalidPolicy",
      `Unknown overlap policy ${JSON.stringify(value)}. Available: ${OVERLAP_POLICIES.join(", ")}`
    );
  }
  return result.data;
}

/** Resolve a policy to its selector. */
export function selectorFor(policy: OverlapPolicy): PitchSelector {
  switch (policy) {
    case "highest":
      return (pitches) => Math.max(...pitches.keys());
    case "lowest":
      return (pitches) => Math.min(...pitches.keys());
    case "average":
      return averagePitch;
  }
}

/**
 * Mean of every sounding instance, rounded to the nearest MIDI pitch.
 * Halves round up (toward the higher pitch).
 */
function averagePitch(pitches: ReadonlyMap<number, number>): number {
  let sum = 0;
  let count = 0;
  for (const [pitch, instances] of pitches) {
    sum += pitch * instances;
    count += instances;
  }
  return Math.round(sum / count);
}
