import { describe, it, expect } from "vitest";
import {
  midiToFrequency,
  pitchToFrequency,
  segmentIntervals,
  soundingEndSeconds,
  totalDurationMs,
} from "./segment.js";
import type { EffectivePitch, PitchInterval } from "./types.js";

function iv(startSeconds: number, endSeconds: number, effectivePitch: EffectivePitch): PitchInterval {
  return { startSeconds, endSeconds, effectivePitch };
}

describe("midiToFrequency", () => {
  it("rounds equal-tempered frequencies to whole Hz", () => {
    expect(midiToFrequency(69)).toBe(440);
    expect(midiToFrequency(60)).toBe(262);
    expect(midiToFrequency(62)).toBe(294);
    expect(midiToFrequency(64)).toBe(330);
    expect(midiToFrequency(72)).toBe(523);
    expect(midiToFrequency(57)).toBe(220);
  });

  it("maps silence to 0 Hz", () => {
    expect(pitchToFrequency("silence")).toBe(0);
    expect(pitchToFrequency(81)).toBe(880);
  });
});

describe("segmentIntervals", () => {
  it("merges adjacent intervals of the same pitch", () => {
    expect(segmentIntervals([iv(0, 0.5, 60), iv(0.5, 1, 60)])).toEqual([
      { frequencyHz: 262, durationMs: 1000, delayBeforeMs: 0 },
    ]);
  });

  it("turns leading silence into a delay", () => {
    expect(segmentIntervals([iv(0, 0.25, "silence"), iv(0.25, 1, 60)])).toEqual([
      { frequencyHz: 262, durationMs: 750, delayBeforeMs: 250 },
    ]);
  });

  it("turns a gap between notes into the next tone's delay, never a 0 Hz tone", () => {
    const segments = segmentIntervals([iv(0, 0.5, 60), iv(0.5, 1, "silence"), iv(1, 1.5, 64)]);
    expect(segments).toEqual([
      { frequencyHz: 262, durationMs: 500, delayBeforeMs: 0 },
      { frequencyHz: 330, durationMs: 500, delayBeforeMs: 500 },
    ]);
    expect(segments.some((s) => s.frequencyHz === 0)).toBe(false);
  });

  it("adds up consecutive silences", () => {
    expect(segmentIntervals([iv(0, 0.2, "silence"), iv(0.2, 0.5, "silence"), iv(0.5, 1, 60)])).toEqual([
      { frequencyHz: 262, durationMs: 500, delayBeforeMs: 500 },
    ]);
  });

  it("counts an uncovered gap as silence", () => {
    expect(segmentIntervals([iv(0, 0.5, 60), iv(0.75, 1, 62)])).toEqual([
      { frequencyHz: 262, durationMs: 500, delayBeforeMs: 0 },
      { frequencyHz: 294, durationMs: 250, delayBeforeMs: 250 },
    ]);
  });

  it("drops trailing silence", () => {
    expect(segmentIntervals([iv(0, 1, 60), iv(1, 3, "silence")])).toEqual([
      { frequencyHz: 262, durationMs: 1000, delayBeforeMs: 0 },
    ]);
  });

  it("keeps a sub-millisecond tone at 1 ms", () => {
    expect(segmentIntervals([iv(0, 0.0002, 60), iv(0.0002, 1, 64)])).toEqual([
      { frequencyHz: 262, durationMs: 1, delayBeforeMs: 0 },
      { frequencyHz: 330, durationMs: 1000, delayBeforeMs: 0 },
    ]);
  });

  it("rounds boundaries, not durations, so the total does not drift", () => {
    const third = 1 / 3;
    const segments = segmentIntervals([iv(0, third, 60), iv(third, 2 * third, 62), iv(2 * third, 1, 64)]);
    expect(segments.map((s) => s.durationMs)).toEqual([333, 334, 333]);
    expect(totalDurationMs(segments)).toBe(1000);
  });

  it("returns nothing when nothing sounds", () => {
    expect(segmentIntervals([])).toEqual([]);
    expect(segmentIntervals([iv(0, 2, "silence")])).toEqual([]);
  });
});

describe("soundingEndSeconds", () => {
  it("ignores trailing silence", () => {
    expect(soundingEndSeconds([iv(0, 1.5, 60), iv(1.5, 4, "silence")])).toBe(1.5);
    expect(soundingEndSeconds([iv(0, 1, "silence")])).toBe(0);
  });
});

describe("totalDurationMs", () => {
  it("sums delays and durations", () => {
    expect(
      totalDurationMs([
        { frequencyHz: 262, durationMs: 500, delayBeforeMs: 0 },
        { frequencyHz: 330, durationMs: 250, delayBeforeMs: 125 },
      ])
    ).toBe(875);
  });
});
