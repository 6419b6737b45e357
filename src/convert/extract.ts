// ─── Event Extraction ───────────────────────────────────────────────────────
//
// Merges every track's note events into one stream on the wall clock.
//
// Note-offs are paired with note-ons in file order (tick, track, position
// in track) per channel and pitch. The paired stream is then ordered by
// tick, note-off before note-on, track, position. A note ending and another
// starting at the same instant therefore never overlap.
//
// Recovery rules:
//   - noteOn at velocity 0 is a noteOff
//   - a noteOff with nothing open on its channel/pitch is dropped
//   - a note released at the tick it was struck is dropped; it never sounds
//   - notes still open at the end close at the last event's time
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiSource, NoteKind, RawNoteEvent, TimedNoteEvent } from "../midi/types.js";
import type { ConversionWarning } from "./types.js";
import { TempoMap } from "./tempo-map.js";

export interface ExtractOptions {
  /** Keep only these MIDI channels (0–15). All channels when omitted. */
  channels?: readonly number[];
}

export interface ExtractionResult {
  events: TimedNoteEvent[];
  /**
   * Note-on events seen after channel filtering (velocity > 0), counted
   * before zero-length and final-tick notes are dropped.
   */
  noteOnCount: number;
  warnings: ConversionWarning[];
}

interface SortableEvent {
  channel: number;
  pitch: number;
  tick: number;
  kind: NoteKind;
  track: number;
  index: number;
}

/**
 * Flatten all tracks of a MIDI source into ordered, timed note events.
 * Builds the tempo map from the source; a malformed one throws.
 */
export function extractTimedEvents(
  source: MidiSource,
  options: ExtractOptions = {}
): ExtractionResult {
  const tempoMap = new TempoMap(source.ticksPerQuarter, source.tempoChanges);
  return extractWithTempoMap(source.tracks, tempoMap, options);
}

/**
 * Same as extractTimedEvents, with a tempo map the caller already built.
 */
export function extractWithTempoMap(
  tracks: readonly (readonly RawNoteEvent[])[],
  tempoMap: TempoMap,
  options: ExtractOptions = {}
): ExtractionResult {
  const warnings: ConversionWarning[] = [];
  const merged = mergeTracks(tracks, options.channels);
  const noteOnCount = merged.filter((e) => e.kind === "noteOn").length;

  const open = new Map<string, SortableEvent[]>();
  const dropped = new Set<SortableEvent>();
  const kept: SortableEvent[] = [];

  for (const event of merged) {
    const key = noteKey(event.channel, event.pitch);
    const sounding = open.get(key) ?? [];

    if (event.kind === "noteOn") {
      sounding.push(event);
      open.set(key, sounding);
      kept.push(event);
      continue;
    }

    const latest = sounding[sounding.length - 1];
    if (latest === undefined) {
      warnings.push({
        kind: "UnmatchedNoteOff",
        message: `Note-off for pitch ${event.pitch} on channel ${event.channel} with no sounding note`,
        tick: event.tick,
        timeSeconds: tempoMap.toSeconds(event.tick),
      });
    } else if (latest.tick === event.tick) {
      sounding.pop();
      dropped.add(latest);
    } else {
      sounding.shift();
      kept.push(event);
    }
  }

  const ordered = kept.filter((e) => !dropped.has(e)).sort(compareEvents);
  const closed = closeOpenNotes(ordered, open, merged, tempoMap, warnings);

  return {
    events: closed.map((e) => ({
      timeSeconds: tempoMap.toSeconds(e.tick),
      pitch: e.pitch,
      kind: e.kind,
      tick: e.tick,
      channel: e.channel,
    })),
    noteOnCount,
    warnings,
  };
}

// ─── Internal ───────────────────────────────────────────────────────────────

function noteKey(channel: number, pitch: number): string {
  return `${channel}:${pitch}`;
}

function mergeTracks(
  tracks: readonly (readonly RawNoteEvent[])[],
  channels: readonly number[] | undefined
): SortableEvent[] {
  const allowed = channels ? new Set(channels) : null;
  const merged: SortableEvent[] = [];

  tracks.forEach((track, trackIndex) => {
    track.forEach((event, index) => {
      if (allowed && !allowed.has(event.channel)) return;
      merged.push({
        channel: event.channel,
        pitch: event.pitch,
        tick: event.tick,
        kind: event.kind === "noteOn" && event.velocity === 0 ? "noteOff" : event.kind,
        track: trackIndex,
        index,
      });
    });
  });

  // File order; pairing depends on it.
  merged.sort((a, b) => a.tick - b.tick || a.track - b.track || a.index - b.index);
  return merged;
}

/** Playback order: tick, note-off before note-on, track, position in track. */
function compareEvents(a: SortableEvent, b: SortableEvent): number {
  return (
    a.tick - b.tick ||
    kindRank(a.kind) - kindRank(b.kind) ||
    a.track - b.track ||
    a.index - b.index
  );
}

function kindRank(kind: NoteKind): number {
  return kind === "noteOff" ? 0 : 1;
}

/**
 * Terminate notes left open at the end of the stream.
 *
 * Note-ons at the final tick can never sound (nothing follows them), so they
 * are removed. Notes opened earlier get a note-off at the final tick, placed
 * after the existing note-offs at that tick.
 */
function closeOpenNotes(
  ordered: SortableEvent[],
  open: Map<string, SortableEvent[]>,
  merged: readonly SortableEvent[],
  tempoMap: TempoMap,
  warnings: ConversionWarning[]
): SortableEvent[] {
  if (merged.length === 0) return ordered;
  const lastTick = merged[merged.length - 1].tick;
  const lastSeconds = tempoMap.toSeconds(lastTick);

  const silent = new Set<SortableEvent>();
  const stuck: SortableEvent[] = [];
  for (const sounding of open.values()) {
    for (const e of sounding) {
      if (e.tick === lastTick) {
        silent.add(e);
        warnings.push({
          kind: "UnterminatedNoteOn",
          message: `Note-on for pitch ${e.pitch} on channel ${e.channel} at the last event never sounds; dropped`,
          tick: e.tick,
          timeSeconds: lastSeconds,
        });
      } else {
        stuck.push(e);
      }
    }
  }
  open.clear();

  stuck.sort((a, b) => a.channel - b.channel || a.pitch - b.pitch || a.tick - b.tick);
  const closings = stuck.map((e, index): SortableEvent => {
    warnings.push({
      kind: "UnterminatedNoteOn",
      message: `Note ${e.pitch} on channel ${e.channel} never released; closed at the last event`,
      tick: lastTick,
      timeSeconds: lastSeconds,
    });
    return {
      channel: e.channel,
      pitch: e.pitch,
      tick: lastTick,
      kind: "noteOff",
      track: Number.MAX_SAFE_INTEGER,
      index,
    };
  });

  return [...ordered.filter((e) => !silent.has(e)), ...closings];
}
