// ─── MIDI File Reader ───────────────────────────────────────────────────────
//
// Reads a standard MIDI file with midi-file and flattens each track's
// delta-timed events into absolute-tick note and tempo events.
// ─────────────────────────────────────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import { parseMidi, type MidiData } from "midi-file";
import type { MidiSource, RawNoteEvent, TempoChange } from "./types.js";

/**
 * Parse a MIDI file from disk.
 */
export async function parseMidiFile(path: string): Promise<MidiSource> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new Error(`Cannot read MIDI file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  try {
    return parseMidiBuffer(bytes);
  } catch (err) {
    throw new Error(`Not a valid MIDI file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Parse MIDI bytes already in memory.
 */
export function parseMidiBuffer(bytes: Uint8Array): MidiSource {
  const midi = parseMidi(bytes);

  return {
    format: midi.header.format,
    ticksPerQuarter: midi.header.ticksPerBeat ?? 0,
    tempoChanges: extractTempoChanges(midi),
    tracks: midi.tracks.map(extractNoteEvents),
    trackNames: extractTrackNames(midi),
  };
}

// ─── Internal ───────────────────────────────────────────────────────────────

type MidiTrack = MidiData["tracks"][number];

function extractNoteEvents(track: MidiTrack): RawNoteEvent[] {
  const events: RawNoteEvent[] = [];
  let tick = 0;

  for (const event of track) {
    tick += event.deltaTime;
    if (event.type === "noteOn" || event.type === "noteOff") {
      events.push({
        channel: event.channel,
        pitch: event.noteNumber,
        velocity: event.velocity,
        tick,
        kind: event.type,
      });
    }
  }

  return events;
}

function extractTempoChanges(midi: MidiData): TempoChange[] {
  const changes: TempoChange[] = [];
  for (const track of midi.tracks) {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      if (event.type === "setTempo") {
        changes.push({ tick, microsecondsPerQuarter: event.microsecondsPerBeat });
      }
    }
  }
  // Array.prototype.sort is stable, so same-tick changes keep file order.
  changes.sort((a, b) => a.tick - b.tick);
  return changes;
}

function extractTrackNames(midi: MidiData): string[] {
  const names: string[] = [];
  for (const track of midi.tracks) {
    for (const event of track) {
      if (event.type === "trackName" && event.text.trim() !== "") {
        names.push(event.text.trim());
      }
    }
  }
  return names;
}
