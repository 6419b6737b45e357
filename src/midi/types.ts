// ─── MIDI Source Types ──────────────────────────────────────────────────────
//
// Tick-based note and tempo data read from a standard MIDI file, plus the
// seconds-based events the conversion pipeline derives from it.
// ─────────────────────────────────────────────────────────────────────────────

/** Note-on or note-off. */
export type NoteKind = "noteOn" | "noteOff";

/** A note event exactly as read from one track. */
export interface RawNoteEvent {
  /** MIDI channel (0–15). */
  readonly channel: number;
  /** MIDI note number (0–127). 60 = middle C. */
  readonly pitch: number;
  /** Velocity (0–127). A noteOn at velocity 0 means note off. */
  readonly velocity: number;
  /** Absolute position in ticks from the start of the track. */
  readonly tick: number;
  readonly kind: NoteKind;
}

/** A tempo change with absolute tick position. */
export interface TempoChange {
  tick: number;
  microsecondsPerQuarter: number;
}

/** A note event placed on the wall clock. */
export interface TimedNoteEvent {
  /** Seconds from the beginning of the performance. */
  timeSeconds: number;
  pitch: number;
  kind: NoteKind;
  /** Source tick, kept for diagnostics. */
  tick: number;
  channel: number;
}

/** Everything the converter needs from a MIDI file. */
export interface MidiSource {
  /** MIDI format (0 = single track, 1 = multi-track, 2 = multi-song). */
  format: number;
  /** Ticks per quarter note. 0 for SMPTE-timed files. */
  ticksPerQuarter: number;
  /** Tempo changes from every track, ordered by tick. */
  tempoChanges: TempoChange[];
  /** Note events per track, in file order. */
  tracks: RawNoteEvent[][];
  /** Track names found in the file (from track name meta events). */
  trackNames: string[];
}
