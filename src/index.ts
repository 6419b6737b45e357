// ─── midi-beeper ────────────────────────────────────────────────────────────
//
// MIDI → monophonic beep script converter with process-backed playback.
//
// Usage:
//   import { parseMidiFile, convertMidi, renderScript } from "midi-beeper";
//   const result = convertMidi(await parseMidiFile("song.mid"), { policy: "highest" });
//   const script = renderScript(result);
// ─────────────────────────────────────────────────────────────────────────────

// MIDI reading
export { parseMidiFile, parseMidiBuffer } from "./midi/parser.js";
export type { MidiSource, RawNoteEvent, TempoChange, TimedNoteEvent, NoteKind } from "./midi/types.js";

// Conversion stages
export { TempoMap, DEFAULT_MICROSECONDS_PER_QUARTER } from "./convert/tempo-map.js";
export { extractTimedEvents, extractWithTempoMap } from "./convert/extract.js";
export type { ExtractOptions, ExtractionResult } from "./convert/extract.js";
export { OverlapResolver, resolveOverlaps } from "./convert/resolve.js";
export type { ResolverState } from "./convert/resolve.js";
export {
  midiToFrequency,
  pitchToFrequency,
  segmentIntervals,
  soundingEndSeconds,
  totalDurationMs,
} from "./convert/segment.js";
export {
  emitBeepScript,
  emitGrubTune,
  formatBeepCommand,
  SCRIPT_SHEBANG,
  GRUB_TEMPO,
} from "./convert/emit.js";
export type { BeepScriptOptions, ScriptSeparator } from "./convert/emit.js";

// Policy
export { OVERLAP_POLICIES, OverlapPolicySchema, parsePolicy, selectorFor } from "./convert/policy.js";
export type { OverlapPolicy, PitchSelector } from "./convert/policy.js";

// Pipeline
export { convertMidi, safeConvertMidi, renderScript } from "./convert/pipeline.js";
export type { ConvertOptions, ConversionOutcome, RenderOptions, ScriptFormat } from "./convert/pipeline.js";
export { writeBeepScript, scriptFileName } from "./convert/script-file.js";
export type { WriteScriptOptions, WrittenScript } from "./convert/script-file.js";

// Errors
export { ConversionError, isConversionError, describeConversionError } from "./convert/errors.js";
export type { ConversionErrorKind, ConversionErrorContext } from "./convert/errors.js";

export type {
  EffectivePitch,
  PitchInterval,
  ToneSegment,
  ConversionResult,
  ConversionWarning,
  ConversionWarningKind,
} from "./convert/types.js";

// Playback
export {
  BeepPlaybackController,
  PlaybackHandle,
  createBeepPlaybackController,
} from "./playback/controls.js";
export type {
  BeepPlaybackState,
  PlaybackEventType,
  StateChangeEvent,
  ExitEvent,
  ErrorEvent,
  AnyPlaybackEvent,
  PlaybackListener,
  PlaybackControlOptions,
} from "./playback/controls.js";
export { createShellRunner } from "./playback/runner.js";
export type { ProcessRunner, RunningProcess, ProcessExit, ShellRunnerOptions } from "./playback/runner.js";

// Settings
export { SettingsSchema, DEFAULT_SETTINGS, validateSettings } from "./config/schema.js";
export type { Settings, SettingsInput, SettingsError } from "./config/schema.js";
export { loadSettings, saveSettings, applySettingAssignments, defaultSettingsPath } from "./config/loader.js";

// Logging
export { createLogger, silentLogger, levelFromEnv, LOG_LEVELS } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
