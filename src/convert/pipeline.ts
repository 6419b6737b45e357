// ─── MIDI → Beep Conversion Pipeline ────────────────────────────────────────
//
// MidiSource → TempoMap → timed events → pitch intervals → tone segments.
// Synchronous and side-effect free apart from logging. Either a complete
// result comes back or a ConversionError is thrown; nothing partial escapes.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiSource } from "../midi/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { ConversionError, describeConversionError } from "./errors.js";
import { parsePolicy } from "./policy.js";
import { TempoMap } from "./tempo-map.js";
import { extractWithTempoMap } from "./extract.js";
import { resolveOverlaps } from "./resolve.js";
import { segmentIntervals, soundingEndSeconds, totalDurationMs } from "./segment.js";
import { emitBeepScript, emitGrubTune, type ScriptSeparator } from "./emit.js";
import type { ConversionResult, ConversionWarning } from "./types.js";

export interface ConvertOptions {
  /** "highest" | "lowest" | "average". Unvalidated input is accepted and checked. Default: "highest". */
  policy?: unknown;
  /** Keep only these MIDI channels (0–15). */
  channels?: readonly number[];
  logger?: Logger;
}

export type ConversionOutcome =
  | { ok: true; result: ConversionResult }
  | { ok: false; error: ConversionError };

export type ScriptFormat = "sh" | "grub";

export interface RenderOptions {
  format?: ScriptFormat;
  separator?: ScriptSeparator;
  command?: string;
}

/**
 * Convert a parsed MIDI source into tone segments.
 *
 * Policy, channels and tempo map are validated before any event is touched.
 * A source with nothing audible yields an empty result carrying a
 * NoSoundableEvents warning.
 */
export function convertMidi(source: MidiSource, options: ConvertOptions = {}): ConversionResult {
  const log = options.logger ?? silentLogger;
  const policy = parsePolicy(options.policy ?? "highest");
  validateChannels(options.channels);
  const tempoMap = new TempoMap(source.ticksPerQuarter, source.tempoChanges);

  const extraction = extractWithTempoMap(source.tracks, tempoMap, { channels: options.channels });
  const intervals = resolveOverlaps(extraction.events, policy);
  const segments = segmentIntervals(intervals);

  const warnings: ConversionWarning[] = [...extraction.warnings];
  for (const w of extraction.warnings) {
    log.debug(`${w.kind} at tick ${w.tick ?? "?"}: ${w.message}`);
  }

  if (segments.length === 0) {
    const message = extraction.noteOnCount === 0
      ? "No note-on events in the input; nothing to play"
      : `${extraction.noteOnCount} note-on event(s) but none sounds for any length of time`;
    warnings.push({ kind: "NoSoundableEvents", message });
    log.warn(message);
  }

  const durationSeconds = soundingEndSeconds(intervals);
  log.info(
    `Converted ${extraction.noteOnCount} note(s) into ${segments.length} segment(s), ` +
      `${durationSeconds.toFixed(3)}s, policy ${policy}`
  );

  return {
    policy,
    segments,
    durationSeconds,
    totalDurationMs: totalDurationMs(segments),
    noteCount: extraction.noteOnCount,
    warnings,
  };
}

/**
 * convertMidi, with ConversionErrors returned instead of thrown.
 * Anything else (a bug) still throws.
 */
export function safeConvertMidi(source: MidiSource, options: ConvertOptions = {}): ConversionOutcome {
  try {
    return { ok: true, result: convertMidi(source, options) };
  } catch (err) {
    if (err instanceof ConversionError) {
      options.logger?.error(describeConversionError(err));
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Render a result as script text, or null when there is nothing to play.
 */
export function renderScript(result: ConversionResult, options: RenderOptions = {}): string | null {
  if (result.segments.length === 0) return null;
  return options.format === "grub"
    ? emitGrubTune(result.segments)
    : emitBeepScript(result.segments, { separator: options.separator, command: options.command });
}

// ─── Internal ───────────────────────────────────────────────────────────────

function validateChannels(channels: readonly number[] | undefined): void {
  if (!channels) return;
  for (const ch of channels) {
    if (!Number.isInteger(ch) || ch < 0 || ch > 15) {
      throw new ConversionError("InvalidChannel", `MIDI channel must be an integer 0–15: got ${ch}`);
    }
  }
}
