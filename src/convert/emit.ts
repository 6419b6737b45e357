// ─── Script Emission ────────────────────────────────────────────────────────
//
// Pure formatting of tone segments. Two targets:
//   - a POSIX shell script, one `beep -f <hz> -l <ms> -D <ms>` per segment
//   - a GRUB tune string (`play` command / GRUB_INIT_TUNE)
// ─────────────────────────────────────────────────────────────────────────────

import { ConversionError } from "./errors.js";
import type { ToneSegment } from "./types.js";

export type ScriptSeparator = "newline" | "semicolon";

export interface BeepScriptOptions {
  /** How commands are chained. Both run strictly in sequence. Default: newline. */
  separator?: ScriptSeparator;
  /** Executable to invoke. Default: "beep". */
  command?: string;
}

export const SCRIPT_SHEBANG = "#!/bin/sh";

/** GRUB duration unit is 60/tempo seconds; 60000 makes it one millisecond. */
export const GRUB_TEMPO = 60_000;

/** One beep invocation for one segment. */
export function formatBeepCommand(segment: ToneSegment, command = "beep"): string {
  return `${command} -f ${segment.frequencyHz} -l ${segment.durationMs} -D ${segment.delayBeforeMs}`;
}

/**
 * Render segments as an executable shell script.
 * Throws ConversionError("EmptySequence") when there is nothing to play.
 */
export function emitBeepScript(
  segments: readonly ToneSegment[],
  options: BeepScriptOptions = {}
): string {
  assertNotEmpty(segments);
  const command = options.command ?? "beep";
  const lines = segments.map((s) => formatBeepCommand(s, command));
  const body = options.separator === "semicolon" ? lines.join(" ; ") : lines.join("\n");
  return `${SCRIPT_SHEBANG}\n${body}\n`;
}

/**
 * Render segments as a GRUB tune: `60000 [0 <delay>] <hz> <ms> …`.
 * A pitch of 0 is a rest, so each delay becomes its own rest pair.
 */
export function emitGrubTune(segments: readonly ToneSegment[]): string {
  assertNotEmpty(segments);
  const parts: number[] = [GRUB_TEMPO];
  for (const s of segments) {
    if (s.delayBeforeMs > 0) parts.push(0, s.delayBeforeMs);
    parts.push(s.frequencyHz, s.durationMs);
  }
  return parts.join(" ");
}

function assertNotEmpty(segments: readonly ToneSegment[]): void {
  if (segments.length === 0) {
    throw new ConversionError("EmptySequence", "No tone segments to emit");
  }
}
