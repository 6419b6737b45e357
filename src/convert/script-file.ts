// ─── Script Files ───────────────────────────────────────────────────────────
//
// Reads a .mid file, converts it, and writes <outputDir>/<name>.sh (mode 755)
// or <name>.grub for the GRUB tune format.
// ─────────────────────────────────────────────────────────────────────────────

import { chmod, mkdir, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { parseMidiFile } from "../midi/parser.js";
import { convertMidi, renderScript, type ConvertOptions, type RenderOptions } from "./pipeline.js";
import type { ConversionResult } from "./types.js";

export interface WriteScriptOptions extends ConvertOptions, RenderOptions {
  /** Directory for the script. Default: the current working directory. */
  outputDir?: string;
}

export interface WrittenScript {
  /** Where the script was written, or null when there was nothing to play. */
  scriptPath: string | null;
  script: string | null;
  result: ConversionResult;
}

/** File name for the script produced from a MIDI file. */
export function scriptFileName(midiPath: string, format: RenderOptions["format"] = "sh"): string {
  const stem = basename(midiPath, extname(midiPath));
  return `${stem}.${format === "grub" ? "grub" : "sh"}`;
}

/**
 * Convert a MIDI file and write the script beside the other outputs.
 * Conversion happens entirely before anything is written.
 */
export async function writeBeepScript(
  midiPath: string,
  options: WriteScriptOptions = {}
): Promise<WrittenScript> {
  const source = await parseMidiFile(midiPath);
  const result = convertMidi(source, options);
  const script = renderScript(result, options);
  if (script === null) {
    return { scriptPath: null, script: null, result };
  }

  const outputDir = options.outputDir ?? process.cwd();
  await mkdir(outputDir, { recursive: true });
  const scriptPath = join(outputDir, scriptFileName(midiPath, options.format));
  await writeFile(scriptPath, script, "utf8");
  if (options.format !== "grub") {
    await chmod(scriptPath, 0o755);
  }

  options.logger?.info(`Wrote ${scriptPath}`);
  return { scriptPath, script, result };
}
