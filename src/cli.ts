#!/usr/bin/env node
// ─── midi-beeper: CLI Entry Point ───────────────────────────────────────────
//
// Usage:
//   midi-beeper                                  # Show help
//   midi-beeper convert song.mid                 # Write song.sh (beep script)
//   midi-beeper convert song.mid --format grub   # Write song.grub (GRUB tune)
//   midi-beeper play song.mid                    # Convert in memory and play
//   midi-beeper play song.sh                     # Play an existing script
//   midi-beeper info song.mid                    # Tracks, tempo, policy preview
//   midi-beeper settings --set policy=lowest     # Persist defaults
// ─────────────────────────────────────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parseMidiFile } from "./midi/parser.js";
import { convertMidi } from "./convert/pipeline.js";
import { writeBeepScript } from "./convert/script-file.js";
import { TempoMap } from "./convert/tempo-map.js";
import { OVERLAP_POLICIES } from "./convert/policy.js";
import { ConversionError, describeConversionError } from "./convert/errors.js";
import type { ConversionResult } from "./convert/types.js";
import type { ScriptFormat } from "./convert/pipeline.js";
import type { ScriptSeparator } from "./convert/emit.js";
import { BeepPlaybackController } from "./playback/controls.js";
import { createShellRunner } from "./playback/runner.js";
import {
  loadSettings,
  saveSettings,
  applySettingAssignments,
  defaultSettingsPath,
} from "./config/loader.js";
import { DEFAULT_SETTINGS, type Settings } from "./config/schema.js";
import { createLogger } from "./logger.js";
import { HELP_TEXT } from "./help.js";

const log = createLogger("midi-beeper");

// ─── Helpers ────────────────────────────────────────────────────────────────

function padRight(s: string, len: number): string {
  return s.length >= len ? s.substring(0, len) : s + " ".repeat(len - s.length);
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/** All values of a repeatable flag. */
function getFlags(args: string[], flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length - 1; i++) {
    if (args[i] === flag) values.push(args[i + 1]);
  }
  return values;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function settingsPath(): string {
  return process.env.MIDI_BEEPER_SETTINGS ?? defaultSettingsPath();
}

const VALID_FORMATS: ScriptFormat[] = ["sh", "grub"];
const VALID_SEPARATORS: ScriptSeparator[] = ["newline", "semicolon"];

/** Settings overridden by command-line flags. */
function resolveOptions(args: string[], settings: Settings) {
  const policy = getFlag(args, "--policy") ?? settings.policy;
  const channelStr = getFlag(args, "--channel");
  const channels = channelStr !== null
    ? channelStr.split(",").map((c) => parseInt(c.trim(), 10))
    : settings.channels;
  if (channels?.some((c) => isNaN(c))) {
    fail(`Invalid --channel "${channelStr}". Expected a number or comma list (0-15).`);
  }

  const separatorStr = getFlag(args, "--separator") ?? settings.separator;
  const separator = VALID_SEPARATORS.find((s) => s === separatorStr);
  if (!separator) {
    fail(`Unknown separator: "${separatorStr}". Available: ${VALID_SEPARATORS.join(", ")}`);
  }

  const formatStr = getFlag(args, "--format") ?? "sh";
  const format = VALID_FORMATS.find((f) => f === formatStr);
  if (!format) {
    fail(`Unknown format: "${formatStr}". Available: ${VALID_FORMATS.join(", ")}`);
  }

  return {
    policy,
    channels,
    separator,
    format,
    command: getFlag(args, "--command") ?? settings.beepCommand,
    outputDir: getFlag(args, "--out") ?? settings.outputDir,
    logger: log,
  };
}

function printWarnings(result: ConversionResult): void {
  const counts = new Map<string, number>();
  for (const w of result.warnings) {
    counts.set(w.kind, (counts.get(w.kind) ?? 0) + 1);
  }
  for (const [kind, count] of counts) {
    console.error(`  ⚠ ${kind} × ${count}`);
  }
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function cmdConvert(args: string[], settings: Settings): Promise<void> {
  const midiPath = args[0];
  if (!midiPath || midiPath.startsWith("--")) {
    fail("Usage: midi-beeper convert <file.mid> [--policy P] [--out DIR] [--channel N[,N]] [--separator S] [--format sh|grub] [--command NAME] [--print]");
  }

  const options = resolveOptions(args, settings);
  const written = await writeBeepScript(midiPath, options);
  const { result } = written;

  if (written.scriptPath === null || written.script === null) {
    console.log(`\nNothing to play in ${midiPath} — no script written.\n`);
    printWarnings(result);
    return;
  }

  if (hasFlag(args, "--print")) {
    process.stdout.write(written.script.endsWith("\n") ? written.script : written.script + "\n");
    return;
  }

  console.log(`\n  ${midiPath} → ${written.scriptPath}`);
  console.log(`  Policy: ${result.policy} | Notes: ${result.noteCount} | Segments: ${result.segments.length}`);
  console.log(`  Duration: ${(result.totalDurationMs / 1000).toFixed(2)}s\n`);
  printWarnings(result);
}

async function cmdPlay(args: string[], settings: Settings): Promise<void> {
  const target = args[0];
  if (!target || target.startsWith("--")) {
    fail("Usage: midi-beeper play <file.mid | script.sh> [--policy P] [--channel N[,N]] [--command NAME]");
  }

  const options = resolveOptions(args, settings);
  const controller = new BeepPlaybackController(createShellRunner(), {
    render: { separator: options.separator, command: options.command },
    logger: log,
  });

  let input: string | ConversionResult;
  let label: string;
  if (extname(target).toLowerCase() === ".sh") {
    input = await readFile(target, "utf8");
    label = "script";
  } else {
    const result = convertMidi(await parseMidiFile(target), options);
    printWarnings(result);
    input = result;
    label = `${result.segments.length} segments, ${(result.totalDurationMs / 1000).toFixed(1)}s, ${result.policy}`;
  }

  const onInterrupt = (): void => {
    controller
      .stop()
      .then(() => {
        console.log("\n  ■ Stopped.");
        process.exit(130);
      })
      .catch((err: unknown) => fail(`Failed to stop playback: ${String(err)}`));
  };
  process.once("SIGINT", onInterrupt);

  const started = await controller.start(input);
  if (!started) {
    console.log("\nNothing to play.\n");
    process.removeListener("SIGINT", onInterrupt);
    return;
  }

  console.log(`\n  ▶ Playing ${target} (${label}) — Ctrl+C to stop`);
  const exit = await controller.waitForExit();
  process.removeListener("SIGINT", onInterrupt);

  if (exit?.error) fail(`Playback failed: ${exit.error.message}`);
  if (exit && exit.code !== 0) {
    fail(`Playback exited with ${exit.signal ?? `code ${exit.code}`} (is "${options.command}" installed?)`);
  }
  console.log("  ✓ Done.\n");
}

async function cmdInfo(args: string[], settings: Settings): Promise<void> {
  const midiPath = args[0];
  if (!midiPath) fail("Usage: midi-beeper info <file.mid>");

  const source = await parseMidiFile(midiPath);
  const tempoMap = new TempoMap(source.ticksPerQuarter, source.tempoChanges);
  const rawNotes = source.tracks.reduce(
    (n, t) => n + t.filter((e) => e.kind === "noteOn" && e.velocity > 0).length,
    0
  );

  console.log(`\n${"═".repeat(60)}`);
  console.log(`  ${midiPath}`);
  console.log(`  Format ${source.format} | ${source.tracks.length} track(s) | ${source.ticksPerQuarter} ticks/quarter`);
  console.log(`  Initial tempo: ${tempoMap.bpmAt(0).toFixed(1)} BPM | Tempo segments: ${tempoMap.segmentCount}`);
  console.log(`  Note-ons: ${rawNotes}`);
  if (source.trackNames.length > 0) {
    console.log(`  Tracks: ${source.trackNames.join(", ")}`);
  }
  console.log(`${"═".repeat(60)}`);

  console.log("\n" + padRight("Policy", 12) + padRight("Segments", 12) + "Duration");
  console.log("─".repeat(36));
  for (const policy of OVERLAP_POLICIES) {
    const result = convertMidi(source, { policy, channels: settings.channels });
    const marker = policy === settings.policy ? " (default)" : "";
    console.log(
      padRight(policy, 12) +
        padRight(String(result.segments.length), 12) +
        `${(result.totalDurationMs / 1000).toFixed(2)}s${marker}`
    );
  }
  console.log();
}

function cmdSettings(args: string[]): void {
  const path = settingsPath();

  if (hasFlag(args, "--reset")) {
    saveSettings(DEFAULT_SETTINGS, path);
    console.log(`\nSettings reset: ${path}\n`);
    return;
  }

  const assignments = getFlags(args, "--set");
  let settings = loadSettings(path);
  if (assignments.length > 0) {
    settings = saveSettings(applySettingAssignments(settings, assignments), path);
    console.log(`\nSaved ${assignments.length} setting(s) to ${path}`);
  }

  console.log(`\nSettings (${path}):`);
  const shown: Array<[string, string]> = [
    ["policy", settings.policy],
    ["separator", settings.separator],
    ["beepCommand", settings.beepCommand],
    ["outputDir", settings.outputDir ?? "(current directory)"],
    ["channels", settings.channels?.join(",") ?? "(all)"],
  ];
  for (const [key, value] of shown) {
    console.log(`  ${padRight(key, 14)} ${value}`);
  }
  console.log();
}

function cmdHelp(): void {
  console.log(HELP_TEXT);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "convert":
      await cmdConvert(args.slice(1), loadSettings(settingsPath()));
      break;
    case "play":
      await cmdPlay(args.slice(1), loadSettings(settingsPath()));
      break;
    case "info":
      await cmdInfo(args.slice(1), loadSettings(settingsPath()));
      break;
    case "settings":
      cmdSettings(args.slice(1));
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      fail(`Unknown command: "${command}". Run 'midi-beeper help' for usage.`);
  }
}

main().catch((err) => {
  if (err instanceof ConversionError) {
    console.error(describeConversionError(err));
  } else {
    console.error(err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
