#!/usr/bin/env node
// ─── midi-beeper: MCP Server ────────────────────────────────────────────────
//
// Exposes MIDI → beep conversion and script playback as MCP tools, so an
// agent can convert a file, start it, and stop it across separate calls.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   convert_midi  : convert a .mid file to a beep script (optionally write it)
//   play_beeps    : play a .mid file or .sh script through the beep utility
//   stop_beeps    : stop the current playback immediately
//   beep_status   : current playback state
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parseMidiFile } from "./midi/parser.js";
import { convertMidi, renderScript } from "./convert/pipeline.js";
import { writeBeepScript } from "./convert/script-file.js";
import { OverlapPolicySchema } from "./convert/policy.js";
import { ConversionError, describeConversionError } from "./convert/errors.js";
import type { ConversionResult } from "./convert/types.js";
import { BeepPlaybackController } from "./playback/controls.js";
import { createShellRunner } from "./playback/runner.js";
import { loadSettings, defaultSettingsPath } from "./config/loader.js";
import { createLogger } from "./logger.js";

// ─── State ──────────────────────────────────────────────────────────────────

const log = createLogger("mcp");
const settings = loadSettings(process.env.MIDI_BEEPER_SETTINGS ?? defaultSettingsPath());

const controller = new BeepPlaybackController(createShellRunner(), {
  render: { separator: settings.separator, command: settings.beepCommand },
  logger: log,
});

let nowPlaying: string | null = null;

controller.on("exit", (e) => {
  if (e.type !== "exit") return;
  log.info(`Playback of ${nowPlaying ?? "script"} ended (${e.stopped ? "stopped" : `code ${e.exit.code}`})`);
});

// ─── Helpers ────────────────────────────────────────────────────────────────

const ChannelsSchema = z.array(z.number().int().min(0).max(15)).min(1);

function errorText(err: unknown): string {
  if (err instanceof ConversionError) return describeConversionError(err);
  return err instanceof Error ? err.message : String(err);
}

function summarize(path: string, result: ConversionResult): string[] {
  const warnings = result.warnings.map((w) => `- ${w.kind}: ${w.message}`);
  return [
    `**${path}**`,
    `Policy: ${result.policy} | Notes: ${result.noteCount} | Segments: ${result.segments.length}`,
    `Duration: ${(result.totalDurationMs / 1000).toFixed(2)}s`,
    ...(warnings.length > 0 ? ["", "Warnings:", ...warnings] : []),
  ];
}

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "midi-beeper",
  version: "0.1.0",
});

// ─── Tool: convert_midi ─────────────────────────────────────────────────────

server.tool(
  "convert_midi",
  "Convert a MIDI file into a monophonic beep script. Overlapping notes are collapsed by policy (highest, lowest, average).",
  {
    path: z.string().describe("Path to a .mid file"),
    policy: OverlapPolicySchema.optional().describe("Overlap policy. Default from settings."),
    channels: ChannelsSchema.optional().describe("Only these MIDI channels (0-15)"),
    format: z.enum(["sh", "grub"]).optional().describe("sh (beep script, default) or grub (GRUB tune)"),
    write: z.boolean().optional().describe("Write the script to disk (default: false, returns text only)"),
    outputDir: z.string().optional().describe("Directory for the written script"),
  },
  async ({ path, policy, channels, format, write, outputDir }) => {
    const options = {
      policy: policy ?? settings.policy,
      channels: channels ?? settings.channels,
      format,
      separator: settings.separator,
      command: settings.beepCommand,
      logger: log,
    };

    try {
      if (write) {
        const written = await writeBeepScript(path, { ...options, outputDir: outputDir ?? settings.outputDir });
        const lines = summarize(path, written.result);
        lines.push("", written.scriptPath ? `Wrote ${written.scriptPath}` : "Nothing to play — no file written.");
        return { content: [{ type: "text", text: lines.join("\n") }] };
      }

      const result = convertMidi(await parseMidiFile(path), options);
      const script = renderScript(result, options);
      const lines = summarize(path, result);
      if (script !== null) lines.push("", "```sh", script.trimEnd(), "```");
      return { content: [{ type: "text", text: lines.join("\n") }] };
    } catch (err) {
      return {
        content: [{ type: "text", text: `Conversion failed: ${errorText(err)}` }],
        isError: true,
      };
    }
  }
);

// ─── Tool: play_beeps ───────────────────────────────────────────────────────

server.tool(
  "play_beeps",
  "Play a .mid file (converted on the fly) or an existing .sh beep script. Stops any playback already running.",
  {
    path: z.string().describe("Path to a .mid file or a .sh script"),
    policy: OverlapPolicySchema.optional().describe("Overlap policy for .mid input"),
    channels: ChannelsSchema.optional().describe("Only these MIDI channels (0-15)"),
  },
  async ({ path, policy, channels }) => {
    let input: string | ConversionResult;
    try {
      input = extname(path).toLowerCase() === ".sh"
        ? await readFile(path, "utf8")
        : convertMidi(await parseMidiFile(path), {
            policy: policy ?? settings.policy,
            channels: channels ?? settings.channels,
            logger: log,
          });
    } catch (err) {
      return {
        content: [{ type: "text", text: `Cannot play ${path}: ${errorText(err)}` }],
        isError: true,
      };
    }

    let started: boolean;
    try {
      started = await controller.start(input);
    } catch (err) {
      return {
        content: [{ type: "text", text: `Cannot play ${path}: ${errorText(err)}` }],
        isError: true,
      };
    }
    if (!started) {
      return { content: [{ type: "text", text: `Nothing to play in ${path}.` }] };
    }
    nowPlaying = path;

    const detail = typeof input === "string"
      ? "script"
      : `${input.segments.length} segments, ${(input.totalDurationMs / 1000).toFixed(1)}s, ${input.policy}`;
    return {
      content: [{ type: "text", text: `Now playing: **${path}** (${detail}). Use stop_beeps to stop.` }],
    };
  }
);

// ─── Tool: stop_beeps ───────────────────────────────────────────────────────

server.tool(
  "stop_beeps",
  "Stop the current beep playback immediately. Does nothing if nothing is playing.",
  {},
  async () => {
    if (!controller.isPlaying) {
      return { content: [{ type: "text", text: "Nothing is playing." }] };
    }
    const stopped = nowPlaying;
    await controller.stop();
    nowPlaying = null;
    return { content: [{ type: "text", text: `Stopped ${stopped ?? "playback"}.` }] };
  }
);

// ─── Tool: beep_status ──────────────────────────────────────────────────────

server.tool(
  "beep_status",
  "Report the playback state (idle, playing, stopped, finished, error).",
  {},
  async () => {
    const text = controller.isPlaying
      ? `State: ${controller.state} — ${nowPlaying ?? "script"} (pid ${controller.pid ?? "?"})`
      : `State: ${controller.state}`;
    return { content: [{ type: "text", text }] };
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("midi-beeper MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
