// ─── midi-beeper: Help Text ─────────────────────────────────────────────────

import { OVERLAP_POLICIES } from "./convert/policy.js";

export const HELP_TEXT = `
midi-beeper — Turn MIDI files into beep scripts

Commands:
  convert <file.mid> [options]     Write an executable beep script (or GRUB tune)
  play <file.mid | file.sh>        Play through the beep utility (Ctrl+C stops)
  info <file.mid>                  Show tracks, tempo and a per-policy preview
  settings [--set key=value]       Show or change saved defaults (--reset restores)
  help                             Show this help

Convert / play options:
  --policy <policy>                Overlapping notes: ${OVERLAP_POLICIES.join(", ")}
  --channel <n[,n]>                Only these MIDI channels (0-15)
  --out <dir>                      Output directory (convert)
  --separator <sep>                newline (default) or semicolon
  --format <fmt>                   sh (default) or grub (convert)
  --command <name>                 Beep executable (default: beep)
  --print                          Print the script instead of the summary (convert)

Environment:
  MIDI_BEEPER_SETTINGS             Settings file (default: ~/.midi-beeper/settings.json)
  MIDI_BEEPER_LOG                  silent, error, warn (default), info, debug

Examples:
  midi-beeper convert tetris.mid --policy highest
  midi-beeper convert chorale.mid --policy average --out ./scripts
  midi-beeper play tetris.mid --channel 0
  midi-beeper settings --set policy=lowest --set separator=semicolon
`;
