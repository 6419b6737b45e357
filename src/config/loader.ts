// ─── Settings Loader ────────────────────────────────────────────────────────
//
// Reads and writes the settings file, validating with Zod.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { SettingsSchema, DEFAULT_SETTINGS, type Settings } from "./schema.js";

/** ~/.midi-beeper/settings.json */
export function defaultSettingsPath(home: string = homedir()): string {
  return join(home, ".midi-beeper", "settings.json");
}

/**
 * Load settings. A missing file means defaults; an invalid one throws with
 * every offending field listed.
 */
export function loadSettings(path: string = defaultSettingsPath()): Settings {
  if (!existsSync(path)) return { ...DEFAULT_SETTINGS };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new Error(`Settings file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid settings ${path}:\n${issues}`);
  }
  return result.data;
}

/**
 * Validate and save settings, creating the directory if needed.
 */
export function saveSettings(settings: unknown, path: string = defaultSettingsPath()): Settings {
  const parsed = SettingsSchema.parse(settings);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(parsed, null, 2) + "\n", "utf8");
  return parsed;
}

/**
 * Apply `key=value` assignments from the command line to existing settings.
 * `channels` takes a comma list; an empty value removes an optional key.
 */
export function applySettingAssignments(current: Settings, assignments: readonly string[]): Settings {
  const next: Record<string, unknown> = { ...current };
  for (const assignment of assignments) {
    const eq = assignment.indexOf("=");
    if (eq <= 0) {
      throw new Error(`Expected key=value, got "${assignment}"`);
    }
    const key = assignment.slice(0, eq).trim();
    const value = assignment.slice(eq + 1).trim();
    if (!(key in SettingsSchema.shape)) {
      throw new Error(`Unknown setting "${key}". Available: ${Object.keys(SettingsSchema.shape).join(", ")}`);
    }
    if (value === "") {
      delete next[key];
    } else if (key === "channels") {
      next[key] = value.split(",").map((c) => Number(c.trim()));
    } else {
      next[key] = value;
    }
  }
  return SettingsSchema.parse(next);
}
