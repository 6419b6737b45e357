// ─── Settings Schema ────────────────────────────────────────────────────────
//
// User settings persisted as JSON (~/.midi-beeper/settings.json). Every field
// has a default, so an empty object is a valid settings file.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { OverlapPolicySchema } from "../convert/policy.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const SettingsSchema = z.object({
  policy: OverlapPolicySchema.default("highest"),
  outputDir: z.string().min(1).optional(),
  separator: z.enum(["newline", "semicolon"]).default("newline"),
  channels: z.array(z.number().int().min(0).max(15)).min(1).optional(),
  beepCommand: z
    .string()
    .regex(/^[A-Za-z0-9_./-]+$/, "beepCommand must be a bare command or path")
    .default("beep"),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

// ─── Validation ──────────────────────────────────────────────────────────────

export interface SettingsError {
  field: string;
  message: string;
}

/**
 * Validate a settings object. Returns an empty array if valid.
 */
export function validateSettings(settings: unknown): SettingsError[] {
  const result = SettingsSchema.safeParse(settings);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}
