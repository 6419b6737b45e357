// ─── Conversion Errors ──────────────────────────────────────────────────────
//
// Fatal failures of the MIDI → beep pipeline. Recoverable anomalies are
// ConversionWarnings (see types.ts), not errors.
// ─────────────────────────────────────────────────────────────────────────────

export type ConversionErrorKind =
  | "MalformedTempoMap"
  | "InvalidPolicy"
  | "InvalidChannel"
  | "EmptySequence";

/** Where in the performance the failure was detected. */
export interface ConversionErrorContext {
  tick?: number;
  timeSeconds?: number;
}

export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;
  readonly tick?: number;
  readonly timeSeconds?: number;

  constructor(kind: ConversionErrorKind, message: string, context: ConversionErrorContext = {}) {
    super(message);
    this.name = "ConversionError";
    this.kind = kind;
    this.tick = context.tick;
    this.timeSeconds = context.timeSeconds;
  }
}

/**
 * Narrow an unknown thrown value to a ConversionError, optionally of one kind.
 */
export function isConversionError(
  err: unknown,
  kind?: ConversionErrorKind
): err is ConversionError {
  return err instanceof ConversionError && (kind === undefined || err.kind === kind);
}

/** One-line, user-facing description including the tick/time context. */
export function describeConversionError(err: ConversionError): string {
  const where: string[] = [];
  if (err.tick !== undefined) where.push(`tick ${err.tick}`);
  if (err.timeSeconds !== undefined) where.push(`${err.timeSeconds.toFixed(3)}s`);
  return where.length > 0
    ? `${err.kind}: ${err.message} (at ${where.join(", ")})`
    : `${err.kind}: ${err.message}`;
}
