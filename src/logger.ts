// ─── Diagnostics Logging ────────────────────────────────────────────────────
//
// Everything goes to stderr. stdout is reserved for command output and, in
// the MCP server, for the stdio transport.
// ─────────────────────────────────────────────────────────────────────────────

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

/** Read MIDI_BEEPER_LOG; anything unrecognized means "warn". */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.MIDI_BEEPER_LOG?.toLowerCase();
  return LOG_LEVELS.find((l) => l === raw) ?? "warn";
}

/**
 * Create a scoped logger. Messages above `level` are dropped.
 */
export function createLogger(
  scope: string,
  level: LogLevel = levelFromEnv(),
  sink: (line: string) => void = (line) => console.error(line)
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const write = (at: Exclude<LogLevel, "silent">, message: string): void => {
    if (LOG_LEVELS.indexOf(at) <= threshold) {
      sink(`[${scope}] ${at}: ${message}`);
    }
  };

  return {
    error: (message) => write("error", message),
    warn: (message) => write("warn", message),
    info: (message) => write("info", message),
    debug: (message) => write("debug", message),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger("silent", "silent", () => {});
