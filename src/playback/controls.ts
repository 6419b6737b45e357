// ─── Beep Playback Controls ─────────────────────────────────────────────────
//
// Runs beep scripts through a ProcessRunner with at most one process alive.
// start() always tears down the previous run first; stop() kills the
// process group at once and is a no-op when nothing is running.
// ─────────────────────────────────────────────────────────────────────────────

import type { ConversionResult } from "../convert/types.js";
import { renderScript, type RenderOptions } from "../convert/pipeline.js";
import { silentLogger, type Logger } from "../logger.js";
import { createShellRunner, type ProcessExit, type ProcessRunner, type RunningProcess } from "./runner.js";

// ─── Event Types ────────────────────────────────────────────────────────────

export type BeepPlaybackState = "idle" | "playing" | "stopped" | "finished" | "error";

export type PlaybackEventType = "stateChange" | "exit" | "error";

export interface StateChangeEvent {
  type: "stateChange";
  state: BeepPlaybackState;
  previousState: BeepPlaybackState;
}

export interface ExitEvent {
  type: "exit";
  exit: ProcessExit;
  /** True when the run ended because stop() (or a newer start()) killed it. */
  stopped: boolean;
}

export interface ErrorEvent {
  type: "error";
  error: Error;
}

export type AnyPlaybackEvent = StateChangeEvent | ExitEvent | ErrorEvent;

export type PlaybackListener = (event: AnyPlaybackEvent) => void;

// ─── Options ────────────────────────────────────────────────────────────────

export interface PlaybackControlOptions {
  /** Used when start() is given a ConversionResult. */
  render?: Omit<RenderOptions, "format">;
  logger?: Logger;
}

// ─── PlaybackHandle ─────────────────────────────────────────────────────────

/**
 * Ownership of one running process. dispose() kills it; calling it again,
 * or after the process exited on its own, does nothing.
 */
export class PlaybackHandle {
  private _disposed = false;
  private _exited = false;
  readonly exited: Promise<ProcessExit>;

  constructor(private readonly running: RunningProcess) {
    this.exited = running.exited.then((exit) => {
      this._exited = true;
      return exit;
    });
  }

  get pid(): number | undefined {
    return this.running.pid;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    if (!this._exited) this.running.kill();
  }
}

// ─── BeepPlaybackController ─────────────────────────────────────────────────

export class BeepPlaybackController {
  private handle: PlaybackHandle | null = null;
  private generation = 0;
  private _state: BeepPlaybackState = "idle";
  private listeners = new Map<PlaybackEventType | "*", Set<PlaybackListener>>();
  private readonly log: Logger;

  constructor(
    private readonly runner: ProcessRunner = createShellRunner(),
    private readonly options: PlaybackControlOptions = {}
  ) {
    this.log = options.logger ?? silentLogger;
  }

  get state(): BeepPlaybackState {
    return this._state;
  }

  get isPlaying(): boolean {
    return this.handle !== null;
  }

  get pid(): number | undefined {
    return this.handle?.pid;
  }

  // ─── Event System ───────────────────────────────────────────────────────

  /** Subscribe to a specific event type or "*" for all events. */
  on(type: PlaybackEventType | "*", listener: PlaybackListener): () => void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
    return () => {
      this.listeners.get(type)?.delete(listener);
    };
  }

  off(type: PlaybackEventType | "*", listener: PlaybackListener): void {
    this.listeners.get(type)?.delete(listener);
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }

  // ─── Playback Controls ──────────────────────────────────────────────────

  /**
   * Start playing a script (text) or a conversion result.
   *
   * Any current run is stopped and awaited first. Resolves true once the new
   * process is spawned, false when there was nothing to play or a later
   * start() superseded this one.
   */
  async start(input: string | ConversionResult): Promise<boolean> {
    const generation = ++this.generation;
    await this.halt();
    if (generation !== this.generation) return false;

    const script = typeof input === "string" ? input : renderScript(input, this.options.render);
    if (script === null || script.trim() === "") {
      this.log.info("Nothing to play");
      return false;
    }

    const handle = new PlaybackHandle(this.runner.run(script));
    this.handle = handle;
    this.setState("playing");
    this.log.debug(`Started playback (pid ${handle.pid ?? "?"})`);

    handle.exited
      .then((exit) => this.onExit(handle, exit))
      .catch((err: unknown) => this.onFailure(err));
    return true;
  }

  /**
   * Kill the current run, if any, and cancel a start() still in progress.
   * The kill is issued synchronously; the returned promise settles once the
   * process is gone.
   */
  stop(): Promise<void> {
    this.generation++;
    return this.halt();
  }

  /**
   * Wait for the current run to end. Resolves null when nothing is playing.
   */
  async waitForExit(): Promise<ProcessExit | null> {
    return this.handle ? this.handle.exited : null;
  }

  // ─── Internal ─────────────────────────────────────────────────────────

  private halt(): Promise<void> {
    const handle = this.handle;
    if (!handle) return Promise.resolve();

    this.handle = null;
    handle.dispose();
    this.setState("stopped");
    this.log.debug(`Stopped playback (pid ${handle.pid ?? "?"})`);
    return handle.exited.then(() => undefined);
  }

  private onExit(handle: PlaybackHandle, exit: ProcessExit): void {
    const stopped = handle.disposed;
    if (this.handle === handle) {
      this.handle = null;
      handle.dispose();
      if (exit.error) {
        this.setState("error");
        this.emit({ type: "error", error: exit.error });
      } else {
        this.setState(exit.code === 0 ? "finished" : "error");
      }
    }
    this.emit({ type: "exit", exit, stopped });
  }

  private onFailure(err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    this.log.error(`Playback failure: ${error.message}`);
    this.emit({ type: "error", error });
  }

  private setState(state: BeepPlaybackState): void {
    const previousState = this._state;
    if (state === previousState) return;
    this._state = state;
    this.emit({ type: "stateChange", state, previousState });
  }

  private emit(event: AnyPlaybackEvent): void {
    for (const key of [event.type, "*"] as const) {
      const set = this.listeners.get(key);
      if (!set) continue;
      for (const fn of set) {
        try {
          fn(event);
        } catch (err) {
          this.log.warn(`Playback listener threw: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    }
  }
}

/**
 * Create a controller backed by a real shell.
 */
export function createBeepPlaybackController(options: PlaybackControlOptions = {}): BeepPlaybackController {
  return new BeepPlaybackController(createShellRunner(), options);
}
