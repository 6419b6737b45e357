import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BeepPlaybackController, PlaybackHandle, type AnyPlaybackEvent } from "./controls.js";
import { createShellRunner, type ProcessExit, type ProcessRunner, type RunningProcess } from "./runner.js";
import { createLogger } from "../logger.js";
import type { ConversionResult } from "../convert/types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

class FakeProcess implements RunningProcess {
  readonly exited: Promise<ProcessExit>;
  killCount = 0;
  alive = true;
  private settle: (exit: ProcessExit) => void = () => {};

  constructor(readonly script: string, readonly pid: number) {
    this.exited = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  kill(): void {
    this.killCount++;
    if (!this.alive) return;
    this.alive = false;
    this.settle({ code: null, signal: "SIGKILL" });
  }

  /** End the run as if the script completed. */
  finish(code: number): void {
    if (!this.alive) return;
    this.alive = false;
    this.settle({ code, signal: null });
  }
}

class FakeRunner implements ProcessRunner {
  readonly runs: FakeProcess[] = [];

  run(script: string): RunningProcess {
    const proc = new FakeProcess(script, 1000 + this.runs.length);
    this.runs.push(proc);
    return proc;
  }

  get aliveCount(): number {
    return this.runs.filter((p) => p.alive).length;
  }
}

function result(segments: ConversionResult["segments"]): ConversionResult {
  return {
    policy: "highest",
    segments,
    durationSeconds: segments.reduce((s, x) => s + x.delayBeforeMs + x.durationMs, 0) / 1000,
    totalDurationMs: segments.reduce((s, x) => s + x.delayBeforeMs + x.durationMs, 0),
    noteCount: segments.length,
    warnings: [],
  };
}

const SCRIPT = "#!/bin/sh\nbeep -f 440 -l 100 -D 0\n";

// ─── PlaybackHandle ─────────────────────────────────────────────────────────

describe("PlaybackHandle", () => {
  it("kills once no matter how often it is disposed", () => {
    const proc = new FakeProcess(SCRIPT, 1);
    const handle = new PlaybackHandle(proc);
    handle.dispose();
    handle.dispose();
    expect(proc.killCount).toBe(1);
    expect(handle.disposed).toBe(true);
    expect(handle.pid).toBe(1);
  });

  it("does not kill a process that already exited", async () => {
    const proc = new FakeProcess(SCRIPT, 1);
    const handle = new PlaybackHandle(proc);
    proc.finish(0);
    await handle.exited;
    handle.dispose();
    expect(proc.killCount).toBe(0);
  });
});

// ─── BeepPlaybackController ─────────────────────────────────────────────────

describe("BeepPlaybackController", () => {
  let runner: FakeRunner;
  let controller: BeepPlaybackController;
  let events: AnyPlaybackEvent[];

  beforeEach(() => {
    runner = new FakeRunner();
    controller = new BeepPlaybackController(runner);
    events = [];
    controller.on("*", (e) => events.push(e));
  });

  it("starts idle with nothing playing", () => {
    expect(controller.state).toBe("idle");
    expect(controller.isPlaying).toBe(false);
    expect(controller.pid).toBeUndefined();
  });

  it("spawns one process for a script", async () => {
    expect(await controller.start(SCRIPT)).toBe(true);
    expect(runner.runs.map((r) => r.script)).toEqual([SCRIPT]);
    expect(controller.state).toBe("playing");
    expect(controller.isPlaying).toBe(true);
    expect(controller.pid).toBe(1000);
  });

  it("renders a conversion result with the configured options", async () => {
    controller = new BeepPlaybackController(runner, { render: { separator: "semicolon", command: "true" } });
    await controller.start(result([
      { frequencyHz: 262, durationMs: 500, delayBeforeMs: 0 },
      { frequencyHz: 330, durationMs: 500, delayBeforeMs: 500 },
    ]));
    expect(runner.runs[0].script).toBe("#!/bin/sh\ntrue -f 262 -l 500 -D 0 ; true -f 330 -l 500 -D 500\n");
  });

  it("plays nothing for an empty result or blank script", async () => {
    expect(await controller.start(result([]))).toBe(false);
    expect(await controller.start("   \n")).toBe(false);
    expect(runner.runs).toHaveLength(0);
    expect(controller.state).toBe("idle");
  });

  it("stops the running process", async () => {
    await controller.start(SCRIPT);
    await controller.stop();

    expect(runner.runs[0].killCount).toBe(1);
    expect(runner.aliveCount).toBe(0);
    expect(controller.state).toBe("stopped");
    expect(controller.isPlaying).toBe(false);
    expect(events.filter((e) => e.type === "exit")).toEqual([
      { type: "exit", exit: { code: null, signal: "SIGKILL" }, stopped: true },
    ]);
  });

  it("treats stop as a no-op when idle or already stopped", async () => {
    await controller.stop();
    expect(controller.state).toBe("idle");
    expect(events).toEqual([]);

    await controller.start(SCRIPT);
    await controller.stop();
    await controller.stop();
    expect(runner.runs[0].killCount).toBe(1);
  });

  it("kills the previous run before starting the next", async () => {
    await controller.start(SCRIPT);
    await controller.start("#!/bin/sh\nbeep -f 880 -l 100 -D 0\n");

    expect(runner.runs).toHaveLength(2);
    expect(runner.runs[0].alive).toBe(false);
    expect(runner.runs[1].alive).toBe(true);
    expect(controller.pid).toBe(1001);
    expect(controller.state).toBe("playing");
  });

  it("lets the later of two overlapping starts win", async () => {
    const first = controller.start("#!/bin/sh\nbeep -f 100\n");
    const second = controller.start("#!/bin/sh\nbeep -f 200\n");
    expect(await Promise.all([first, second])).toEqual([false, true]);
    expect(runner.runs.map((r) => r.script)).toEqual(["#!/bin/sh\nbeep -f 200\n"]);
  });

  it("cancels a start that has not spawned yet", async () => {
    const pending = controller.start(SCRIPT);
    await controller.stop();
    expect(await pending).toBe(false);
    expect(runner.runs).toHaveLength(0);
    expect(controller.isPlaying).toBe(false);
  });

  it("reports a natural finish", async () => {
    await controller.start(SCRIPT);
    runner.runs[0].finish(0);
    expect(await controller.waitForExit()).toEqual({ code: 0, signal: null });

    expect(controller.state).toBe("finished");
    expect(controller.isPlaying).toBe(false);
    expect(runner.runs[0].killCount).toBe(0);
    expect(events.filter((e) => e.type === "exit")).toEqual([
      { type: "exit", exit: { code: 0, signal: null }, stopped: false },
    ]);
  });

  it("reports a failing script as an error state", async () => {
    await controller.start(SCRIPT);
    runner.runs[0].finish(127);
    await controller.waitForExit();
    expect(controller.state).toBe("error");
  });

  it("resolves waitForExit with null when nothing plays", async () => {
    expect(await controller.waitForExit()).toBeNull();
  });

  it("emits state changes in order", async () => {
    await controller.start(SCRIPT);
    await controller.stop();
    const states = events.flatMap((e) => (e.type === "stateChange" ? [e.state] : []));
    expect(states).toEqual(["playing", "stopped"]);
  });

  it("keeps going when a listener throws", async () => {
    const lines: string[] = [];
    controller = new BeepPlaybackController(runner, {
      logger: createLogger("test", "warn", (line) => lines.push(line)),
    });
    controller.on("stateChange", () => {
      throw new Error("listener broke");
    });

    expect(await controller.start(SCRIPT)).toBe(true);
    expect(lines).toEqual(["[test] warn: Playback listener threw: listener broke"]);
  });

  it("unsubscribes listeners", async () => {
    const seen: string[] = [];
    const unsubscribe = controller.on("stateChange", (e) => seen.push(e.type));
    unsubscribe();
    await controller.start(SCRIPT);
    expect(seen).toEqual([]);
  });
});

// ─── Real shell ─────────────────────────────────────────────────────────────

describe.skipIf(process.platform === "win32")("BeepPlaybackController with a shell", () => {
  let dir: string;
  let controller: BeepPlaybackController;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "midi-beeper-play-"));
    controller = new BeepPlaybackController(createShellRunner());
  });

  afterEach(async () => {
    await controller.stop();
    rmSync(dir, { recursive: true, force: true });
  });

  async function waitFor(condition: () => boolean, timeoutMs: number): Promise<void> {
    const started = Date.now();
    while (!condition()) {
      if (Date.now() - started > timeoutMs) throw new Error("timed out waiting");
      await new Promise((resolve) => setTimeout(resolve, 20));
    }
  }

  it("stops the whole script promptly, including the command it is running", async () => {
    const first = join(dir, "first");
    const second = join(dir, "second");
    await controller.start(`sleep 0.1; touch "${first}"; sleep 1; touch "${second}"`);
    await waitFor(() => existsSync(first), 3000);

    const stopAt = Date.now();
    await controller.stop();
    expect(Date.now() - stopAt).toBeLessThan(500);

    await new Promise((resolve) => setTimeout(resolve, 1500));
    expect(existsSync(second)).toBe(false);
  });

  it("finishes on its own when the script completes", async () => {
    controller = new BeepPlaybackController(createShellRunner(), { render: { command: "true" } });
    await controller.start(result([{ frequencyHz: 440, durationMs: 10, delayBeforeMs: 0 }]));
    expect(await controller.waitForExit()).toEqual({ code: 0, signal: null });
    expect(controller.state).toBe("finished");
  });

  it("plays a script longer than a single command-line argument allows", async () => {
    const done = join(dir, "done");
    const lines = Array.from({ length: 12_000 }, (_, i) => `: -f ${262 + (i % 100)} -l 10 -D 0`);
    const script = `#!/bin/sh\n${lines.join("\n")}\ntouch "${done}"\n`;
    expect(script.length).toBeGreaterThan(200_000);

    expect(await controller.start(script)).toBe(true);
    expect(await controller.waitForExit()).toEqual({ code: 0, signal: null });
    expect(controller.state).toBe("finished");
    expect(existsSync(done)).toBe(true);
  });

  it("stops a long script before the shell has read all of it", async () => {
    const started = join(dir, "started");
    const done = join(dir, "done");
    const lines = Array.from({ length: 12_000 }, () => ": -f 440 -l 10 -D 0");
    await controller.start(`touch "${started}"; sleep 5\n${lines.join("\n")}\ntouch "${done}"\n`);
    await waitFor(() => existsSync(started), 3000);

    await controller.stop();
    expect(controller.state).toBe("stopped");
    expect(existsSync(done)).toBe(false);
  });

  it("reports a shell that cannot be started", async () => {
    const errors: string[] = [];
    controller = new BeepPlaybackController(createShellRunner({ shell: join(dir, "no-such-shell") }));
    controller.on("error", (e) => {
      if (e.type === "error") errors.push(e.error.message);
    });

    await controller.start(SCRIPT);
    const exit = await controller.waitForExit();
    expect(exit?.code).toBeNull();
    expect(exit?.error).toBeInstanceOf(Error);
    expect(controller.state).toBe("error");
    expect(errors).toHaveLength(1);
  });
});

describe("createShellRunner", () => {
  it("reports a spawn that fails immediately through exited", async () => {
    const running = createShellRunner({ shell: "no\0such-shell" }).run(SCRIPT);
    const exit = await running.exited;

    expect(running.pid).toBeUndefined();
    expect(exit.code).toBeNull();
    expect(exit.signal).toBeNull();
    expect(exit.error).toBeInstanceOf(Error);
    expect(() => running.kill()).not.toThrow();
  });

  it("leaves the controller in the error state when the shell cannot spawn", async () => {
    const controller = new BeepPlaybackController(createShellRunner({ shell: "no\0such-shell" }));
    await expect(controller.start(SCRIPT)).resolves.toBe(true);
    await controller.waitForExit();
    expect(controller.state).toBe("error");
  });
});
