// ─── Process Runner ─────────────────────────────────────────────────────────
//
// The external collaborator that actually executes a beep script. The
// default runner starts `sh` as the leader of a new process group and feeds
// the script on stdin, so script length is not bounded by the argv limit
// and one signal reaches the shell and whichever beep it is running.
// ─────────────────────────────────────────────────────────────────────────────

import { spawn, type ChildProcess } from "node:child_process";

/** How a script process ended. */
export interface ProcessExit {
  /** Exit code, or null when killed by a signal or never started. */
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started. */
  error?: Error;
}

/** A script process in flight. */
export interface RunningProcess {
  readonly pid: number | undefined;
  /** Settles exactly once, when the process is gone. Never rejects. */
  readonly exited: Promise<ProcessExit>;
  /** Terminate immediately (no grace period), including any children. */
  kill(): void;
}

export interface ProcessRunner {
  run(script: string): RunningProcess;
}

export interface ShellRunnerOptions {
  /** Shell binary. Default: "sh". */
  shell?: string;
  /** Working directory for the script. */
  cwd?: string;
}

/** Children still alive, killed if this Node process exits first. */
const live = new Set<ChildProcess>();
let exitHookInstalled = false;

function installExitHook(): void {
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.once("exit", () => {
    for (const child of live) killTree(child);
  });
}

function killTree(child: ChildProcess): void {
  if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) return;
  if (process.platform === "win32") {
    child.kill("SIGKILL");
    return;
  }
  try {
    // Negative pid: the whole group led by the shell.
    process.kill(-child.pid, "SIGKILL");
  } catch (err) {
    // ESRCH: the group is already gone.
    if (!(err instanceof Error && "code" in err && err.code === "ESRCH")) throw err;
  }
}

/**
 * Runner backed by a real shell.
 */
export function createShellRunner(options: ShellRunnerOptions = {}): ProcessRunner {
  const shell = options.shell ?? "sh";

  return {
    run(script: string): RunningProcess {
      const child = spawnShell(shell, options.cwd);
      if (child instanceof Error) return failedToStart(child);
      live.add(child);
      installExitHook();

      let stdinError: Error | undefined;
      child.stdin?.on("error", (err: Error) => {
        // EPIPE: the shell went away (killed or exited) before reading it all.
        if (!("code" in err && err.code === "EPIPE")) stdinError = err;
      });
      child.stdin?.end(script);

      const exited = new Promise<ProcessExit>((resolve) => {
        child.once("error", (error) => {
          live.delete(child);
          resolve({ code: null, signal: null, error });
        });
        child.once("exit", (code, signal) => {
          live.delete(child);
          resolve(stdinError ? { code, signal, error: stdinError } : { code, signal });
        });
      });

      return {
        pid: child.pid,
        exited,
        kill: () => killTree(child),
      };
    },
  };
}

/** Spawn the shell, or return why it could not be spawned. */
function spawnShell(shell: string, cwd: string | undefined): ChildProcess | Error {
  try {
    return spawn(shell, [], {
      cwd,
      detached: process.platform !== "win32",
      stdio: ["pipe", "ignore", "ignore"],
    });
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err));
  }
}

/** A run that never got a process. */
function failedToStart(error: Error): RunningProcess {
  return {
    pid: undefined,
    exited: Promise.resolve({ code: null, signal: null, error }),
    kill: () => {},
  };
}
