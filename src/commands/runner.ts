import { type ChildProcess, spawn } from "node:child_process";

/** Largest delay setTimeout honours; above a signed 32-bit ms count it fires after 1 ms. */
export const MAX_TIMEOUT_SEC = Math.floor((2 ** 31 - 1) / 1000);

export interface CommandResult {
  ok: boolean;
  code: number | null;
  stdout: string;
  stderr: string;
  duration_sec: number;
}

export interface BatchResult {
  ok: boolean;
  results: (CommandResult & { cmd: string })[];
  duration_sec: number;
  stopped_early: boolean;
}

export interface RunOptions {
  /** Seconds before the child is killed. No limit when omitted or above MAX_TIMEOUT_SEC. */
  timeoutSec?: number;
  cwd?: string;
}

function elapsedSec(start: number): number {
  return Math.round((performance.now() - start) * 10) / 10_000;
}

function killGroup(child: ChildProcess): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, "SIGKILL");
  } catch {
    child.kill("SIGKILL");
  }
}

/** Runs `cmd` through the system shell. Never rejects: failures are part of the result. */
export function runCommand(cmd: string, opts: RunOptions = {}): Promise<CommandResult> {
  const start = performance.now();

  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    // Own process group, so a timeout can take down everything the shell started.
    const child = spawn(cmd, { shell: true, cwd: opts.cwd || undefined, detached: true });
    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => (stdout += chunk));
    child.stderr.on("data", (chunk: string) => (stderr += chunk));

    const timer =
      opts.timeoutSec !== undefined && opts.timeoutSec <= MAX_TIMEOUT_SEC
        ? setTimeout(() => {
            timedOut = true;
            killGroup(child);
          }, opts.timeoutSec * 1000)
        : undefined;

    const finish = (result: Omit<CommandResult, "duration_sec">): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ ...result, duration_sec: elapsedSec(start) });
    };

    child.on("error", (err) => {
      finish({ ok: false, code: null, stdout: "", stderr: `ERROR: ${err.message}` });
    });

    // A timed-out child may leave pipes open in orphans, so do not wait for "close".
    child.on("exit", () => {
      if (timedOut) finish({ ok: false, code: null, stdout, stderr: `${stderr}\nTIMEOUT` });
    });

    child.on("close", (code) => {
      if (timedOut) return;
      finish({ ok: code === 0, code, stdout, stderr });
    });
  });
}

/** Sequential execution; with `stopOnError` the batch ends at the first failure. */
export async function runCommands(
  cmds: readonly string[],
  opts: RunOptions & { stopOnError?: boolean } = {},
): Promise<BatchResult> {
  const start = performance.now();
  const results: BatchResult["results"] = [];
  let stoppedEarly = false;

  for (const [i, cmd] of cmds.entries()) {
    const result = await runCommand(cmd, opts);
    results.push({ cmd, ...result });
    if (!result.ok && opts.stopOnError && i < cmds.length - 1) {
      stoppedEarly = true;
      break;
    }
  }

  return {
    ok: results.every((r) => r.ok),
    results,
    duration_sec: elapsedSec(start),
    stopped_early: stoppedEarly,
  };
}
