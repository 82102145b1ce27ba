// Process execution layer: the only place a child process is spawned.
// Every manager goes through ExecutionAdapter, which sits on top of an Executor;
// tests substitute an in-process Executor, production uses ExecaExecutor.
import execa from "execa";
import type { Command } from "../types/command.js";

export interface ExecOptions {
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
  /** Attach the child to the parent's terminal (credential prompts). Output is not captured. */
  readonly interactive?: boolean;
}

/** Result of command execution. Output is captured even on timeout or failure. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  /** Null when the process was ended by a signal (timeout, cancellation). */
  readonly exitCode: number | null;
  readonly durationMs: number;
  readonly timedOut: boolean;
  readonly cancelled: boolean;
}

/** Executor interface: spawn a command, never throw for a non-zero exit. */
export interface Executor {
  execute(command: Command, options: ExecOptions): Promise<ExecResult>;
}

// Exit code reported when the binary could not be spawned at all (ENOENT, EACCES).
export const SPAWN_FAILURE_EXIT_CODE = 127;

/** Executor backed by execa. */
export class ExecaExecutor implements Executor {
  async execute(command: Command, options: ExecOptions): Promise<ExecResult> {
    const start = performance.now();
    const [file, ...args] = command.argv;
    if (!file) {
      return { stdout: "", stderr: "empty command", exitCode: SPAWN_FAILURE_EXIT_CODE, durationMs: 0, timedOut: false, cancelled: false };
    }

    const child = execa(file, args, {
      env: command.env ? { ...command.env } : undefined,
      extendEnv: true,
      timeout: options.timeoutMs,
      reject: false,
      stdio: options.interactive ? "inherit" : ["ignore", "pipe", "pipe"],
      // 20MB: large enough for verbose upgrade logs, bounded for runaway tools.
      maxBuffer: 20 * 1024 * 1024,
    });

    const onAbort = (): void => child.cancel();
    options.signal?.addEventListener("abort", onAbort, { once: true });
    try {
      const result = await child;
      const killed = result.timedOut || result.isCanceled || result.signal !== undefined;
      return {
        stdout: result.stdout ?? "",
        stderr: result.stderr ?? "",
        exitCode: typeof result.exitCode === "number" ? result.exitCode : killed ? null : SPAWN_FAILURE_EXIT_CODE,
        durationMs: Math.round(performance.now() - start),
        timedOut: result.timedOut,
        cancelled: result.isCanceled,
      };
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}
