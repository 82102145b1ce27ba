// ExecutionAdapter: the single chokepoint between managers and external tools.
// Applies the per-invocation timeout, keeps captured output on every path, and
// turns non-zero exits into ErrorRecords instead of exceptions. It is also the
// dry-run guard: a mutating invocation while the active run is a dry run is a
// programming error and throws DRY_RUN_VIOLATION without spawning anything.
import type { Logger } from "pino";
import type { Command } from "../types/command.js";
import { formatCommand } from "../types/command.js";
import type { ErrorRecord } from "../shared/errors.js";
import { UpdaterError, UpdaterErrorCode } from "../shared/errors.js";
import type { Executor } from "./executor.js";

export interface InvokeOptions {
  /** Overrides the adapter's default timeout. */
  readonly timeoutMs?: number;
  /** Exit codes that mean success for this tool (e.g. npm outdated exits 1 when updates exist). */
  readonly okExitCodes?: readonly number[];
  /** Whether the invocation changes system state. */
  readonly mutating?: boolean;
}

export interface Invocation {
  readonly command: string;
  readonly ok: boolean;
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number | null;
  readonly durationMs: number;
  readonly timedOut: boolean;
  readonly cancelled: boolean;
  readonly error?: ErrorRecord;
}

/** Per-run policy the orchestrator installs for the duration of a run. */
export interface RunScope {
  readonly dryRun: boolean;
  readonly signal?: AbortSignal;
}

const IDLE_SCOPE: RunScope = { dryRun: false };
const STDERR_EXCERPT_LIMIT = 4_000;

export class ExecutionAdapter {
  private scope: RunScope = IDLE_SCOPE;
  private readonly resolved = new Map<string, string | null>();

  constructor(
    private readonly executor: Executor,
    private readonly logger: Logger,
    private readonly defaultTimeoutMs: number,
  ) {}

  /** Install the run's policy. Returns the function that restores the idle scope. */
  enterRun(scope: RunScope): () => void {
    this.scope = scope;
    return () => {
      this.scope = IDLE_SCOPE;
    };
  }

  get dryRun(): boolean {
    return this.scope.dryRun;
  }

  /** Run a command and interpret its exit status. Never throws for tool failures. */
  async run(command: Command, options: InvokeOptions = {}): Promise<Invocation> {
    const rendered = formatCommand(command);
    if (options.mutating && this.scope.dryRun) {
      throw new UpdaterError(UpdaterErrorCode.DRY_RUN_VIOLATION, `Refusing mutating command during dry run: ${rendered}`);
    }
    if (this.scope.signal?.aborted) {
      return this.cancelledBeforeStart(rendered);
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    this.logger.debug({ command: rendered, timeoutMs, mutating: options.mutating ?? false }, "Invoking external command");
    const r = await this.executor.execute(command, { timeoutMs, signal: this.scope.signal });
    const okCodes = options.okExitCodes ?? [0];
    const invocation: Invocation = {
      command: rendered,
      ok: !r.timedOut && !r.cancelled && r.exitCode !== null && okCodes.includes(r.exitCode),
      stdout: r.stdout,
      stderr: r.stderr,
      exitCode: r.exitCode,
      durationMs: r.durationMs,
      timedOut: r.timedOut,
      cancelled: r.cancelled,
    };
    if (invocation.ok) return invocation;

    const error = describeFailure(invocation, timeoutMs);
    this.logger.warn({ command: rendered, exitCode: r.exitCode, code: error.code, durationMs: r.durationMs }, error.message);
    return { ...invocation, error };
  }

  /** Run a command and throw an UpdaterError carrying the failure record if it did not succeed. */
  async runOrThrow(command: Command, options: InvokeOptions = {}): Promise<Invocation> {
    const result = await this.run(command, options);
    if (result.error) {
      throw new UpdaterError(result.error.code, result.error.message, {
        exitCode: result.error.exitCode,
        stderr: result.error.stderr,
        stdout: result.stdout,
      });
    }
    return result;
  }

  /** Presence probe: true when the command exits 0. Never throws. */
  async probe(command: Command, timeoutMs = 15_000): Promise<boolean> {
    try {
      const r = await this.run(command, { timeoutMs });
      return r.ok;
    } catch (err) {
      this.logger.debug({ command: formatCommand(command), error: err instanceof Error ? err.message : String(err) }, "Probe failed");
      return false;
    }
  }

  /**
   * Run a command attached to the terminal so it can prompt the user.
   * Used only for credential refresh; nothing is captured.
   */
  async runInteractive(command: Command, timeoutMs: number): Promise<boolean> {
    if (this.scope.signal?.aborted) return false;
    const r = await this.executor.execute(command, { timeoutMs, signal: this.scope.signal, interactive: true });
    return !r.timedOut && !r.cancelled && r.exitCode === 0;
  }

  /** Resolve a binary name to its path, memoised for the adapter's lifetime. */
  async resolve(binary: string): Promise<string | null> {
    const cached = this.resolved.get(binary);
    if (cached !== undefined) return cached;
    // The name is passed as a positional parameter, never spliced into the script.
    const r = await this.run({ argv: ["sh", "-c", 'command -v "$1"', "sh", binary] }, { timeoutMs: 10_000 });
    const path = r.ok ? r.stdout.trim().split("\n")[0] || null : null;
    this.resolved.set(binary, path);
    return path;
  }

  private cancelledBeforeStart(command: string): Invocation {
    return {
      command, ok: false, stdout: "", stderr: "", exitCode: null, durationMs: 0, timedOut: false, cancelled: true,
      error: { code: UpdaterErrorCode.INVOCATION_CANCELLED, message: `Run cancelled before '${command}' started` },
    };
  }
}

function excerpt(stderr: string): string | undefined {
  const trimmed = stderr.trim();
  if (!trimmed) return undefined;
  return trimmed.length > STDERR_EXCERPT_LIMIT ? `${trimmed.slice(0, STDERR_EXCERPT_LIMIT)}…` : trimmed;
}

function describeFailure(r: Invocation, timeoutMs: number): ErrorRecord {
  if (r.cancelled) {
    return { code: UpdaterErrorCode.INVOCATION_CANCELLED, message: `'${r.command}' was cancelled`, stderr: excerpt(r.stderr) };
  }
  if (r.timedOut) {
    return { code: UpdaterErrorCode.INVOCATION_TIMEOUT, message: `'${r.command}' timed out after ${timeoutMs}ms`, stderr: excerpt(r.stderr) };
  }
  if (r.exitCode === null) {
    return { code: UpdaterErrorCode.INVOCATION_FAILED, message: `'${r.command}' was killed by a signal`, stderr: excerpt(r.stderr) };
  }
  const detail = excerpt(r.stderr)?.split("\n")[0];
  return {
    code: UpdaterErrorCode.INVOCATION_FAILED,
    message: detail ? `'${r.command}' exited with ${r.exitCode}: ${detail}` : `'${r.command}' exited with ${r.exitCode}`,
    exitCode: r.exitCode,
    stderr: excerpt(r.stderr),
  };
}
