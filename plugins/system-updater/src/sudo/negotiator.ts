// Sudo negotiation for privileged update steps.
// A decision is computed fresh for every privileged operation because cached
// sudo credentials can expire mid-run. Probes are non-interactive (`sudo -n true`)
// and serialised: concurrent managers asking at the same moment share one probe.
import type { Logger } from "pino";
import type { ExecutionAdapter } from "../execution/adapter.js";
import type { CredentialState, SudoDecision, SudoStrategy } from "../types/sudo.js";

export const REASON_POLICY_SKIP = "privileged execution disabled by policy";
export const REASON_UNATTENDED = "no interactive session and no cached credentials";

const PROBE_TIMEOUT_MS = 10_000;
const PROMPT_TIMEOUT_MS = 120_000;

export interface SudoNegotiatorOptions {
  readonly strategy: SudoStrategy;
  /** True when a human is attached to the terminal and can answer a password prompt. */
  readonly interactive: boolean;
  readonly adapter: ExecutionAdapter;
  readonly logger: Logger;
}

export interface DecideOptions {
  /** Dry run: report what would happen without prompting. */
  readonly simulate?: boolean;
}

export class SudoNegotiator {
  private readonly strategy: SudoStrategy;
  private readonly interactive: boolean;
  private readonly adapter: ExecutionAdapter;
  private readonly logger: Logger;

  private credentials: CredentialState = "unknown";
  private inflightProbe: Promise<boolean> | null = null;
  private inflightPrompt: Promise<boolean> | null = null;
  private whitelistCheck: Promise<string | null> | null = null;

  constructor(options: SudoNegotiatorOptions) {
    this.strategy = options.strategy;
    this.interactive = options.interactive;
    this.adapter = options.adapter;
    this.logger = options.logger.child({ component: "sudo" });
  }

  /** Last observed credential-cache state. */
  get state(): CredentialState {
    return this.credentials;
  }

  /** Forget the last probe; called at the start of every run. */
  reset(): void {
    this.credentials = "unknown";
  }

  /**
   * Decide whether the privileged operation identified by `operation`
   * (its argv prefix, e.g. ["brew", "upgrade", "--cask"]) may run.
   */
  async decide(operation: readonly string[], options: DecideOptions = {}): Promise<SudoDecision> {
    const strategy = this.strategy;
    if (strategy.kind === "skip") {
      return { outcome: "skip", reason: REASON_POLICY_SKIP };
    }

    if (strategy.kind === "whitelist") {
      const unresolved = await this.checkWhitelist(strategy.prefixes);
      if (unresolved) {
        return { outcome: "abort", reason: `sudo whitelist references '${unresolved}', which cannot be resolved on PATH` };
      }
      if (!matchesWhitelist(operation, strategy.prefixes)) {
        return { outcome: "skip", reason: `'${operation.join(" ")}' is not in the sudo whitelist` };
      }
      return (await this.probe())
        ? { outcome: "proceed", reason: "whitelisted command with cached credentials" }
        : { outcome: "skip", reason: "whitelisted command but no cached credentials" };
    }

    if (await this.probe()) {
      return { outcome: "proceed", reason: "cached credentials available" };
    }

    if (strategy.kind === "passwordless") {
      return { outcome: "skip", reason: "passwordless sudo not available" };
    }

    // prompt
    if (!this.interactive) {
      return { outcome: "skip", reason: REASON_UNATTENDED };
    }
    if (options.simulate) {
      return { outcome: "proceed", reason: "would prompt for sudo credentials" };
    }
    return (await this.prompt())
      ? { outcome: "proceed", reason: "credentials refreshed interactively" }
      : { outcome: "skip", reason: "sudo credential prompt was declined or failed" };
  }

  private probe(): Promise<boolean> {
    if (!this.inflightProbe) {
      this.inflightProbe = this.adapter
        .probe({ argv: ["sudo", "-n", "true"] }, PROBE_TIMEOUT_MS)
        .then((available) => {
          this.credentials = available ? "available" : "unavailable";
          this.logger.debug({ credentials: this.credentials }, "Probed sudo credential cache");
          return available;
        })
        .finally(() => {
          this.inflightProbe = null;
        });
    }
    return this.inflightProbe;
  }

  private prompt(): Promise<boolean> {
    if (!this.inflightPrompt) {
      this.logger.info("Requesting sudo credentials");
      this.inflightPrompt = this.adapter
        .runInteractive({ argv: ["sudo", "-v"] }, PROMPT_TIMEOUT_MS)
        .then((ok) => {
          this.credentials = ok ? "available" : "unavailable";
          return ok;
        })
        .finally(() => {
          this.inflightPrompt = null;
        });
    }
    return this.inflightPrompt;
  }

  // Every whitelisted prefix must name a binary the adapter can resolve.
  // Returns the first unresolvable binary, or null. Checked once per negotiator.
  private checkWhitelist(prefixes: readonly string[]): Promise<string | null> {
    if (!this.whitelistCheck) {
      this.whitelistCheck = (async () => {
        for (const prefix of prefixes) {
          const binary = tokenize(prefix)[0];
          if (!binary) return prefix;
          if ((await this.adapter.resolve(binary)) === null) return binary;
        }
        return null;
      })();
    }
    return this.whitelistCheck;
  }
}

function tokenize(command: string): string[] {
  return command.trim().split(/\s+/).filter(Boolean);
}

function basename(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx === -1 ? path : path.slice(idx + 1);
}

/**
 * Token-prefix match: "brew upgrade --cask" allows ["brew", "upgrade", "--cask", "firefox"]
 * but not ["brew", "upgrade"]. The first token is compared by basename so
 * "/opt/homebrew/bin/brew" matches "brew".
 */
export function matchesWhitelist(operation: readonly string[], prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => {
    const tokens = tokenize(prefix);
    if (tokens.length === 0 || tokens.length > operation.length) return false;
    return tokens.every((token, i) => {
      const actual = operation[i];
      if (actual === undefined) return false;
      return i === 0 ? basename(actual) === basename(token) : actual === token;
    });
  });
}
