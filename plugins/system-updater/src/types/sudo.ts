/** How privileged operations are negotiated during a run. */
export type SudoStrategy =
  | { readonly kind: "prompt" }
  | { readonly kind: "whitelist"; readonly prefixes: readonly string[] }
  | { readonly kind: "passwordless" }
  | { readonly kind: "skip" };

export type SudoOutcome = "proceed" | "skip" | "abort";

/** Computed fresh per privileged operation; never persisted. */
export interface SudoDecision {
  readonly outcome: SudoOutcome;
  readonly reason: string;
}

/** Credential cache view: unknown until the first probe of the run. */
export type CredentialState = "unknown" | "available" | "unavailable";
