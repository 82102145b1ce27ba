import { ExecutionAdapter } from "../../../src/execution/adapter.js";
import { REASON_POLICY_SKIP, REASON_UNATTENDED, SudoNegotiator, matchesWhitelist } from "../../../src/sudo/negotiator.js";
import type { SudoStrategy } from "../../../src/types/sudo.js";
import { FakeExecutor } from "../../helpers/fake-executor.js";
import { silentLogger } from "../../helpers/context.js";

function negotiator(strategy: SudoStrategy, interactive = false): { executor: FakeExecutor; sudo: SudoNegotiator } {
  const executor = new FakeExecutor();
  const logger = silentLogger();
  const adapter = new ExecutionAdapter(executor, logger, 1_000);
  return { executor, sudo: new SudoNegotiator({ strategy, interactive, adapter, logger }) };
}

const CASK = ["brew", "upgrade", "--cask", "firefox"];

describe("SudoNegotiator", () => {
  it("skip strategy always skips and never probes", async () => {
    const { executor, sudo } = negotiator({ kind: "skip" });
    executor.on(["sudo", "-n", "true"], {});
    expect(await sudo.decide(CASK)).toEqual({ outcome: "skip", reason: REASON_POLICY_SKIP });
    expect(await sudo.decide(CASK)).toEqual({ outcome: "skip", reason: "privileged execution disabled by policy" });
    expect(executor.calls).toHaveLength(0);
    expect(sudo.state).toBe("unknown");
  });

  it("passwordless proceeds with cached credentials", async () => {
    const { executor, sudo } = negotiator({ kind: "passwordless" });
    executor.on(["sudo", "-n", "true"], {});
    expect((await sudo.decide(CASK)).outcome).toBe("proceed");
    expect(sudo.state).toBe("available");
  });

  it("passwordless skips without credentials", async () => {
    const { executor, sudo } = negotiator({ kind: "passwordless" });
    executor.on(["sudo", "-n", "true"], { exitCode: 1, stderr: "sudo: a password is required" });
    expect((await sudo.decide(CASK)).outcome).toBe("skip");
    expect(sudo.state).toBe("unavailable");
  });

  it("probes fresh for every decision", async () => {
    const { executor, sudo } = negotiator({ kind: "passwordless" });
    let available = true;
    executor.on(["sudo", "-n", "true"], () => ({ exitCode: available ? 0 : 1 }));
    expect((await sudo.decide(CASK)).outcome).toBe("proceed");
    available = false;
    expect((await sudo.decide(CASK)).outcome).toBe("skip");
    expect(executor.commands()).toEqual(["sudo -n true", "sudo -n true"]);
  });

  it("shares one probe between concurrent decisions", async () => {
    const { executor, sudo } = negotiator({ kind: "passwordless" });
    executor.on(["sudo", "-n", "true"], async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return {};
    });
    const decisions = await Promise.all([sudo.decide(CASK), sudo.decide(["tlmgr", "update", "x"])]);
    expect(decisions.map((d) => d.outcome)).toEqual(["proceed", "proceed"]);
    expect(executor.calls).toHaveLength(1);
  });

  it("prompt strategy proceeds with cached credentials", async () => {
    const { executor, sudo } = negotiator({ kind: "prompt" });
    executor.on(["sudo", "-n", "true"], {});
    expect((await sudo.decide(CASK)).outcome).toBe("proceed");
  });

  it("prompt strategy skips unattended runs without credentials", async () => {
    const { executor, sudo } = negotiator({ kind: "prompt" }, false);
    executor.on(["sudo", "-n", "true"], { exitCode: 1 });
    expect(await sudo.decide(CASK)).toEqual({ outcome: "skip", reason: REASON_UNATTENDED });
    expect(executor.commands()).not.toContain("sudo -v");
  });

  it("prompt strategy asks interactively and proceeds when the user authenticates", async () => {
    const { executor, sudo } = negotiator({ kind: "prompt" }, true);
    executor.on(["sudo", "-n", "true"], { exitCode: 1 });
    executor.on(["sudo", "-v"], {});
    expect((await sudo.decide(CASK)).outcome).toBe("proceed");
    expect(executor.calls[1]?.options.interactive).toBe(true);
    expect(sudo.state).toBe("available");
  });

  it("prompt strategy skips when the prompt fails", async () => {
    const { executor, sudo } = negotiator({ kind: "prompt" }, true);
    executor.on(["sudo", "-n", "true"], { exitCode: 1 });
    executor.on(["sudo", "-v"], { exitCode: 1 });
    expect((await sudo.decide(CASK)).outcome).toBe("skip");
  });

  it("does not prompt while simulating", async () => {
    const { executor, sudo } = negotiator({ kind: "prompt" }, true);
    executor.on(["sudo", "-n", "true"], { exitCode: 1 });
    expect((await sudo.decide(CASK, { simulate: true })).outcome).toBe("proceed");
    expect(executor.commands()).toEqual(["sudo -n true"]);
  });

  describe("whitelist", () => {
    function whitelisted(prefixes: string[]): { executor: FakeExecutor; sudo: SudoNegotiator } {
      const setup = negotiator({ kind: "whitelist", prefixes });
      setup.executor.on(["sh", "-c"], (command) => (command.argv[4] === "brew" ? { stdout: "/usr/local/bin/brew\n" } : { exitCode: 1 }));
      return setup;
    }

    it("proceeds for a listed prefix with credentials", async () => {
      const { executor, sudo } = whitelisted(["brew upgrade --cask"]);
      executor.on(["sudo", "-n", "true"], {});
      expect((await sudo.decide(CASK)).outcome).toBe("proceed");
    });

    it("skips a listed prefix without credentials", async () => {
      const { executor, sudo } = whitelisted(["brew upgrade --cask"]);
      executor.on(["sudo", "-n", "true"], { exitCode: 1 });
      expect((await sudo.decide(CASK)).outcome).toBe("skip");
    });

    it("skips commands outside the whitelist without probing", async () => {
      const { executor, sudo } = whitelisted(["brew upgrade --cask"]);
      executor.on(["sudo", "-n", "true"], {});
      const decision = await sudo.decide(["brew", "upgrade", "--formula", "wget"]);
      expect(decision).toEqual({ outcome: "skip", reason: "'brew upgrade --formula wget' is not in the sudo whitelist" });
      expect(executor.commands()).not.toContain("sudo -n true");
    });

    it("aborts when a whitelisted binary cannot be resolved", async () => {
      const { sudo } = whitelisted(["brew upgrade --cask", "tlmgr update"]);
      const decision = await sudo.decide(CASK);
      expect(decision.outcome).toBe("abort");
      expect(decision.reason).toContain("'tlmgr'");
    });
  });
});

describe("matchesWhitelist", () => {
  it("matches whole tokens as a prefix", () => {
    expect(matchesWhitelist(["tlmgr", "update", "amsmath"], ["tlmgr update"])).toBe(true);
    expect(matchesWhitelist(["tlmgr", "updatex"], ["tlmgr update"])).toBe(false);
    expect(matchesWhitelist(["tlmgr"], ["tlmgr update"])).toBe(false);
  });

  it("compares the binary by basename", () => {
    expect(matchesWhitelist(["/opt/homebrew/bin/brew", "upgrade", "--cask", "x"], ["brew upgrade --cask"])).toBe(true);
  });

  it("never matches an empty prefix", () => {
    expect(matchesWhitelist(["brew"], ["   "])).toBe(false);
  });
});
