// Manager registry: constructed managers keyed by id, in declaration order.
// Order is fixed at registration and never re-sorted, so runs and rendered
// reports are stable between invocations.
import type { UpdateManager } from "../managers/contract.js";
import { UpdaterError, UpdaterErrorCode } from "../shared/errors.js";

export interface RegistryEntry {
  readonly manager: UpdateManager;
  readonly enabled: boolean;
  /** Per-manager exclusions, matched by exact package name. */
  readonly exclusions: ReadonlySet<string>;
  readonly cleanup: boolean;
  readonly selfUpdate: boolean;
}

export interface RegisterOptions {
  readonly enabled?: boolean;
  readonly exclusions?: Iterable<string>;
  readonly cleanup?: boolean;
  readonly selfUpdate?: boolean;
}

export class ManagerRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  register(manager: UpdateManager, options: RegisterOptions = {}): void {
    if (this.entries.has(manager.id)) {
      throw new UpdaterError(UpdaterErrorCode.DUPLICATE_MANAGER, `Manager '${manager.id}' is already registered`, {
        manager: manager.id,
      });
    }
    this.entries.set(manager.id, {
      manager,
      enabled: options.enabled ?? true,
      exclusions: new Set(options.exclusions ?? []),
      cleanup: options.cleanup ?? true,
      selfUpdate: options.selfUpdate ?? true,
    });
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): RegistryEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new UpdaterError(UpdaterErrorCode.NOT_FOUND, `Unknown manager '${id}'`, { manager: id, known: this.ids() });
    }
    return entry;
  }

  /** Every registered manager, enabled or not, in registration order. */
  all(): RegistryEntry[] {
    return [...this.entries.values()];
  }

  enabled(): RegistryEntry[] {
    return this.all().filter((e) => e.enabled);
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Resolve a caller-supplied selection. Unknown ids raise NOT_FOUND before
   * anything runs. The result follows registry order, not the caller's order.
   * Without a selection, every enabled manager is returned.
   */
  select(ids?: readonly string[]): RegistryEntry[] {
    if (!ids || ids.length === 0) return this.enabled();
    const unknown = ids.filter((id) => !this.entries.has(id));
    if (unknown.length > 0) {
      throw new UpdaterError(UpdaterErrorCode.NOT_FOUND, `Unknown manager(s): ${unknown.join(", ")}`, {
        unknown,
        known: this.ids(),
      });
    }
    const wanted = new Set(ids);
    return this.all().filter((e) => wanted.has(e.manager.id));
  }

  get size(): number {
    return this.entries.size;
  }
}
