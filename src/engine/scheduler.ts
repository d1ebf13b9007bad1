import type { RefreshOutcome } from "../types.js";
import type { ExclusiveGuard } from "./guard.js";
import { debugLog } from "../log.js";

export interface RefreshHandle {
  readonly generation: number;
  readonly controller: AbortController;
  readonly task: Promise<RefreshOutcome>;
}

export interface SchedulerDeps {
  guard: ExclusiveGuard;
  /** True while no input is queued or being handled */
  isIdle: () => boolean;
  /** Refresh the last panel; must commit nothing once the signal is aborted */
  refresh: (signal: AbortSignal) => Promise<RefreshOutcome>;
}

/**
 * Idle-time refresh of the rightmost panel. At most one refresh in flight;
 * cancel() aborts it and waits for its teardown before returning.
 */
export class RefreshScheduler {
  private inFlight: RefreshHandle | null = null;
  private generation = 0;
  private readonly deps: SchedulerDeps;

  constructor(deps: SchedulerDeps) {
    this.deps = deps;
  }

  get running(): boolean {
    return this.inFlight !== null;
  }

  get current(): RefreshHandle | null {
    return this.inFlight;
  }

  /** Called on a timer; starts a refresh only when idle and nothing else holds the guard */
  tick(): RefreshHandle | null {
    if (this.inFlight || this.deps.guard.locked || !this.deps.isIdle()) return null;
    const generation = ++this.generation;
    const controller = new AbortController();
    const task = this.deps.guard
      .runExclusive(() => this.deps.refresh(controller.signal))
      .catch((err: unknown): RefreshOutcome => {
        debugLog(`background refresh #${generation} failed: ${err instanceof Error ? err.message : String(err)}`);
        return "unchanged";
      })
      .finally(() => {
        if (this.inFlight?.generation === generation) this.inFlight = null;
      });
    this.inFlight = { generation, controller, task };
    return this.inFlight;
  }

  async cancel(): Promise<void> {
    const handle = this.inFlight;
    if (!handle) return;
    handle.controller.abort();
    await handle.task;
    debugLog(`background refresh #${handle.generation} cancelled`);
  }
}
