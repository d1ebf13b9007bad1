import { describe, it, expect } from "vitest";
import { ExclusiveGuard } from "../guard.js";
import { RefreshScheduler } from "../scheduler.js";
import { deferred, flush } from "./helpers.js";
import type { RefreshOutcome } from "../../types.js";

// Refresh that only settles when aborted or resolved by the test
function pendingRefresh() {
  const done = deferred<RefreshOutcome>();
  const signals: AbortSignal[] = [];
  const refresh = (signal: AbortSignal): Promise<RefreshOutcome> => {
    signals.push(signal);
    signal.addEventListener("abort", () => done.resolve("cancelled"), { once: true });
    return done.promise;
  };
  return { done, signals, refresh };
}

describe("RefreshScheduler", () => {
  it("should start a refresh when idle and keep at most one in flight", async () => {
    const guard = new ExclusiveGuard();
    const { done, signals, refresh } = pendingRefresh();
    const scheduler = new RefreshScheduler({ guard, isIdle: () => true, refresh });

    const handle = scheduler.tick();
    expect(handle?.generation).toBe(1);
    expect(scheduler.running).toBe(true);
    expect(scheduler.tick()).toBeNull();

    await flush();
    expect(signals).toHaveLength(1);
    done.resolve("changed");
    expect(await handle?.task).toBe("changed");
    expect(scheduler.running).toBe(false);
  });

  it("should not start while input is pending", () => {
    const scheduler = new RefreshScheduler({
      guard: new ExclusiveGuard(),
      isIdle: () => false,
      refresh: async () => "changed",
    });
    expect(scheduler.tick()).toBeNull();
  });

  it("should not start while something else holds the guard", async () => {
    const guard = new ExclusiveGuard();
    const gate = deferred<void>();
    const held = guard.runExclusive(() => gate.promise);
    const scheduler = new RefreshScheduler({ guard, isIdle: () => true, refresh: async () => "changed" });

    expect(scheduler.tick()).toBeNull();
    gate.resolve();
    await held;
    expect(scheduler.tick()).not.toBeNull();
  });

  it("should abort the in-flight refresh and wait for it on cancel", async () => {
    const guard = new ExclusiveGuard();
    const { signals, refresh } = pendingRefresh();
    const scheduler = new RefreshScheduler({ guard, isIdle: () => true, refresh });

    const handle = scheduler.tick();
    await flush();
    await scheduler.cancel();

    expect(signals[0]?.aborted).toBe(true);
    expect(await handle?.task).toBe("cancelled");
    expect(scheduler.running).toBe(false);
    expect(guard.locked).toBe(false);
  });

  it("should number generations upwards", async () => {
    const scheduler = new RefreshScheduler({
      guard: new ExclusiveGuard(),
      isIdle: () => true,
      refresh: async () => "unchanged",
    });
    await scheduler.tick()?.task;
    expect(scheduler.tick()?.generation).toBe(2);
  });

  it("should turn a failing refresh into unchanged", async () => {
    const scheduler = new RefreshScheduler({
      guard: new ExclusiveGuard(),
      isIdle: () => true,
      refresh: async () => {
        throw new Error("kubectl missing");
      },
    });
    expect(await scheduler.tick()?.task).toBe("unchanged");
    expect(scheduler.running).toBe(false);
  });

  it("should return at once from cancel when nothing runs", async () => {
    const scheduler = new RefreshScheduler({
      guard: new ExclusiveGuard(),
      isIdle: () => true,
      refresh: async () => "unchanged",
    });
    await expect(scheduler.cancel()).resolves.toBeUndefined();
  });
});
