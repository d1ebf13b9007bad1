import { useEffect } from "react";
import type { RefreshScheduler } from "../engine/scheduler.js";

// React hook: offer the scheduler a chance to refresh the last panel every intervalMs.
// The scheduler itself decides whether the UI is idle enough to start one.
export function useBackgroundRefresh(scheduler: RefreshScheduler, intervalMs: number): void {
  useEffect(() => {
    const timer = setInterval(() => {
      scheduler.tick();
    }, intervalMs);
    return () => clearInterval(timer);
  }, [scheduler, intervalMs]);
}
