import { useEffect, useState } from "react";
import type { ViewStore } from "../view-store.js";

// React hook: re-render whenever the engine asks for a redraw
export function useViewStore(store: ViewStore): number {
  const [tick, setTick] = useState(0);
  useEffect(() => store.subscribe(() => setTick((t) => t + 1)), [store]);
  return tick;
}
