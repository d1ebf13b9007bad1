import type { RefreshOutcome, Surface } from "../types.js";
import type { Panel } from "./panel.js";

// Selections feeding panel `index`: its declared upstream, else every panel to its left
export function upstreamOf(panels: readonly Panel[], index: number): (string | undefined)[] {
  const from = panels[index].upstream;
  if (from) return from.map((i) => panels[i].selected());
  return panels.slice(0, index).map((p) => p.selected());
}

/** Re-fetch one panel from its current upstream and redraw it when the rows moved */
export async function refreshPanel(
  panels: readonly Panel[],
  index: number,
  surface: Surface,
  signal: AbortSignal,
): Promise<RefreshOutcome> {
  const outcome = await panels[index].refresh(upstreamOf(panels, index), signal);
  if (outcome === "changed") surface.redraw(index, "full");
  return outcome;
}

/**
 * Fan a selection change out to every dependent of `source`, left to right.
 * Each dependent is awaited before the next one fetches, so a panel further
 * right always reads its neighbours' settled selection. Dependents do not
 * cascade again: each panel's list already names the whole sub-cascade.
 */
export async function cascadeFrom(
  panels: readonly Panel[],
  source: number,
  surface: Surface,
  signal: AbortSignal,
): Promise<void> {
  const order = [...panels[source].dependents].sort((a, b) => a - b);
  for (const dep of order) {
    if (signal.aborted) return;
    await refreshPanel(panels, dep, surface, signal);
  }
}
