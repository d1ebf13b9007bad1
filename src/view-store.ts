import type { RedrawScope, Surface } from "./types.js";

export interface PanelRevision {
  header: number;
  rows: number;
  footer: number;
}

export interface ScreenHooks {
  suspend: () => void;
  resume: () => void;
}

/**
 * Bridges engine redraw requests to React. Each panel part carries a revision
 * counter; components memoize on it, so a footer-only redraw leaves the row
 * list alone.
 */
export class ViewStore implements Surface {
  private revisions: PanelRevision[];
  private overlayRev = 0;
  private readonly listeners = new Set<() => void>();
  private readonly hooks: ScreenHooks;

  constructor(panelCount: number, hooks: ScreenHooks) {
    this.revisions = Array.from({ length: panelCount }, () => ({ header: 0, rows: 0, footer: 0 }));
    this.hooks = hooks;
  }

  revision(panel: number): PanelRevision {
    return this.revisions[panel];
  }

  get overlayRevision(): number {
    return this.overlayRev;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  redraw(panel: number, scope: RedrawScope): void {
    const prev = this.revisions[panel];
    if (!prev) return;
    const all = scope === "full";
    this.revisions[panel] = {
      header: all || scope === "header" ? prev.header + 1 : prev.header,
      rows: all || scope === "rows" ? prev.rows + 1 : prev.rows,
      footer: all || scope === "footer" ? prev.footer + 1 : prev.footer,
    };
    this.emit();
  }

  redrawOverlay(): void {
    this.overlayRev++;
    this.emit();
  }

  suspend(): void {
    this.hooks.suspend();
  }

  resume(): void {
    this.hooks.resume();
    for (let i = 0; i < this.revisions.length; i++) this.redraw(i, "full");
  }

  private emit(): void {
    for (const listener of this.listeners) listener();
  }
}
