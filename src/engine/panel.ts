import type {
  FilterState,
  Geometry,
  InputEvent,
  PanelRole,
  PanelSpec,
  RedrawScope,
  RefreshOutcome,
  RowFetcher,
} from "../types.js";
import { CircularWindow } from "./circular-window.js";
import { stepFilter } from "./filter-machine.js";
import { debugLog } from "../log.js";

export type VerticalMove = "up" | "down" | "pageUp" | "pageDown" | "home" | "end";

export type FilterResult =
  | { kind: "exit" }
  | { kind: "redraw"; scope: RedrawScope; selectionChanged: boolean };

// Rows of `all` containing `text` (case-insensitive), original order kept
export function filterRows(all: readonly string[], text: string): string[] {
  if (!text) return [...all];
  const needle = text.toLowerCase();
  return all.filter((row) => row.toLowerCase().includes(needle));
}

function sameRows(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((row, i) => row === b[i]);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export class Panel {
  readonly title: string;
  readonly role: PanelRole;
  readonly dependents: readonly number[];
  readonly upstream: readonly number[] | undefined;
  private readonly fetcher: RowFetcher;

  private rows: string[] = [];
  private filterText = "";
  private filterState: FilterState = "normal";
  private window = new CircularWindow<string>([]);
  private offset = 0;
  private geom: Geometry;

  constructor(spec: PanelSpec) {
    this.title = spec.title;
    this.role = spec.role;
    this.dependents = spec.dependents;
    this.upstream = spec.upstream;
    this.fetcher = spec.fetch;
    this.geom = { ...spec.geometry };
  }

  get allRows(): readonly string[] {
    return this.rows;
  }

  get filter(): string {
    return this.filterText;
  }

  get state(): FilterState {
    return this.filterState;
  }

  get filteredRows(): CircularWindow<string> {
    return this.window;
  }

  get selectedOffset(): number {
    return this.offset;
  }

  get geometry(): Geometry {
    return this.geom;
  }

  visibleCount(): number {
    return Math.min(this.geom.height, this.window.size);
  }

  visibleRows(): string[] {
    return this.window.view(this.visibleCount());
  }

  selected(): string | undefined {
    const visible = this.visibleRows();
    return visible.length > 0 ? visible[this.offset] : undefined;
  }

  /** Feed one input to the filter machine; null when the machine leaves it alone */
  applyFilterInput(input: InputEvent): FilterResult | null {
    const step = stepFilter(this.filterState, this.filterText, input);
    if (!step) return null;
    if (step.effect === "exit") return { kind: "exit" };

    this.filterState = step.state;
    if (step.effect === "footer") {
      this.filterText = step.text;
      return { kind: "redraw", scope: "footer", selectionChanged: false };
    }

    const before = this.visibleRows();
    const selectedBefore = this.selected();
    this.filterText = step.text;
    this.window = new CircularWindow(filterRows(this.rows, this.filterText));
    const after = this.visibleRows();
    if (sameRows(before, after)) {
      this.offset = Math.min(this.offset, Math.max(0, after.length - 1));
      return { kind: "redraw", scope: "footer", selectionChanged: false };
    }
    this.offset = 0;
    return { kind: "redraw", scope: "full", selectionChanged: this.selected() !== selectedBefore };
  }

  /**
   * Re-fetch rows. Failures degrade to an empty list; an aborted fetch commits nothing.
   * An absent upstream selection skips the fetch entirely.
   */
  async refresh(upstream: readonly (string | undefined)[], signal: AbortSignal): Promise<RefreshOutcome> {
    if (signal.aborted) return "cancelled";
    let next: string[] = [];
    const params = upstream.filter((p): p is string => p !== undefined);
    if (params.length === upstream.length) {
      try {
        next = await this.fetcher(params, signal);
      } catch (err) {
        if (signal.aborted || isAbortError(err)) {
          debugLog(`refresh ${this.title}: cancelled`);
          return "cancelled";
        }
        debugLog(`refresh ${this.title}: ${err instanceof Error ? err.message : String(err)}`);
        next = [];
      }
    }
    if (signal.aborted) return "cancelled";
    return this.replaceRows(next);
  }

  /**
   * Swap in a new row set. The selection resets only when the visible count
   * moves; otherwise the selected row keeps its line if it survived.
   */
  replaceRows(next: readonly string[]): RefreshOutcome {
    if (sameRows(this.rows, next)) return "unchanged";
    const countBefore = this.visibleCount();
    const selectedBefore = this.selected();
    this.rows = [...next];
    this.window = new CircularWindow(filterRows(this.rows, this.filterText));
    const countAfter = this.visibleCount();
    if (countAfter !== countBefore) {
      this.offset = 0;
      return "changed";
    }
    const found = selectedBefore === undefined ? -1 : this.window.elements.indexOf(selectedBefore);
    if (found < 0) {
      this.offset = Math.min(this.offset, Math.max(0, countAfter - 1));
    } else if (this.window.size > countAfter) {
      this.window.shift(found - this.offset);
    } else {
      this.offset = found;
    }
    return "changed";
  }

  /** Returns false when nothing moved (one row or none visible) */
  move(direction: VerticalMove): boolean {
    const visible = this.visibleCount();
    if (visible <= 1) return false;
    const size = this.window.size;
    const rotating = size > visible;

    switch (direction) {
      case "up":
      case "down": {
        const step = direction === "down" ? 1 : -1;
        if (rotating) this.window.shift(step);
        else this.offset = (this.offset + step + visible) % visible;
        break;
      }
      case "pageUp":
        this.window.shift(-visible);
        break;
      case "pageDown":
        this.window.shift(visible);
        break;
      case "home":
        this.window.shift(-this.window.index);
        this.offset = 0;
        break;
      case "end":
        // last element sits on the last visible line
        this.window.shift(size - visible - this.window.index);
        this.offset = visible - 1;
        break;
    }
    return true;
  }

  /** Select the n-th visible row; false when out of range */
  selectVisible(n: number): boolean {
    if (n < 0 || n >= this.visibleCount()) return false;
    this.offset = n;
    return true;
  }

  resize(geometry: Geometry): void {
    this.geom = { ...geometry };
    this.offset = Math.min(this.offset, Math.max(0, this.visibleCount() - 1));
  }
}
