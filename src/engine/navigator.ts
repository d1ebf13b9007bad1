import type {
  CommandParams,
  CommandRunner,
  Geometry,
  InputEvent,
  KeyBinding,
  KeyName,
  MouseButton,
  PanelRole,
  PendingConfirm,
  Surface,
} from "../types.js";
import type { Panel, VerticalMove } from "./panel.js";
import { cascadeFrom, refreshPanel } from "./cascade.js";
import { stepFilter } from "./filter-machine.js";
import { ExclusiveGuard } from "./guard.js";
import { RefreshScheduler } from "./scheduler.js";
import { bindingApplies, findBinding, keyIdOf, renderCommand } from "../commands.js";
import { ROWS_ABOVE_LIST } from "../layout.js";
import { debugLog } from "../log.js";

export interface NavigatorOptions {
  panels: Panel[];
  surface: Surface;
  bindings: readonly KeyBinding[];
  runCommand: CommandRunner;
  /** Geometry for every panel at a terminal size */
  layout: (columns: number, rows: number) => Geometry[];
  /** Current terminal size; re-read after an external command hands the terminal back */
  terminalSize: () => { columns: number; rows: number };
  onExit: () => void;
}

const VERTICAL: Partial<Record<KeyName, VerticalMove>> = {
  up: "up",
  down: "down",
  pageUp: "pageUp",
  pageDown: "pageDown",
  home: "home",
  end: "end",
};

// Furthest a click outside every panel moves the active panel
const MAX_POINTER_STEPS = 2;

/**
 * Input dispatcher. Owns the active panel cursor, serializes event handling,
 * and coordinates cascades, the background refresher and external commands.
 */
export class Navigator {
  readonly panels: Panel[];
  readonly guard = new ExclusiveGuard();
  readonly scheduler: RefreshScheduler;

  private readonly surface: Surface;
  private readonly bindings: readonly KeyBinding[];
  private readonly runCommand: CommandRunner;
  private readonly layout: (columns: number, rows: number) => Geometry[];
  private readonly terminalSize: () => { columns: number; rows: number };
  private readonly onExit: () => void;

  private activeIdx = 0;
  private pending: PendingConfirm | null = null;
  private exited = false;
  private queue: InputEvent[] = [];
  private draining: Promise<void> | null = null;
  // Aborted on exit: startup and reload fetches
  private readonly lifetime = new AbortController();
  // The cascade in progress; aborted when newer input will move a selection again
  private cascadeController: AbortController | null = null;
  // Lowest panel whose cascade was cut short and still owes its dependents a refresh
  private staleFrom: number | null = null;

  constructor(opts: NavigatorOptions) {
    this.panels = opts.panels;
    this.surface = opts.surface;
    this.bindings = opts.bindings;
    this.runCommand = opts.runCommand;
    this.layout = opts.layout;
    this.terminalSize = opts.terminalSize;
    this.onExit = opts.onExit;
    this.scheduler = new RefreshScheduler({
      guard: this.guard,
      isIdle: () => this.isIdle(),
      refresh: (signal) => refreshPanel(this.panels, this.panels.length - 1, this.surface, signal),
    });
  }

  get active(): number {
    return this.activeIdx;
  }

  get confirmation(): PendingConfirm | null {
    return this.pending;
  }

  get hasExited(): boolean {
    return this.exited;
  }

  isIdle(): boolean {
    return !this.exited && this.pending === null && this.queue.length === 0 && this.draining === null;
  }

  /**
   * Initial population: first panel, then everything that hangs off it.
   * Runs on the event queue, so input typed meanwhile waits its turn.
   */
  start(): Promise<void> {
    if (!this.draining) this.draining = this.drain(() => this.populate());
    return this.draining;
  }

  private async populate(): Promise<void> {
    await refreshPanel(this.panels, 0, this.surface, this.lifetime.signal);
    await this.cascade(0);
  }

  enqueue(event: InputEvent): void {
    if (this.exited) return;
    // ctrl-c jumps the queue: a hung fetch must not keep the program alive
    if (event.type === "key" && event.name === "ctrlC") return this.exit();
    if (this.supersedes(event)) this.cascadeController?.abort();
    this.queue.push(event);
    if (!this.draining) this.draining = this.drain();
  }

  // Input that will move a selection and start a cascade of its own
  private supersedes(event: InputEvent): boolean {
    switch (event.type) {
      case "mouse":
        return !event.release;
      case "reload":
      case "resize":
        return true;
      case "key":
        return (
          VERTICAL[event.name] !== undefined ||
          event.name === "ctrlR" ||
          (event.name === "backspace" && this.panels[this.activeIdx].state === "filledFilter")
        );
      case "char":
        return this.panels[this.activeIdx].state !== "normal";
      case "meta":
        return false;
    }
  }

  /** Resolves once every queued event has been handled */
  whenIdle(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  private async drain(first?: () => Promise<void>): Promise<void> {
    if (first) await this.guarded("start", first);
    while (!this.exited) {
      const event = this.queue.shift();
      if (event) {
        await this.guarded(event.type, () => this.handle(event));
        continue;
      }
      // queue is empty: finish what an interrupted cascade left behind
      if (this.staleFrom === null) break;
      await this.guarded("cascade", () => this.settle());
    }
    this.queue = [];
    this.draining = null;
  }

  // A failing handler is logged; the loop keeps going
  private async guarded(label: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      debugLog(`${label} failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    }
  }

  async handle(event: InputEvent): Promise<void> {
    if (event.type === "key" && event.name === "ctrlC") return this.exit();
    if (this.pending) return this.answerConfirm(event);

    switch (event.type) {
      case "resize":
        return this.resize(event.columns, event.rows);
      case "reload":
        return this.reload(event.panel);
      case "mouse":
        return this.pointer(event.x, event.y, event.button, event.release);
    }

    const panel = this.panels[this.activeIdx];
    const step = stepFilter(panel.state, panel.filter, event);
    if (step) {
      if (step.effect === "exit") return this.exit();
      // the filter is about to rebuild rows; nothing may commit underneath it
      if (step.effect === "rows") await this.scheduler.cancel();
      const result = panel.applyFilterInput(event);
      if (result?.kind !== "redraw") return;
      this.surface.redraw(this.activeIdx, result.scope);
      if (result.selectionChanged) await this.propagate(this.activeIdx);
      return;
    }

    if (event.type === "key") {
      switch (event.name) {
        case "tab":
        case "right":
          return this.activate(this.wrap(this.activeIdx + 1));
        case "backTab":
        case "left":
          return this.activate(this.wrap(this.activeIdx - 1));
        case "ctrlR":
          return this.reload(this.activeIdx);
      }
      const move = VERTICAL[event.name];
      if (move) return this.moveVertically(this.activeIdx, move);
    }

    if (event.type === "char" && event.char === "q") return this.exit();

    const keyId = keyIdOf(event);
    const binding = keyId ? findBinding(this.bindings, keyId) : undefined;
    if (binding) await this.invoke(binding);
  }

  // ─── Navigation ───────────────────────────────────────────

  private wrap(i: number): number {
    const n = this.panels.length;
    return ((i % n) + n) % n;
  }

  private activate(next: number): void {
    if (next === this.activeIdx) return;
    const prev = this.activeIdx;
    this.activeIdx = next;
    this.surface.redraw(prev, "header");
    this.surface.redraw(next, "header");
  }

  private async moveVertically(index: number, move: VerticalMove): Promise<void> {
    const panel = this.panels[index];
    if (panel.visibleCount() <= 1) return;
    await this.scheduler.cancel();
    const before = panel.selected();
    panel.move(move);
    this.surface.redraw(index, "rows");
    if (panel.selected() !== before) await this.propagate(index);
  }

  private async propagate(index: number): Promise<void> {
    if (this.panels[index].dependents.length === 0) return;
    await this.scheduler.cancel();
    await this.cascade(index);
  }

  /**
   * Refresh the dependents of `source`. Skipped when queued input will move a
   * selection again; an interrupted cascade is remembered and rerun once the
   * queue drains, unless a later cascade already covered it.
   */
  private async cascade(source: number): Promise<void> {
    if (this.exited) return;
    if (this.queue.some((e) => this.supersedes(e))) return this.markStale(source);
    const controller = new AbortController();
    this.cascadeController = controller;
    try {
      await cascadeFrom(this.panels, source, this.surface, controller.signal);
    } finally {
      if (this.cascadeController === controller) this.cascadeController = null;
    }
    if (controller.signal.aborted) {
      if (!this.exited) this.markStale(source);
      return;
    }
    if (this.staleFrom !== null && this.covers(source, this.staleFrom)) this.staleFrom = null;
  }

  private markStale(source: number): void {
    this.staleFrom = this.staleFrom === null ? source : Math.min(this.staleFrom, source);
  }

  // A cascade from `source` refreshes everything one from `stale` would
  private covers(source: number, stale: number): boolean {
    if (source === stale) return true;
    const reached = this.panels[source].dependents;
    return reached.includes(stale) && this.panels[stale].dependents.every((d) => reached.includes(d));
  }

  private async settle(): Promise<void> {
    const from = this.staleFrom;
    if (from === null) return;
    this.staleFrom = null;
    await this.cascade(from);
  }

  private async pointer(x: number, y: number, button: MouseButton, release: boolean): Promise<void> {
    if (release || button === "other") return;
    const target = this.panelAtColumn(x);
    this.activate(target);
    if (button === "wheelUp") return this.moveVertically(target, "up");
    if (button === "wheelDown") return this.moveVertically(target, "down");

    const panel = this.panels[target];
    const row = y - ROWS_ABOVE_LIST;
    if (row < 0 || row >= panel.visibleCount() || row === panel.selectedOffset) return;
    await this.scheduler.cancel();
    const before = panel.selected();
    panel.selectVisible(row);
    this.surface.redraw(target, "rows");
    if (panel.selected() !== before) await this.propagate(target);
  }

  // Panel under column x; outside every panel → nearest one on that side, within reach
  private panelAtColumn(x: number): number {
    const hit = this.panels.findIndex((p) => x >= p.geometry.x && x < p.geometry.x + p.geometry.width);
    if (hit >= 0) return hit;
    const first = this.panels[0].geometry;
    if (x < first.x) return Math.max(0, this.activeIdx - MAX_POINTER_STEPS);
    return Math.min(this.panels.length - 1, this.activeIdx + MAX_POINTER_STEPS);
  }

  // ─── Refresh ──────────────────────────────────────────────

  private async reload(index: number): Promise<void> {
    await this.scheduler.cancel();
    const outcome = await refreshPanel(this.panels, index, this.surface, this.lifetime.signal);
    if (outcome === "changed") await this.cascade(index);
  }

  // A shorter window can clamp a selection; its dependents then refetch, left to right
  private async resize(columns: number, rows: number): Promise<void> {
    await this.scheduler.cancel();
    const geometry = this.layout(columns, rows);
    const before = this.panels.map((p) => p.selected());
    for (const [i, panel] of this.panels.entries()) {
      const g = geometry[i];
      if (g) panel.resize(g);
      this.surface.redraw(i, "full");
    }
    const refreshed = new Set<number>();
    for (const [i, panel] of this.panels.entries()) {
      if (refreshed.has(i) || panel.selected() === before[i]) continue;
      await this.propagate(i);
      for (const d of panel.dependents) refreshed.add(d);
    }
  }

  // ─── Commands ─────────────────────────────────────────────

  private selectionOf(role: PanelRole): string | undefined {
    return this.panels.find((p) => p.role === role)?.selected();
  }

  private commandParams(): CommandParams | null {
    const context = this.selectionOf("context");
    const namespace = this.selectionOf("namespace");
    const kind = this.selectionOf("kind");
    const resource = this.panels[this.panels.length - 1].selected();
    if (context === undefined || namespace === undefined || kind === undefined || resource === undefined) {
      return null;
    }
    return { context, namespace, kind, resource };
  }

  private async invoke(binding: KeyBinding): Promise<void> {
    // commands must see dependents that match their upstream selection
    await this.settle();
    const params = this.commandParams();
    if (!params || !bindingApplies(binding, params.kind)) return;
    const command = renderCommand(binding.command, params);
    if (binding.confirm) {
      this.pending = { binding, command, params };
      this.surface.redrawOverlay();
      return;
    }
    await this.execute(command);
  }

  private async answerConfirm(event: InputEvent): Promise<void> {
    const pending = this.pending;
    if (!pending) return;
    switch (event.type) {
      case "resize":
        return this.resize(event.columns, event.rows);
      case "reload":
        return this.reload(event.panel);
      case "mouse":
        // clicks and wheel noise must not dismiss the prompt
        return;
    }
    const yes =
      (event.type === "char" && (event.char === "y" || event.char === "Y")) ||
      (event.type === "key" && event.name === "enter");
    this.pending = null;
    this.surface.redrawOverlay();
    if (yes) await this.execute(pending.command);
  }

  private async execute(command: string): Promise<void> {
    await this.scheduler.cancel();
    await this.guard.runExclusive(async () => {
      this.surface.suspend();
      try {
        await this.runCommand(command);
      } finally {
        this.surface.resume();
      }
    });
    // the terminal may have been resized while the command owned it
    const { columns, rows } = this.terminalSize();
    await this.resize(columns, rows);
  }

  private exit(): void {
    if (this.exited) return;
    this.exited = true;
    this.queue = [];
    this.staleFrom = null;
    this.cascadeController?.abort();
    this.lifetime.abort();
    this.onExit();
  }
}
