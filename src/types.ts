// ─── Input events ───────────────────────────────────────────

export type KeyName =
  | "up"
  | "down"
  | "left"
  | "right"
  | "pageUp"
  | "pageDown"
  | "home"
  | "end"
  | "tab"
  | "backTab"
  | "escape"
  | "backspace"
  | "delete"
  | "enter"
  | "ctrlC"
  | "ctrlR";

export type MouseButton = "left" | "wheelUp" | "wheelDown" | "other";

export type InputEvent =
  | { type: "key"; name: KeyName }
  | { type: "char"; char: string }
  // Alt+key; never a filter character or a binding
  | { type: "meta"; char: string }
  // x/y are 0-based terminal cells
  | { type: "mouse"; button: MouseButton; x: number; y: number; release: boolean }
  | { type: "resize"; columns: number; rows: number }
  | { type: "reload"; panel: number };

// ─── Panels ─────────────────────────────────────────────────

export type FilterState = "normal" | "emptyFilter" | "filledFilter";

// What each panel's selection means to the commands bound on keys
export type PanelRole = "context" | "namespace" | "kind" | "resource";

export interface Geometry {
  x: number;
  width: number;
  /** Number of rows visible at once */
  height: number;
}

// Fetches a panel's rows from the selections of every panel to its left
export type RowFetcher = (upstream: readonly string[], signal: AbortSignal) => Promise<string[]>;

export interface PanelSpec {
  title: string;
  role: PanelRole;
  fetch: RowFetcher;
  /** Arena indices of the panels refreshed when this one's selection changes */
  dependents: readonly number[];
  /** Panels whose selections feed the fetch, in order; defaults to every panel on the left */
  upstream?: readonly number[];
  geometry: Geometry;
}

export type RefreshOutcome = "changed" | "unchanged" | "cancelled";

export type RedrawScope = "header" | "rows" | "footer" | "full";

// Drawing side of the engine. The Ink view implements this; tests record calls.
export interface Surface {
  redraw(panel: number, scope: RedrawScope): void;
  /** Confirmation overlay appeared or went away */
  redrawOverlay(): void;
  /** Tear the display down so an external program can own the terminal */
  suspend(): void;
  /** Rebuild the display from saved state */
  resume(): void;
}

// ─── Key bindings ───────────────────────────────────────────

export type Applicability = { kind: "any" } | { kind: "only"; kinds: readonly string[] };

export interface KeyBinding {
  /** A single printable character, or a named key such as "delete" */
  key: string;
  description: string;
  command: string;
  applies: Applicability;
  /** Destructive: ask before running */
  confirm: boolean;
}

export type CommandParams = Record<PanelRole, string>;

export type CommandRunner = (command: string) => Promise<void>;

export interface PendingConfirm {
  binding: KeyBinding;
  command: string;
  params: CommandParams;
}
