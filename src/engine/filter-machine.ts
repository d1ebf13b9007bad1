import type { FilterState, InputEvent } from "../types.js";

/**
 * Per-panel filter state machine.
 *
 *   normal ──/──▶ emptyFilter ──char──▶ filledFilter ⟲ char / backspace
 *     ▲  │            │  ▲                   │
 *     │  esc→exit     esc │ backspace(last)  │
 *     └───────────────┘  └───────────────────┘ esc → normal
 *
 * Effects tell the panel what to do on entry:
 *   footer: redraw the filter line only
 *   rows:   filter text changed, recompute the window (panel picks full vs footer redraw)
 *   exit:   quit the program
 */
export type FilterEffect = "footer" | "rows" | "exit";

export interface FilterStep {
  state: FilterState;
  text: string;
  effect: FilterEffect;
}

const FILTER_CHAR = /^[a-zA-Z0-9-]$/;

export function isFilterChar(char: string): boolean {
  return FILTER_CHAR.test(char);
}

// null means the machine does not claim the input; navigation and bindings get it
export function stepFilter(state: FilterState, text: string, input: InputEvent): FilterStep | null {
  const isEscape = input.type === "key" && input.name === "escape";
  const isErase = input.type === "key" && input.name === "backspace";
  const typed = input.type === "char" && isFilterChar(input.char) ? input.char.toLowerCase() : null;

  switch (state) {
    case "normal":
      if (input.type === "char" && input.char === "/") {
        return { state: "emptyFilter", text: "", effect: "footer" };
      }
      if (isEscape) return { state: "normal", text, effect: "exit" };
      return null;

    case "emptyFilter":
      if (isEscape) return { state: "normal", text: "", effect: "footer" };
      if (typed) return { state: "filledFilter", text: typed, effect: "rows" };
      return null;

    case "filledFilter": {
      if (isEscape) return { state: "normal", text: "", effect: "rows" };
      if (isErase) {
        const next = text.slice(0, -1);
        return { state: next ? "filledFilter" : "emptyFilter", text: next, effect: "rows" };
      }
      if (typed) return { state: "filledFilter", text: text + typed, effect: "rows" };
      return null;
    }
  }
}
