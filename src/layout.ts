import type { Geometry } from "./types.js";

// Rows a panel spends on chrome: border(1) + title(1) above the list,
// filter line(1) + border(1) below it. Under the panels: status bar(1) plus
// one spare row, since Ink clears and repaints everything once output fills the terminal.
export const ROWS_ABOVE_LIST = 2;
export const ROWS_BELOW_LIST = 2;
export const STATUS_BAR_ROWS = 2;

export const DEFAULT_WIDTHS = [2, 2, 2, 4] as const;

/** Split the terminal into side-by-side panels by relative width */
export function computeLayout(columns: number, rows: number, widths: readonly number[]): Geometry[] {
  const total = widths.reduce((s, w) => s + w, 0);
  const height = Math.max(1, rows - ROWS_ABOVE_LIST - ROWS_BELOW_LIST - STATUS_BAR_ROWS);
  const out: Geometry[] = [];
  let x = 0;
  for (const [i, w] of widths.entries()) {
    // last panel takes the rounding remainder
    const width = i === widths.length - 1 ? Math.max(0, columns - x) : Math.floor((columns * w) / total);
    out.push({ x, width, height });
    x += width;
  }
  return out;
}
