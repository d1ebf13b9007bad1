import { Panel } from "../panel.js";
import type { Geometry, PanelRole, RedrawScope, RowFetcher, Surface } from "../../types.js";

export class RecordingSurface implements Surface {
  redraws: [number, RedrawScope][] = [];
  overlays = 0;
  events: string[] = [];

  redraw(panel: number, scope: RedrawScope): void {
    this.redraws.push([panel, scope]);
  }

  redrawOverlay(): void {
    this.overlays++;
  }

  suspend(): void {
    this.events.push("suspend");
  }

  resume(): void {
    this.events.push("resume");
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function abortError(): Error {
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

// Fetcher that rejects with AbortError as soon as its signal fires, like execFile does
export function abortable(result: Promise<string[]>): RowFetcher {
  return (_upstream, signal) =>
    new Promise<string[]>((resolve, reject) => {
      if (signal.aborted) return reject(abortError());
      signal.addEventListener("abort", () => reject(abortError()), { once: true });
      result.then(resolve, reject);
    });
}

export function staticFetcher(rows: string[]): RowFetcher {
  return async () => rows;
}

export function makePanel(
  opts: {
    rows?: string[];
    height?: number;
    title?: string;
    role?: PanelRole;
    fetch?: RowFetcher;
    dependents?: number[];
    geometry?: Partial<Geometry>;
  } = {},
): Panel {
  const panel = new Panel({
    title: opts.title ?? "Test",
    role: opts.role ?? "resource",
    fetch: opts.fetch ?? staticFetcher(opts.rows ?? []),
    dependents: opts.dependents ?? [],
    geometry: { x: 0, width: 20, height: opts.height ?? 2, ...opts.geometry },
  });
  if (opts.rows) panel.replaceRows(opts.rows);
  return panel;
}

export const signal = (): AbortSignal => new AbortController().signal;

// Lets every pending microtask and promise callback run
export const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
