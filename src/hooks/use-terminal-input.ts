import { useEffect } from "react";
import { InputDecoder } from "../terminal/keys.js";
import type { Navigator } from "../engine/navigator.js";
import type { TerminalStreams } from "../terminal/screen.js";
import type { InputEvent } from "../types.js";

// How long a trailing ESC waits for the rest of its sequence
const ESCAPE_TIMEOUT_MS = 50;

// React hook: raw stdin → decoded events → navigator queue, plus terminal resizes.
// Mounted only while the UI owns the terminal, so external commands get stdin to themselves.
export function useTerminalInput(navigator: Navigator, { stdin, stdout }: TerminalStreams): void {
  useEffect(() => {
    const decoder = new InputDecoder();
    let escapeTimer: ReturnType<typeof setTimeout> | null = null;
    const deliver = (events: InputEvent[]) => {
      for (const event of events) navigator.enqueue(event);
    };

    const onData = (chunk: string | Buffer) => {
      if (escapeTimer) clearTimeout(escapeTimer);
      escapeTimer = null;
      deliver(decoder.feed(chunk.toString()));
      if (decoder.hasPending) {
        escapeTimer = setTimeout(() => {
          escapeTimer = null;
          deliver(decoder.flush());
        }, ESCAPE_TIMEOUT_MS);
      }
    };
    const onResize = () => {
      navigator.enqueue({ type: "resize", columns: stdout.columns ?? 80, rows: stdout.rows ?? 24 });
    };

    stdin.on("data", onData);
    stdout.on("resize", onResize);
    return () => {
      if (escapeTimer) clearTimeout(escapeTimer);
      stdin.off("data", onData);
      stdout.off("resize", onResize);
    };
  }, [navigator, stdin, stdout]);
}
