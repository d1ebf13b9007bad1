import type { InputEvent, KeyName, MouseButton } from "../types.js";

const ESC = "\x1b";
const PASTE_START = "\x1b[200~";
const PASTE_END = "\x1b[201~";

// CSI / SS3 sequences (without the leading ESC) → key
const SEQUENCES: Record<string, KeyName> = {
  "[A": "up",
  "[B": "down",
  "[C": "right",
  "[D": "left",
  OA: "up",
  OB: "down",
  OC: "right",
  OD: "left",
  "[H": "home",
  "[F": "end",
  OH: "home",
  OF: "end",
  "[1~": "home",
  "[7~": "home",
  "[4~": "end",
  "[8~": "end",
  "[3~": "delete",
  "[5~": "pageUp",
  "[6~": "pageDown",
  "[Z": "backTab",
};

const CONTROL: Record<string, KeyName> = {
  "\t": "tab",
  "\r": "enter",
  "\n": "enter",
  "\x7f": "backspace",
  "\b": "backspace",
  "\x03": "ctrlC",
  "\x12": "ctrlR",
};

const SGR_MOUSE = /^\[<(\d+);(\d+);(\d+)([Mm])/;

function mouseButton(code: number): MouseButton {
  // low bits = button, 64 = wheel; modifiers (shift/meta/ctrl) live in bits 2-4
  const base = code & ~(4 | 8 | 16);
  if (base === 0) return "left";
  if (base === 64) return "wheelUp";
  if (base === 65) return "wheelDown";
  return "other";
}

/**
 * Length of the escape sequence body starting at `rest` (after ESC):
 * 0 if `rest` does not start one, -1 if it is cut off before its final byte.
 */
function sequenceLength(rest: string): number {
  if (rest.startsWith("O")) return rest.length >= 2 ? 2 : -1;
  if (!rest.startsWith("[")) return 0;
  // CSI: parameter/intermediate bytes, then one final byte in @..~
  for (let i = 1; i < rest.length; i++) {
    const code = rest.charCodeAt(i);
    if (code >= 0x40 && code <= 0x7e) return i + 1;
  }
  return -1;
}

function isPrintable(cp: number): boolean {
  return cp >= 0x20 && cp !== 0x7f;
}

/**
 * Stateful stdin decoder. A chunk may end inside an escape sequence or a
 * bracketed paste; the unfinished part waits for the next chunk. A lone ESC
 * at the end of a chunk is held until `flush()` (the caller's escape timeout).
 */
export class InputDecoder {
  private pending = "";
  private inPaste = false;

  /** True while a trailing ESC or partial sequence waits for more input */
  get hasPending(): boolean {
    return this.pending.length > 0;
  }

  feed(chunk: string): InputEvent[] {
    const data = this.pending + chunk;
    this.pending = "";
    return this.decode(data, false);
  }

  /** Give up waiting: a held ESC is the escape key, a cut-off sequence is dropped */
  flush(): InputEvent[] {
    const data = this.pending;
    this.pending = "";
    return data ? this.decode(data, true) : [];
  }

  private decode(chunk: string, final: boolean): InputEvent[] {
    const events: InputEvent[] = [];
    let i = 0;
    while (i < chunk.length) {
      if (this.inPaste) {
        const end = chunk.indexOf(PASTE_END, i);
        if (end < 0) return events;
        this.inPaste = false;
        i = end + PASTE_END.length;
        continue;
      }
      if (chunk.startsWith(PASTE_START, i)) {
        this.inPaste = true;
        i += PASTE_START.length;
        continue;
      }

      const ch = chunk[i];
      if (ch === ESC) {
        const rest = chunk.slice(i + 1);
        if (rest.length === 0 && !final) {
          this.pending = ESC;
          return events;
        }
        const mouse = SGR_MOUSE.exec(rest);
        if (mouse) {
          events.push({
            type: "mouse",
            button: mouseButton(Number(mouse[1])),
            x: Number(mouse[2]) - 1,
            y: Number(mouse[3]) - 1,
            release: mouse[4] === "m",
          });
          i += 1 + mouse[0].length;
          continue;
        }
        const len = sequenceLength(rest);
        if (len < 0) {
          if (!final) this.pending = chunk.slice(i);
          return events;
        }
        if (len > 0) {
          const name = SEQUENCES[rest.slice(0, len)];
          if (name) events.push({ type: "key", name });
          i += 1 + len;
          continue;
        }
        const next = rest.codePointAt(0);
        if (next !== undefined && next !== 0x1b && isPrintable(next)) {
          // Alt+key arrives as ESC + the key
          const char = String.fromCodePoint(next);
          events.push({ type: "meta", char });
          i += 1 + char.length;
          continue;
        }
        events.push({ type: "key", name: "escape" });
        i += 1;
        continue;
      }

      const control = CONTROL[ch];
      if (control) {
        events.push({ type: "key", name: control });
        i += 1;
        continue;
      }

      const cp = chunk.codePointAt(i) ?? 0;
      const char = String.fromCodePoint(cp);
      if (cp >= 0x20) events.push({ type: "char", char });
      i += char.length;
    }
    return events;
  }
}

/**
 * Decode one complete stdin chunk into input events, in order.
 * Unknown escape sequences and bracketed-paste content are dropped.
 */
export function decodeInput(chunk: string): InputEvent[] {
  const decoder = new InputDecoder();
  return [...decoder.feed(chunk), ...decoder.flush()];
}
