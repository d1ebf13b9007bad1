import { describe, it, expect } from "vitest";
import { InputDecoder, decodeInput } from "../keys.js";

const key = (name: string) => ({ type: "key", name });
const char = (c: string) => ({ type: "char", char: c });

describe("decodeInput", () => {
  it("should decode arrows in both CSI and SS3 form", () => {
    expect(decodeInput("\x1b[A\x1b[B\x1b[C\x1b[D")).toEqual([key("up"), key("down"), key("right"), key("left")]);
    expect(decodeInput("\x1bOA\x1bOD")).toEqual([key("up"), key("left")]);
  });

  it("should decode paging and jump keys", () => {
    expect(decodeInput("\x1b[5~\x1b[6~")).toEqual([key("pageUp"), key("pageDown")]);
    expect(decodeInput("\x1b[H\x1b[1~\x1bOH")).toEqual([key("home"), key("home"), key("home")]);
    expect(decodeInput("\x1b[F\x1b[4~\x1b[8~")).toEqual([key("end"), key("end"), key("end")]);
  });

  it("should decode delete and shift-tab", () => {
    expect(decodeInput("\x1b[3~\x1b[Z")).toEqual([key("delete"), key("backTab")]);
  });

  it("should decode control characters", () => {
    expect(decodeInput("\t\r\n\x7f\b\x03\x12")).toEqual([
      key("tab"),
      key("enter"),
      key("enter"),
      key("backspace"),
      key("backspace"),
      key("ctrlC"),
      key("ctrlR"),
    ]);
  });

  it("should split a burst of printable characters", () => {
    expect(decodeInput("/ab")).toEqual([char("/"), char("a"), char("b")]);
  });

  it("should keep characters outside the BMP whole", () => {
    expect(decodeInput("é😀")).toEqual([char("é"), char("😀")]);
  });

  it("should read ESC followed by a printable character as Alt+key", () => {
    expect(decodeInput("\x1bq")).toEqual([{ type: "meta", char: "q" }]);
    expect(decodeInput("\x1bxy")).toEqual([{ type: "meta", char: "x" }, char("y")]);
  });

  it("should read a lone ESC as the escape key", () => {
    expect(decodeInput("\x1b")).toEqual([key("escape")]);
    expect(decodeInput("\x1b\x1b")).toEqual([key("escape"), key("escape")]);
  });

  it("should drop unknown sequences and other control bytes", () => {
    expect(decodeInput("\x1b[15~x\x01y")).toEqual([char("x"), char("y")]);
  });

  it("should decode SGR mouse reports with 0-based cells", () => {
    expect(decodeInput("\x1b[<0;11;4M")).toEqual([{ type: "mouse", button: "left", x: 10, y: 3, release: false }]);
    expect(decodeInput("\x1b[<0;11;4m")).toEqual([{ type: "mouse", button: "left", x: 10, y: 3, release: true }]);
  });

  it("should decode the wheel and ignore modifier bits", () => {
    expect(decodeInput("\x1b[<64;1;1M\x1b[<65;1;1M")).toEqual([
      { type: "mouse", button: "wheelUp", x: 0, y: 0, release: false },
      { type: "mouse", button: "wheelDown", x: 0, y: 0, release: false },
    ]);
    expect(decodeInput("\x1b[<4;2;2M")).toEqual([{ type: "mouse", button: "left", x: 1, y: 1, release: false }]);
    expect(decodeInput("\x1b[<2;2;2M")).toEqual([{ type: "mouse", button: "other", x: 1, y: 1, release: false }]);
  });

  it("should discard bracketed paste content", () => {
    expect(decodeInput("a\x1b[200~q/rm -rf\x1b[201~b")).toEqual([char("a"), char("b")]);
    expect(decodeInput("\x1b[200~unterminated")).toEqual([]);
  });
});

describe("InputDecoder", () => {
  it("should join an arrow key split across chunks", () => {
    const decoder = new InputDecoder();
    expect(decoder.feed("\x1b[")).toEqual([]);
    expect(decoder.hasPending).toBe(true);
    expect(decoder.feed("A")).toEqual([key("up")]);
    expect(decoder.hasPending).toBe(false);
  });

  it("should join an SS3 key split after the ESC", () => {
    const decoder = new InputDecoder();
    expect(decoder.feed("x\x1b")).toEqual([char("x")]);
    expect(decoder.feed("OB")).toEqual([key("down")]);
  });

  it("should hold a trailing ESC until flushed", () => {
    const decoder = new InputDecoder();
    expect(decoder.feed("\x1b")).toEqual([]);
    expect(decoder.hasPending).toBe(true);
    expect(decoder.flush()).toEqual([key("escape")]);
    expect(decoder.hasPending).toBe(false);
    expect(decoder.flush()).toEqual([]);
  });

  it("should read Alt+key split after the ESC as a meta key", () => {
    const decoder = new InputDecoder();
    expect(decoder.feed("\x1b")).toEqual([]);
    expect(decoder.feed("q")).toEqual([{ type: "meta", char: "q" }]);
  });

  it("should join a mouse report split across chunks", () => {
    const decoder = new InputDecoder();
    expect(decoder.feed("\x1b[<0;1")).toEqual([]);
    expect(decoder.feed("1;4M")).toEqual([{ type: "mouse", button: "left", x: 10, y: 3, release: false }]);
  });

  it("should drop a cut-off sequence on flush", () => {
    const decoder = new InputDecoder();
    expect(decoder.feed("\x1b[1;")).toEqual([]);
    expect(decoder.flush()).toEqual([]);
    expect(decoder.feed("a")).toEqual([char("a")]);
  });

  it("should discard paste content spread over several chunks", () => {
    const decoder = new InputDecoder();
    expect(decoder.feed("a\x1b[200~q/r")).toEqual([char("a")]);
    expect(decoder.feed("m -rf")).toEqual([]);
    expect(decoder.feed("\x1b[201~b")).toEqual([char("b")]);
  });
});
