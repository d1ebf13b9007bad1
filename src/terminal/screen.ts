// Terminal modes around the UI: alternate screen, bracketed paste, SGR mouse reports.

// Enter alternate screen buffer (fullscreen, like vim/htop)
const ALT_SCREEN_ON = "\x1B[?1049h\x1B[H";
const ALT_SCREEN_OFF = "\x1B[?1049l";
// Bracket paste mode: terminal wraps pasted text in escape sequences
// so we can detect and ignore it instead of treating each char as a keypress
const BRACKET_PASTE_ON = "\x1B[?2004h";
const BRACKET_PASTE_OFF = "\x1B[?2004l";
// Button press/release + wheel, reported in SGR form (no 223-column limit)
const MOUSE_ON = "\x1B[?1000h\x1B[?1006h";
const MOUSE_OFF = "\x1B[?1006l\x1B[?1000l";

export interface TerminalStreams {
  stdin: NodeJS.ReadStream;
  stdout: NodeJS.WriteStream;
}

export function enterScreen({ stdin, stdout }: TerminalStreams): void {
  stdout.write(ALT_SCREEN_ON + BRACKET_PASTE_ON + MOUSE_ON);
  if (stdin.isTTY) stdin.setRawMode(true);
  stdin.setEncoding("utf-8");
  stdin.resume();
}

// Hand the terminal back in the state a shell or external program expects
export function leaveScreen({ stdin, stdout }: TerminalStreams): void {
  if (stdin.isTTY) stdin.setRawMode(false);
  stdin.pause();
  stdout.write(MOUSE_OFF + BRACKET_PASTE_OFF + ALT_SCREEN_OFF);
}
