/**
 * Key-bound external commands: template rendering, applicability and execution.
 *
 * Templates name the panel selections they need as {context}, {namespace},
 * {kind} and {resource}. Substituted values are single-quoted for the shell;
 * any other brace text (`${PAGER:-less}`) is left for the shell to expand.
 */
import { spawn } from "node:child_process";
import type { CommandParams, InputEvent, KeyBinding, PanelRole } from "./types.js";
import { debugLog } from "./log.js";

const PLACEHOLDER = /\{(context|namespace|kind|resource)\}/g;

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function isRole(name: string): name is PanelRole {
  return name === "context" || name === "namespace" || name === "kind" || name === "resource";
}

export function renderCommand(template: string, params: CommandParams): string {
  return template.replace(PLACEHOLDER, (match: string, name: string) =>
    isRole(name) ? shellQuote(params[name]) : match,
  );
}

export function bindingApplies(binding: KeyBinding, kind: string): boolean {
  return binding.applies.kind === "any" || binding.applies.kinds.includes(kind);
}

// Identifier a binding's `key` is matched against: the character, or the key name
export function keyIdOf(event: InputEvent): string | null {
  if (event.type === "char") return event.char;
  if (event.type === "key") return event.name;
  return null;
}

export function findBinding(bindings: readonly KeyBinding[], keyId: string): KeyBinding | undefined {
  return bindings.find((b) => b.key === keyId);
}

/**
 * Run a command through the shell on the real terminal and wait for it.
 * Exit status is the user's business; the program's own output shows failures.
 */
export function runExternal(command: string): Promise<void> {
  debugLog(`run: ${command}`);
  return new Promise((resolve) => {
    const child = spawn(command, { shell: true, stdio: "inherit" });
    child.on("error", (err) => {
      debugLog(`run failed: ${err.message}`);
      resolve();
    });
    child.on("exit", (code, signal) => {
      debugLog(`run exited: code=${code ?? "-"} signal=${signal ?? "-"}`);
      resolve();
    });
  });
}
