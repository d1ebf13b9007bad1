/**
 * Config: reads ~/.kcascade/config.json
 *
 * Validated once at startup; a binding that would never fire is a load error,
 * not a silent no-op at keypress time. A missing file means defaults.
 */
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import type { KeyBinding } from "./types.js";
import { DEFAULT_WIDTHS } from "./layout.js";

export const CONFIG_DIR = join(homedir(), ".kcascade");
export const CONFIG_PATH = join(CONFIG_DIR, "config.json");

export const DEFAULT_REFRESH_MS = 3000;

// Named keys a binding may use besides single characters
const NAMED_KEYS = new Set(["delete", "enter"]);
// Reserved by navigation and the filter
const RESERVED_CHARS = new Set(["/", "q"]);

export class ConfigError extends Error {
  constructor(
    readonly path: string,
    message: string,
  ) {
    super(`${path}: ${message}`);
    this.name = "ConfigError";
  }
}

export function isBindableKey(key: string): boolean {
  if (NAMED_KEYS.has(key)) return true;
  const chars = [...key];
  if (chars.length !== 1 || RESERVED_CHARS.has(key)) return false;
  const cp = key.codePointAt(0) ?? 0;
  return cp > 0x20 && cp !== 0x7f;
}

const BindingSchema = z.object({
  key: z.string().refine(isBindableKey, {
    message: `must be one printable character other than "/" and "q", or one of: ${[...NAMED_KEYS].join(", ")}`,
  }),
  description: z.string().min(1),
  command: z.string().min(1),
  applies: z.union([z.literal("*"), z.array(z.string().min(1)).nonempty()]).default("*"),
  confirm: z.boolean().default(false),
});

const ConfigSchema = z.object({
  bindings: z
    .array(BindingSchema)
    .refine((list) => new Set(list.map((b) => b.key)).size === list.length, {
      message: "each key may be bound only once",
    })
    .optional(),
  refreshIntervalMs: z.number().int().min(250).default(DEFAULT_REFRESH_MS),
  kubectl: z.string().min(1).default("kubectl"),
  widths: z.array(z.number().int().positive()).length(DEFAULT_WIDTHS.length).optional(),
});

type RawBinding = z.infer<typeof BindingSchema>;

export interface AppConfig {
  bindings: KeyBinding[];
  refreshIntervalMs: number;
  kubectl: string;
  widths: number[];
}

const PAGER = "${PAGER:-less}";

export const DEFAULT_BINDINGS: KeyBinding[] = [
  {
    key: "1",
    description: "yaml",
    command: `kubectl --context {context} -n {namespace} get {kind} {resource} -o yaml | ${PAGER}`,
    applies: { kind: "any" },
    confirm: false,
  },
  {
    key: "2",
    description: "describe",
    command: `kubectl --context {context} -n {namespace} describe {kind} {resource} | ${PAGER}`,
    applies: { kind: "any" },
    confirm: false,
  },
  {
    key: "3",
    description: "edit",
    command: "kubectl --context {context} -n {namespace} edit {kind} {resource}",
    applies: { kind: "any" },
    confirm: false,
  },
  {
    key: "4",
    description: "logs",
    command: `kubectl --context {context} -n {namespace} logs --all-containers {resource} | ${PAGER}`,
    applies: { kind: "only", kinds: ["pods"] },
    confirm: false,
  },
  {
    key: "5",
    description: "shell",
    command: "kubectl --context {context} -n {namespace} exec -it {resource} -- sh",
    applies: { kind: "only", kinds: ["pods"] },
    confirm: false,
  },
  {
    key: "delete",
    description: "delete",
    command: "kubectl --context {context} -n {namespace} delete {kind} {resource}",
    applies: { kind: "any" },
    confirm: true,
  },
];

function toBinding(raw: RawBinding): KeyBinding {
  return {
    key: raw.key,
    description: raw.description,
    command: raw.command,
    applies: raw.applies === "*" ? { kind: "any" } : { kind: "only", kinds: raw.applies },
    confirm: raw.confirm,
  };
}

/** Validate an already-parsed config object */
export function parseConfig(data: unknown, source = CONFIG_PATH): AppConfig {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(source, detail);
  }
  const cfg = result.data;
  return {
    bindings: cfg.bindings ? cfg.bindings.map(toBinding) : DEFAULT_BINDINGS,
    refreshIntervalMs: cfg.refreshIntervalMs,
    kubectl: cfg.kubectl,
    widths: cfg.widths ?? [...DEFAULT_WIDTHS],
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function loadConfig(path = CONFIG_PATH): AppConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return parseConfig({}, path);
    throw new ConfigError(path, err instanceof Error ? err.message : String(err));
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(path, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  return parseConfig(data, path);
}
