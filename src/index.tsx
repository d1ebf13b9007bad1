#!/usr/bin/env node
import React from "react";
import { readFileSync } from "node:fs";
import { render, type Instance } from "ink";
import { Command, InvalidArgumentError } from "commander";
import { App } from "./app.js";
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { computeLayout } from "./layout.js";
import { runExternal } from "./commands.js";
import { Navigator } from "./engine/navigator.js";
import { createKubeFetchers } from "./kube/kubectl.js";
import { createPanels } from "./kube/panels.js";
import { enterScreen, leaveScreen, type TerminalStreams } from "./terminal/screen.js";
import { ViewStore } from "./view-store.js";
import { kubeconfigPaths, watchKubeconfig } from "./watchers/kubeconfig.js";
import { debugLog, setDebugLogging } from "./log.js";

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    // running from an unpacked tree without package.json
  }
  return "0.0.0";
}

function parseMs(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 250) throw new InvalidArgumentError("expected an integer >= 250");
  return n;
}

interface CliOptions {
  config?: string;
  kubectl?: string;
  refresh?: number;
  debug?: boolean;
}

const program = new Command();

program
  .name("kcascade")
  .description("Browse Kubernetes contexts, namespaces, kinds and resources in cascading panels")
  .version(readVersion())
  .option("--config <path>", "Config file (default: ~/.kcascade/config.json)")
  .option("--kubectl <bin>", "kubectl binary to run")
  .option("--refresh <ms>", "Idle refresh interval for the resources panel", parseMs)
  .option("--debug", "Write a debug log to ~/.kcascade/debug.log");

program.parse();
const opts = program.opts<CliOptions>();
if (opts.debug) setDebugLogging(true);

let config: AppConfig;
try {
  config = loadConfig(opts.config);
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`kcascade: ${err.message}`);
  process.exit(1);
}
if (opts.kubectl) config.kubectl = opts.kubectl;
if (opts.refresh) config.refreshIntervalMs = opts.refresh;

const streams: TerminalStreams = { stdin: process.stdin, stdout: process.stdout };
const layout = (columns: number, rows: number) => computeLayout(columns, rows, config.widths);

const panels = createPanels(
  createKubeFetchers(config.kubectl),
  layout(process.stdout.columns ?? 80, process.stdout.rows ?? 24),
);

let instance: Instance | null = null;

function mount(): void {
  instance = render(
    <App
      navigator={engine}
      store={store}
      bindings={config.bindings}
      refreshIntervalMs={config.refreshIntervalMs}
      streams={streams}
    />,
    { exitOnCtrlC: false, patchConsole: false },
  );
}

function unmount(): void {
  instance?.unmount();
  instance = null;
}

const store = new ViewStore(panels.length, {
  suspend: () => {
    unmount();
    leaveScreen(streams);
  },
  resume: () => {
    enterScreen(streams);
    mount();
  },
});

const stopWatching = watchKubeconfig(kubeconfigPaths(), () => engine.enqueue({ type: "reload", panel: 0 }));

// Restore original screen + disable mouse/bracket paste on exit
let restored = false;
async function shutdown(): Promise<void> {
  if (restored) return;
  restored = true;
  unmount();
  leaveScreen(streams);
  await engine.scheduler.cancel();
  await stopWatching();
}

const engine = new Navigator({
  panels,
  surface: store,
  bindings: config.bindings,
  runCommand: runExternal,
  layout,
  terminalSize: () => ({ columns: streams.stdout.columns ?? 80, rows: streams.stdout.rows ?? 24 }),
  onExit: () => {
    shutdown().catch((err: unknown) => debugLog(`shutdown: ${String(err)}`));
  },
});

function exitOnSignal(code: number): void {
  shutdown()
    .catch((err: unknown) => debugLog(`shutdown: ${String(err)}`))
    .finally(() => process.exit(code));
}

// raw mode swallows ctrl-c, so these only arrive from outside
process.on("SIGINT", () => exitOnSignal(130));
process.on("SIGTERM", () => exitOnSignal(143));

enterScreen(streams);
mount();
await engine.start();
