// kubectl-backed row fetchers for the four cascade panels.
// Run without a shell; every call honours the panel's AbortSignal.

import { execFile } from "node:child_process";
import type { RowFetcher } from "../types.js";

export type Exec = (file: string, args: readonly string[], signal: AbortSignal) => Promise<string>;

// Kinds people reach for first; the rest of api-resources follows alphabetically
export const TOP_KINDS = [
  "pods",
  "services",
  "deployments",
  "statefulsets",
  "daemonsets",
  "ingresses",
  "configmaps",
  "secrets",
  "persistentvolumes",
  "persistentvolumeclaims",
  "nodes",
  "storageclasses",
];

const MAX_BUFFER = 32 * 1024 * 1024;

export const execKubectl: Exec = (file, args, signal) =>
  new Promise((resolve, reject) => {
    execFile(file, [...args], { signal, maxBuffer: MAX_BUFFER, encoding: "utf-8" }, (err, stdout) => {
      if (err) reject(err);
      else resolve(stdout);
    });
  });

/** First whitespace-separated column of every non-empty line */
export function parseFirstColumn(stdout: string): string[] {
  const out: string[] = [];
  for (const line of stdout.split("\n")) {
    const first = line.trim().split(/\s+/)[0];
    if (first) out.push(first);
  }
  return out;
}

export function orderKinds(kinds: readonly string[]): string[] {
  const available = new Set(kinds);
  const top = TOP_KINDS.filter((k) => available.has(k));
  const topSet = new Set(top);
  const rest = [...available].filter((k) => !topSet.has(k)).sort();
  return [...top, ...rest];
}

export interface KubeFetchers {
  contexts: RowFetcher;
  namespaces: RowFetcher;
  kinds: RowFetcher;
  resources: RowFetcher;
}

export function createKubeFetchers(kubectl = "kubectl", exec: Exec = execKubectl): KubeFetchers {
  const lines = async (args: string[], signal: AbortSignal) => parseFirstColumn(await exec(kubectl, args, signal));
  return {
    contexts: (_upstream, signal) => lines(["config", "get-contexts", "-o", "name"], signal),
    namespaces: ([context], signal) => lines(["--context", context, "get", "namespaces", "--no-headers"], signal),
    kinds: async ([context], signal) =>
      orderKinds(await lines(["--context", context, "api-resources", "--verbs=get", "--no-headers"], signal)),
    // upstream: context, namespace, kind
    resources: ([context, namespace, kind], signal) =>
      lines(["--context", context, "-n", namespace, "get", kind, "--no-headers"], signal),
  };
}
