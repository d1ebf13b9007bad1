import { watch } from "chokidar";
import { delimiter, join } from "node:path";
import { homedir } from "node:os";

const DEBOUNCE_MS = 100;

// KUBECONFIG may list several files; kubectl merges them, so any of them can add a context
export function kubeconfigPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  const fromEnv = (env.KUBECONFIG ?? "").split(delimiter).filter(Boolean);
  return fromEnv.length > 0 ? fromEnv : [join(homedir(), ".kube", "config")];
}

/** Watch the kubeconfig file(s); returns a stop function */
export function watchKubeconfig(paths: string[], onChange: () => void): () => Promise<void> {
  const watcher = watch(paths, {
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: { stabilityThreshold: 50, pollInterval: 20 },
  });

  // Debounce: kubectl rewrites the file in several steps → single reload
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  const onFileChange = () => {
    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = setTimeout(onChange, DEBOUNCE_MS);
  };

  watcher.on("change", onFileChange);
  watcher.on("add", onFileChange);

  return () => {
    if (debounceTimer) clearTimeout(debounceTimer);
    return watcher.close();
  };
}
