import type { Geometry, PanelSpec } from "../types.js";
import { Panel } from "../engine/panel.js";
import type { KubeFetchers } from "./kubectl.js";

// context → namespace → kind → resource
export function createPanels(fetchers: KubeFetchers, geometry: readonly Geometry[]): Panel[] {
  const specs: Omit<PanelSpec, "geometry">[] = [
    { title: "Contexts", role: "context", fetch: fetchers.contexts, dependents: [1, 2, 3] },
    { title: "Namespaces", role: "namespace", fetch: fetchers.namespaces, dependents: [3] },
    // api-resources only depend on the cluster, not the namespace
    { title: "API resources", role: "kind", fetch: fetchers.kinds, dependents: [3], upstream: [0] },
    { title: "Resources", role: "resource", fetch: fetchers.resources, dependents: [] },
  ];
  return specs.map((spec, i) => new Panel({ ...spec, geometry: geometry[i] ?? { x: 0, width: 0, height: 1 } }));
}
