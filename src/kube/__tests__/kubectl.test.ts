import { describe, it, expect } from "vitest";
import { createKubeFetchers, orderKinds, parseFirstColumn, type Exec } from "../kubectl.js";
import { createPanels } from "../panels.js";

function fakeExec(stdout: string) {
  const calls: { file: string; args: readonly string[] }[] = [];
  const exec: Exec = async (file, args) => {
    calls.push({ file, args });
    return stdout;
  };
  return { calls, exec };
}

const signal = new AbortController().signal;

describe("parseFirstColumn", () => {
  it("should take the first column of every non-empty line", () => {
    expect(parseFirstColumn("web-0   1/1   Running   0   2d\n\n  web-1   0/1   Pending\n")).toEqual(["web-0", "web-1"]);
  });

  it("should return nothing for empty output", () => {
    expect(parseFirstColumn("")).toEqual([]);
    expect(parseFirstColumn("\n  \n")).toEqual([]);
  });
});

describe("orderKinds", () => {
  it("should put common kinds first and sort the rest", () => {
    expect(orderKinds(["widgets", "services", "bindings", "pods", "pods"])).toEqual([
      "pods",
      "services",
      "bindings",
      "widgets",
    ]);
  });
});

describe("createKubeFetchers", () => {
  it("should list contexts by name", async () => {
    const { calls, exec } = fakeExec("dev\nprod\n");
    const fetchers = createKubeFetchers("kubectl", exec);
    expect(await fetchers.contexts([], signal)).toEqual(["dev", "prod"]);
    expect(calls).toEqual([{ file: "kubectl", args: ["config", "get-contexts", "-o", "name"] }]);
  });

  it("should list namespaces of the selected context", async () => {
    const { calls, exec } = fakeExec("default   Active   10d\nkube-system   Active   10d\n");
    const fetchers = createKubeFetchers("/opt/kubectl", exec);
    expect(await fetchers.namespaces(["dev"], signal)).toEqual(["default", "kube-system"]);
    expect(calls[0]).toEqual({
      file: "/opt/kubectl",
      args: ["--context", "dev", "get", "namespaces", "--no-headers"],
    });
  });

  it("should list gettable kinds in display order", async () => {
    const { calls, exec } = fakeExec("bindings      v1   true   Binding\npods   po   v1   true   Pod\n");
    const fetchers = createKubeFetchers("kubectl", exec);
    expect(await fetchers.kinds(["dev"], signal)).toEqual(["pods", "bindings"]);
    expect(calls[0]?.args).toEqual(["--context", "dev", "api-resources", "--verbs=get", "--no-headers"]);
  });

  it("should list resources of a kind in a namespace", async () => {
    const { calls, exec } = fakeExec("web-0   1/1   Running\n");
    const fetchers = createKubeFetchers("kubectl", exec);
    expect(await fetchers.resources(["dev", "default", "pods"], signal)).toEqual(["web-0"]);
    expect(calls[0]?.args).toEqual(["--context", "dev", "-n", "default", "get", "pods", "--no-headers"]);
  });

  it("should pass kubectl failures through", async () => {
    const exec: Exec = async () => {
      throw new Error("Unable to connect to the server");
    };
    await expect(createKubeFetchers("kubectl", exec).contexts([], signal)).rejects.toThrow("Unable to connect");
  });
});

describe("createPanels", () => {
  it("should wire the four panels into a cascade", () => {
    const { exec } = fakeExec("");
    const panels = createPanels(createKubeFetchers("kubectl", exec), [
      { x: 0, width: 20, height: 5 },
      { x: 20, width: 20, height: 5 },
      { x: 40, width: 20, height: 5 },
      { x: 60, width: 40, height: 5 },
    ]);
    expect(panels.map((p) => [p.title, p.role, p.dependents])).toEqual([
      ["Contexts", "context", [1, 2, 3]],
      ["Namespaces", "namespace", [3]],
      ["API resources", "kind", [3]],
      ["Resources", "resource", []],
    ]);
    expect(panels[2].upstream).toEqual([0]);
    expect(panels[3].geometry).toEqual({ x: 60, width: 40, height: 5 });
  });
});
