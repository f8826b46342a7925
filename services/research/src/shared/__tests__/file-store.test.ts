import { mkdtemp } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { FileStore } from "../store/file.js";

async function tempStore(): Promise<{ store: FileStore; dir: string }> {
  const dir = await mkdtemp(path.join(tmpdir(), "fanout-store-"));
  return { store: new FileStore({ basePath: dir, prettyPrint: false }), dir };
}

describe("FileStore", () => {
  it("maps slash keys to JSON files under the base path", async () => {
    const { store, dir } = await tempStore();

    expect(store.getPath("run-r1/plan")).toBe(path.join(dir, "run-r1/plan.json"));
  });

  it("round-trips values and lists keys by substring", async () => {
    const { store } = await tempStore();

    await store.write("run-r1/plan", { runId: "r1" });
    await store.write("run-r1/finding-a", { threadId: "a" });
    await store.write("run-r2/plan", { runId: "r2" });

    expect(await store.read("run-r1/plan")).toEqual({ runId: "r1" });
    expect(await store.list("run-r1/")).toEqual(["run-r1/finding-a", "run-r1/plan"]);
    expect(await store.list("/plan")).toEqual(["run-r1/plan", "run-r2/plan"]);
  });

  it("treats missing keys as absent", async () => {
    const { store } = await tempStore();

    expect(await store.read("run-x/plan")).toBeNull();
    expect(await store.exists("run-x/plan")).toBe(false);
    expect(await store.list()).toEqual([]);
  });
});
