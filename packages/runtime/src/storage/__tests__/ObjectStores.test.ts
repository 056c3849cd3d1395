import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { pathToFileURL } from "url";
import { afterEach, describe, expect, it } from "vitest";
import { FileSystemObjectStore, InMemoryObjectStore } from "../ObjectStores.js";

describe("object stores", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it("keeps blobs in memory under memory:// uris", async () => {
    const store = new InMemoryObjectStore();
    const uri = await store.put("hello", { key: "artifacts/t1.txt" });
    expect(uri).toBe("memory://artifacts/t1.txt");
    expect((await store.get(uri)).toString("utf-8")).toBe("hello");
    await expect(store.get("memory://missing")).rejects.toThrow("object memory://missing not found");
  });

  it("rejects keys that escape the store", async () => {
    const store = new InMemoryObjectStore();
    await expect(store.put("x", { key: "../etc/passwd" })).rejects.toThrow('invalid object key "../etc/passwd"');
  });

  it("writes files below the root and serves them back", async () => {
    const root = await mkdtemp(join(tmpdir(), "taskforge-objects-"));
    tempDirs.push(root);
    const store = new FileSystemObjectStore(root);

    const uri = await store.put(Buffer.from("report body"), { key: "t1/report.txt" });
    expect(uri).toBe(pathToFileURL(join(root, "t1/report.txt")).href);
    expect((await store.get(uri)).toString("utf-8")).toBe("report body");

    const outside = pathToFileURL(join(tmpdir(), "elsewhere.txt")).href;
    await expect(store.get(outside)).rejects.toThrow("is outside the store");
  });
});
