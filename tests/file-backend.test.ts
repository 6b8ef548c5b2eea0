import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { FileSnapshotStore } from "../src/queue/file-backend.js";
import type { QueueRecord } from "../src/queue/types.js";

const cleanupPaths: string[] = [];

afterEach(async () => {
  while (cleanupPaths.length > 0) {
    const path = cleanupPaths.pop();
    if (path) {
      await rm(path, { recursive: true, force: true });
    }
  }
});

async function createStore(): Promise<{ dir: string; store: FileSnapshotStore }> {
  const dir = await mkdtemp(join(tmpdir(), "relayq-store-"));
  cleanupPaths.push(dir);
  return { dir, store: new FileSnapshotStore({ basePath: join(dir, "data") }) };
}

function queueRecord(name: string): QueueRecord {
  return {
    version: 1,
    name,
    config: { maxMessages: 10, persistIntervalSeconds: 60, queueType: "transaction" },
    createdAt: "2024-01-01T00:00:00.000Z",
    lastModified: "2024-01-01T00:00:00.000Z",
    messages: []
  };
}

describe("file snapshot store", () => {
  it("returns undefined for records that were never written", async () => {
    const { store } = await createStore();
    expect(await store.readRegistry()).toBeUndefined();
    expect(await store.readQueue("orders")).toBeUndefined();
  });

  it("keeps the registry and queue records in separate files", async () => {
    const { dir, store } = await createStore();
    await store.writeRegistry({ version: 1, queues: {} });
    await store.writeQueue(queueRecord("registry"));
    expect(store.registryPath()).toBe(join(dir, "data", "registry.json"));
    expect(store.queuePath("registry")).toBe(join(dir, "data", "queues", "registry.json"));
    expect(await store.readRegistry()).toEqual({ version: 1, queues: {} });
    expect(await store.readQueue("registry")).toEqual(queueRecord("registry"));
  });

  it("replaces records without leaving temp files behind", async () => {
    const { dir, store } = await createStore();
    await store.writeQueue(queueRecord("orders"));
    await store.writeQueue({ ...queueRecord("orders"), lastModified: "2024-02-01T00:00:00.000Z" });
    expect(await readdir(join(dir, "data", "queues"))).toEqual(["orders.json"]);
    const onDisk: unknown = JSON.parse(await readFile(store.queuePath("orders"), "utf8"));
    expect(onDisk).toMatchObject({ lastModified: "2024-02-01T00:00:00.000Z" });
  });

  it("removes queue records and tolerates removing a missing one", async () => {
    const { store } = await createStore();
    await store.writeQueue(queueRecord("orders"));
    await store.removeQueue("orders");
    await store.removeQueue("orders");
    expect(await store.readQueue("orders")).toBeUndefined();
  });

  it("surfaces unparseable records as errors", async () => {
    const { store } = await createStore();
    await store.writeQueue(queueRecord("orders"));
    await writeFile(store.queuePath("orders"), "{", "utf8");
    await expect(store.readQueue("orders")).rejects.toThrow(SyntaxError);
  });
});
