import { describe, expect, it } from "vitest";

import { isQueueError, type QueueErrorCode } from "../src/queue/errors.js";
import { QueueRegistry, type RegistryChange } from "../src/queue/registry.js";
import { prediction, transaction } from "./helpers/messages.js";

function createRegistry(): QueueRegistry {
  return new QueueRegistry({
    defaults: { maxMessages: 1000, persistIntervalSeconds: 60 }
  });
}

function withCode(code: QueueErrorCode) {
  return (error: unknown) => isQueueError(error, code);
}

describe("queue registry", () => {
  it("runs the bounded transaction queue scenario", async () => {
    const registry = createRegistry();
    registry.create("orders", { maxMessages: 5, queueType: "transaction" });

    const ids: string[] = [];
    for (let index = 1; index <= 5; index += 1) {
      ids.push(await registry.push("orders", "transaction", transaction({ transaction_id: `tx-${index}` })));
    }
    expect(new Set(ids).size).toBe(5);

    await expect(registry.push("orders", "transaction", transaction({ transaction_id: "tx-6" }))).rejects.toSatisfy(
      withCode("QUEUE_FULL")
    );

    const first = await registry.pull("orders");
    expect(first?.id).toBe(ids[0]);
    expect(first?.content.transaction_id).toBe("tx-1");
    expect(registry.getInfo("orders").messageCount).toBe(4);

    await expect(registry.push("orders", "transaction", transaction({ transaction_id: "tx-7" }))).resolves.toEqual(
      expect.any(String)
    );
    expect(registry.getInfo("orders").messageCount).toBe(5);
  });

  it("runs the prediction queue scenario", async () => {
    const registry = createRegistry();
    registry.create("preds", { queueType: "prediction" });
    await expect(
      registry.push("preds", "prediction", { transaction_id: "t1", prediction: true, confidence: 0.9 })
    ).resolves.toEqual(expect.any(String));
    await expect(registry.push("preds", "prediction", { transaction_id: "t1", amount: 10 })).rejects.toSatisfy(
      withCode("INVALID_CONTENT")
    );
    expect(registry.getInfo("preds").messageCount).toBe(1);
  });

  it("rejects a prediction pushed to a transaction queue whatever its content", async () => {
    const registry = createRegistry();
    registry.create("orders");
    await expect(registry.push("orders", "prediction", prediction())).rejects.toSatisfy(withCode("TYPE_MISMATCH"));
    await expect(registry.push("orders", "prediction", transaction())).rejects.toSatisfy(withCode("TYPE_MISMATCH"));
  });

  it("keeps FIFO order", async () => {
    const registry = createRegistry();
    registry.create("orders");
    const a = await registry.push("orders", "transaction", transaction({ transaction_id: "a" }));
    const b = await registry.push("orders", "transaction", transaction({ transaction_id: "b" }));
    expect((await registry.pull("orders"))?.id).toBe(a);
    expect((await registry.pull("orders"))?.id).toBe(b);
    expect(await registry.pull("orders")).toBeNull();
  });

  it("applies process defaults and per-queue overrides", () => {
    const registry = createRegistry();
    expect(registry.create("defaults")).toMatchObject({
      name: "defaults",
      queueType: "transaction",
      messageCount: 0,
      maxMessages: 1000,
      persistIntervalSeconds: 60
    });
    expect(registry.create("custom", { maxMessages: 5, persistIntervalSeconds: 2, queueType: "prediction" })).toMatchObject({
      queueType: "prediction",
      maxMessages: 5,
      persistIntervalSeconds: 2
    });
  });

  it("validates names, uniqueness and config", () => {
    const registry = createRegistry();
    expect(() => registry.create("")).toThrowError(expect.objectContaining({ code: "INVALID_NAME" }));
    expect(() => registry.create("bad-name")).toThrowError(expect.objectContaining({ code: "INVALID_NAME" }));
    expect(() => registry.create("orders!")).toThrowError(expect.objectContaining({ code: "INVALID_NAME" }));
    registry.create("orders");
    expect(() => registry.create("orders")).toThrowError(expect.objectContaining({ code: "ALREADY_EXISTS" }));
    expect(() => registry.create("zero", { maxMessages: 0 })).toThrowError(
      expect.objectContaining({ code: "INVALID_CONFIG" })
    );
    expect(() => registry.create("fraction", { persistIntervalSeconds: 1.5 })).toThrowError(
      expect.objectContaining({ code: "INVALID_CONFIG" })
    );
    expect(registry.list().map((info) => info.name)).toEqual(["orders"]);
  });

  it("makes every operation on a deleted queue fail with NOT_FOUND", async () => {
    const registry = createRegistry();
    registry.create("orders");
    await registry.push("orders", "transaction", transaction());
    await registry.delete("orders");
    await expect(registry.push("orders", "transaction", transaction())).rejects.toSatisfy(withCode("NOT_FOUND"));
    await expect(registry.pull("orders")).rejects.toSatisfy(withCode("NOT_FOUND"));
    expect(() => registry.getInfo("orders")).toThrowError(expect.objectContaining({ code: "NOT_FOUND" }));
    await expect(registry.delete("orders")).rejects.toSatisfy(withCode("NOT_FOUND"));
    expect(registry.list()).toEqual([]);
  });

  it("fails a push that was waiting on the guard when delete won the race", async () => {
    const registry = createRegistry();
    registry.create("orders");
    const deletion = registry.delete("orders");
    const push = registry.push("orders", "transaction", transaction());
    await deletion;
    await expect(push).rejects.toSatisfy(withCode("NOT_FOUND"));
  });

  it("lets a push that acquired the guard first complete before delete", async () => {
    const registry = createRegistry();
    registry.create("orders");
    const push = registry.push("orders", "transaction", transaction());
    const deletion = registry.delete("orders");
    await expect(push).resolves.toEqual(expect.any(String));
    await deletion;
    expect(() => registry.getInfo("orders")).toThrowError(expect.objectContaining({ code: "NOT_FOUND" }));
  });

  it("allows a name to be reused after delete", async () => {
    const registry = createRegistry();
    registry.create("orders");
    await registry.delete("orders");
    expect(registry.create("orders", { queueType: "prediction" }).queueType).toBe("prediction");
  });

  it("notifies subscribers of creates and deletes", async () => {
    const registry = createRegistry();
    const changes: string[] = [];
    const unsubscribe = registry.subscribe((change: RegistryChange) => {
      changes.push(`${change.kind}:${change.state.name}`);
    });
    registry.create("orders");
    await registry.delete("orders");
    unsubscribe();
    registry.create("later");
    expect(changes).toEqual(["created:orders", "deleted:orders"]);
  });

  it("lists a consistent snapshot of queues", async () => {
    const registry = createRegistry();
    registry.create("a");
    registry.create("b", { queueType: "prediction" });
    await registry.push("a", "transaction", transaction());
    const listed = registry.list();
    expect(listed.map((info) => [info.name, info.messageCount])).toEqual([
      ["a", 1],
      ["b", 0]
    ]);
  });
});
