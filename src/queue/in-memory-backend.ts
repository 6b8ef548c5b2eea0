import type { QueueRecord, RegistryRecord, SnapshotStore } from "./types.js";

/** Keeps snapshots in process memory. Records are cloned on the way in and out. */
export class InMemorySnapshotStore implements SnapshotStore {
  private registry: RegistryRecord | undefined;
  private readonly queues = new Map<string, QueueRecord>();
  /** Set to make the next writes reject, for exercising retry paths. */
  failWrites = false;

  async readRegistry(): Promise<unknown> {
    return this.registry === undefined ? undefined : structuredClone(this.registry);
  }

  async writeRegistry(record: RegistryRecord): Promise<void> {
    this.assertWritable();
    this.registry = structuredClone(record);
  }

  async readQueue(name: string): Promise<unknown> {
    const record = this.queues.get(name);
    return record === undefined ? undefined : structuredClone(record);
  }

  async writeQueue(record: QueueRecord): Promise<void> {
    this.assertWritable();
    this.queues.set(record.name, structuredClone(record));
  }

  async removeQueue(name: string): Promise<void> {
    this.queues.delete(name);
  }

  hasQueue(name: string): boolean {
    return this.queues.has(name);
  }

  async close(): Promise<void> {
    // Keep records so a second engine can recover from the same store.
  }

  private assertWritable(): void {
    if (this.failWrites) {
      throw new Error("snapshot store unavailable");
    }
  }
}
