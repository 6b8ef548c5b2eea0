import type { Logger } from "pino";

import { silentLogger } from "./logger.js";
import type { QueueCapture, QueueState } from "./queue/queue-state.js";
import { describeSchemaErrors, validateQueueRecord, validateRegistryRecord } from "./queue/record-schema.js";
import { isValidQueueName, type QueueRegistry, type RegistryChange } from "./queue/registry.js";
import {
  SNAPSHOT_FORMAT_VERSION,
  type QueueRecord,
  type RegistryRecord,
  type SnapshotStore
} from "./queue/types.js";
import type { Message, QueueConfig } from "./types.js";

const REGISTRY_CHAIN = "\u0000registry";

export interface PersistenceEngineOptions {
  registry: QueueRegistry;
  store: SnapshotStore;
  /** How often the engine looks for queues whose own interval has elapsed. */
  tickMs: number;
  logger?: Logger;
}

export interface RecoveryReport {
  restored: string[];
  /** Queues recreated empty because their record was missing or unreadable. */
  degraded: string[];
}

function freezeMessage(message: Message): Message {
  Object.freeze(message.content);
  return Object.freeze(message);
}

function toQueueRecord(capture: QueueCapture): QueueRecord {
  return {
    version: SNAPSHOT_FORMAT_VERSION,
    name: capture.name,
    config: capture.config,
    createdAt: capture.createdAt,
    lastModified: capture.lastModified,
    messages: capture.messages
  };
}

/**
 * Writes dirty queues to the snapshot store off the push/pull path and
 * rebuilds the registry from it at startup.
 *
 * One process-wide tick checks every queue; a queue is written once its own
 * `persistIntervalSeconds` has elapsed since its last successful write. Store
 * operations for one record run strictly in order, and a write for a queue
 * that was deleted in the meantime is dropped.
 */
export class PersistenceEngine {
  private readonly logger: Logger;
  private readonly chains = new Map<string, Promise<void>>();
  private readonly lastWrittenAt = new WeakMap<QueueState, number>();
  private timer: NodeJS.Timeout | null = null;
  private cycle: Promise<number> | null = null;
  private registryDirty = false;
  private registryVersion = 0;
  private readonly unsubscribe: () => void;

  constructor(private readonly options: PersistenceEngineOptions) {
    this.logger = options.logger ?? silentLogger();
    this.unsubscribe = options.registry.subscribe((change) => this.onRegistryChange(change));
  }

  async recover(now = Date.now()): Promise<RecoveryReport> {
    const report: RecoveryReport = { restored: [], degraded: [] };
    let raw: unknown;
    try {
      raw = await this.options.store.readRegistry();
    } catch (err) {
      this.logger.error({ err }, "registry snapshot unreadable; starting with no queues");
      return report;
    }
    if (raw === undefined) {
      this.logger.info("no registry snapshot found; starting with no queues");
      return report;
    }
    if (!validateRegistryRecord(raw)) {
      this.logger.error(
        { reason: describeSchemaErrors(validateRegistryRecord.errors) },
        "registry snapshot invalid; starting with no queues"
      );
      return report;
    }

    for (const [name, entry] of Object.entries(raw.queues)) {
      if (!isValidQueueName(name)) {
        this.logger.warn({ queue: name }, "skipping registry entry with invalid queue name");
        continue;
      }
      const config: QueueConfig = {
        maxMessages: entry.maxMessages,
        persistIntervalSeconds: entry.persistIntervalSeconds,
        queueType: entry.queueType
      };
      const loaded = await this.loadMessages(name, config);
      let messages = loaded.messages;
      if (messages.length > config.maxMessages) {
        this.logger.warn(
          { queue: name, found: messages.length, maxMessages: config.maxMessages },
          "queue snapshot exceeds capacity; dropping newest messages"
        );
        messages = messages.slice(0, config.maxMessages);
      }
      const state = this.options.registry.restore({
        name,
        config,
        createdAt: entry.createdAt,
        lastModified: loaded.lastModified ?? entry.createdAt,
        messages: messages.map(freezeMessage)
      });
      this.lastWrittenAt.set(state, now);
      if (loaded.degraded) {
        report.degraded.push(name);
      } else {
        report.restored.push(name);
      }
    }
    this.logger.info(
      { restored: report.restored.length, degraded: report.degraded.length },
      "queues recovered from snapshot"
    );
    return report;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick().catch((err: unknown) => {
        this.logger.error({ err }, "snapshot tick failed");
      });
    }, this.options.tickMs);
  }

  /** Writes every dirty queue whose interval has elapsed. Skipped while another cycle runs. */
  async tick(now = Date.now()): Promise<number> {
    if (this.cycle) {
      return 0;
    }
    return this.runCycle((state) => {
      const last = this.lastWrittenAt.get(state) ?? 0;
      return now - last >= state.config.persistIntervalSeconds * 1_000;
    }, now);
  }

  /** Writes every dirty queue now, after any cycle already in progress. */
  async flush(now = Date.now()): Promise<number> {
    if (this.cycle) {
      await this.cycle;
    }
    return this.runCycle(() => true, now);
  }

  /** Stops the tick, finishes outstanding writes and performs a final flush. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const written = await this.flush();
    await this.drain();
    this.unsubscribe();
    await this.options.store.close();
    this.logger.info({ written }, "final snapshot written");
  }

  /** Resolves once every queued store operation has settled. */
  async drain(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all([...this.chains.values()]);
    }
  }

  private async runCycle(isDue: (state: QueueState) => boolean, now: number): Promise<number> {
    const due = this.options.registry.states().filter((state) => state.isDirty() && isDue(state));
    const writes = due.map((state) => this.persistQueue(state, now));
    if (this.registryDirty) {
      writes.push(this.persistRegistry().then(() => false));
    }
    const cycle = Promise.all(writes).then((results) => results.filter(Boolean).length);
    this.cycle = cycle;
    try {
      return await cycle;
    } finally {
      if (this.cycle === cycle) {
        this.cycle = null;
      }
    }
  }

  private async persistQueue(state: QueueState, now: number): Promise<boolean> {
    const capture = await state.capture();
    try {
      return await this.enqueue(state.name, async () => {
        if (state.isClosed()) {
          return false;
        }
        await this.options.store.writeQueue(toQueueRecord(capture));
        this.lastWrittenAt.set(state, now);
        if (!state.markPersisted(capture.version)) {
          this.logger.debug({ queue: state.name }, "queue changed during snapshot; staying dirty");
        }
        return true;
      });
    } catch (err) {
      this.logger.error({ err, queue: state.name }, "queue snapshot failed; will retry next cycle");
      return false;
    }
  }

  private async loadMessages(
    name: string,
    config: QueueConfig
  ): Promise<{ messages: Message[]; lastModified?: string; degraded: boolean }> {
    let raw: unknown;
    try {
      raw = await this.options.store.readQueue(name);
    } catch (err) {
      this.logger.warn({ err, queue: name }, "queue snapshot unreadable; recovering as empty");
      return { messages: [], degraded: true };
    }
    if (raw === undefined) {
      return { messages: [], degraded: false };
    }
    if (!validateQueueRecord(raw)) {
      this.logger.warn(
        { queue: name, reason: describeSchemaErrors(validateQueueRecord.errors) },
        "queue snapshot invalid; recovering as empty"
      );
      return { messages: [], degraded: true };
    }
    const foreign = raw.messages.find((message) => message.type !== config.queueType);
    if (raw.name !== name || foreign) {
      this.logger.warn({ queue: name }, "queue snapshot does not match registry entry; recovering as empty");
      return { messages: [], degraded: true };
    }
    return { messages: raw.messages, lastModified: raw.lastModified, degraded: false };
  }

  private onRegistryChange(change: RegistryChange): void {
    const { state } = change;
    if (change.kind === "created") {
      this.lastWrittenAt.set(state, Date.now());
    } else {
      this.enqueue(state.name, () => this.options.store.removeQueue(state.name)).catch((err: unknown) => {
        this.logger.error({ err, queue: state.name }, "failed to remove queue snapshot");
      });
    }
    this.registryDirty = true;
    this.registryVersion += 1;
    void this.persistRegistry();
  }

  /** Rewrites the registry record; it stays dirty until a write reflecting the latest change succeeds. */
  private async persistRegistry(): Promise<void> {
    try {
      await this.enqueue(REGISTRY_CHAIN, async () => {
        if (!this.registryDirty) {
          return;
        }
        const version = this.registryVersion;
        await this.options.store.writeRegistry(this.registryRecord());
        if (this.registryVersion === version) {
          this.registryDirty = false;
        }
      });
    } catch (err) {
      this.logger.error({ err }, "registry snapshot failed; will retry next cycle");
    }
  }

  private registryRecord(): RegistryRecord {
    const record: RegistryRecord = { version: SNAPSHOT_FORMAT_VERSION, queues: {} };
    for (const state of this.options.registry.states()) {
      record.queues[state.name] = {
        queueType: state.config.queueType,
        maxMessages: state.config.maxMessages,
        persistIntervalSeconds: state.config.persistIntervalSeconds,
        createdAt: state.createdAt
      };
    }
    return record;
  }

  private enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const next = previous.then(task);
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.chains.set(key, settled);
    void settled.then(() => {
      if (this.chains.get(key) === settled) {
        this.chains.delete(key);
      }
    });
    return next;
  }
}
