import { randomUUID } from "node:crypto";

import type { Logger } from "pino";

import { QueueError } from "./errors.js";
import { QueueState } from "./queue-state.js";
import { isMessageType, isPredictionContent, isTransactionContent, validate } from "./type-enforcer.js";
import { silentLogger } from "../logger.js";
import type {
  JsonObject,
  Message,
  MessageType,
  QueueConfig,
  QueueConfigOverrides,
  QueueInfo
} from "../types.js";

const QUEUE_NAME_PATTERN = /^[A-Za-z0-9]+$/;

export type RegistryChange =
  | { kind: "created"; state: QueueState }
  | { kind: "deleted"; state: QueueState };

export type RegistryListener = (change: RegistryChange) => void;

export interface QueueRegistryOptions {
  defaults: Pick<QueueConfig, "maxMessages" | "persistIntervalSeconds">;
  logger?: Logger;
}

export interface RestoredQueue {
  name: string;
  config: QueueConfig;
  createdAt: string;
  lastModified: string;
  messages: Message[];
}

export function isValidQueueName(name: string): boolean {
  return QUEUE_NAME_PATTERN.test(name);
}

export function createMessage(type: MessageType, content: JsonObject): Message {
  const id = randomUUID();
  const createdAt = new Date().toISOString();
  const frozen = Object.freeze({ ...content });
  if (type === "transaction" && isTransactionContent(frozen)) {
    return Object.freeze({ id, type, content: frozen, createdAt });
  }
  if (type === "prediction" && isPredictionContent(frozen)) {
    return Object.freeze({ id, type, content: frozen, createdAt });
  }
  throw new QueueError("INVALID_CONTENT", `${type} message is missing required fields`);
}

/**
 * Owns every QueueState. Map changes are synchronous, so a lookup either sees
 * a queue or does not; per-queue work then serialises on that queue's guard.
 */
export class QueueRegistry {
  private readonly queues = new Map<string, QueueState>();
  private readonly listeners = new Set<RegistryListener>();
  private readonly logger: Logger;

  constructor(private readonly options: QueueRegistryOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  create(name: string, overrides: QueueConfigOverrides = {}): QueueInfo {
    if (!isValidQueueName(name)) {
      throw new QueueError("INVALID_NAME", "queue name must be non-empty and alphanumeric");
    }
    if (this.queues.has(name)) {
      throw new QueueError("ALREADY_EXISTS", `queue '${name}' already exists`);
    }
    const config = this.resolveConfig(overrides);
    const state = new QueueState({ name, config });
    this.queues.set(name, state);
    this.logger.info({ queue: name, config }, "queue created");
    this.emit({ kind: "created", state });
    return state.info();
  }

  async delete(name: string): Promise<void> {
    const state = this.require(name);
    await state.close(() => {
      if (this.queues.get(name) === state) {
        this.queues.delete(name);
      }
    });
    this.logger.info({ queue: name, dropped: state.size }, "queue deleted");
    this.emit({ kind: "deleted", state });
  }

  getInfo(name: string): QueueInfo {
    return this.require(name).info();
  }

  list(): QueueInfo[] {
    return [...this.queues.values()].map((state) => state.info());
  }

  async push(name: string, type: MessageType, content: JsonObject): Promise<string> {
    const state = this.require(name);
    const check = validate(type, content, state.config.queueType);
    if (!check.ok) {
      throw check.code === "TYPE_MISMATCH"
        ? new QueueError("TYPE_MISMATCH", `cannot push ${type} message to ${state.config.queueType} queue '${name}'`)
        : new QueueError("INVALID_CONTENT", `${type} message missing required field(s): ${check.missing.join(", ")}`);
    }
    const message = createMessage(type, content);
    const id = await state.push(message);
    this.logger.info(
      {
        action: "push",
        queue: name,
        messageId: id,
        type,
        transactionId: content.transaction_id
      },
      "message pushed"
    );
    return id;
  }

  /** Returns null when the queue exists but holds no messages. */
  async pull(name: string): Promise<Message | null> {
    const message = await this.require(name).pull();
    if (message) {
      this.logger.info(
        {
          action: "pull",
          queue: name,
          messageId: message.id,
          type: message.type,
          transactionId: message.content.transaction_id
        },
        "message pulled"
      );
    }
    return message;
  }

  get(name: string): QueueState | undefined {
    return this.queues.get(name);
  }

  states(): QueueState[] {
    return [...this.queues.values()];
  }

  /** Inserts a recovered queue as clean; used before the service accepts requests. */
  restore(record: RestoredQueue): QueueState {
    if (this.queues.has(record.name)) {
      throw new QueueError("ALREADY_EXISTS", `queue '${record.name}' already exists`);
    }
    const state = new QueueState({
      name: record.name,
      config: record.config,
      createdAt: record.createdAt,
      lastModified: record.lastModified,
      messages: record.messages,
      dirty: false
    });
    this.queues.set(record.name, state);
    return state;
  }

  subscribe(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private resolveConfig(overrides: QueueConfigOverrides): QueueConfig {
    const config: QueueConfig = {
      maxMessages: overrides.maxMessages ?? this.options.defaults.maxMessages,
      persistIntervalSeconds: overrides.persistIntervalSeconds ?? this.options.defaults.persistIntervalSeconds,
      queueType: overrides.queueType ?? "transaction"
    };
    if (!Number.isInteger(config.maxMessages) || config.maxMessages <= 0) {
      throw new QueueError("INVALID_CONFIG", "maxMessages must be a positive integer");
    }
    if (!Number.isInteger(config.persistIntervalSeconds) || config.persistIntervalSeconds <= 0) {
      throw new QueueError("INVALID_CONFIG", "persistIntervalSeconds must be a positive integer");
    }
    if (!isMessageType(config.queueType)) {
      throw new QueueError("INVALID_CONFIG", `unknown queue type: ${String(config.queueType)}`);
    }
    return config;
  }

  private require(name: string): QueueState {
    const state = this.queues.get(name);
    if (!state) {
      throw new QueueError("NOT_FOUND", `queue '${name}' does not exist`);
    }
    return state;
  }

  private emit(change: RegistryChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error: unknown) {
        this.logger.error({ err: error, queue: change.state.name, kind: change.kind }, "registry listener failed");
      }
    }
  }
}
