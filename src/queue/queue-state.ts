import { QueueError } from "./errors.js";
import { Mutex } from "./mutex.js";
import { validate } from "./type-enforcer.js";
import type { Message, QueueConfig, QueueInfo } from "../types.js";

export interface QueueCapture {
  name: string;
  config: QueueConfig;
  createdAt: string;
  lastModified: string;
  messages: Message[];
  version: number;
}

export interface QueueStateInit {
  name: string;
  config: QueueConfig;
  createdAt?: string;
  lastModified?: string;
  messages?: Message[];
  dirty?: boolean;
}

/**
 * One named, typed, bounded FIFO. Every mutation runs under the queue's own
 * mutex; `version` counts mutations so a snapshot only clears `dirty` when
 * nothing changed after it was captured.
 */
export class QueueState {
  readonly name: string;
  readonly config: Readonly<QueueConfig>;
  readonly createdAt: string;
  private readonly guard = new Mutex();
  private messages: Message[];
  private lastModified: string;
  private dirty: boolean;
  private version = 0;
  private closed = false;

  constructor(init: QueueStateInit) {
    this.name = init.name;
    this.config = Object.freeze({ ...init.config });
    const now = new Date().toISOString();
    this.createdAt = init.createdAt ?? now;
    this.lastModified = init.lastModified ?? this.createdAt;
    this.messages = [...(init.messages ?? [])];
    this.dirty = init.dirty ?? true;
  }

  async push(message: Message): Promise<string> {
    return this.guard.runExclusive(() => {
      this.assertOpen();
      const check = validate(message.type, message.content, this.config.queueType);
      if (!check.ok) {
        throw check.code === "TYPE_MISMATCH"
          ? new QueueError("TYPE_MISMATCH", `queue '${this.name}' accepts ${this.config.queueType} messages, got ${message.type}`)
          : new QueueError("INVALID_CONTENT", `${message.type} message missing required field(s): ${check.missing.join(", ")}`);
      }
      if (this.messages.length >= this.config.maxMessages) {
        throw new QueueError("QUEUE_FULL", `queue '${this.name}' is full (max ${this.config.maxMessages} messages)`);
      }
      this.messages.push(message);
      this.touch();
      return message.id;
    });
  }

  /** Removes and returns the oldest message, or null when the queue is empty. */
  async pull(): Promise<Message | null> {
    return this.guard.runExclusive(() => {
      this.assertOpen();
      const message = this.messages.shift();
      if (message === undefined) {
        return null;
      }
      this.touch();
      return message;
    });
  }

  async capture(): Promise<QueueCapture> {
    return this.guard.runExclusive(() => ({
      name: this.name,
      config: { ...this.config },
      createdAt: this.createdAt,
      lastModified: this.lastModified,
      messages: [...this.messages],
      version: this.version
    }));
  }

  /** Clears the dirty flag only if no mutation happened since `version` was captured. */
  markPersisted(version: number): boolean {
    if (this.version !== version) {
      return false;
    }
    this.dirty = false;
    return true;
  }

  /** Detaches the state under its guard; `detach` runs inside the critical section. */
  async close(detach: () => void): Promise<void> {
    await this.guard.runExclusive(() => {
      this.assertOpen();
      detach();
      this.closed = true;
    });
  }

  isDirty(): boolean {
    return this.dirty;
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.messages.length;
  }

  info(): QueueInfo {
    return {
      name: this.name,
      queueType: this.config.queueType,
      messageCount: this.messages.length,
      maxMessages: this.config.maxMessages,
      persistIntervalSeconds: this.config.persistIntervalSeconds,
      createdAt: this.createdAt,
      lastModified: this.lastModified
    };
  }

  private touch(): void {
    this.lastModified = new Date().toISOString();
    this.dirty = true;
    this.version += 1;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new QueueError("NOT_FOUND", `queue '${this.name}' does not exist`);
    }
  }
}
