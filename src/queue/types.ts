/**
 * Pluggable durable storage for queue snapshots.
 * The file backend is the default; the in-memory backend backs tests and ephemeral runs.
 */

import type { Message, MessageType, QueueConfig } from "../types.js";

export const SNAPSHOT_FORMAT_VERSION = 1;

export interface RegistryEntry {
  queueType: MessageType;
  maxMessages: number;
  persistIntervalSeconds: number;
  createdAt: string;
}

/** name → config mapping; rewritten whenever the set of queues changes. */
export interface RegistryRecord {
  version: typeof SNAPSHOT_FORMAT_VERSION;
  queues: Record<string, RegistryEntry>;
}

/** One queue's ordered messages plus metadata. */
export interface QueueRecord {
  version: typeof SNAPSHOT_FORMAT_VERSION;
  name: string;
  config: QueueConfig;
  createdAt: string;
  lastModified: string;
  messages: Message[];
}

export interface SnapshotStore {
  /** Parsed registry record, or undefined when none was ever written. Throws when unreadable. */
  readRegistry(): Promise<unknown>;
  writeRegistry(record: RegistryRecord): Promise<void>;
  /** Parsed queue record, or undefined when none exists. Throws when unreadable. */
  readQueue(name: string): Promise<unknown>;
  writeQueue(record: QueueRecord): Promise<void>;
  removeQueue(name: string): Promise<void>;
  close(): Promise<void>;
}
