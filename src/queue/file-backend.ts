import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import type { QueueRecord, RegistryRecord, SnapshotStore } from "./types.js";

const REGISTRY_FILE = "registry.json";
const QUEUES_DIR = "queues";

/**
 * Snapshot store on the local filesystem: `<basePath>/registry.json` and
 * `<basePath>/queues/<name>.json`. Writes land in a temp file that is renamed
 * over the record, so readers never see a half-written file.
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly basePath: string;

  constructor(options: { basePath: string }) {
    this.basePath = options.basePath;
  }

  registryPath(): string {
    return join(this.basePath, REGISTRY_FILE);
  }

  queuePath(name: string): string {
    const safe = name.replace(/[^a-zA-Z0-9]/g, "_");
    return join(this.basePath, QUEUES_DIR, `${safe}.json`);
  }

  async readRegistry(): Promise<unknown> {
    return this.readJson(this.registryPath());
  }

  async writeRegistry(record: RegistryRecord): Promise<void> {
    await this.writeJson(this.registryPath(), record);
  }

  async readQueue(name: string): Promise<unknown> {
    return this.readJson(this.queuePath(name));
  }

  async writeQueue(record: QueueRecord): Promise<void> {
    await this.writeJson(this.queuePath(record.name), record);
  }

  async removeQueue(name: string): Promise<void> {
    await rm(this.queuePath(name), { force: true });
  }

  async close(): Promise<void> {
    // No-op; file state persists
  }

  private async readJson(path: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return undefined;
      }
      throw err;
    }
    return JSON.parse(raw) as unknown;
  }

  private async writeJson(path: string, value: unknown): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tmp = `${path}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, JSON.stringify(value, null, 2), "utf8");
      await rename(tmp, path);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }
}

function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value;
}
