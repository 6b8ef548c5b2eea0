import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  DEFAULT_CONFIG,
  isDevMode,
  loadConfig,
  loadConfigFromDisk,
  parseConfigFile,
  resolveConfigPath,
  validateStartupConfig
} from "../src/config.js";

const tempDirs: string[] = [];

afterEach(async () => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  }
});

async function writeConfig(contents: unknown, fileName = "relayq.json"): Promise<{ dir: string; path: string }> {
  const dir = await mkdtemp(join(tmpdir(), "relayq-config-"));
  tempDirs.push(dir);
  const path = join(dir, fileName);
  await writeFile(path, typeof contents === "string" ? contents : JSON.stringify(contents), "utf8");
  return { dir, path };
}

describe("config security startup rules", () => {
  it("rejects the placeholder token secret at startup in secure mode", () => {
    const config = loadConfigFromDisk({ cwd: "/definitely/missing-path", env: {} });
    expect(() => validateStartupConfig(config, { allowInsecureDefaults: false })).toThrow(
      /placeholder token secret/i
    );
  });

  it("allows insecure defaults in explicit dev mode", () => {
    const config = loadConfigFromDisk({ cwd: "/definitely/missing-path", env: {} });
    expect(() => validateStartupConfig(config, { allowInsecureDefaults: true })).not.toThrow();
    expect(isDevMode({ RELAYQ_DEV_MODE: "true" })).toBe(true);
    expect(isDevMode({ RELAYQ_DEV_MODE: "0" })).toBe(false);
    expect(isDevMode({})).toBe(false);
  });

  it("rejects literal undefined/null token secrets", async () => {
    const { dir } = await writeConfig({ gateway: { auth: { secret: "undefined" } } });
    const config = loadConfigFromDisk({ cwd: dir, env: {} });
    expect(() => validateStartupConfig(config, { allowInsecureDefaults: false })).toThrow(
      /invalid literal token secret/i
    );
  });

  it("rejects placeholder user passwords", () => {
    const config = loadConfig({
      gateway: {
        auth: {
          secret: "test-secret",
          users: [{ username: "ops", password: "changeme", role: "admin" }]
        }
      }
    });
    expect(() => validateStartupConfig(config, { allowInsecureDefaults: false })).toThrow(
      "refusing startup with placeholder password for user ops"
    );
  });

  it("accepts a configured secret and users", () => {
    const config = loadConfig({
      gateway: {
        auth: {
          secret: "test-secret",
          users: [{ username: "ops", password: "test-password", role: "admin" }]
        }
      }
    });
    expect(() => validateStartupConfig(config, { allowInsecureDefaults: false })).not.toThrow();
  });
});

describe("config loading", () => {
  it("falls back to defaults when no file exists", () => {
    expect(loadConfigFromDisk({ cwd: "/definitely/missing-path", env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it("merges file values over defaults and honors the env path override", async () => {
    const { dir, path } = await writeConfig(
      {
        gateway: { bodyLimitBytes: 12345, auth: { secret: "test-secret" } },
        queue: { maxMessagesPerQueue: 50 }
      },
      "custom.json"
    );
    const env = { RELAYQ_CONFIG_PATH: path };
    expect(resolveConfigPath({ cwd: dir, env })).toBe(path);

    const config = loadConfigFromDisk({ cwd: dir, env });
    expect(config.gateway.bodyLimitBytes).toBe(12345);
    expect(config.gateway.auth.secret).toBe("test-secret");
    expect(config.gateway.auth.tokenTtlMinutes).toBe(30);
    expect(config.queue).toEqual({
      maxMessagesPerQueue: 50,
      persistIntervalSeconds: 60,
      storagePath: "./queue_data"
    });
  });

  it("prefers explicit configPath over env and cwd defaults", async () => {
    const { dir, path } = await writeConfig({ gateway: { port: 9100 } }, "explicit.json");
    expect(resolveConfigPath({ configPath: path, cwd: dir, env: { RELAYQ_CONFIG_PATH: "/elsewhere.json" } })).toBe(
      path
    );
    expect(resolveConfigPath({ cwd: dir, env: {} })).toBe(join(dir, "relayq.json"));
  });

  it("applies the PORT override only when it is a valid port", async () => {
    const { dir } = await writeConfig({ gateway: { port: 9100 } });
    expect(loadConfigFromDisk({ cwd: dir, env: { PORT: "9200" } }).gateway.port).toBe(9200);
    expect(loadConfigFromDisk({ cwd: dir, env: { PORT: "not-a-port" } }).gateway.port).toBe(9100);
    expect(loadConfigFromDisk({ cwd: dir, env: { PORT: "70000" } }).gateway.port).toBe(9100);
  });

  it("rejects unknown keys and out-of-range values", () => {
    expect(() => parseConfigFile(JSON.stringify({ queue: { maxMessages: 5 } }), "a.json")).toThrow(
      /^invalid config file a\.json: \/queue must NOT have additional properties/
    );
    expect(() => parseConfigFile(JSON.stringify({ queue: { persistIntervalSeconds: 0 } }), "b.json")).toThrow(
      "invalid config file b.json: /queue/persistIntervalSeconds must be >= 1"
    );
    expect(() => parseConfigFile("{", "c.json")).toThrow(SyntaxError);
  });

  it("rejects duplicate usernames", () => {
    expect(() =>
      loadConfig({
        gateway: {
          auth: {
            users: [
              { username: "ops", password: "a", role: "admin" },
              { username: "ops", password: "b", role: "user" }
            ]
          }
        }
      })
    ).toThrow("duplicate gateway user: ops");
  });
});
