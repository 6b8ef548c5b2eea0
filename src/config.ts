import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { Ajv } from "ajv";
import type { LevelWithSilent } from "pino";

import type { Role } from "./types.js";

export interface UserConfig {
  username: string;
  password: string;
  role: Role;
}

export interface GatewayConfig {
  bind: "loopback" | "0.0.0.0";
  port: number;
  bodyLimitBytes: number;
  /** Browser origins allowed to call the gateway; empty disables CORS. "*" allows any origin. */
  corsOrigins: string[];
  auth: {
    /** HMAC key for bearer tokens. */
    secret: string;
    tokenTtlMinutes: number;
    users: UserConfig[];
  };
}

export interface QueueDefaultsConfig {
  maxMessagesPerQueue: number;
  persistIntervalSeconds: number;
  storagePath: string;
}

export interface PersistenceConfig {
  tickMs: number;
}

export interface LoggingConfig {
  level: LevelWithSilent;
  file?: string;
}

export interface RelayConfig {
  gateway: GatewayConfig;
  queue: QueueDefaultsConfig;
  persistence: PersistenceConfig;
  logging: LoggingConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export const DEFAULT_CONFIG: RelayConfig = {
  gateway: {
    bind: "loopback",
    port: 7500,
    bodyLimitBytes: 64 * 1024,
    corsOrigins: [],
    auth: {
      secret: "changeme",
      tokenTtlMinutes: 30,
      users: []
    }
  },
  queue: {
    maxMessagesPerQueue: 1000,
    persistIntervalSeconds: 60,
    storagePath: "./queue_data"
  },
  persistence: {
    tickMs: 1_000
  },
  logging: {
    level: "info"
  }
};

const positiveInteger = { type: "integer", minimum: 1 };

const configFileSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    gateway: {
      type: "object",
      additionalProperties: false,
      properties: {
        bind: { enum: ["loopback", "0.0.0.0"] },
        port: { type: "integer", minimum: 0, maximum: 65535 },
        bodyLimitBytes: positiveInteger,
        corsOrigins: { type: "array", items: { type: "string", minLength: 1 } },
        auth: {
          type: "object",
          additionalProperties: false,
          properties: {
            secret: { type: "string", minLength: 1 },
            tokenTtlMinutes: positiveInteger,
            users: {
              type: "array",
              items: {
                type: "object",
                additionalProperties: false,
                required: ["username", "password", "role"],
                properties: {
                  username: { type: "string", minLength: 1 },
                  password: { type: "string", minLength: 1 },
                  role: { enum: ["admin", "agent", "user"] }
                }
              }
            }
          }
        }
      }
    },
    queue: {
      type: "object",
      additionalProperties: false,
      properties: {
        maxMessagesPerQueue: positiveInteger,
        persistIntervalSeconds: positiveInteger,
        storagePath: { type: "string", minLength: 1 }
      }
    },
    persistence: {
      type: "object",
      additionalProperties: false,
      properties: {
        tickMs: { type: "integer", minimum: 10 }
      }
    },
    logging: {
      type: "object",
      additionalProperties: false,
      properties: {
        level: { enum: ["fatal", "error", "warn", "info", "debug", "trace", "silent"] },
        file: { type: "string", minLength: 1 }
      }
    }
  }
};

const validateConfigFile = new Ajv({ allErrors: true, strict: false }).compile<DeepPartial<RelayConfig>>(
  configFileSchema
);

function merge<T extends object>(base: T, override?: DeepPartial<T>): T {
  if (!override) {
    return base;
  }
  const out: Record<string, unknown> = { ...(base as Record<string, unknown>) };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const current = out[key];
    if (value && typeof value === "object" && !Array.isArray(value) && current && typeof current === "object") {
      out[key] = merge(current as object, value as DeepPartial<object>);
      continue;
    }
    out[key] = value;
  }
  return out as T;
}

export function loadConfig(raw?: DeepPartial<RelayConfig>): RelayConfig {
  const config = merge(DEFAULT_CONFIG, raw);
  const usernames = new Set<string>();
  for (const user of config.gateway.auth.users) {
    if (usernames.has(user.username)) {
      throw new Error(`duplicate gateway user: ${user.username}`);
    }
    usernames.add(user.username);
  }
  return config;
}

export interface LoadConfigFromDiskOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function isLiteralNullishToken(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "undefined" || normalized === "null";
}

export function resolveConfigPath(options: LoadConfigFromDiskOptions = {}): string {
  if (options.configPath) {
    return options.configPath;
  }
  const env = options.env ?? process.env;
  if (env.RELAYQ_CONFIG_PATH) {
    return env.RELAYQ_CONFIG_PATH;
  }
  return join(options.cwd ?? process.cwd(), "relayq.json");
}

export function parseConfigFile(rawText: string, source: string): DeepPartial<RelayConfig> {
  const parsed: unknown = JSON.parse(rawText);
  if (!validateConfigFile(parsed)) {
    const detail = (validateConfigFile.errors ?? [])
      .map((error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`)
      .join("; ");
    throw new Error(`invalid config file ${source}: ${detail}`);
  }
  return parsed;
}

export function loadConfigFromDisk(options: LoadConfigFromDiskOptions = {}): RelayConfig {
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options);
  const config = existsSync(configPath)
    ? loadConfig(parseConfigFile(readFileSync(configPath, "utf8"), configPath))
    : loadConfig(DEFAULT_CONFIG);
  const port = env.PORT !== undefined ? Number.parseInt(env.PORT, 10) : Number.NaN;
  if (Number.isInteger(port) && port >= 0 && port <= 65535) {
    return { ...config, gateway: { ...config.gateway, port } };
  }
  return config;
}

export interface StartupValidationOptions {
  allowInsecureDefaults: boolean;
}

export function validateStartupConfig(config: RelayConfig, options: StartupValidationOptions): void {
  if (options.allowInsecureDefaults) {
    return;
  }
  const { secret, users } = config.gateway.auth;
  if (secret.trim() === "changeme") {
    throw new Error("refusing startup with placeholder token secret");
  }
  if (isLiteralNullishToken(secret)) {
    throw new Error('refusing startup with invalid literal token secret ("undefined"/"null")');
  }
  const placeholder = users.find((user) => user.password.trim() === "changeme" || isLiteralNullishToken(user.password));
  if (placeholder) {
    throw new Error(`refusing startup with placeholder password for user ${placeholder.username}`);
  }
}

export function isDevMode(env: NodeJS.ProcessEnv = process.env): boolean {
  return /^(1|true|yes)$/i.test(env.RELAYQ_DEV_MODE ?? "");
}
