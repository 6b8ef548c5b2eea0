import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import type { Logger } from "pino";

import type { RelayConfig } from "./config.js";
import { silentLogger } from "./logger.js";
import { isQueueError, type QueueErrorCode } from "./queue/errors.js";
import type { QueueRegistry } from "./queue/registry.js";
import { AuthService, isOperationAllowed, type QueueOperation } from "./security.js";
import { MESSAGE_TYPES, type JsonObject, type MessageType, type QueueConfigOverrides, type Role } from "./types.js";

class GatewayError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: string,
    readonly clientMessage: string
  ) {
    super(clientMessage);
  }
}

export interface GatewayDependencies {
  config: RelayConfig;
  registry: QueueRegistry;
  auth: AuthService;
  logger?: Logger;
}

interface QueueParams {
  name: string;
}

interface CreateQueueBody {
  name: string;
  config?: QueueConfigOverrides;
}

interface PushBody {
  type: MessageType;
  content: JsonObject;
}

interface TokenBody {
  username: string;
  password: string;
}

const QUEUE_ERROR_STATUS: Record<QueueErrorCode, number> = {
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  INVALID_NAME: 400,
  INVALID_CONFIG: 400,
  QUEUE_FULL: 429,
  TYPE_MISMATCH: 400,
  INVALID_CONTENT: 400
};

const tokenSchema = {
  type: "object",
  required: ["username", "password"],
  properties: {
    username: { type: "string", minLength: 1 },
    password: { type: "string", minLength: 1 }
  }
};

const createQueueSchema = {
  type: "object",
  required: ["name"],
  properties: {
    name: { type: "string" },
    config: {
      type: "object",
      additionalProperties: false,
      properties: {
        maxMessages: { type: "integer", minimum: 1 },
        persistIntervalSeconds: { type: "integer", minimum: 1 },
        queueType: { enum: [...MESSAGE_TYPES] }
      }
    }
  }
};

const pushSchema = {
  type: "object",
  required: ["type", "content"],
  properties: {
    type: { enum: [...MESSAGE_TYPES] },
    content: { type: "object" }
  }
};

export function buildGateway(deps: GatewayDependencies): FastifyInstance {
  const logger = deps.logger ?? silentLogger();
  const app = Fastify({
    logger: false,
    bodyLimit: deps.config.gateway.bodyLimitBytes,
    ajv: {
      customOptions: { removeAdditional: false, coerceTypes: false }
    }
  });

  const { corsOrigins } = deps.config.gateway;
  if (corsOrigins.length > 0) {
    void app.register(cors, {
      origin: corsOrigins.includes("*") ? true : corsOrigins,
      methods: ["GET", "POST", "DELETE"],
      allowedHeaders: ["authorization", "content-type"]
    });
  }

  const requireRole = (request: FastifyRequest, operation: QueueOperation): Role => {
    const auth = deps.auth.authorize({ headers: mapHeaders(request.headers) });
    if (!auth.ok) {
      logger.warn({ operation, reason: auth.reason, ip: request.ip }, "request rejected");
      throw new GatewayError(401, auth.reason, "Unauthorized");
    }
    if (!isOperationAllowed(auth.role, operation)) {
      logger.warn({ operation, username: auth.username, role: auth.role }, "role not permitted");
      throw new GatewayError(403, "AUTH_ROLE_MISMATCH", "Forbidden");
    }
    return auth.role;
  };

  app.addHook("onResponse", async (request, reply) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        ip: request.ip,
        statusCode: reply.statusCode,
        elapsedMs: Math.round(reply.elapsedTime)
      },
      "request completed"
    );
  });

  app.setErrorHandler(async (error, request, reply) => {
    const mapped = mapError(error);
    if (mapped.statusCode >= 500) {
      logger.error({ err: error, method: request.method, url: request.url }, "request failed");
    }
    return reply.code(mapped.statusCode).send(errorResponse(mapped.code, mapped.message));
  });

  app.get("/health", async () => {
    return {
      ok: true,
      time: new Date().toISOString()
    };
  });

  app.post<{ Body: TokenBody }>("/token", { schema: { body: tokenSchema } }, async (request) => {
    const issued = deps.auth.issueToken(request.body.username, request.body.password);
    if (!issued) {
      logger.warn({ username: request.body.username, ip: request.ip }, "token request denied");
      throw new GatewayError(401, "AUTH_INVALID", "Invalid credentials");
    }
    return issued;
  });

  app.get("/queues", async (request) => {
    requireRole(request, "queue.list");
    return { queues: deps.registry.list() };
  });

  app.post<{ Body: CreateQueueBody }>("/queues", { schema: { body: createQueueSchema } }, async (request, reply) => {
    requireRole(request, "queue.create");
    const info = deps.registry.create(request.body.name, request.body.config ?? {});
    return reply.code(201).send(info);
  });

  app.get<{ Params: QueueParams }>("/queues/:name", async (request) => {
    requireRole(request, "queue.info");
    return deps.registry.getInfo(request.params.name);
  });

  app.delete<{ Params: QueueParams }>("/queues/:name", async (request) => {
    requireRole(request, "queue.delete");
    await deps.registry.delete(request.params.name);
    return { deleted: request.params.name };
  });

  app.post<{ Params: QueueParams; Body: PushBody }>(
    "/queues/:name/push",
    { schema: { body: pushSchema } },
    async (request, reply) => {
      requireRole(request, "message.push");
      const messageId = await deps.registry.push(request.params.name, request.body.type, request.body.content);
      return reply.code(201).send({ messageId });
    }
  );

  app.get<{ Params: QueueParams }>("/queues/:name/pull", async (request, reply) => {
    requireRole(request, "message.pull");
    const message = await deps.registry.pull(request.params.name);
    if (!message) {
      return reply.code(204).send();
    }
    return message;
  });

  return app;
}

function errorResponse(code: string, message: string): { error: { code: string; message: string } } {
  return {
    error: {
      code,
      message
    }
  };
}

function mapHeaders(headers: Record<string, unknown>): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(",");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else {
      out[key.toLowerCase()] = undefined;
    }
  }
  return out;
}

function mapError(error: unknown): { statusCode: number; code: string; message: string } {
  if (error instanceof GatewayError) {
    return { statusCode: error.statusCode, code: error.code, message: error.clientMessage };
  }
  if (isQueueError(error)) {
    return { statusCode: QUEUE_ERROR_STATUS[error.code], code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    const statusCode: unknown = Reflect.get(error, "statusCode");
    if (typeof statusCode === "number" && statusCode >= 400 && statusCode < 500) {
      return { statusCode, code: "BAD_REQUEST", message: error.message };
    }
  }
  return { statusCode: 500, code: "INTERNAL", message: "Internal server error" };
}
