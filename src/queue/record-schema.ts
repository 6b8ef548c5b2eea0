import { Ajv, type ErrorObject } from "ajv";

import { requiredFields } from "./type-enforcer.js";
import { SNAPSHOT_FORMAT_VERSION, type QueueRecord, type RegistryRecord } from "./types.js";
import { MESSAGE_TYPES } from "../types.js";

const ajv = new Ajv({ allErrors: true, strict: false });

const positiveInteger = { type: "integer", minimum: 1 };

const messageSchema = {
  type: "object",
  required: ["id", "type", "content", "createdAt"],
  properties: {
    id: { type: "string", minLength: 1 },
    type: { enum: [...MESSAGE_TYPES] },
    content: { type: "object" },
    createdAt: { type: "string" }
  },
  allOf: MESSAGE_TYPES.map((type) => ({
    if: { properties: { type: { const: type } } },
    then: { properties: { content: { required: [...requiredFields(type)] } } }
  }))
};

const registrySchema = {
  type: "object",
  required: ["version", "queues"],
  properties: {
    version: { const: SNAPSHOT_FORMAT_VERSION },
    queues: {
      type: "object",
      additionalProperties: {
        type: "object",
        required: ["queueType", "maxMessages", "persistIntervalSeconds", "createdAt"],
        properties: {
          queueType: { enum: [...MESSAGE_TYPES] },
          maxMessages: positiveInteger,
          persistIntervalSeconds: positiveInteger,
          createdAt: { type: "string" }
        }
      }
    }
  }
};

const queueSchema = {
  type: "object",
  required: ["version", "name", "config", "createdAt", "lastModified", "messages"],
  properties: {
    version: { const: SNAPSHOT_FORMAT_VERSION },
    name: { type: "string" },
    config: {
      type: "object",
      required: ["maxMessages", "persistIntervalSeconds", "queueType"],
      properties: {
        maxMessages: positiveInteger,
        persistIntervalSeconds: positiveInteger,
        queueType: { enum: [...MESSAGE_TYPES] }
      }
    },
    createdAt: { type: "string" },
    lastModified: { type: "string" },
    messages: { type: "array", items: messageSchema }
  }
};

export const validateRegistryRecord = ajv.compile<RegistryRecord>(registrySchema);

export const validateQueueRecord = ajv.compile<QueueRecord>(queueSchema);

export function describeSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown schema error";
  }
  return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`).join("; ");
}
