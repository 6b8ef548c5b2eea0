import {
  MESSAGE_TYPES,
  type JsonObject,
  type MessageType,
  type PredictionContent,
  type TransactionContent
} from "../types.js";

const REQUIRED_FIELDS: Record<MessageType, readonly string[]> = {
  transaction: ["transaction_id", "customer_id", "amount", "vendor_id"],
  prediction: ["transaction_id", "prediction", "confidence"]
};

export type EnforcementResult =
  | { ok: true }
  | { ok: false; code: "TYPE_MISMATCH"; missing: [] }
  | { ok: false; code: "INVALID_CONTENT"; missing: string[] };

export function isMessageType(value: unknown): value is MessageType {
  return MESSAGE_TYPES.some((type) => type === value);
}

export function requiredFields(type: MessageType): readonly string[] {
  return REQUIRED_FIELDS[type];
}

export function missingFields(type: MessageType, content: JsonObject): string[] {
  return REQUIRED_FIELDS[type].filter((field) => !Object.prototype.hasOwnProperty.call(content, field));
}

/**
 * Checks a push against its target queue. The type tag is compared first, so a
 * mismatched tag fails with TYPE_MISMATCH whatever the content holds.
 */
export function validate(
  declaredType: MessageType,
  content: JsonObject,
  queueType: MessageType
): EnforcementResult {
  if (declaredType !== queueType) {
    return { ok: false, code: "TYPE_MISMATCH", missing: [] };
  }
  const missing = missingFields(declaredType, content);
  if (missing.length > 0) {
    return { ok: false, code: "INVALID_CONTENT", missing };
  }
  return { ok: true };
}

export function isTransactionContent(content: JsonObject): content is TransactionContent {
  return missingFields("transaction", content).length === 0;
}

export function isPredictionContent(content: JsonObject): content is PredictionContent {
  return missingFields("prediction", content).length === 0;
}
