export type MessageType = "transaction" | "prediction";

export const MESSAGE_TYPES: readonly MessageType[] = ["transaction", "prediction"];

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Raw transaction captured by an agent. Extra fields are carried through untouched. */
export interface TransactionContent extends JsonObject {
  transaction_id: JsonValue;
  customer_id: JsonValue;
  amount: JsonValue;
  vendor_id: JsonValue;
}

/** Result produced by a worker for a transaction. */
export interface PredictionContent extends JsonObject {
  transaction_id: JsonValue;
  prediction: JsonValue;
  confidence: JsonValue;
}

export interface TransactionMessage {
  readonly id: string;
  readonly type: "transaction";
  readonly content: Readonly<TransactionContent>;
  readonly createdAt: string;
}

export interface PredictionMessage {
  readonly id: string;
  readonly type: "prediction";
  readonly content: Readonly<PredictionContent>;
  readonly createdAt: string;
}

export type Message = TransactionMessage | PredictionMessage;

export interface QueueConfig {
  maxMessages: number;
  persistIntervalSeconds: number;
  queueType: MessageType;
}

export type QueueConfigOverrides = Partial<QueueConfig>;

export interface QueueInfo {
  name: string;
  queueType: MessageType;
  messageCount: number;
  maxMessages: number;
  persistIntervalSeconds: number;
  createdAt: string;
  lastModified: string;
}

export type Role = "admin" | "agent" | "user";

export type DecisionReasonCode =
  | "AUTH_MISSING"
  | "AUTH_INVALID"
  | "AUTH_EXPIRED"
  | "AUTH_ROLE_MISMATCH";
