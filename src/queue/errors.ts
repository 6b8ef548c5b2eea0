export type QueueErrorCode =
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INVALID_NAME"
  | "INVALID_CONFIG"
  | "QUEUE_FULL"
  | "TYPE_MISMATCH"
  | "INVALID_CONTENT";

/**
 * Failure of a single queue operation. Local to the call that raised it;
 * the gateway maps `code` to a status code.
 */
export class QueueError extends Error {
  constructor(
    readonly code: QueueErrorCode,
    message: string
  ) {
    super(message);
    this.name = "QueueError";
  }
}

export function isQueueError(error: unknown, code?: QueueErrorCode): error is QueueError {
  return error instanceof QueueError && (code === undefined || error.code === code);
}
