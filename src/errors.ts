export type ErrorCode =
  | "CONFIG_INVALID"
  | "VALIDATION_FAILED"
  | "DUPLICATE_TASK"
  | "WEBHOOK_REJECTED"
  | "INVALID_PAYLOAD"
  | "UPSTREAM_FAILED";

export class CallbackQueueError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CallbackQueueError";
    this.code = code;
  }
}

/** Missing or invalid process configuration. Raised at startup, never per request. */
export class ConfigError extends CallbackQueueError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export class ValidationError extends CallbackQueueError {
  constructor(code: Extract<ErrorCode, "VALIDATION_FAILED" | "DUPLICATE_TASK">, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

export type VerificationFailure =
  | "missing_signature"
  | "malformed_signature"
  | "missing_timestamp"
  | "malformed_timestamp"
  | "stale_timestamp"
  | "signature_mismatch";

export class WebhookVerificationError extends CallbackQueueError {
  readonly reason: VerificationFailure;

  constructor(reason: VerificationFailure) {
    super("WEBHOOK_REJECTED", `Webhook rejected: ${reason}`);
    this.name = "WebhookVerificationError";
    this.reason = reason;
  }
}

/** The delivery was authentic but its body is not an event we understand. */
export class WebhookPayloadError extends CallbackQueueError {
  constructor(message: string) {
    super("INVALID_PAYLOAD", message);
    this.name = "WebhookPayloadError";
  }
}

export class UpstreamError extends CallbackQueueError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super("UPSTREAM_FAILED", message, { cause: options?.cause });
    this.name = "UpstreamError";
    this.status = options?.status;
  }
}
