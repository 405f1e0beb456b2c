import { createHmac, timingSafeEqual } from "node:crypto";
import { WebhookPayloadError, WebhookVerificationError } from "../errors.js";
import { getConfig } from "../config.js";
import { log } from "../utils/logger.js";
import { parseWebhookEvent, type WebhookEvent } from "./events.js";

export const SIGNATURE_HEADER = "x-callback-signature";
export const TIMESTAMP_HEADER = "x-callback-timestamp";

const SIGNATURE_PREFIX = "sha256=";
const SIGNATURE_HEX = /^[0-9a-f]{64}$/;
const TIMESTAMP_DIGITS = /^\d{1,15}$/;

export type WebhookHeaders = {
  signature?: string | null;
  timestamp?: string | null;
};

export type WebhookVerifierOptions = {
  secret: string;
  /** Freshness window in seconds (default: config webhook.toleranceSeconds). */
  toleranceSeconds?: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
};

/** HMAC-SHA256 over `"<timestamp>." + body`, as lowercase hex. The timestamp is signed as sent. */
export function computeSignature(secret: string, timestamp: number | string, rawBody: string | Buffer): string {
  return createHmac("sha256", secret).update(`${timestamp}.`).update(rawBody).digest("hex");
}

/** Header value for a delivery signed at `timestamp` (Unix seconds). */
export function signPayload(secret: string, timestamp: number | string, rawBody: string | Buffer): string {
  return `${SIGNATURE_PREFIX}${computeSignature(secret, timestamp, rawBody)}`;
}

export class WebhookVerifier {
  private secret: string;
  private toleranceSeconds: number;
  private now: () => number;

  constructor(opts: WebhookVerifierOptions) {
    this.secret = opts.secret;
    this.toleranceSeconds = opts.toleranceSeconds ?? getConfig().webhook.toleranceSeconds;
    this.now = opts.now ?? Date.now;
  }

  sign(rawBody: string | Buffer, timestamp: number = Math.floor(this.now() / 1000)): string {
    return signPayload(this.secret, timestamp, rawBody);
  }

  /**
   * Authenticate a delivery and return its event. Throws
   * WebhookVerificationError when the delivery is not authentic or not fresh,
   * and WebhookPayloadError when an authentic body is not a valid event.
   */
  verify(rawBody: string | Buffer, headers: WebhookHeaders): WebhookEvent {
    try {
      this.authenticate(rawBody, headers);
    } catch (err) {
      if (err instanceof WebhookVerificationError) {
        log.warn("Webhook verification failed", { reason: err.reason });
      }
      throw err;
    }

    const text = typeof rawBody === "string" ? rawBody : rawBody.toString("utf-8");
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new WebhookPayloadError("Invalid payload format: body is not JSON");
    }
    return parseWebhookEvent(payload);
  }

  private authenticate(rawBody: string | Buffer, headers: WebhookHeaders): void {
    const signature = headers.signature?.trim();
    if (!signature) throw new WebhookVerificationError("missing_signature");
    if (!signature.startsWith(SIGNATURE_PREFIX)) throw new WebhookVerificationError("malformed_signature");
    const providedHex = signature.slice(SIGNATURE_PREFIX.length);
    if (!SIGNATURE_HEX.test(providedHex)) throw new WebhookVerificationError("malformed_signature");

    const rawTimestamp = headers.timestamp?.trim();
    if (!rawTimestamp) throw new WebhookVerificationError("missing_timestamp");
    if (!TIMESTAMP_DIGITS.test(rawTimestamp)) throw new WebhookVerificationError("malformed_timestamp");
    const ageSeconds = Math.abs(this.now() / 1000 - Number(rawTimestamp));
    if (ageSeconds > this.toleranceSeconds) throw new WebhookVerificationError("stale_timestamp");

    const expected = Buffer.from(computeSignature(this.secret, rawTimestamp, rawBody), "hex");
    const provided = Buffer.from(providedHex, "hex");
    if (!timingSafeEqual(expected, provided)) throw new WebhookVerificationError("signature_mismatch");
  }
}
