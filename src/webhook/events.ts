import type { z } from "zod";
import { WebhookPayloadError } from "../errors.js";
import {
  CompletedEventSchema,
  EventEnvelopeSchema,
  FailedEventSchema,
} from "../schemas.js";

export type CompletedEvent = z.infer<typeof CompletedEventSchema>;
export type FailedEvent = z.infer<typeof FailedEventSchema>;

/** An authentic event whose type this service does not act on. */
export type UnhandledEvent = { type: "unhandled"; eventType: string; id: string };

export type WebhookEvent = CompletedEvent | FailedEvent | UnhandledEvent;

export function parseWebhookEvent(payload: unknown): WebhookEvent {
  const envelope = EventEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new WebhookPayloadError(`Invalid payload format: ${issues(envelope.error)}`);
  }

  switch (envelope.data.type) {
    case "response.completed":
      return parseWith(CompletedEventSchema, payload);
    case "response.failed":
      return parseWith(FailedEventSchema, payload);
    default:
      return { type: "unhandled", eventType: envelope.data.type, id: envelope.data.id };
  }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new WebhookPayloadError(`Invalid payload format: ${issues(result.error)}`);
  }
  return result.data;
}

function issues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}
