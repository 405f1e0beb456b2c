import { z } from "zod";
import { ValidationError } from "./errors.js";

// --- Environment ---

const required = (name: string) =>
  z.string({ required_error: `${name} environment variable is required` }).trim().min(1, `${name} must not be empty`);

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === "" ? undefined : v))
  .optional();

const optionalInt = (min: number, max: number) =>
  z
    .string()
    .trim()
    .transform((v) => (v === "" ? undefined : v))
    .pipe(z.coerce.number().int().min(min).max(max).optional())
    .optional();

export const EnvSchema = z.object({
  OPENAI_API_KEY: required("OPENAI_API_KEY"),
  OPENAI_WEBHOOK_SECRET: required("OPENAI_WEBHOOK_SECRET"),
  PORT: optionalInt(0, 65_535),
  HOST: optionalString,
  PUBLIC_URL: optionalString.pipe(z.string().url().optional()),
  WEBHOOK_TOLERANCE_SECONDS: optionalInt(1, 86_400),
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  OPENAI_MODEL: optionalString,
  LOG_LEVEL: optionalString,
});

// --- REST requests ---

export const QueueRequestSchema = z.object({
  prompt: z
    .string({ required_error: "prompt is required", invalid_type_error: "prompt must be a string" })
    .trim()
    .min(1, "Please provide a prompt"),
});

/** Integer given as text, as a CLI flag or query parameter. */
const intOption = (name: string, min: number, max: number) =>
  z
    .string()
    .trim()
    .min(1, `${name} must not be empty`)
    .pipe(
      z.coerce
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .min(min, `${name} must be at least ${min}`)
        .max(max, `${name} must be at most ${max}`),
    )
    .optional();

export const ListTasksQuerySchema = z.object({
  limit: intOption("limit", 1, 500),
});

// --- CLI options ---

export const ServeOptionsSchema = z.object({
  port: intOption("--port", 0, 65_535),
  simulateDelay: intOption("--simulate-delay", 0, 3_600_000),
});

export type ServeOptions = z.output<typeof ServeOptionsSchema>;

export const SubmitOptionsSchema = z.object({
  interval: intOption("--interval", 1, 3_600_000),
});

// --- Webhook events ---

export const CompletedEventSchema = z.object({
  type: z.literal("response.completed"),
  id: z.string().min(1),
  output: z.object({ text: z.string() }),
});

export const FailedEventSchema = z.object({
  type: z.literal("response.failed"),
  id: z.string().min(1),
  error: z.object({ message: z.string().default("") }).default({}),
});

/** Envelope every event shares; used to acknowledge event types we do not act on. */
export const EventEnvelopeSchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1),
});

// --- Upstream responses ---

export const BackgroundResponseSchema = z.object({
  id: z.string().min(1),
  status: z.string().default("queued"),
});

/** Parse `value` with `schema`, throwing a ValidationError that lists every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const msg = result.error.issues.map((i) => i.message).join("; ");
    throw new ValidationError("VALIDATION_FAILED", msg);
  }
  return result.data;
}
