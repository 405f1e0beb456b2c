// Config
export { getConfig, configure, resetConfig, defaults, loadEnvConfig } from "./config.js";
export type { AppConfig, DeepPartial, EnvConfig, Secrets } from "./config.js";

// Errors
export {
  CallbackQueueError,
  ConfigError,
  ValidationError,
  WebhookVerificationError,
  WebhookPayloadError,
  UpstreamError,
} from "./errors.js";
export type { ErrorCode, VerificationFailure } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  EnvSchema,
  QueueRequestSchema,
  CompletedEventSchema,
  FailedEventSchema,
  EventEnvelopeSchema,
  BackgroundResponseSchema,
  ListTasksQuerySchema,
  ServeOptionsSchema,
  SubmitOptionsSchema,
} from "./schemas.js";
export type { ServeOptions } from "./schemas.js";

// Tasks
export { InMemoryTaskStore } from "./tasks/store.js";
export type { TaskStore, InMemoryTaskStoreOptions } from "./tasks/store.js";
export { TaskService } from "./tasks/service.js";
export type { ApplyResult, TaskServiceOptions } from "./tasks/service.js";
export { isTerminal } from "./tasks/types.js";
export type { TaskRecord, TaskStatus, TaskOutcome, UpdateResult } from "./tasks/types.js";

// Webhook
export {
  WebhookVerifier,
  computeSignature,
  signPayload,
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
} from "./webhook/verifier.js";
export type { WebhookHeaders, WebhookVerifierOptions } from "./webhook/verifier.js";
export { parseWebhookEvent } from "./webhook/events.js";
export type { WebhookEvent, CompletedEvent, FailedEvent, UnhandledEvent } from "./webhook/events.js";

// Upstream
export type { CompletionClient, BackgroundRequest, BackgroundResponse } from "./upstream/client.js";
export { OpenAICompletionClient } from "./upstream/openai-client.js";
export type { OpenAICompletionClientOptions } from "./upstream/openai-client.js";
export { SimulatedCompletionClient } from "./upstream/simulated-client.js";
export type { Responder, SimulatedCompletionClientOptions } from "./upstream/simulated-client.js";

// Server
export { TaskServer, SERVICE_NAME } from "./server/server.js";
export type { TaskServerOptions } from "./server/server.js";
export type { QueueResponse, StatusResponse, WebhookAck, HealthResponse, ErrorResponse } from "./server/types.js";
export { createApp } from "./app.js";
export type { App, AppOptions } from "./app.js";

// Utils
export { log, setLogLevel, getLogLevel, parseLogLevel } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
