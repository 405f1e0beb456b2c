import { UpstreamError, ValidationError } from "../errors.js";
import type { CompletionClient } from "../upstream/client.js";
import { log } from "../utils/logger.js";
import type { WebhookEvent } from "../webhook/events.js";
import type { TaskStore } from "./store.js";
import type { TaskOutcome, TaskRecord, UpdateResult } from "./types.js";

export type ApplyResult = UpdateResult | { applied: false; reason: "ignored"; eventType: string };

export type TaskServiceOptions = {
  store: TaskStore;
  client: CompletionClient;
};

/** Reconciles queue submissions, webhook deliveries and status reads against one store. */
export class TaskService {
  readonly store: TaskStore;
  readonly client: CompletionClient;

  constructor(opts: TaskServiceOptions) {
    this.store = opts.store;
    this.client = opts.client;
  }

  /**
   * Hand the prompt to the upstream and register it as pending under the
   * upstream's id. Upstream failures propagate and nothing is registered.
   * An id the upstream has already issued is an upstream failure too.
   */
  async submit(prompt: string, webhookUrl: string): Promise<TaskRecord> {
    const response = await this.client.createBackgroundResponse({ prompt, webhookUrl });
    let task: TaskRecord;
    try {
      task = this.store.create(prompt, response.id);
    } catch (err) {
      if (err instanceof ValidationError && err.code === "DUPLICATE_TASK") {
        log.error("Upstream reused a task id", { taskId: response.id, client: this.client.name });
        throw new UpstreamError(`Upstream reused task id "${response.id}"`, { cause: err });
      }
      throw err;
    }
    log.info("Task queued", { taskId: task.id, client: this.client.name, upstreamStatus: response.status });
    return task;
  }

  applyEvent(event: WebhookEvent): ApplyResult {
    const outcome = toOutcome(event);
    if (!outcome) {
      log.info("Ignoring unhandled webhook event", { taskId: event.id, eventType: eventTypeOf(event) });
      return { applied: false, reason: "ignored", eventType: eventTypeOf(event) };
    }
    return this.store.update(event.id, outcome);
  }

  get(id: string): TaskRecord | undefined {
    return this.store.get(id);
  }

  /** Newest first. */
  list(limit?: number): TaskRecord[] {
    return this.store.list(limit);
  }

  shutdown(): void {
    this.client.shutdown?.();
  }
}

function toOutcome(event: WebhookEvent): TaskOutcome | null {
  switch (event.type) {
    case "response.completed":
      return { status: "completed", result: event.output.text };
    case "response.failed":
      return { status: "failed", error: event.error.message || "Unknown error" };
    default:
      return null;
  }
}

function eventTypeOf(event: WebhookEvent): string {
  return event.type === "unhandled" ? event.eventType : event.type;
}
