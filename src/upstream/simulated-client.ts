import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { log } from "../utils/logger.js";
import { SIGNATURE_HEADER, TIMESTAMP_HEADER, signPayload } from "../webhook/verifier.js";
import type { BackgroundRequest, BackgroundResponse, CompletionClient } from "./client.js";

export type Responder = (prompt: string) => string | Promise<string>;

export type SimulatedCompletionClientOptions = {
  /** Secret shared with the webhook endpoint. */
  webhookSecret: string;
  /** Produces the answer. Throwing delivers a failure event instead. */
  respond?: Responder;
  /** Delay before the webhook is delivered (default: config simulation.delayMs). */
  delayMs?: number;
  /** Clock in epoch milliseconds, used for the signed timestamp. */
  now?: () => number;
  /** Fixed delivery target, read at delivery time. Overrides the URL each request names. */
  deliverTo?: () => string;
};

const echo: Responder = (prompt) => `Echo: ${prompt}`;

/**
 * Stands in for a real background completion API: accepts the request,
 * then delivers a signed webhook to the caller's endpoint after a delay.
 */
export class SimulatedCompletionClient implements CompletionClient {
  readonly name = "simulated";

  private webhookSecret: string;
  private respond: Responder;
  private delayMs: number;
  private now: () => number;
  private deliverTo?: () => string;
  private timers = new Set<NodeJS.Timeout>();
  private inflight = new Set<Promise<void>>();

  constructor(opts: SimulatedCompletionClientOptions) {
    this.webhookSecret = opts.webhookSecret;
    this.respond = opts.respond ?? echo;
    this.delayMs = opts.delayMs ?? getConfig().simulation.delayMs;
    this.now = opts.now ?? Date.now;
    this.deliverTo = opts.deliverTo;
  }

  async createBackgroundResponse(request: BackgroundRequest): Promise<BackgroundResponse> {
    const id = `resp_${randomUUID().replace(/-/g, "")}`;

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      const delivery = this.complete(id, request).finally(() => this.inflight.delete(delivery));
      this.inflight.add(delivery);
    }, this.delayMs);
    this.timers.add(timer);

    log.info(`[${this.name}] Queued response`, { id, delayMs: this.delayMs });
    return { id, status: "queued" };
  }

  /** Number of deliveries not yet attempted or still in flight. */
  get pending(): number {
    return this.timers.size + this.inflight.size;
  }

  /** Resolves once every delivery started so far has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.inflight]);
  }

  shutdown(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private async complete(id: string, request: BackgroundRequest): Promise<void> {
    let event: Record<string, unknown>;
    try {
      const text = await this.respond(request.prompt);
      event = { type: "response.completed", id, output: { text } };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      event = { type: "response.failed", id, error: { message } };
    }

    const body = JSON.stringify(event);
    const timestamp = Math.floor(this.now() / 1000);
    try {
      const res = await fetch(this.deliverTo?.() ?? request.webhookUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          [SIGNATURE_HEADER]: signPayload(this.webhookSecret, timestamp, body),
          [TIMESTAMP_HEADER]: String(timestamp),
        },
        body,
      });
      if (!res.ok) {
        log.error(`[${this.name}] Webhook delivery rejected`, { id, status: res.status });
        return;
      }
      log.debug(`[${this.name}] Webhook delivered`, { id, type: event.type });
    } catch (err) {
      log.error(`[${this.name}] Webhook delivery failed`, { id, error: String(err) });
    }
  }
}
