import { getConfig } from "../config.js";
import { UpstreamError } from "../errors.js";
import { BackgroundResponseSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { BackgroundRequest, BackgroundResponse, CompletionClient } from "./client.js";

export type OpenAICompletionClientOptions = {
  apiKey: string;
  /** Default: config upstream.baseUrl */
  baseUrl?: string;
  /** Default: config upstream.model */
  model?: string;
  instructions?: string;
  /** Timeout in ms (default: config upstream.timeoutMs) */
  timeout?: number;
};

/** Creates background responses through an OpenAI-compatible Responses API. */
export class OpenAICompletionClient implements CompletionClient {
  readonly name = "openai";

  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private instructions: string;
  private timeout: number;

  constructor(opts: OpenAICompletionClientOptions) {
    const upstream = getConfig().upstream;
    this.apiKey = opts.apiKey;
    this.baseUrl = (opts.baseUrl ?? upstream.baseUrl).replace(/\/$/, "");
    this.model = opts.model ?? upstream.model;
    this.instructions = opts.instructions ?? upstream.instructions;
    this.timeout = opts.timeout ?? upstream.timeoutMs;
  }

  async createBackgroundResponse(request: BackgroundRequest): Promise<BackgroundResponse> {
    const url = `${this.baseUrl}/responses`;
    log.info(`[${this.name}] Creating background response`, { model: this.model });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    // The timer and signal cover the body read too; a stalled body is a timeout.
    let res: Response;
    let body: string;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          instructions: this.instructions,
          input: request.prompt,
          background: true,
          metadata: { webhook_url: request.webhookUrl },
        }),
        signal: controller.signal,
      });
      body = await res.text();
    } catch (err) {
      const isTimeout = controller.signal.aborted;
      log.error(`[${this.name}] Request failed`, { error: String(err) });
      throw new UpstreamError(
        isTimeout ? `Upstream timed out after ${this.timeout}ms` : `Upstream request failed: ${String(err)}`,
        { cause: err },
      );
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      log.error(`[${this.name}] Upstream returned ${res.status}`, { body: body.slice(0, 500) });
      throw new UpstreamError(`Upstream returned HTTP ${res.status}: ${body.slice(0, 200)}`, {
        status: res.status,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (err) {
      throw new UpstreamError("Upstream returned invalid JSON", { status: res.status, cause: err });
    }

    const parsed = BackgroundResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamError("Upstream response is missing an id", { status: res.status });
    }
    log.debug(`[${this.name}] Background response queued`, { id: parsed.data.id, status: parsed.data.status });
    return parsed.data;
  }
}
