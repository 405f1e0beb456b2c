import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import { readFile } from "node:fs/promises";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { getConfig } from "../config.js";
import {
  UpstreamError,
  ValidationError,
  WebhookPayloadError,
  WebhookVerificationError,
} from "../errors.js";
import { ListTasksQuerySchema, QueueRequestSchema, parseOrThrow } from "../schemas.js";
import type { TaskService } from "../tasks/service.js";
import type { TaskRecord } from "../tasks/types.js";
import { log } from "../utils/logger.js";
import type { WebhookEvent } from "../webhook/events.js";
import { SIGNATURE_HEADER, TIMESTAMP_HEADER, type WebhookVerifier } from "../webhook/verifier.js";
import type { HealthResponse, QueueResponse, StatusResponse, WebhookAck } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const SERVICE_NAME = "callback-queue";

export type TaskServerOptions = {
  service: TaskService;
  verifier: WebhookVerifier;
  port?: number;
  host?: string;
  /** Base URL the upstream can reach us at. */
  publicUrl?: string;
};

class PayloadTooLargeError extends Error {}

export class TaskServer {
  private service: TaskService;
  private verifier: WebhookVerifier;
  private port: number;
  private host: string;
  private publicUrl?: string;
  private server: Server | null = null;
  private htmlCache: string | null = null;

  constructor(opts: TaskServerOptions) {
    const config = getConfig().server;
    this.service = opts.service;
    this.verifier = opts.verifier;
    this.port = opts.port ?? config.port;
    this.host = opts.host ?? config.host;
    this.publicUrl = (opts.publicUrl ?? config.publicUrl)?.replace(/\/$/, "");
  }

  async start(): Promise<{ port: number; host: string }> {
    this.htmlCache = await readFile(join(__dirname, "..", "ui", "index.html"), "utf-8");

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err) => {
        log.error("Request handler error", { error: String(err) });
        if (!res.headersSent) {
          json(res, 500, { error: "Internal server error" });
        } else {
          res.end();
        }
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        log.info(`Server listening at http://${this.host}:${this.port}`);
        if (!this.publicUrl) {
          log.warn("No public URL configured; webhook URLs are derived from each request's Host header");
        }
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  /** Webhook endpoint at the address the server is bound to. */
  get localWebhookUrl(): string {
    const host = this.host === "0.0.0.0" ? "127.0.0.1" : this.host === "::" ? "::1" : this.host;
    return `http://${host.includes(":") ? `[${host}]` : host}:${this.port}/api/webhook`;
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;
    this.service.shutdown();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    if (method === "GET" && pathname === "/") {
      return this.serveIndex(res);
    }

    if (method === "GET" && pathname === "/health") {
      const body: HealthResponse = { status: "healthy", service: SERVICE_NAME };
      return json(res, 200, body);
    }

    if (method === "POST" && pathname === "/api/queue") {
      return this.handleQueue(req, res);
    }

    if (method === "POST" && pathname === "/api/webhook") {
      return this.handleWebhook(req, res);
    }

    if (method === "GET" && pathname === "/api/tasks") {
      return this.handleListTasks(res, url.searchParams);
    }

    const statusMatch = pathname.match(/^\/api\/status\/([^/]+)$/);
    if (method === "GET" && statusMatch) {
      return this.handleStatus(res, safeDecode(statusMatch[1]));
    }

    json(res, 404, { error: "Not found" });
  }

  private serveIndex(res: ServerResponse): void {
    res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
    res.end(this.htmlCache ?? "");
  }

  private async handleQueue(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const raw = await this.readBodyOrReject(req, res);
    if (raw === null) return;

    let fields: unknown;
    try {
      fields = parseFields(req.headers["content-type"], raw.toString("utf-8"));
    } catch {
      json(res, 400, { error: "Invalid JSON body" });
      return;
    }

    let prompt: string;
    try {
      prompt = parseOrThrow(QueueRequestSchema, fields).prompt;
    } catch (err) {
      if (err instanceof ValidationError) {
        json(res, 400, { error: err.message });
        return;
      }
      throw err;
    }

    const maxPromptLength = getConfig().limits.maxPromptLength;
    if (prompt.length > maxPromptLength) {
      json(res, 400, { error: `Prompt exceeds ${maxPromptLength} characters` });
      return;
    }

    try {
      const task = await this.service.submit(prompt, this.webhookUrl(req));
      const body: QueueResponse = { id: task.id, status: task.status };
      json(res, 202, body);
    } catch (err) {
      if (err instanceof UpstreamError) {
        json(res, 502, { error: `Failed to queue task: ${err.message}` });
        return;
      }
      throw err;
    }
  }

  private async handleWebhook(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const raw = await this.readBodyOrReject(req, res);
    if (raw === null) return;

    let event: WebhookEvent;
    try {
      event = this.verifier.verify(raw, {
        signature: header(req, SIGNATURE_HEADER),
        timestamp: header(req, TIMESTAMP_HEADER),
      });
    } catch (err) {
      if (err instanceof WebhookVerificationError) {
        json(res, 401, { error: "Invalid webhook signature", reason: err.reason });
        return;
      }
      if (err instanceof WebhookPayloadError) {
        log.warn("Rejected webhook payload", { error: err.message });
        json(res, 400, { error: err.message });
        return;
      }
      throw err;
    }

    const result = this.service.applyEvent(event);
    let ack: WebhookAck;
    if (result.applied) {
      ack = { status: "received", id: event.id };
    } else if (result.reason === "not_found") {
      json(res, 404, { error: "Task not found" });
      return;
    } else if (result.reason === "already_terminal") {
      ack = { status: "duplicate", id: event.id };
    } else {
      ack = { status: "ignored", id: event.id };
    }
    json(res, 200, ack);
  }

  private handleStatus(res: ServerResponse, taskId: string): void {
    const task = this.service.get(taskId);
    if (!task) {
      json(res, 404, { error: "Task not found" });
      return;
    }
    json(res, 200, toStatusResponse(task));
  }

  private handleListTasks(res: ServerResponse, params: URLSearchParams): void {
    let limit: number | undefined;
    try {
      limit = parseOrThrow(ListTasksQuerySchema, { limit: params.get("limit") ?? undefined }).limit;
    } catch (err) {
      if (err instanceof ValidationError) {
        json(res, 400, { error: err.message });
        return;
      }
      throw err;
    }
    const body: StatusResponse[] = this.service.list(limit).map(toStatusResponse);
    json(res, 200, body);
  }

  private webhookUrl(req: IncomingMessage): string {
    if (this.publicUrl) return `${this.publicUrl}/api/webhook`;
    const proto = header(req, "x-forwarded-proto")?.split(",")[0].trim() || "http";
    const host = req.headers.host ?? `${this.host}:${this.port}`;
    return `${proto}://${host}/api/webhook`;
  }

  /** Reads the body, answering 413 and returning null when it exceeds the limit. */
  private async readBodyOrReject(req: IncomingMessage, res: ServerResponse): Promise<Buffer | null> {
    try {
      return await readBody(req, getConfig().server.maxBodyBytes);
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        res.setHeader("Connection", "close");
        json(res, 413, { error: "Payload too large" });
        return null;
      }
      throw err;
    }
  }
}

function toStatusResponse(task: TaskRecord): StatusResponse {
  return {
    id: task.id,
    status: task.status,
    result: task.result,
    error: task.error,
    createdAt: task.createdAt,
    completedAt: task.completedAt,
  };
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/** Malformed escapes are looked up verbatim and simply miss. */
function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function header(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** Form-encoded by default; JSON when the client says so. */
function parseFields(contentType: string | undefined, body: string): unknown {
  if (contentType?.includes("application/json")) {
    return JSON.parse(body);
  }
  return Object.fromEntries(new URLSearchParams(body));
}

function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        req.removeAllListeners("data");
        req.resume();
        reject(new PayloadTooLargeError(`Body exceeds ${limit} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks)));
    req.on("error", reject);
  });
}
