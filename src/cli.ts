#!/usr/bin/env node

import "dotenv/config";
import { Command } from "commander";
import { createApp } from "./app.js";
import { configure, getConfig, loadEnvConfig, type EnvConfig } from "./config.js";
import { ConfigError, ValidationError } from "./errors.js";
import { ServeOptionsSchema, SubmitOptionsSchema, parseOrThrow, type ServeOptions } from "./schemas.js";
import type { QueueResponse, StatusResponse } from "./server/types.js";
import { log, parseLogLevel, setLogLevel } from "./utils/logger.js";
import { SIGNATURE_HEADER, TIMESTAMP_HEADER, signPayload } from "./webhook/verifier.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const program = new Command();

program
  .name("callback-queue")
  .description("Submit prompts to a background completion service and track them through signed webhooks")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  setLogLevel(opts.debug ? "debug" : parseLogLevel(process.env.LOG_LEVEL));
});

const DEFAULT_SERVER = "http://127.0.0.1:3000";

// --- serve ---
program
  .command("serve")
  .description("Start the HTTP server")
  .option("-p, --port <port>", "Port to listen on")
  .option("--host <host>", "Host to bind")
  .option("--public-url <url>", "Base URL the upstream uses to reach the webhook")
  .option("--simulate", "Simulate the upstream: deliver a signed webhook after a delay")
  .option("--simulate-delay <ms>", "Delay before the simulated webhook is delivered")
  .action(async (opts: { port?: string; host?: string; publicUrl?: string; simulate?: boolean; simulateDelay?: string }) => {
    let env: EnvConfig;
    let options: ServeOptions;
    try {
      options = parseOrThrow(ServeOptionsSchema, opts);
      env = loadEnvConfig();
    } catch (err) {
      if (err instanceof ConfigError || err instanceof ValidationError) {
        console.error(err.message);
        process.exitCode = 1;
        return;
      }
      throw err;
    }
    configure(env.overrides);

    const app = createApp({
      secrets: env.secrets,
      simulate: opts.simulate,
      simulateDelayMs: options.simulateDelay,
      port: options.port,
      host: opts.host,
      publicUrl: opts.publicUrl,
    });

    const addr = await app.server.start();
    console.log(`Server:   http://${addr.host}:${addr.port}`);
    console.log(`Upstream: ${app.client.name}`);
    console.log("Press Ctrl+C to stop.\n");

    process.on("SIGINT", () => {
      app.server
        .stop()
        .catch((err) => log.error("Shutdown failed", { error: String(err) }))
        .finally(() => process.exit(0));
    });
  });

// --- submit ---
program
  .command("submit")
  .description("Queue a prompt on a running server and wait for its result")
  .argument("<prompt>", "The prompt to submit")
  .option("-u, --url <url>", "Server base URL", DEFAULT_SERVER)
  .option("-i, --interval <ms>", "Status poll interval")
  .action(async (prompt: string, opts: { url: string; interval?: string }) => {
    const base = opts.url.replace(/\/$/, "");
    try {
      const interval = parseOrThrow(SubmitOptionsSchema, opts).interval ?? getConfig().client.pollIntervalMs;
      const res = await fetch(`${base}/api/queue`, {
        method: "POST",
        body: new URLSearchParams({ prompt }),
      });
      if (!res.ok) {
        const t = await res.text();
        throw new Error(`Server returned ${res.status}: ${t.slice(0, 200)}`);
      }
      const { id } = (await res.json()) as QueueResponse;
      console.error(`Queued task ${id}`);

      while (true) {
        await new Promise((r) => setTimeout(r, interval));
        const statusRes = await fetch(`${base}/api/status/${encodeURIComponent(id)}`);
        if (!statusRes.ok) throw new Error(`Failed to get status: ${statusRes.status}`);
        const task = (await statusRes.json()) as StatusResponse;
        if (task.status === "completed") {
          console.log(task.result ?? "");
          return;
        }
        if (task.status === "failed") {
          console.error("Task failed:", task.error ?? "Unknown error");
          process.exitCode = 1;
          return;
        }
      }
    } catch (err) {
      console.error("Submit failed:", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  });

// --- sign ---
program
  .command("sign")
  .description("Print a signed webhook delivery, ready to send with curl")
  .requiredOption("--id <id>", "Task id")
  .option("--result <text>", "Deliver a completion with this result")
  .option("--error <message>", "Deliver a failure with this message")
  .option("--secret <secret>", "Webhook secret (default: OPENAI_WEBHOOK_SECRET)")
  .option("--timestamp <seconds>", "Unix timestamp to sign (default: now)")
  .action((opts: { id: string; result?: string; error?: string; secret?: string; timestamp?: string }) => {
    const secret = opts.secret ?? process.env.OPENAI_WEBHOOK_SECRET;
    if (!secret) {
      console.error("No secret: pass --secret or set OPENAI_WEBHOOK_SECRET");
      process.exitCode = 1;
      return;
    }
    if ((opts.result === undefined) === (opts.error === undefined)) {
      console.error("Pass exactly one of --result or --error");
      process.exitCode = 1;
      return;
    }

    const event =
      opts.result !== undefined
        ? { type: "response.completed", id: opts.id, output: { text: opts.result } }
        : { type: "response.failed", id: opts.id, error: { message: opts.error } };
    const body = JSON.stringify(event);
    const timestamp = opts.timestamp ?? String(Math.floor(Date.now() / 1000));

    console.log(`${SIGNATURE_HEADER}: ${signPayload(secret, timestamp, body)}`);
    console.log(`${TIMESTAMP_HEADER}: ${timestamp}`);
    console.log("");
    console.log(body);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
