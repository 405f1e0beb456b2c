import type { Secrets } from "./config.js";
import { TaskServer } from "./server/server.js";
import { TaskService } from "./tasks/service.js";
import { InMemoryTaskStore, type TaskStore } from "./tasks/store.js";
import type { CompletionClient } from "./upstream/client.js";
import { OpenAICompletionClient } from "./upstream/openai-client.js";
import { SimulatedCompletionClient, type Responder } from "./upstream/simulated-client.js";
import { WebhookVerifier } from "./webhook/verifier.js";

export type AppOptions = {
  secrets: Secrets;
  /** Use the simulated upstream instead of the real API. */
  simulate?: boolean;
  simulateDelayMs?: number;
  respond?: Responder;
  /** Supply a client directly; takes precedence over `simulate`. */
  client?: CompletionClient;
  store?: TaskStore;
  port?: number;
  host?: string;
  publicUrl?: string;
};

export type App = {
  server: TaskServer;
  service: TaskService;
  store: TaskStore;
  verifier: WebhookVerifier;
  client: CompletionClient;
};

/** Wire one store, client and verifier into a server. Nothing is shared between apps. */
export function createApp(opts: AppOptions): App {
  const store = opts.store ?? new InMemoryTaskStore();
  const verifier = new WebhookVerifier({ secret: opts.secrets.webhookSecret });
  // Simulated deliveries go to the bound address, whatever webhook URL a request derived.
  const localWebhookUrl = (): string => server.localWebhookUrl;
  const client =
    opts.client ??
    (opts.simulate
      ? new SimulatedCompletionClient({
          webhookSecret: opts.secrets.webhookSecret,
          delayMs: opts.simulateDelayMs,
          respond: opts.respond,
          deliverTo: localWebhookUrl,
        })
      : new OpenAICompletionClient({ apiKey: opts.secrets.apiKey }));
  const service = new TaskService({ store, client });
  const server = new TaskServer({
    service,
    verifier,
    port: opts.port,
    host: opts.host,
    publicUrl: opts.publicUrl,
  });
  return { server, service, store, verifier, client };
}
