import { ConfigError } from "./errors.js";
import { EnvSchema } from "./schemas.js";

export type AppConfig = {
  server: {
    port: number;
    host: string;
    /** Externally reachable base URL; when unset the webhook URL is derived from the request. */
    publicUrl?: string;
    maxBodyBytes: number;
  };
  webhook: {
    /** Maximum age (either direction) of a delivery timestamp. */
    toleranceSeconds: number;
  };
  upstream: {
    baseUrl: string;
    model: string;
    instructions: string;
    timeoutMs: number;
  };
  simulation: {
    delayMs: number;
  };
  limits: {
    maxPromptLength: number;
  };
  client: {
    pollIntervalMs: number;
  };
};

/** Credentials required before the server may start. */
export type Secrets = {
  apiKey: string;
  webhookSecret: string;
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: AppConfig = {
  server: {
    port: 3000,
    host: "127.0.0.1",
    maxBodyBytes: 1024 * 1024,
  },
  webhook: {
    toleranceSeconds: 300,
  },
  upstream: {
    baseUrl: "https://api.openai.com/v1",
    model: "o3",
    instructions: "You are a helpful assistant that provides detailed, thoughtful responses.",
    timeoutMs: 30_000,
  },
  simulation: {
    delayMs: 4_000,
  },
  limits: {
    maxPromptLength: 10_000,
  },
  client: {
    pollIntervalMs: 2_000,
  },
};

let current: AppConfig = structuredClone(DEFAULTS);

function deepMerge<T extends Record<string, unknown>>(base: T, overrides: DeepPartial<T>): T {
  const result = structuredClone(base);
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined && typeof val === "object" && !Array.isArray(val) && val !== null) {
      (result as Record<string, unknown>)[key as string] = deepMerge(
        (result[key] ?? {}) as Record<string, unknown>,
        val as DeepPartial<Record<string, unknown>>,
      );
    } else if (val !== undefined) {
      (result as Record<string, unknown>)[key as string] = val;
    }
  }
  return result;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<AppConfig>): void {
  current = deepMerge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<AppConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<AppConfig> = Object.freeze(structuredClone(DEFAULTS));

export type EnvConfig = {
  secrets: Secrets;
  overrides: DeepPartial<AppConfig>;
};

/**
 * Read configuration from the environment. Throws a ConfigError naming every
 * missing or invalid variable, so `serve` fails before it binds a port.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${problems.join("; ")}`);
  }
  const e = result.data;

  const overrides: DeepPartial<AppConfig> = {
    server: { port: e.PORT, host: e.HOST, publicUrl: e.PUBLIC_URL },
    webhook: { toleranceSeconds: e.WEBHOOK_TOLERANCE_SECONDS },
    upstream: { baseUrl: e.OPENAI_BASE_URL, model: e.OPENAI_MODEL },
  };

  return {
    secrets: { apiKey: e.OPENAI_API_KEY, webhookSecret: e.OPENAI_WEBHOOK_SECRET },
    overrides,
  };
}
