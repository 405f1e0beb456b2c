import { afterEach, describe, expect, it } from "vitest";
import { configure, defaults, getConfig, loadEnvConfig, resetConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const REQUIRED = { OPENAI_API_KEY: "test-key", OPENAI_WEBHOOK_SECRET: "test-secret" };

afterEach(() => {
  resetConfig();
});

describe("config", () => {
  it("starts from the defaults", () => {
    expect(getConfig()).toEqual(defaults);
    expect(getConfig().webhook.toleranceSeconds).toBe(300);
    expect(getConfig().upstream.model).toBe("o3");
  });

  it("merges overrides deeply", () => {
    configure({ server: { port: 8080 } });
    expect(getConfig().server.port).toBe(8080);
    expect(getConfig().server.host).toBe("127.0.0.1");
    expect(getConfig().webhook.toleranceSeconds).toBe(300);
  });

  it("resets to defaults", () => {
    configure({ webhook: { toleranceSeconds: 5 } });
    resetConfig();
    expect(getConfig().webhook.toleranceSeconds).toBe(300);
  });
});

describe("loadEnvConfig", () => {
  it("fails naming every missing credential", () => {
    expect(() => loadEnvConfig({})).toThrow(ConfigError);
    expect(() => loadEnvConfig({})).toThrow(
      "Invalid environment: OPENAI_API_KEY: OPENAI_API_KEY environment variable is required; " +
        "OPENAI_WEBHOOK_SECRET: OPENAI_WEBHOOK_SECRET environment variable is required",
    );
  });

  it("rejects blank credentials", () => {
    expect(() => loadEnvConfig({ ...REQUIRED, OPENAI_WEBHOOK_SECRET: "   " })).toThrow(
      "OPENAI_WEBHOOK_SECRET must not be empty",
    );
  });

  it("returns secrets and leaves unset options undefined", () => {
    const env = loadEnvConfig(REQUIRED);
    expect(env.secrets).toEqual({ apiKey: "test-key", webhookSecret: "test-secret" });
    expect(env.overrides.server?.port).toBeUndefined();

    configure(env.overrides);
    expect(getConfig()).toEqual(defaults);
  });

  it("maps optional variables onto config overrides", () => {
    const env = loadEnvConfig({
      ...REQUIRED,
      PORT: "8080",
      HOST: "0.0.0.0",
      PUBLIC_URL: "https://queue.example.test",
      WEBHOOK_TOLERANCE_SECONDS: "60",
      OPENAI_MODEL: "test-model",
    });
    configure(env.overrides);

    const config = getConfig();
    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe("0.0.0.0");
    expect(config.server.publicUrl).toBe("https://queue.example.test");
    expect(config.webhook.toleranceSeconds).toBe(60);
    expect(config.upstream.model).toBe("test-model");
    expect(config.upstream.baseUrl).toBe("https://api.openai.com/v1");
  });

  it("treats empty optional variables as unset", () => {
    const env = loadEnvConfig({ ...REQUIRED, PORT: "", PUBLIC_URL: "" });
    expect(env.overrides.server?.port).toBeUndefined();
    expect(env.overrides.server?.publicUrl).toBeUndefined();
  });

  it("rejects invalid numbers and URLs", () => {
    expect(() => loadEnvConfig({ ...REQUIRED, PORT: "eighty" })).toThrow(ConfigError);
    expect(() => loadEnvConfig({ ...REQUIRED, PORT: "70000" })).toThrow(ConfigError);
    expect(() => loadEnvConfig({ ...REQUIRED, WEBHOOK_TOLERANCE_SECONDS: "0" })).toThrow(ConfigError);
    expect(() => loadEnvConfig({ ...REQUIRED, PUBLIC_URL: "not a url" })).toThrow(ConfigError);
  });
});
