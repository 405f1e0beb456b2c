import { createHmac } from "node:crypto";
import { beforeAll, describe, expect, it } from "vitest";
import { WebhookPayloadError, WebhookVerificationError } from "../../src/errors.js";
import { setLogLevel } from "../../src/utils/logger.js";
import { SIGNATURE_HEADER, TIMESTAMP_HEADER, WebhookVerifier, signPayload } from "../../src/webhook/verifier.js";

const NOW_MS = 1_700_000_000_000;
const TS = 1_700_000_000;
const SECRET = "test-secret";
const BODY = JSON.stringify({ type: "response.completed", id: "T1", output: { text: "Hi!" } });

const verifier = new WebhookVerifier({ secret: SECRET, toleranceSeconds: 300, now: () => NOW_MS });

function rejection(fn: () => unknown): WebhookVerificationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof WebhookVerificationError) return err;
    throw err;
  }
  throw new Error("expected the delivery to be rejected");
}

beforeAll(() => {
  setLogLevel("silent");
});

describe("signPayload", () => {
  it("is an HMAC-SHA256 over the timestamp-prefixed body", () => {
    const expected = createHmac("sha256", SECRET).update(`${TS}.${BODY}`).digest("hex");
    expect(signPayload(SECRET, TS, BODY)).toBe(`sha256=${expected}`);
  });

  it("matches the verifier's own signing", () => {
    expect(verifier.sign(BODY, TS)).toBe(signPayload(SECRET, TS, BODY));
  });
});

describe("WebhookVerifier", () => {
  it("accepts a correctly signed, fresh delivery and returns the event", () => {
    const event = verifier.verify(BODY, { signature: verifier.sign(BODY, TS), timestamp: String(TS) });
    expect(event).toEqual({ type: "response.completed", id: "T1", output: { text: "Hi!" } });
  });

  it("accepts a Buffer body", () => {
    const event = verifier.verify(Buffer.from(BODY), { signature: verifier.sign(BODY, TS), timestamp: String(TS) });
    expect(event.id).toBe("T1");
  });

  it("rejects every single-bit mutation of the signature", () => {
    const signature = verifier.sign(BODY, TS);
    for (let i = 0; i < signature.length; i++) {
      for (let bit = 0; bit < 7; bit++) {
        const mutated =
          signature.slice(0, i) + String.fromCharCode(signature.charCodeAt(i) ^ (1 << bit)) + signature.slice(i + 1);
        const err = rejection(() => verifier.verify(BODY, { signature: mutated, timestamp: String(TS) }));
        expect(["malformed_signature", "signature_mismatch"]).toContain(err.reason);
      }
    }
  });

  it("rejects every single-bit mutation of the body", () => {
    const signature = verifier.sign(BODY, TS);
    const original = Buffer.from(BODY);
    for (let i = 0; i < original.length; i++) {
      for (let bit = 0; bit < 8; bit++) {
        const mutated = Buffer.from(original);
        mutated[i] ^= 1 << bit;
        const err = rejection(() => verifier.verify(mutated, { signature, timestamp: String(TS) }));
        expect(err.reason).toBe("signature_mismatch");
      }
    }
  });

  it("rejects a correctly signed delivery older than the freshness window", () => {
    const stale = TS - 301;
    const err = rejection(() =>
      verifier.verify(BODY, { signature: verifier.sign(BODY, stale), timestamp: String(stale) }),
    );
    expect(err.reason).toBe("stale_timestamp");
  });

  it("accepts a delivery exactly at the edge of the window", () => {
    const edge = TS - 300;
    const event = verifier.verify(BODY, { signature: verifier.sign(BODY, edge), timestamp: String(edge) });
    expect(event.id).toBe("T1");
  });

  it("rejects timestamps too far in the future", () => {
    const future = TS + 301;
    const err = rejection(() =>
      verifier.verify(BODY, { signature: verifier.sign(BODY, future), timestamp: String(future) }),
    );
    expect(err.reason).toBe("stale_timestamp");
  });

  it("rejects a signature made for a different timestamp", () => {
    const err = rejection(() =>
      verifier.verify(BODY, { signature: verifier.sign(BODY, TS), timestamp: String(TS + 1) }),
    );
    expect(err.reason).toBe("signature_mismatch");
  });

  it("rejects a signature made with another secret", () => {
    const err = rejection(() =>
      verifier.verify(BODY, { signature: signPayload("other-secret", TS, BODY), timestamp: String(TS) }),
    );
    expect(err.reason).toBe("signature_mismatch");
  });

  it("reports missing and malformed headers", () => {
    const good = verifier.sign(BODY, TS);
    const hex = good.slice("sha256=".length);

    expect(rejection(() => verifier.verify(BODY, { timestamp: String(TS) })).reason).toBe("missing_signature");
    expect(rejection(() => verifier.verify(BODY, { signature: "", timestamp: String(TS) })).reason).toBe(
      "missing_signature",
    );
    expect(rejection(() => verifier.verify(BODY, { signature: hex, timestamp: String(TS) })).reason).toBe(
      "malformed_signature",
    );
    expect(rejection(() => verifier.verify(BODY, { signature: `md5=${hex}`, timestamp: String(TS) })).reason).toBe(
      "malformed_signature",
    );
    expect(
      rejection(() => verifier.verify(BODY, { signature: `sha256=${hex.toUpperCase()}`, timestamp: String(TS) }))
        .reason,
    ).toBe("malformed_signature");
    expect(rejection(() => verifier.verify(BODY, { signature: good })).reason).toBe("missing_timestamp");
    expect(rejection(() => verifier.verify(BODY, { signature: good, timestamp: "yesterday" })).reason).toBe(
      "malformed_timestamp",
    );
    expect(rejection(() => verifier.verify(BODY, { signature: good, timestamp: "-5" })).reason).toBe(
      "malformed_timestamp",
    );
  });

  it("rejects a Standard Webhooks style v1 signature as malformed", () => {
    const v1 = `v1,${createHmac("sha256", SECRET).update(`msg_1.${TS}.${BODY}`).digest("base64")}`;
    expect(rejection(() => verifier.verify(BODY, { signature: v1, timestamp: String(TS) })).reason).toBe(
      "malformed_signature",
    );
  });

  it("reads its own header names, distinct from the webhook-* scheme", () => {
    expect(SIGNATURE_HEADER).toBe("x-callback-signature");
    expect(TIMESTAMP_HEADER).toBe("x-callback-timestamp");
  });

  it("raises a payload error for an authentic body that is not JSON", () => {
    const body = "not json";
    expect(() => verifier.verify(body, { signature: verifier.sign(body, TS), timestamp: String(TS) })).toThrow(
      WebhookPayloadError,
    );
  });

  it("raises a payload error for a completion without output", () => {
    const body = JSON.stringify({ type: "response.completed", id: "T1" });
    expect(() => verifier.verify(body, { signature: verifier.sign(body, TS), timestamp: String(TS) })).toThrow(
      WebhookPayloadError,
    );
  });

  it("parses a failure event, defaulting a missing message to empty", () => {
    const body = JSON.stringify({ type: "response.failed", id: "T1" });
    const event = verifier.verify(body, { signature: verifier.sign(body, TS), timestamp: String(TS) });
    expect(event).toEqual({ type: "response.failed", id: "T1", error: { message: "" } });
  });

  it("parses event types it does not act on as unhandled", () => {
    const body = JSON.stringify({ type: "response.cancelled", id: "T1" });
    const event = verifier.verify(body, { signature: verifier.sign(body, TS), timestamp: String(TS) });
    expect(event).toEqual({ type: "unhandled", eventType: "response.cancelled", id: "T1" });
  });
});
