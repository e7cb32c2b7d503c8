import { afterEach, describe, expect, it } from "vitest";
import { getEnv, parseEnv, resetEnvForTests } from "../apps/common/src/env.js";
import { ConfigError, isCertificateError, normalizeError } from "../apps/common/src/errors.js";

describe("parseEnv", () => {
  it("applies defaults", () => {
    const env = parseEnv({});
    expect(env).toMatchObject({
      MODEL_NAME: "gpt-5.2",
      MODEL_MAX_OUTPUT_TOKENS: 16000,
      MODEL_TEMPERATURE: 0.7,
      MODEL_TIMEOUT_MS: 300_000,
      MODEL_RETRY_COUNT: 3,
      MODEL_TLS_INSECURE_FALLBACK: true,
      STORE_TIMEOUT_MS: 10_000,
      STORE_INSERT_TIMEOUT_MS: 30_000,
      BATCH_DELAY_SECONDS: 30,
    });
    expect(env.GPT_API_KEY).toBeUndefined();
  });

  it("reads boolean flags and treats blank strings as unset", () => {
    const env = parseEnv({
      MODEL_TLS_INSECURE_FALLBACK: "off",
      GPT_API_KEY: "   ",
      MODEL_RETRY_COUNT: "0",
    });
    expect(env.MODEL_TLS_INSECURE_FALLBACK).toBe(false);
    expect(env.GPT_API_KEY).toBeUndefined();
    expect(env.MODEL_RETRY_COUNT).toBe(0);
  });

  it("rejects invalid values", () => {
    expect(() => parseEnv({ MODEL_TLS_INSECURE_FALLBACK: "maybe" })).toThrow(ConfigError);
    expect(() => parseEnv({ LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });
});

describe("getEnv", () => {
  const original = process.env.MODEL_NAME;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.MODEL_NAME;
    } else {
      process.env.MODEL_NAME = original;
    }
    resetEnvForTests();
  });

  it("caches the parsed environment until reset", () => {
    process.env.MODEL_NAME = "test-model-a";
    resetEnvForTests();
    expect(getEnv().MODEL_NAME).toBe("test-model-a");

    process.env.MODEL_NAME = "test-model-b";
    expect(getEnv().MODEL_NAME).toBe("test-model-a");

    resetEnvForTests();
    expect(getEnv().MODEL_NAME).toBe("test-model-b");
  });
});

describe("error helpers", () => {
  it("surfaces the socket error hidden behind fetch failed", () => {
    const cause = Object.assign(new Error("connect ECONNREFUSED"), {
      code: "ECONNREFUSED",
      syscall: "connect",
    });
    expect(normalizeError(new Error("fetch failed", { cause }))).toBe(
      "fetch failed: connect ECONNREFUSED (code=ECONNREFUSED, syscall=connect)",
    );
  });

  it("renders non-error values", () => {
    expect(normalizeError(undefined)).toBe("unknown error");
    expect(normalizeError("plain")).toBe("plain");
    expect(normalizeError({ status: 500 })).toBe('{"status":500}');
  });

  it("appends the cause chain and joins aggregate errors", () => {
    const wrapped = new Error("topic queue unavailable", { cause: new Error("EISDIR: illegal operation") });
    expect(normalizeError(wrapped)).toBe("topic queue unavailable: EISDIR: illegal operation");
    expect(normalizeError(new AggregateError([new Error("first"), "second"]))).toBe("first; second");
  });

  it("finds certificate failures anywhere in the cause chain", () => {
    const tls = Object.assign(new Error("self-signed certificate"), {
      code: "DEPTH_ZERO_SELF_SIGNED_CERT",
    });
    expect(isCertificateError(new Error("fetch failed", { cause: tls }))).toBe(true);
    expect(isCertificateError(new Error("fetch failed", { cause: new Error("timeout") }))).toBe(false);
    expect(isCertificateError("CERT_HAS_EXPIRED")).toBe(false);
  });
});
