import { describe, it, expect } from "vitest";
import { loadConfig } from "../../../lib/config/loader";
import { getCheckpointPolicy, getRetryPolicy, getTriageSettings } from "../../../lib/config/helpers";

describe("loadConfig", () => {
  it("applies defaults when nothing is set", () => {
    const values = loadConfig({});

    expect(values.environment).toBe("development");
    expect(values.embeddingModel).toBe("text-embedding-3-small");
    expect(values.kbPath).toBe("data/knowledge-base.json");
    expect(values.kbSimilarityThreshold).toBe(0.5);
    expect(values.kbTopK).toBe(3);
    expect(values.maxDescriptionLength).toBe(5000);
    expect(values.maxRetries).toBeUndefined();
    expect(values.langsmithTracingEnabled).toBe(true);
  });

  it("reads and coerces environment variables", () => {
    const values = loadConfig({
      ENVIRONMENT: "production",
      MAX_RETRIES: "2",
      KB_SIMILARITY_THRESHOLD: "0.7",
      LANGSMITH_TRACING: "no",
      KB_PATH: "  /srv/kb.json  ",
    });

    expect(values.environment).toBe("production");
    expect(values.maxRetries).toBe(2);
    expect(values.kbSimilarityThreshold).toBe(0.7);
    expect(values.langsmithTracingEnabled).toBe(false);
    expect(values.kbPath).toBe("/srv/kb.json");
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ KB_TOP_K: "   " }).kbTopK).toBe(3);
  });

  it("falls back to the default for an invalid value and warns", () => {
    const values = loadConfig({ KB_TOP_K: "many", EVENT_BUFFER_SIZE: "8" });

    expect(values.kbTopK).toBe(3);
    expect(values.eventBufferSize).toBe(8);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("[Config] Invalid value for KB_TOP_K"),
    );
  });

  it("does not allow more than three knowledge-base matches", () => {
    expect(loadConfig({ KB_TOP_K: "5" }).kbTopK).toBe(3);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("[Config] Invalid value for KB_TOP_K"),
    );
  });

  it("rejects an unknown environment name", () => {
    expect(loadConfig({ ENVIRONMENT: "staging" }).environment).toBe("development");
  });
});

describe("getRetryPolicy", () => {
  it("uses the profile of the environment", () => {
    expect(getRetryPolicy(loadConfig({ ENVIRONMENT: "development" }))).toEqual({
      maxRetries: 3,
      initialDelayMs: 1000,
      backoffFactor: 2,
    });
    expect(getRetryPolicy(loadConfig({ ENVIRONMENT: "production" }))).toEqual({
      maxRetries: 5,
      initialDelayMs: 1000,
      backoffFactor: 2,
    });
    expect(getRetryPolicy(loadConfig({ ENVIRONMENT: "test" }))).toEqual({
      maxRetries: 1,
      initialDelayMs: 10,
      backoffFactor: 2,
    });
  });

  it("lets explicit settings override the profile", () => {
    const policy = getRetryPolicy(
      loadConfig({ ENVIRONMENT: "production", MAX_RETRIES: "0", RETRY_DELAY_MS: "250", RETRY_BACKOFF: "3" }),
    );

    expect(policy).toEqual({ maxRetries: 0, initialDelayMs: 250, backoffFactor: 3 });
  });
});

describe("derived settings", () => {
  it("converts the checkpoint TTL to milliseconds", () => {
    expect(getCheckpointPolicy(loadConfig({ CHECKPOINT_TTL_HOURS: "2", CHECKPOINT_MAX_ENTRIES: "50" }))).toEqual({
      ttlMs: 7_200_000,
      maxEntries: 50,
    });
  });

  it("collects the workflow settings", () => {
    expect(getTriageSettings(loadConfig({ LLM_TIMEOUT_MS: "5000" }))).toEqual({
      maxDescriptionLength: 5000,
      similarityThreshold: 0.5,
      topK: 3,
      eventBufferSize: 16,
      llmTimeoutMs: 5000,
    });
  });
});
