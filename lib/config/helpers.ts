// Configuration helpers for consolidated config access
import type { RetryPolicy } from "../services/smart-retry";
import { getConfigSync } from "./loader";
import type { ConfigValueMap, TriageEnvironment } from "./registry";

const RETRY_PROFILES: Record<TriageEnvironment, RetryPolicy> = {
  development: { maxRetries: 3, initialDelayMs: 1000, backoffFactor: 2 },
  production: { maxRetries: 5, initialDelayMs: 1000, backoffFactor: 2 },
  test: { maxRetries: 1, initialDelayMs: 10, backoffFactor: 2 },
};

/**
 * Retry policy for reasoning service calls: explicit settings win over the
 * environment profile.
 */
export function getRetryPolicy(source: ConfigValueMap = getConfigSync()): RetryPolicy {
  const profile = RETRY_PROFILES[source.environment];
  return {
    maxRetries: source.maxRetries ?? profile.maxRetries,
    initialDelayMs: source.retryDelayMs ?? profile.initialDelayMs,
    backoffFactor: source.retryBackoff ?? profile.backoffFactor,
  };
}

export interface TriageSettings {
  maxDescriptionLength: number;
  similarityThreshold: number;
  topK: number;
  eventBufferSize: number;
  llmTimeoutMs: number;
}

export function getTriageSettings(source: ConfigValueMap = getConfigSync()): TriageSettings {
  return {
    maxDescriptionLength: source.maxDescriptionLength,
    similarityThreshold: source.kbSimilarityThreshold,
    topK: source.kbTopK,
    eventBufferSize: source.eventBufferSize,
    llmTimeoutMs: source.llmTimeoutMs,
  };
}

export interface CheckpointPolicy {
  ttlMs: number;
  maxEntries: number;
}

export function getCheckpointPolicy(source: ConfigValueMap = getConfigSync()): CheckpointPolicy {
  return {
    ttlMs: source.checkpointTtlHours * 60 * 60 * 1000,
    maxEntries: source.checkpointMaxEntries,
  };
}
