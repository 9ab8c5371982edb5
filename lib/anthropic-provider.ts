/**
 * Anthropic API Provider
 * Direct Anthropic SDK client used by the reasoning gateway
 */

import Anthropic from "@anthropic-ai/sdk";
import { wrapSDK } from "langsmith/wrappers";
import { config } from "./config";
import { isTracingEnabled } from "./observability";

// Singleton client instance
let anthropicClient: Anthropic | null = null;

/**
 * Get or create Anthropic client instance.
 *
 * SDK-level retries are disabled: the reasoning gateway owns retry and backoff.
 */
export function getAnthropicClient(): Anthropic {
  if (!anthropicClient) {
    const apiKey = config.anthropicApiKey || process.env.ANTHROPIC_API_KEY || "";

    if (!apiKey) {
      throw new Error(
        'ANTHROPIC_API_KEY not configured. ' +
        'Get your API key from https://console.anthropic.com/'
      );
    }

    const baseClient = new Anthropic({
      apiKey,
      maxRetries: 0,
      timeout: config.llmTimeoutMs,
    });

    anthropicClient = isTracingEnabled() ? wrapAnthropicWithLangSmith(baseClient) : baseClient;

    console.log('[Anthropic] Initialized client');
  }

  return anthropicClient;
}

function wrapAnthropicWithLangSmith(client: Anthropic): Anthropic {
  try {
    const wrapped = wrapSDK(client);
    console.log('[LangSmith] Enabled tracing for Anthropic client');
    return wrapped;
  } catch (error) {
    console.warn('[LangSmith] Failed to wrap Anthropic client:', error);
    return client;
  }
}

/**
 * Supported Anthropic models
 */
export const ANTHROPIC_MODELS = {
  SONNET_45: 'claude-sonnet-4-5',
  SONNET_4: 'claude-sonnet-4',
  HAIKU_45: 'claude-haiku-4-5',
} as const;

export type AnthropicModel = typeof ANTHROPIC_MODELS[keyof typeof ANTHROPIC_MODELS];

function isSupportedModel(value: string): value is AnthropicModel {
  return Object.values<string>(ANTHROPIC_MODELS).includes(value);
}

/**
 * Get configured Anthropic model
 */
export function getConfiguredModel(): AnthropicModel {
  const configured = config.anthropicModel.trim();

  if (configured && isSupportedModel(configured)) {
    return configured;
  }

  if (configured) {
    console.warn(`[Anthropic] Unsupported model "${configured}", using ${ANTHROPIC_MODELS.SONNET_45}`);
  }

  return ANTHROPIC_MODELS.SONNET_45;
}

/**
 * Format usage metrics for logging
 */
export function formatUsageMetrics(usage: { input_tokens: number; output_tokens: number }): string {
  return `Input: ${usage.input_tokens} | Output: ${usage.output_tokens}`;
}
