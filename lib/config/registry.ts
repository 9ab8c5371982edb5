import { z } from "zod";

const envFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

export const TRIAGE_ENVIRONMENTS = ["development", "production", "test"] as const;
export type TriageEnvironment = (typeof TRIAGE_ENVIRONMENTS)[number];

/**
 * Typed view of every setting the service reads from the environment.
 * Retry settings are optional: when unset they come from the environment profile
 * (see `getRetryPolicy`).
 */
export const ConfigSchema = z.object({
  environment: z.enum(TRIAGE_ENVIRONMENTS).default("development"),

  anthropicApiKey: z.string().default(""),
  anthropicModel: z.string().default(""),
  openaiApiKey: z.string().default(""),
  embeddingModel: z.string().default("text-embedding-3-small"),
  llmTimeoutMs: z.coerce.number().int().positive().default(30_000),

  maxRetries: z.coerce.number().int().min(0).max(10).optional(),
  retryDelayMs: z.coerce.number().min(0).optional(),
  retryBackoff: z.coerce.number().min(1).optional(),

  maxDescriptionLength: z.coerce.number().int().positive().default(5000),
  kbPath: z.string().default("data/knowledge-base.json"),
  kbSimilarityThreshold: z.coerce.number().min(-1).max(1).default(0.5),
  kbTopK: z.coerce.number().int().min(1).max(3).default(3),

  checkpointTtlHours: z.coerce.number().positive().default(24),
  checkpointMaxEntries: z.coerce.number().int().positive().default(1000),
  eventBufferSize: z.coerce.number().int().positive().default(16),

  langsmithApiKey: z.string().default(""),
  langsmithProject: z.string().default("ticket-triage"),
  langsmithEndpoint: z.string().default(""),
  langsmithTracingEnabled: envFlag.default("true"),
});

export type ConfigValueMap = z.infer<typeof ConfigSchema>;
export type ConfigKey = keyof ConfigValueMap;

export interface ConfigDefinition {
  envVar: string;
  description: string;
  sensitive?: boolean;
}

export const CONFIG_DEFINITIONS: Record<ConfigKey, ConfigDefinition> = {
  environment: {
    envVar: "ENVIRONMENT",
    description: "Runtime profile (development, production, test). Selects retry defaults.",
  },
  anthropicApiKey: {
    envVar: "ANTHROPIC_API_KEY",
    description: "API key for the Anthropic Messages API used for analysis and classification.",
    sensitive: true,
  },
  anthropicModel: {
    envVar: "ANTHROPIC_MODEL",
    description: "Anthropic model id. Unsupported values fall back to the default model.",
  },
  openaiApiKey: {
    envVar: "OPENAI_API_KEY",
    description: "API key for OpenAI embeddings.",
    sensitive: true,
  },
  embeddingModel: {
    envVar: "CASE_EMBEDDING_MODEL",
    description: "Embedding model used for knowledge-base similarity search.",
  },
  llmTimeoutMs: {
    envVar: "LLM_TIMEOUT_MS",
    description: "Per-attempt timeout for reasoning service calls.",
  },
  maxRetries: {
    envVar: "MAX_RETRIES",
    description: "Retries after the first attempt for transient reasoning service failures.",
  },
  retryDelayMs: {
    envVar: "RETRY_DELAY_MS",
    description: "Delay before the first retry.",
  },
  retryBackoff: {
    envVar: "RETRY_BACKOFF",
    description: "Multiplier applied to the delay after each retry.",
  },
  maxDescriptionLength: {
    envVar: "MAX_DESCRIPTION_LENGTH",
    description: "Longest ticket description accepted.",
  },
  kbPath: {
    envVar: "KB_PATH",
    description: "Path of the knowledge-base JSON file, relative to the working directory.",
  },
  kbSimilarityThreshold: {
    envVar: "KB_SIMILARITY_THRESHOLD",
    description: "Cosine similarity at or above which a match counts as a known issue.",
  },
  kbTopK: {
    envVar: "KB_TOP_K",
    description: "Number of knowledge-base matches returned per search.",
  },
  checkpointTtlHours: {
    envVar: "CHECKPOINT_TTL_HOURS",
    description: "Hours a suspended session stays resumable.",
  },
  checkpointMaxEntries: {
    envVar: "CHECKPOINT_MAX_ENTRIES",
    description: "Suspended sessions kept before the oldest is evicted.",
  },
  eventBufferSize: {
    envVar: "EVENT_BUFFER_SIZE",
    description: "Events buffered per stream before the workflow waits for the consumer.",
  },
  langsmithApiKey: {
    envVar: "LANGSMITH_API_KEY",
    description: "LangSmith API key. Tracing stays off without it.",
    sensitive: true,
  },
  langsmithProject: {
    envVar: "LANGSMITH_PROJECT",
    description: "LangSmith project that receives traces.",
  },
  langsmithEndpoint: {
    envVar: "LANGSMITH_API_URL",
    description: "Custom LangSmith endpoint.",
  },
  langsmithTracingEnabled: {
    envVar: "LANGSMITH_TRACING",
    description: "Set to false to disable tracing even when an API key is present.",
  },
};
