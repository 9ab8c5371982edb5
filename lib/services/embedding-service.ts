/**
 * Embedding Service
 * Generates embeddings using OpenAI text-embedding-3-small
 */

import OpenAI from "openai";
import { config } from "../config";

export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string; encoding_format?: "float" }): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export class EmbeddingService {
  private model: string;
  private client: EmbeddingsClient;

  constructor(model: string = config.embeddingModel, client?: EmbeddingsClient) {
    this.model = model;
    this.client = client ?? createOpenAIClient();
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Generate embedding vector for text
   *
   * Returns: 1536-dimensional vector for text-embedding-3-small
   */
  async generateEmbedding(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: text,
      encoding_format: "float",
    });

    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error("OpenAI embedding response missing data");
    }

    return embedding;
  }
}

function createOpenAIClient(): OpenAI {
  const apiKey = config.openaiApiKey || process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY not configured for embedding generation");
  }
  // Retries are owned by the reasoning gateway.
  return new OpenAI({ apiKey, maxRetries: 0, timeout: config.llmTimeoutMs });
}

// Factory function
let embeddingService: EmbeddingService | null = null;

export function getEmbeddingService(): EmbeddingService {
  if (!embeddingService) {
    embeddingService = new EmbeddingService();
  }
  return embeddingService;
}
