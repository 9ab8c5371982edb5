/**
 * LLM-backed reasoning provider
 *
 * Analysis and classification go to Anthropic with a forced tool call;
 * embeddings go to OpenAI. Errors are thrown as-is so the gateway can decide
 * whether they are worth retrying.
 */

import type { z } from "zod";
import { parseJsonWithSchema } from "../../utils/json";
import { formatUsageMetrics } from "../../anthropic-provider";
import { AnthropicChatService, type ChatResponse } from "../anthropic-chat";
import { EmbeddingService, getEmbeddingService } from "../embedding-service";
import {
  ASSESS_TOOL,
  CLASSIFY_TOOL,
  buildAnalyzeSystemPrompt,
  buildAnalyzeUserPrompt,
  buildClassifySystemPrompt,
  buildClassifyUserPrompt,
} from "./prompts";
import type { AnalyzeInput, ClassifyInput, ReasoningProvider } from "./reasoning-gateway";
import {
  ClassificationSchema,
  SufficiencyVerdictSchema,
  type Classification,
  type SufficiencyVerdict,
} from "./types";

/**
 * Read the forced tool call, falling back to JSON in the text output.
 */
export function readToolOutput<T>(
  response: ChatResponse,
  toolName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  const call = response.toolCalls.find((toolCall) => toolCall.name === toolName);
  if (call) {
    const result = schema.safeParse(call.input);
    if (!result.success) {
      throw new Error(`Invalid ${toolName} arguments: ${result.error.message}`);
    }
    return result.data;
  }

  return parseJsonWithSchema(response.outputText, schema, toolName);
}

function logUsage(step: string, response: ChatResponse): void {
  if (response.usage) {
    console.log(`[Reasoning Provider] ${step} tokens: ${formatUsageMetrics(response.usage)}`);
  }
}

export class LlmReasoningProvider implements ReasoningProvider {
  constructor(
    private readonly chat: AnthropicChatService = AnthropicChatService.getInstance(),
    private readonly embeddings: EmbeddingService = getEmbeddingService(),
  ) {}

  embed(text: string): Promise<number[]> {
    return this.embeddings.generateEmbedding(text);
  }

  async analyze(input: AnalyzeInput): Promise<SufficiencyVerdict> {
    const response = await this.chat.send({
      messages: [
        { role: "system", content: buildAnalyzeSystemPrompt() },
        { role: "user", content: buildAnalyzeUserPrompt(input) },
      ],
      tools: [ASSESS_TOOL],
      toolChoice: { type: "tool", name: ASSESS_TOOL.name },
      temperature: 0,
      maxTokens: 512,
    });

    logUsage("analyze", response);
    return readToolOutput(response, ASSESS_TOOL.name, SufficiencyVerdictSchema);
  }

  async classify(input: ClassifyInput): Promise<Classification> {
    const response = await this.chat.send({
      messages: [
        { role: "system", content: buildClassifySystemPrompt(input) },
        { role: "user", content: buildClassifyUserPrompt(input) },
      ],
      tools: [CLASSIFY_TOOL],
      toolChoice: { type: "tool", name: CLASSIFY_TOOL.name },
      temperature: 0,
    });

    logUsage("classify", response);
    return readToolOutput(response, CLASSIFY_TOOL.name, ClassificationSchema);
  }
}
