/**
 * Anthropic Chat Service
 *
 * Thin wrapper around the Anthropic Messages API with support for forced tool
 * calls. Retries are handled by the caller (see the reasoning gateway).
 */

import Anthropic from "@anthropic-ai/sdk";
import type {
  MessageCreateParamsNonStreaming,
  Message,
  ToolUseBlock,
} from "@anthropic-ai/sdk/resources/messages";
import { getAnthropicClient, getConfiguredModel } from "../anthropic-provider";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Anthropic.Messages.Tool.InputSchema;
}

export type ToolChoice =
  | { type: "auto" }
  | { type: "any" }
  | { type: "tool"; name: string };

export interface ChatRequest {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  toolChoice?: ToolChoice;
}

export interface ChatResponse {
  message: Message;
  toolCalls: ToolUseBlock[];
  outputText?: string;
  usage?: Anthropic.Messages.Usage;
}

/**
 * Minimal client surface used by the service, so tests can pass a stub.
 */
export interface MessagesClient {
  messages: {
    create(params: MessageCreateParamsNonStreaming): Promise<Message>;
  };
}

const DEFAULT_MAX_TOKENS = 1024;

export class AnthropicChatService {
  constructor(private client: MessagesClient = getAnthropicClient()) {}

  /**
   * Create or reuse a singleton instance.
   */
  static getInstance(): AnthropicChatService {
    return getAnthropicChatService();
  }

  async send(request: ChatRequest): Promise<ChatResponse> {
    const params = this.toMessageParams(request);

    const result = await this.client.messages.create(params);

    const toolCalls = result.content.filter(
      (block): block is ToolUseBlock => block.type === "tool_use",
    );

    const textBlocks = result.content.filter(
      (block): block is Anthropic.Messages.TextBlock => block.type === "text",
    );

    return {
      message: result,
      toolCalls,
      outputText: textBlocks.map((block) => block.text).join("\n\n") || undefined,
      usage: result.usage,
    };
  }

  private toMessageParams(request: ChatRequest): MessageCreateParamsNonStreaming {
    const model = request.model ?? getConfiguredModel();

    const systemSegments: string[] = [];
    const conversation: MessageCreateParamsNonStreaming["messages"] = [];

    for (const message of request.messages) {
      if (message.role === "system") {
        systemSegments.push(message.content);
        continue;
      }

      conversation.push({
        role: message.role,
        content: [{ type: "text", text: message.content }],
      });
    }

    const params: MessageCreateParamsNonStreaming = {
      model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: conversation,
    };

    if (systemSegments.length > 0) {
      params.system = systemSegments.join("\n\n");
    }

    if (request.temperature !== undefined) {
      params.temperature = request.temperature;
    }

    if (request.tools && request.tools.length > 0) {
      params.tools = request.tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: tool.inputSchema,
      }));
    }

    if (request.toolChoice) {
      params.tool_choice = request.toolChoice;
    }

    return params;
  }
}

let chatService: AnthropicChatService | null = null;

export function getAnthropicChatService(): AnthropicChatService {
  if (!chatService) {
    chatService = new AnthropicChatService();
  }
  return chatService;
}
