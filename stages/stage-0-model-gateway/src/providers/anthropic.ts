import type {
  AnthropicConfig,
  ChatRequest,
  JsonObject,
  Message,
  ProviderResult,
  ToolCall,
  ToolDeclaration,
} from "../types.js";
import {
  parseErrorMessage,
  ProviderCommunicationError,
  readJsonBody,
  type LLMProvider,
} from "./types.js";

const DEFAULT_ANTHROPIC_BASE_URL = "https://api.anthropic.com/v1";
const DEFAULT_ANTHROPIC_VERSION = "2023-06-01";
// The messages API requires max_tokens.
const DEFAULT_MAX_TOKENS = 1000;

type ContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: JsonObject }
  | {
      type: "tool_result";
      tool_use_id: string;
      content: string;
      is_error?: boolean;
    };

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | ContentBlock[];
}

interface AnthropicResponse {
  content?: Array<{
    type?: string;
    text?: string;
    id?: string;
    name?: string;
    input?: JsonObject;
  }>;
  stop_reason?: string;
  usage?: { input_tokens?: number; output_tokens?: number };
}

/**
 * System text goes to the top-level `system` field. Consecutive tool results
 * are merged into a single user message of tool_result blocks, which is the
 * only place the API accepts them.
 */
export function toAnthropicMessages(messages: Message[]): {
  system?: string;
  messages: AnthropicMessage[];
} {
  const systemParts: string[] = [];
  const out: AnthropicMessage[] = [];

  for (const message of messages) {
    switch (message.role) {
      case "system":
        systemParts.push(message.content);
        break;
      case "user":
        out.push({ role: "user", content: message.content });
        break;
      case "assistant": {
        if (!message.toolCalls?.length) {
          out.push({ role: "assistant", content: message.content });
          break;
        }
        const blocks: ContentBlock[] = [];
        if (message.content) {
          blocks.push({ type: "text", text: message.content });
        }
        for (const call of message.toolCalls) {
          blocks.push({
            type: "tool_use",
            id: call.id,
            name: call.name,
            input: toToolInput(call),
          });
        }
        out.push({ role: "assistant", content: blocks });
        break;
      }
      case "tool": {
        const block: ContentBlock = {
          type: "tool_result",
          tool_use_id: message.toolCallId,
          content: message.content,
        };
        if (message.isError) {
          block.is_error = true;
        }
        const previous = out[out.length - 1];
        if (
          previous &&
          previous.role === "user" &&
          Array.isArray(previous.content) &&
          previous.content.every((b) => b.type === "tool_result")
        ) {
          previous.content.push(block);
        } else {
          out.push({ role: "user", content: [block] });
        }
        break;
      }
    }
  }

  return {
    system: systemParts.length > 0 ? systemParts.join("\n") : undefined,
    messages: out,
  };
}

function toToolInput(call: ToolCall): JsonObject {
  if (typeof call.arguments !== "string") {
    return call.arguments;
  }
  if (!call.arguments.trim()) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(call.arguments);
  } catch (err) {
    throw new ProviderCommunicationError({
      provider: "anthropic",
      message: `Cannot replay tool call ${call.id}: arguments are not valid JSON.`,
      cause: err,
    });
  }
  if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
    const input: JsonObject = {};
    for (const [key, value] of Object.entries(parsed)) {
      input[key] = value;
    }
    return input;
  }
  return {};
}

export function toAnthropicTools(tools: ToolDeclaration[]) {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.parameters,
  }));
}

function parseContent(data: AnthropicResponse): {
  content: string;
  toolCalls: ToolCall[];
} {
  const textParts: string[] = [];
  const toolCalls: ToolCall[] = [];

  for (const [index, block] of (data.content ?? []).entries()) {
    if (block.type === "text") {
      textParts.push(block.text ?? "");
    } else if (block.type === "tool_use") {
      if (!block.name) {
        throw new ProviderCommunicationError({
          provider: "anthropic",
          message: `tool_use block at index ${index} has no name.`,
        });
      }
      toolCalls.push({
        id: block.id ?? `toolu_${index}`,
        name: block.name,
        arguments: block.input ?? {},
      });
    }
  }

  return { content: textParts.join(""), toolCalls };
}

export function createAnthropicProvider(config: AnthropicConfig): LLMProvider {
  return {
    name: "anthropic",
    async chat(request: ChatRequest): Promise<ProviderResult> {
      if (!request.model) {
        throw new ProviderCommunicationError({
          provider: "anthropic",
          message: "Model is required for Anthropic.",
        });
      }
      const apiKey = config.apiKey;
      if (!apiKey) {
        throw new ProviderCommunicationError({
          provider: "anthropic",
          message:
            "Anthropic API key not found. Set ANTHROPIC_API_KEY in the environment or .env.",
          code: "missing_api_key",
        });
      }

      const baseUrl = config.baseUrl ?? DEFAULT_ANTHROPIC_BASE_URL;
      const { system, messages } = toAnthropicMessages(request.messages);

      const body: Record<string, unknown> = {
        model: request.model,
        messages,
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: request.temperature,
      };
      if (system) {
        body.system = system;
      }
      if (request.tools?.length) {
        body.tools = toAnthropicTools(request.tools);
      }

      const response = await fetch(`${baseUrl}/messages`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-api-key": apiKey,
          "anthropic-version": config.version ?? DEFAULT_ANTHROPIC_VERSION,
        },
        body: JSON.stringify(body),
        signal: request.abortSignal,
      });

      if (!response.ok) {
        const errorDetails = await parseErrorMessage(response);
        throw new ProviderCommunicationError({
          provider: "anthropic",
          message: errorDetails.message,
          status: response.status,
          code: errorDetails.code,
        });
      }

      const data = await readJsonBody<AnthropicResponse>("anthropic", response);
      if (!Array.isArray(data.content)) {
        throw new ProviderCommunicationError({
          provider: "anthropic",
          message: "Anthropic response has no content array.",
          status: response.status,
        });
      }

      const { content, toolCalls } = parseContent(data);
      const usage = data.usage
        ? {
            inputTokens: data.usage.input_tokens ?? 0,
            outputTokens: data.usage.output_tokens ?? 0,
            totalTokens:
              (data.usage.input_tokens ?? 0) + (data.usage.output_tokens ?? 0),
          }
        : undefined;

      return {
        content,
        toolCalls,
        finishReason: data.stop_reason,
        usage,
        raw: data,
      };
    },
  };
}
