import type {
  ChatRequest,
  Message,
  OpenAIConfig,
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

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

type OpenAIMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: Array<{
        id: string;
        type: "function";
        function: { name: string; arguments: string };
      }>;
    }
  | { role: "tool"; tool_call_id: string; content: string };

interface OpenAIResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
      tool_calls?: Array<{
        id?: string;
        type?: string;
        function?: { name?: string; arguments?: string };
      }>;
    };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

function buildHeaders(config: OpenAIConfig, apiKey: string): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Authorization: `Bearer ${apiKey}`,
  };

  if (config.organization) {
    headers["OpenAI-Organization"] = config.organization;
  }

  return headers;
}

function toOpenAIMessage(message: Message): OpenAIMessage {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: message.content };
    case "assistant":
      if (!message.toolCalls?.length) {
        return { role: "assistant", content: message.content };
      }
      return {
        role: "assistant",
        content: message.content || null,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: "function",
          function: {
            name: call.name,
            arguments:
              typeof call.arguments === "string"
                ? call.arguments
                : JSON.stringify(call.arguments),
          },
        })),
      };
    case "tool":
      return {
        role: "tool",
        tool_call_id: message.toolCallId,
        content: message.content,
      };
  }
}

export function toOpenAITools(tools: ToolDeclaration[]) {
  return tools.map((tool) => ({
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
}

function parseToolCalls(
  message: NonNullable<NonNullable<OpenAIResponse["choices"]>[number]["message"]>
): ToolCall[] {
  return (message.tool_calls ?? []).map((call, index) => {
    const name = call.function?.name;
    if (!name) {
      throw new ProviderCommunicationError({
        provider: "openai",
        message: `Tool call at index ${index} has no function name.`,
      });
    }
    return {
      id: call.id ?? `call_${index}`,
      name,
      arguments: call.function?.arguments ?? "",
    };
  });
}

export function createOpenAIProvider(config: OpenAIConfig): LLMProvider {
  return {
    name: "openai",
    async chat(request: ChatRequest): Promise<ProviderResult> {
      if (!request.model) {
        throw new ProviderCommunicationError({
          provider: "openai",
          message: "Model is required for OpenAI.",
        });
      }
      const apiKey = config.apiKey;
      if (!apiKey) {
        throw new ProviderCommunicationError({
          provider: "openai",
          message:
            "OpenAI API key not found. Set OPENAI_API_KEY in the environment or .env.",
          code: "missing_api_key",
        });
      }

      const baseUrl = config.baseUrl ?? DEFAULT_OPENAI_BASE_URL;
      const body: Record<string, unknown> = {
        model: request.model,
        messages: request.messages.map(toOpenAIMessage),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      };
      if (request.tools?.length) {
        body.tools = toOpenAITools(request.tools);
      }

      const response = await fetch(`${baseUrl}/chat/completions`, {
        method: "POST",
        headers: buildHeaders(config, apiKey),
        body: JSON.stringify(body),
        signal: request.abortSignal,
      });

      if (!response.ok) {
        const errorDetails = await parseErrorMessage(response);
        throw new ProviderCommunicationError({
          provider: "openai",
          message: errorDetails.message,
          status: response.status,
          code: errorDetails.code,
        });
      }

      const data = await readJsonBody<OpenAIResponse>("openai", response);
      const choice = data.choices?.[0];
      if (!choice?.message) {
        throw new ProviderCommunicationError({
          provider: "openai",
          message: "OpenAI returned no choices.",
          status: response.status,
        });
      }

      return {
        content: choice.message.content ?? "",
        toolCalls: parseToolCalls(choice.message),
        finishReason: choice.finish_reason,
        usage: data.usage
          ? {
              inputTokens: data.usage.prompt_tokens ?? 0,
              outputTokens: data.usage.completion_tokens ?? 0,
              totalTokens: data.usage.total_tokens ?? 0,
            }
          : undefined,
        raw: data,
      };
    },
  };
}
