export type ProviderName = "openai" | "anthropic";

export type Role = "system" | "user" | "assistant" | "tool";

/** JSON value as produced by JSON.parse. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** JSON Schema (draft-07 style) used to declare tool parameters. */
export type JsonSchema = Record<string, unknown>;

/** Tool call as proposed by a backend; arguments stay in the backend-native form. */
export interface ToolCall {
  id: string;
  name: string;
  /** OpenAI sends a JSON string, Anthropic an already-parsed object. */
  arguments: string | JsonObject;
}

export type Message =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: ToolCall[] }
  | {
      role: "tool";
      toolCallId: string;
      name: string;
      content: string;
      isError?: boolean;
    };

/** Callable tool as declared to the backend. */
export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: JsonSchema;
}

export interface ChatRequest {
  model?: string;
  provider?: ProviderName;
  messages: Message[];
  tools?: ToolDeclaration[];
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  abortSignal?: AbortSignal;
  requestId?: string;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface CostEstimate {
  inputCents: number;
  outputCents: number;
  totalCents: number;
  currency: "USD";
}

/** What a provider hands back before the gateway adds routing and cost data. */
export interface ProviderResult {
  content: string;
  toolCalls: ToolCall[];
  usage?: Usage;
  finishReason?: string;
  /**
   * Raw response body, kept for debugging only. Nothing past the gateway reads it.
   */
  raw?: unknown;
}

export interface ChatResult extends ProviderResult {
  cost?: CostEstimate;
  model: string;
  provider: ProviderName;
  requestId: string;
}

export interface RetryOptions {
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs?: number;
  jitter?: number;
}

export interface RequestLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  messageCount: number;
  toolCount: number;
  timeoutMs?: number;
}

export interface ResponseLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  durationMs: number;
  usage?: Usage;
  finishReason?: string;
  toolCallCount: number;
  cost?: CostEstimate;
}

export interface ErrorLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  durationMs: number;
  error: {
    name: string;
    message: string;
    status?: number;
    code?: string;
  };
}

export type EventLevel = "error" | "warn" | "info" | "debug";

/** Agent-level event (run lifecycle, function calls, registry changes). */
export interface EventLog {
  timestamp: string;
  level: EventLevel;
  event: string;
  runId?: string;
  details?: Record<string, unknown>;
}

export interface RequestLogger {
  logRequest(entry: RequestLog): void;
  logResponse(entry: ResponseLog): void;
  logError(entry: ErrorLog): void;
}

export interface Logger extends RequestLogger {
  logEvent(entry: EventLog): void;
}

export interface OpenAIConfig {
  apiKey?: string;
  baseUrl?: string;
  organization?: string;
}

export interface AnthropicConfig {
  apiKey?: string;
  baseUrl?: string;
  /** Value of the anthropic-version header. */
  version?: string;
}

export interface ProviderConfig {
  openai?: OpenAIConfig;
  anthropic?: AnthropicConfig;
}

export interface CostTableEntry {
  inputCentsPer1k: number;
  outputCentsPer1k: number;
  currency?: "USD";
}

export type CostTable = Record<string, CostTableEntry>;

export interface GatewayConfig {
  providers: ProviderConfig;
  defaultModel?: string;
  modelProviderMap?: Record<string, ProviderName>;
  fallbackModels?: string[];
  retry?: RetryOptions;
  timeoutMs?: number;
  logger?: RequestLogger;
  costTable?: CostTable;
}

export interface ModelGateway {
  chat(request: ChatRequest): Promise<ChatResult>;
}
