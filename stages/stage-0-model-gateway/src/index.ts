export { createModelGateway } from "./gateway.js";
export {
  createConsoleLogger,
  createSilentLogger,
  isLogLevel,
  parseLogLevel,
  type LogLevel,
} from "./logger.js";
export { createDefaultCostTable, estimateCost, sumCosts } from "./cost.js";
export { isRetryableError, withRetry } from "./retry.js";
export { ProviderCommunicationError } from "./providers/types.js";
export type { LLMProvider } from "./providers/types.js";
export { createOpenAIProvider, toOpenAITools } from "./providers/openai.js";
export {
  createAnthropicProvider,
  toAnthropicMessages,
  toAnthropicTools,
} from "./providers/anthropic.js";
export {
  buildProviderConfigFromModelMaps,
  ConfigurationError,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_TIMEOUT_MS,
  getDefaultModelForProvider,
  isProviderName,
  loadGlobalConfig,
  PROVIDER_NAMES,
  type GlobalConfig,
} from "../../../config/index.js";
export type {
  AnthropicConfig,
  ChatRequest,
  ChatResult,
  CostEstimate,
  CostTable,
  ErrorLog,
  EventLevel,
  EventLog,
  GatewayConfig,
  JsonObject,
  JsonSchema,
  JsonValue,
  Logger,
  Message,
  ModelGateway,
  OpenAIConfig,
  ProviderConfig,
  ProviderName,
  ProviderResult,
  RequestLogger,
  RetryOptions,
  ToolCall,
  ToolDeclaration,
  Usage,
} from "./types.js";
