export { createAgent } from "./agent.js";
export { runOrchestrationLoop, summarizeExhaustion } from "./loop.js";
export { InvalidRequestError, RequestCancelledError } from "./errors.js";
export type {
  Agent,
  AgentOptions,
  AgentRunResult,
  AgentRunStatus,
  LoopDeps,
  LoopOptions,
  RespondOptions,
} from "./types.js";

// Package surface: the pieces callers need alongside the agent.
export {
  ConfigurationError,
  createConsoleLogger,
  createModelGateway,
  createSilentLogger,
  ProviderCommunicationError,
  type ChatRequest,
  type ChatResult,
  type GatewayConfig,
  type JsonObject,
  type JsonValue,
  type Logger,
  type ProviderName,
} from "../../stage-0-model-gateway/src/index.js";
export {
  ConversationStateError,
  type ConversationTurn,
  type FunctionDescriptor,
  type FunctionErrorInfo,
  type FunctionResultTurn,
  type ParameterSpec,
  type ParameterType,
} from "../../stage-1-context-engine/src/index.js";
export {
  createProviderAdapter,
  MalformedDecisionError,
  MissingArgumentError,
  TypeCoercionError,
  type Decision,
  type DecisionRequest,
  type DecisionResult,
  type ProviderAdapter,
} from "../../stage-2-output-control/src/index.js";
export {
  defineFunction,
  DuplicateRegistrationError,
  FunctionExecutionError,
  FunctionNotFoundError,
  FunctionTimeoutError,
  InvalidFunctionDescriptorError,
  type DuplicatePolicy,
  type FunctionContext,
  type FunctionDescriptorInput,
  type FunctionHandler,
  type RegistrationHandle,
} from "../../stage-3-tool-system/src/index.js";
