/**
 * Stage 2 Output Control types.
 * The model is untrusted: call proposals and their arguments are parsed and
 * validated here before anything executes.
 */

import type {
  ChatRequest,
  ChatResult,
  CostEstimate,
  JsonObject,
  ProviderName,
  Usage,
} from "../../stage-0-model-gateway/src/types.js";
import type {
  ConversationTurn,
  FunctionDescriptor,
} from "../../stage-1-context-engine/src/types.js";
import type { ArgumentValidationError } from "./errors.js";

export type { JsonSchema } from "../../stage-0-model-gateway/src/types.js";

/** Result of pulling JSON out of free text. */
export type ParseResult<T = unknown> =
  | { success: true; data: T }
  | { success: false; errors: string[]; raw?: string };

/** One proposed call, normalized. `arguments` is still unvalidated. */
export interface CallProposal {
  callId: string;
  name: string;
  arguments: JsonObject;
}

/** Normalized outcome of one model round-trip. */
export type Decision =
  | { kind: "final_answer"; text: string }
  | { kind: "function_calls"; calls: CallProposal[] };

export type ArgumentValidationResult =
  | { success: true; data: JsonObject }
  | { success: false; error: ArgumentValidationError };

/** Provider-agnostic snapshot sent to the backend for one round-trip. */
export interface DecisionRequest {
  system: string;
  functions: readonly FunctionDescriptor[];
  turns: readonly ConversationTurn[];
  model?: string;
  provider?: ProviderName;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  abortSignal?: AbortSignal;
  requestId?: string;
}

export interface DecisionResult {
  decision: Decision;
  usage?: Usage;
  cost?: CostEstimate;
}

/**
 * Provider Adapter contract: one request snapshot in, exactly one Decision out.
 * Throws ProviderCommunicationError or MalformedDecisionError.
 */
export interface ProviderAdapter {
  decide(request: DecisionRequest): Promise<DecisionResult>;
}

export interface ProviderAdapterDeps {
  /** Stage 0 gateway chat. */
  chat: (request: ChatRequest) => Promise<ChatResult>;
}
