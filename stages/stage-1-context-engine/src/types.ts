/**
 * Stage 1 Context Engine types.
 * Core data model shared by every later stage: capabilities, function
 * descriptors and the per-request conversation log.
 */

import type {
  JsonObject,
  JsonValue,
} from "../../stage-0-model-gateway/src/types.js";

/** Free-text hint about what the agent can do. Biases the model; not a contract. */
export type CapabilityStatement = string;

/** Declared parameter types; "array" is the sequence type. */
export type ParameterType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "object"
  | "array";

export interface ParameterSpec {
  name: string;
  type: ParameterType;
  description?: string;
  /** Defaults to true unless a default is given. */
  required?: boolean;
  default?: JsonValue;
}

/** Registered shape of a callable. Immutable once declared. */
export interface FunctionDescriptor {
  /** Unique key within one agent. */
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ParameterSpec[];
  /** Free-form hint of what the function returns, e.g. "object" or "number". */
  readonly returns?: string;
}

export type FunctionErrorType =
  | "function_not_available"
  | "missing_argument"
  | "type_coercion"
  | "execution_failed"
  | "timeout";

/** Structured failure fed back to the model as a function result. */
export interface FunctionErrorInfo {
  type: FunctionErrorType;
  message: string;
  /** Offending parameter for validation failures. */
  parameter?: string;
  expected?: string;
  received?: string;
}

export interface UserMessageTurn {
  kind: "user_message";
  text: string;
}

export interface FunctionCallTurn {
  kind: "function_call";
  callId: string;
  /** 1-based model round-trip that proposed the call. */
  round: number;
  name: string;
  /** Raw payload as proposed, before validation. */
  arguments: JsonObject;
}

interface FunctionResultBase {
  kind: "function_result";
  callId: string;
  round: number;
  name: string;
  /** Model-consumable text form of the value or error. */
  content: string;
}

export interface FunctionSuccessTurn extends FunctionResultBase {
  ok: true;
  value: unknown;
}

export interface FunctionErrorTurn extends FunctionResultBase {
  ok: false;
  error: FunctionErrorInfo;
}

export type FunctionResultTurn = FunctionSuccessTurn | FunctionErrorTurn;

export interface FinalAnswerTurn {
  kind: "final_answer";
  text: string;
}

export type ConversationTurn =
  | UserMessageTurn
  | FunctionCallTurn
  | FunctionResultTurn
  | FinalAnswerTurn;

export interface ConversationOptions {
  /** Observer called after every appended turn. */
  onTurn?: (turn: ConversationTurn) => void;
}

/**
 * Append-only turn log owned by one respond invocation.
 * Starts with one user message; each call is followed by its result; at most one final answer.
 */
export interface Conversation {
  readonly request: string;
  turns(): readonly ConversationTurn[];
  addFunctionCall(call: Omit<FunctionCallTurn, "kind">): FunctionCallTurn;
  addFunctionResult(
    result: Omit<FunctionSuccessTurn, "kind"> | Omit<FunctionErrorTurn, "kind">
  ): FunctionResultTurn;
  addFinalAnswer(text: string): FinalAnswerTurn;
  /** Call still waiting for its result, if any. */
  pendingCall(): FunctionCallTurn | undefined;
  isComplete(): boolean;
  functionCallCount(): number;
  /** Most recent results, oldest first. */
  lastResults(limit?: number): FunctionResultTurn[];
}

export interface CapabilityRegistry {
  /** Appends a trimmed statement; returns false (and appends nothing) for empty text. */
  learn(statement: string): boolean;
  list(): readonly CapabilityStatement[];
  size(): number;
}

export interface SystemContextInput {
  agentName: string;
  capabilities: readonly CapabilityStatement[];
  functions: readonly FunctionDescriptor[];
}
