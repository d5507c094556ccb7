/**
 * Stage 4 Agent Core types.
 * One respond call = one run of the orchestration loop over its own turn log.
 */

import type {
  CostEstimate,
  GatewayConfig,
  Logger,
  ProviderName,
  Usage,
} from "../../stage-0-model-gateway/src/types.js";
import type { LogLevel } from "../../stage-0-model-gateway/src/logger.js";
import type {
  CapabilityRegistry,
  CapabilityStatement,
  ConversationTurn,
  FunctionDescriptor,
  FunctionResultTurn,
} from "../../stage-1-context-engine/src/types.js";
import type { ProviderAdapter } from "../../stage-2-output-control/src/types.js";
import type {
  DuplicatePolicy,
  FunctionDescriptorInput,
  FunctionHandler,
  FunctionRegistry,
  RegistrationHandle,
} from "../../stage-3-tool-system/src/types.js";

/** "max_iterations_exceeded" is a terminal outcome, not an error. */
export type AgentRunStatus = "completed" | "max_iterations_exceeded";

export interface AgentRunResult {
  runId: string;
  status: AgentRunStatus;
  /** Final answer, or the exhaustion summary; never empty. */
  reply: string;
  /** Model round-trips made (the finalization round-trip included). */
  iterations: number;
  functionCalls: number;
  turns: readonly ConversationTurn[];
  /** Latest function results, oldest first; the partial information on exhaustion. */
  partialResults: FunctionResultTurn[];
  usage?: Usage;
  cost?: CostEstimate;
  startedAt: string;
  finishedAt: string;
}

export interface RespondOptions {
  abortSignal?: AbortSignal;
  /** Overrides the agent's iteration cap for this call. */
  maxIterations?: number;
  /** Observer for each turn as it is appended. */
  onTurn?: (turn: ConversationTurn, runId: string) => void;
}

export interface AgentOptions {
  /** Display label used in the system context. */
  name?: string;
  provider?: ProviderName;
  /** Backend-specific model id; defaults per provider. */
  model?: string;
  /** Cap on model round-trips per respond call. */
  maxIterations?: number;
  /** Timeout per adapter round-trip. */
  timeoutMs?: number;
  /** Timeout per function execution. */
  functionTimeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  onDuplicate?: DuplicatePolicy;
  /** Ask once more for a prose answer when the cap is hit. */
  finalAnswerOnExhaustion?: boolean;
  capabilities?: string[];
  logger?: Logger;
  /** Level of the default console logger; ignored when `logger` is given. Overrides LOG_LEVEL. */
  logLevel?: LogLevel;
  /** Replaces the gateway-backed adapter entirely. */
  adapter?: ProviderAdapter;
  /** Merged over the environment-derived gateway config. */
  gateway?: Partial<GatewayConfig>;
}

export interface Agent {
  readonly name: string;
  readonly provider: ProviderName;
  readonly model: string;
  readonly maxIterations: number;
  learn(statement: string): boolean;
  registerFunction(
    descriptor: FunctionDescriptor | FunctionDescriptorInput,
    handler: FunctionHandler
  ): RegistrationHandle;
  unregisterFunction(name: string): boolean;
  respond(request: string, options?: RespondOptions): Promise<string>;
  run(request: string, options?: RespondOptions): Promise<AgentRunResult>;
  capabilities(): readonly CapabilityStatement[];
  functions(): FunctionDescriptor[];
}

/** Everything the loop reads; shared across concurrent runs. */
export interface LoopDeps {
  agentName: string;
  adapter: ProviderAdapter;
  functions: FunctionRegistry;
  capabilities: CapabilityRegistry;
  logger: Logger;
}

export interface LoopOptions {
  runId: string;
  maxIterations: number;
  provider?: ProviderName;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  functionTimeoutMs?: number;
  finalAnswerOnExhaustion?: boolean;
  abortSignal?: AbortSignal;
  onTurn?: (turn: ConversationTurn, runId: string) => void;
}
