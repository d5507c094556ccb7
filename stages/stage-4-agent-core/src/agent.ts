/**
 * Agent Core: owns the capability and function registries and runs one
 * orchestration loop per respond call. Registries are shared by concurrent
 * calls; each call keeps its own conversation.
 */

import { randomUUID } from "node:crypto";

import {
  ConfigurationError,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_TIMEOUT_MS,
  buildProviderConfigFromModelMaps,
  getDefaultModelForProvider,
  isProviderName,
  loadGlobalConfig,
} from "../../../config/index.js";
import { createModelGateway } from "../../stage-0-model-gateway/src/gateway.js";
import {
  createConsoleLogger,
  parseLogLevel,
} from "../../stage-0-model-gateway/src/logger.js";
import type {
  GatewayConfig,
  Logger,
  ProviderName,
  RetryOptions,
} from "../../stage-0-model-gateway/src/types.js";
import { createCapabilityRegistry } from "../../stage-1-context-engine/src/capabilities.js";
import { createProviderAdapter } from "../../stage-2-output-control/src/adapter.js";
import type { ProviderAdapter } from "../../stage-2-output-control/src/types.js";
import { createFunctionRegistry } from "../../stage-3-tool-system/src/registry.js";
import { InvalidRequestError } from "./errors.js";
import { runOrchestrationLoop } from "./loop.js";
import type {
  Agent,
  AgentOptions,
  AgentRunResult,
  RespondOptions,
} from "./types.js";

const DEFAULT_AGENT_NAME = "Assistant";
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 1000;
// Backend failures are fatal to the run; retrying is opt-in through `gateway.retry`.
const NO_RETRY: RetryOptions = { maxRetries: 0, backoffMs: 0 };

function generateRunId(): string {
  return `run_${randomUUID()}`;
}

function requirePositiveInt(setting: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(
      setting,
      `${setting} must be a positive integer, got ${value}.`
    );
  }
  return value;
}

function requireProvider(value: string): ProviderName {
  if (!isProviderName(value)) {
    throw new ConfigurationError(
      "provider",
      `Unsupported provider: ${value}. Use 'openai' or 'anthropic'.`
    );
  }
  return value;
}

function buildAdapter(
  options: AgentOptions,
  model: string,
  timeoutMs: number,
  logger: Logger
): ProviderAdapter {
  if (options.adapter) {
    return options.adapter;
  }
  const base = buildProviderConfigFromModelMaps();
  const override: Partial<GatewayConfig> = options.gateway ?? {};
  const config: GatewayConfig = {
    ...override,
    providers: {
      openai: { ...base.openai, ...override.providers?.openai },
      anthropic: { ...base.anthropic, ...override.providers?.anthropic },
    },
    defaultModel: override.defaultModel ?? model,
    retry: override.retry ?? NO_RETRY,
    timeoutMs: override.timeoutMs ?? timeoutMs,
    logger: override.logger ?? logger,
  };
  const gateway = createModelGateway(config);
  return createProviderAdapter({ chat: (request) => gateway.chat(request) });
}

/** Throws ConfigurationError for an unknown provider or non-positive limits. */
export function createAgent(options: AgentOptions = {}): Agent {
  const env = loadGlobalConfig();
  const logger =
    options.logger ??
    createConsoleLogger(options.logLevel ?? parseLogLevel(env.logLevel));

  const provider = requireProvider(options.provider ?? env.provider ?? "openai");
  const envModel = provider === (env.provider ?? "openai") ? env.defaultModel : undefined;
  const model = options.model ?? envModel ?? getDefaultModelForProvider(provider);
  const maxIterations = requirePositiveInt(
    "maxIterations",
    options.maxIterations ?? env.maxIterations ?? DEFAULT_MAX_ITERATIONS
  );
  const timeoutMs = requirePositiveInt(
    "timeoutMs",
    options.timeoutMs ?? env.timeoutMs ?? DEFAULT_TIMEOUT_MS
  );
  const functionTimeoutMs = requirePositiveInt(
    "functionTimeoutMs",
    options.functionTimeoutMs ?? DEFAULT_TIMEOUT_MS
  );
  const name = options.name?.trim() || DEFAULT_AGENT_NAME;

  const log = (
    level: "info" | "warn" | "debug",
    event: string,
    details?: Record<string, unknown>
  ) => {
    logger.logEvent({ timestamp: new Date().toISOString(), level, event, details });
  };

  const capabilities = createCapabilityRegistry(options.capabilities ?? []);
  const functions = createFunctionRegistry({
    onDuplicate: options.onDuplicate,
    onChange: (event) =>
      log(event.type === "replaced" ? "warn" : "info", `function_${event.type}`, {
        name: event.name,
      }),
  });
  const adapter = buildAdapter(options, model, timeoutMs, logger);

  async function run(
    request: string,
    runOptions: RespondOptions = {}
  ): Promise<AgentRunResult> {
    if (typeof request !== "string" || request.trim() === "") {
      throw new InvalidRequestError("Request text must not be empty.");
    }
    const cap = requirePositiveInt(
      "maxIterations",
      runOptions.maxIterations ?? maxIterations
    );

    return runOrchestrationLoop(
      { agentName: name, adapter, functions, capabilities, logger },
      request,
      {
        runId: generateRunId(),
        maxIterations: cap,
        provider,
        model,
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        timeoutMs,
        functionTimeoutMs,
        finalAnswerOnExhaustion: options.finalAnswerOnExhaustion ?? false,
        abortSignal: runOptions.abortSignal,
        onTurn: runOptions.onTurn,
      }
    );
  }

  log("debug", "agent_created", { name, provider, model, maxIterations });

  return {
    name,
    provider,
    model,
    maxIterations,

    learn(statement: string): boolean {
      const added = capabilities.learn(statement);
      if (added) {
        log("info", "capability_learned", { statement: statement.trim() });
      } else {
        log("warn", "capability_ignored", { reason: "empty" });
      }
      return added;
    },

    registerFunction(descriptor, handler) {
      return functions.register(descriptor, handler);
    },

    unregisterFunction(fnName: string): boolean {
      return functions.unregister(fnName);
    },

    run,

    async respond(request: string, runOptions?: RespondOptions): Promise<string> {
      const result = await run(request, runOptions);
      return result.reply;
    },

    capabilities() {
      return capabilities.list();
    },

    functions() {
      return functions.descriptors();
    },
  };
}
