import { randomUUID } from "node:crypto";

import { createDefaultCostTable, estimateCost } from "./cost.js";
import { createConsoleLogger } from "./logger.js";
import { createAnthropicProvider } from "./providers/anthropic.js";
import { createOpenAIProvider } from "./providers/openai.js";
import {
  ProviderCommunicationError,
  type LLMProvider,
} from "./providers/types.js";
import { withRetry } from "./retry.js";
import type {
  ChatRequest,
  ChatResult,
  GatewayConfig,
  ModelGateway,
  ProviderName,
  RequestLogger,
} from "./types.js";

const DEFAULT_MODEL_PROVIDER_MAP: Record<string, ProviderName> = {
  "gpt-3.5-turbo": "openai",
  "gpt-4o": "openai",
  "gpt-4o-mini": "openai",
  "gpt-4-turbo": "openai",
  "claude-3-haiku-20240307": "anthropic",
  "claude-3-5-haiku-20241022": "anthropic",
  "claude-3-5-sonnet-20241022": "anthropic",
  "claude-3-opus-20240229": "anthropic",
};

function resolveTimeout(
  request: ChatRequest,
  config: GatewayConfig
): number | undefined {
  const requestTimeout = request.timeoutMs ?? Number.POSITIVE_INFINITY;
  const configTimeout = config.timeoutMs ?? Number.POSITIVE_INFINITY;
  const min = Math.min(requestTimeout, configTimeout);
  return Number.isFinite(min) ? min : undefined;
}

function createMergedSignal(
  abortSignal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal?: AbortSignal; cancel?: () => void } {
  if (!abortSignal && !timeoutMs) {
    return {};
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  if (timeoutMs) {
    timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  }

  const onAbort = () => controller.abort();
  if (abortSignal) {
    if (abortSignal.aborted) {
      controller.abort();
    } else {
      abortSignal.addEventListener("abort", onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    cancel: () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      abortSignal?.removeEventListener("abort", onAbort);
    },
  };
}

/** Both backends are always registered; a missing key only fails on first use. */
function buildProviderRegistry(
  config: GatewayConfig
): Map<ProviderName, LLMProvider> {
  const registry = new Map<ProviderName, LLMProvider>();
  registry.set("openai", createOpenAIProvider(config.providers.openai ?? {}));
  registry.set(
    "anthropic",
    createAnthropicProvider(config.providers.anthropic ?? {})
  );
  return registry;
}

function resolveProviderName(
  model: string,
  explicitProvider: ProviderName | undefined,
  modelProviderMap: Record<string, ProviderName>
): ProviderName {
  if (explicitProvider) {
    return explicitProvider;
  }

  const provider = modelProviderMap[model];
  if (!provider) {
    throw new Error(`No provider mapping found for model: ${model}`);
  }

  return provider;
}

function ensureProvider(
  registry: Map<ProviderName, LLMProvider>,
  providerName: ProviderName
): LLMProvider {
  const provider = registry.get(providerName);
  if (!provider) {
    throw new Error(`Provider not configured: ${providerName}`);
  }
  return provider;
}

function createLogger(config: GatewayConfig): RequestLogger {
  if (config.logger) {
    return config.logger;
  }
  return createConsoleLogger("info");
}

function describeError(error: unknown): {
  name: string;
  message: string;
  status?: number;
  code?: string;
} {
  if (error instanceof ProviderCommunicationError) {
    return {
      name: error.name,
      message: error.message,
      status: error.status,
      code: error.code,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: "Error", message: String(error) };
}

/** Anything escaping a provider (fetch TypeError, AbortError) is a communication failure. */
function toCommunicationError(
  error: unknown,
  provider: ProviderName,
  timeoutMs: number | undefined,
  callerAborted: boolean
): ProviderCommunicationError {
  if (error instanceof ProviderCommunicationError) {
    return error;
  }
  const details = describeError(error);
  if (details.name === "AbortError") {
    return new ProviderCommunicationError({
      provider,
      message: callerAborted
        ? "Request was aborted by the caller."
        : `Request timed out after ${timeoutMs ?? 0}ms.`,
      code: callerAborted ? "aborted" : "timeout",
      cause: error,
    });
  }
  return new ProviderCommunicationError({
    provider,
    message: details.message,
    cause: error,
  });
}

export function createModelGateway(config: GatewayConfig): ModelGateway {
  const modelProviderMap = {
    ...DEFAULT_MODEL_PROVIDER_MAP,
    ...(config.modelProviderMap ?? {}),
  };
  const registry = buildProviderRegistry(config);
  const logger = createLogger(config);
  const costTable = config.costTable ?? createDefaultCostTable();

  async function chat(request: ChatRequest): Promise<ChatResult> {
    const model = request.model ?? config.defaultModel;
    if (!model) {
      throw new Error(
        "Model is required. Provide request.model or config.defaultModel."
      );
    }

    const modelsToTry = [
      model,
      ...(config.fallbackModels ?? []).filter((m) => m !== model),
    ];
    const timeoutMs = resolveTimeout(request, config);
    const requestId = request.requestId ?? randomUUID();

    let lastError: ProviderCommunicationError | undefined;

    for (const candidate of modelsToTry) {
      const providerName = resolveProviderName(
        candidate,
        request.provider,
        modelProviderMap
      );
      const provider = ensureProvider(registry, providerName);
      const attemptStart = Date.now();

      logger.logRequest({
        timestamp: new Date().toISOString(),
        requestId,
        model: candidate,
        provider: providerName,
        messageCount: request.messages.length,
        toolCount: request.tools?.length ?? 0,
        timeoutMs,
      });

      try {
        const attempt = async () => {
          const { signal, cancel } = createMergedSignal(
            request.abortSignal,
            timeoutMs
          );
          try {
            return await provider.chat({
              ...request,
              model: candidate,
              provider: providerName,
              requestId,
              abortSignal: signal,
            });
          } finally {
            if (cancel) {
              cancel();
            }
          }
        };

        const result = await withRetry(
          attempt,
          config.retry,
          request.abortSignal
        );

        const durationMs = Date.now() - attemptStart;
        const cost = estimateCost(result.usage, candidate, costTable);

        logger.logResponse({
          timestamp: new Date().toISOString(),
          requestId,
          model: candidate,
          provider: providerName,
          durationMs,
          usage: result.usage,
          finishReason: result.finishReason,
          toolCallCount: result.toolCalls.length,
          cost,
        });

        return {
          ...result,
          cost,
          model: candidate,
          provider: providerName,
          requestId,
        };
      } catch (error) {
        const durationMs = Date.now() - attemptStart;
        const callerAborted = request.abortSignal?.aborted ?? false;
        lastError = toCommunicationError(
          error,
          providerName,
          timeoutMs,
          callerAborted
        );

        logger.logError({
          timestamp: new Date().toISOString(),
          requestId,
          model: candidate,
          provider: providerName,
          durationMs,
          error: describeError(lastError),
        });

        if (callerAborted) {
          throw lastError;
        }
      }
    }

    throw (
      lastError ?? new Error("Model Gateway failed without an explicit error.")
    );
  }

  return { chat };
}
