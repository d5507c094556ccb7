import "dotenv/config";

import type {
  ProviderConfig,
  ProviderName,
} from "../stages/stage-0-model-gateway/src/types.js";

export interface ModelMap {
  model: string;
  endpoint: string;
  apiKey?: string;
}

/** Bad or missing configuration, reported before any model round-trip. */
export class ConfigurationError extends Error {
  readonly setting: string;

  constructor(setting: string, message: string) {
    super(message);
    this.name = "ConfigurationError";
    this.setting = setting;
  }
}

export const PROVIDER_NAMES: readonly ProviderName[] = ["openai", "anthropic"];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_TIMEOUT_MS = 30_000;

// Read lazily so tests and long-lived processes see the current environment.
export function getModelMaps(): Record<ProviderName, ModelMap> {
  return {
    openai: {
      model: "gpt-3.5-turbo",
      endpoint: process.env.OPENAI_BASE_URL || "https://api.openai.com/v1",
      apiKey: process.env.OPENAI_API_KEY || undefined,
    },
    anthropic: {
      model: "claude-3-haiku-20240307",
      endpoint:
        process.env.ANTHROPIC_BASE_URL || "https://api.anthropic.com/v1",
      apiKey: process.env.ANTHROPIC_API_KEY || undefined,
    },
  };
}

export interface GlobalConfig {
  provider?: ProviderName;
  defaultModel?: string;
  logLevel?: string;
  maxIterations?: number;
  timeoutMs?: number;
}

function readPositiveInt(name: string): number | undefined {
  const raw = process.env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(
      name,
      `${name} must be a positive integer, got "${raw}".`
    );
  }
  return value;
}

function readProvider(): ProviderName | undefined {
  const raw = process.env.AGENT_PROVIDER?.trim().toLowerCase();
  if (!raw) {
    return undefined;
  }
  if (!isProviderName(raw)) {
    throw new ConfigurationError(
      "AGENT_PROVIDER",
      `Unsupported provider: ${raw}. Use 'openai' or 'anthropic'.`
    );
  }
  return raw;
}

// Single place that reads the environment, so call sites never touch process.env.
export function loadGlobalConfig(): GlobalConfig {
  return {
    provider: readProvider(),
    defaultModel: process.env.DEFAULT_MODEL?.trim() || undefined,
    logLevel: process.env.LOG_LEVEL,
    maxIterations: readPositiveInt("AGENT_MAX_ITERATIONS"),
    timeoutMs: readPositiveInt("AGENT_TIMEOUT_MS"),
  };
}

/** Gateway provider config from the model maps; keys may be absent. */
export function buildProviderConfigFromModelMaps(): ProviderConfig {
  const maps = getModelMaps();
  return {
    openai: { apiKey: maps.openai.apiKey, baseUrl: maps.openai.endpoint },
    anthropic: {
      apiKey: maps.anthropic.apiKey,
      baseUrl: maps.anthropic.endpoint,
    },
  };
}

export function getDefaultModelForProvider(provider: ProviderName): string {
  return getModelMaps()[provider].model;
}
