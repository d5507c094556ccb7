import type { CostEstimate, CostTable, Usage } from "./types.js";

export function estimateCost(
  usage: Usage | undefined,
  model: string,
  costTable: CostTable
): CostEstimate | undefined {
  if (!usage) {
    return undefined;
  }

  const entry = costTable[model];
  if (!entry) {
    return undefined;
  }

  const rawInput = (usage.inputTokens / 1000) * entry.inputCentsPer1k;
  const rawOutput = (usage.outputTokens / 1000) * entry.outputCentsPer1k;
  const round4 = (x: number) => Math.round(x * 10000) / 10000;
  const inputCents = round4(rawInput);
  const outputCents = round4(rawOutput);
  const totalCents = round4(inputCents + outputCents);

  return {
    inputCents,
    outputCents,
    totalCents,
    currency: entry.currency ?? "USD",
  };
}

/** Sum several estimates; undefined entries are skipped. */
export function sumCosts(
  costs: Array<CostEstimate | undefined>
): CostEstimate | undefined {
  const present = costs.filter((c): c is CostEstimate => c !== undefined);
  if (present.length === 0) {
    return undefined;
  }
  const round4 = (x: number) => Math.round(x * 10000) / 10000;
  return {
    inputCents: round4(present.reduce((s, c) => s + c.inputCents, 0)),
    outputCents: round4(present.reduce((s, c) => s + c.outputCents, 0)),
    totalCents: round4(present.reduce((s, c) => s + c.totalCents, 0)),
    currency: "USD",
  };
}

// US cents per 1k tokens.
export function createDefaultCostTable(): CostTable {
  return {
    "gpt-3.5-turbo": { inputCentsPer1k: 0.05, outputCentsPer1k: 0.15 },
    "gpt-4o": { inputCentsPer1k: 0.25, outputCentsPer1k: 1.0 },
    "gpt-4o-mini": { inputCentsPer1k: 0.015, outputCentsPer1k: 0.06 },
    "gpt-4-turbo": { inputCentsPer1k: 1.0, outputCentsPer1k: 3.0 },
    "claude-3-haiku-20240307": {
      inputCentsPer1k: 0.025,
      outputCentsPer1k: 0.125,
    },
    "claude-3-5-haiku-20241022": {
      inputCentsPer1k: 0.08,
      outputCentsPer1k: 0.4,
    },
    "claude-3-5-sonnet-20241022": {
      inputCentsPer1k: 0.3,
      outputCentsPer1k: 1.5,
    },
    "claude-3-opus-20240229": { inputCentsPer1k: 1.5, outputCentsPer1k: 7.5 },
  };
}
