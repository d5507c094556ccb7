/**
 * Orchestration loop: alternate model round-trips and function execution
 * until the model answers or the iteration cap is reached.
 *
 * Suspension points are the adapter call and each function execution; the
 * abort signal is checked before each of them.
 */

import { sumCosts } from "../../stage-0-model-gateway/src/cost.js";
import type {
  CostEstimate,
  EventLevel,
  Usage,
} from "../../stage-0-model-gateway/src/types.js";
import { createConversation } from "../../stage-1-context-engine/src/conversation.js";
import { buildSystemContext } from "../../stage-1-context-engine/src/prompt.js";
import type {
  Conversation,
  FunctionDescriptor,
  FunctionErrorInfo,
  FunctionResultTurn,
} from "../../stage-1-context-engine/src/types.js";
import { MalformedDecisionError } from "../../stage-2-output-control/src/errors.js";
import type {
  CallProposal,
  DecisionRequest,
  DecisionResult,
} from "../../stage-2-output-control/src/types.js";
import { validateArguments } from "../../stage-2-output-control/src/validate.js";
import { FunctionNotFoundError } from "../../stage-3-tool-system/src/errors.js";
import { executeFunction } from "../../stage-3-tool-system/src/runner.js";
import { RequestCancelledError } from "./errors.js";
import type { AgentRunResult, LoopDeps, LoopOptions } from "./types.js";

const SUMMARY_RESULT_LIMIT = 5;

const FINALIZE_INSTRUCTION =
  "The function call budget for this request is used up. Do not call any more functions. Answer the user now using the results above.";

function nowIso(): string {
  return new Date().toISOString();
}

function sumUsage(usages: Usage[]): Usage | undefined {
  if (usages.length === 0) {
    return undefined;
  }
  return usages.reduce(
    (total, u) => ({
      inputTokens: total.inputTokens + u.inputTokens,
      outputTokens: total.outputTokens + u.outputTokens,
      totalTokens: total.totalTokens + u.totalTokens,
    }),
    { inputTokens: 0, outputTokens: 0, totalTokens: 0 }
  );
}

function errorContent(info: FunctionErrorInfo): string {
  return `Error: ${info.message}`;
}

/** Reply used when the cap is hit without an answer. Never empty. */
export function summarizeExhaustion(
  maxIterations: number,
  results: readonly FunctionResultTurn[]
): string {
  const head = `I could not complete the request within ${maxIterations} model ${
    maxIterations === 1 ? "round-trip" : "round-trips"
  }.`;
  if (results.length === 0) {
    return `${head} No function produced a result.`;
  }
  const lines = results.map((r) => `- ${r.name}: ${r.content}`);
  return `${head} Latest function results:\n${lines.join("\n")}`;
}

export async function runOrchestrationLoop(
  deps: LoopDeps,
  request: string,
  options: LoopOptions
): Promise<AgentRunResult> {
  const { runId, abortSignal } = options;
  const startedAt = nowIso();
  const usages: Usage[] = [];
  const costs: Array<CostEstimate | undefined> = [];
  let iterations = 0;

  const log = (
    level: EventLevel,
    event: string,
    details?: Record<string, unknown>
  ) => {
    deps.logger.logEvent({ timestamp: nowIso(), level, event, runId, details });
  };

  const throwIfAborted = () => {
    if (abortSignal?.aborted) {
      log("warn", "run_cancelled", { iterations });
      throw new RequestCancelledError(runId, abortSignal.reason);
    }
  };

  const conversation = createConversation(request, {
    onTurn: options.onTurn ? (turn) => options.onTurn?.(turn, runId) : undefined,
  });

  const decide = async (
    system: string,
    functions: readonly FunctionDescriptor[]
  ): Promise<DecisionResult> => {
    throwIfAborted();
    iterations += 1;
    const decisionRequest: DecisionRequest = {
      system,
      functions,
      turns: conversation.turns(),
      model: options.model,
      provider: options.provider,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      timeoutMs: options.timeoutMs,
      abortSignal,
      requestId: `${runId}_${iterations}`,
    };
    try {
      const result = await deps.adapter.decide(decisionRequest);
      if (result.usage) usages.push(result.usage);
      costs.push(result.cost);
      return result;
    } catch (err) {
      // The gateway reports a caller abort as a communication error.
      throwIfAborted();
      throw err;
    }
  };

  const finish = (
    status: AgentRunResult["status"],
    reply: string
  ): AgentRunResult => {
    const result: AgentRunResult = {
      runId,
      status,
      reply,
      iterations,
      functionCalls: conversation.functionCallCount(),
      turns: conversation.turns(),
      partialResults: conversation.lastResults(SUMMARY_RESULT_LIMIT),
      usage: sumUsage(usages),
      cost: sumCosts(costs),
      startedAt,
      finishedAt: nowIso(),
    };
    log("info", "run_finished", {
      status,
      iterations: result.iterations,
      functionCalls: result.functionCalls,
      totalTokens: result.usage?.totalTokens,
      totalCents: result.cost?.totalCents,
    });
    return result;
  };

  log("info", "run_started", {
    maxIterations: options.maxIterations,
    requestLength: request.length,
  });

  while (iterations < options.maxIterations) {
    // Fresh snapshot per round-trip: registrations made meanwhile are visible next time.
    const functions = deps.functions.descriptors();
    const system = buildSystemContext({
      agentName: deps.agentName,
      capabilities: deps.capabilities.list(),
      functions,
    });

    let calls: CallProposal[];
    try {
      const { decision } = await decide(system, functions);
      if (decision.kind === "final_answer") {
        conversation.addFinalAnswer(decision.text);
        return finish("completed", decision.text);
      }
      calls = decision.calls;
    } catch (err) {
      if (err instanceof MalformedDecisionError && err.recoverable) {
        log("warn", "unknown_function_proposed", {
          iteration: iterations,
          names: err.unknownNames,
        });
        calls = err.calls;
      } else if (err instanceof RequestCancelledError) {
        throw err;
      } else {
        log("error", "run_failed", {
          iteration: iterations,
          error: err instanceof Error ? err.message : String(err),
        });
        throw err;
      }
    }

    log("debug", "function_calls_proposed", {
      iteration: iterations,
      names: calls.map((c) => c.name),
    });

    for (const call of calls) {
      throwIfAborted();
      await handleCall(deps, conversation, call, iterations, options, log);
    }
  }

  log("warn", "max_iterations_exceeded", {
    maxIterations: options.maxIterations,
  });

  if (options.finalAnswerOnExhaustion) {
    const functions = deps.functions.descriptors();
    const system = `${buildSystemContext({
      agentName: deps.agentName,
      capabilities: deps.capabilities.list(),
      functions,
    })}\n\n${FINALIZE_INSTRUCTION}`;
    try {
      const { decision } = await decide(system, functions);
      if (decision.kind === "final_answer") {
        return finish("max_iterations_exceeded", decision.text);
      }
      log("debug", "finalization_ignored", { reason: "function_calls" });
    } catch (err) {
      if (!(err instanceof MalformedDecisionError)) {
        throw err;
      }
      log("debug", "finalization_ignored", { reason: err.reason });
    }
  }

  return finish(
    "max_iterations_exceeded",
    summarizeExhaustion(
      options.maxIterations,
      conversation.lastResults(SUMMARY_RESULT_LIMIT)
    )
  );
}

async function handleCall(
  deps: LoopDeps,
  conversation: Conversation,
  call: CallProposal,
  round: number,
  options: LoopOptions,
  log: (
    level: EventLevel,
    event: string,
    details?: Record<string, unknown>
  ) => void
): Promise<void> {
  conversation.addFunctionCall({
    callId: call.callId,
    round,
    name: call.name,
    arguments: call.arguments,
  });

  const fail = (error: FunctionErrorInfo) => {
    log("warn", "function_call_failed", {
      callId: call.callId,
      name: call.name,
      type: error.type,
      message: error.message,
    });
    conversation.addFunctionResult({
      callId: call.callId,
      round,
      name: call.name,
      ok: false,
      error,
      content: errorContent(error),
    });
  };

  const fn = deps.functions.get(call.name);
  if (!fn) {
    fail(new FunctionNotFoundError(call.name).toErrorInfo());
    return;
  }

  const validated = validateArguments(fn.descriptor, call.arguments);
  if (!validated.success) {
    fail(validated.error.toErrorInfo());
    return;
  }

  const outcome = await executeFunction(fn, validated.data, {
    callId: call.callId,
    runId: options.runId,
    timeoutMs: options.functionTimeoutMs,
    abortSignal: options.abortSignal,
  });
  if (!outcome.ok) {
    fail(outcome.error.toErrorInfo());
    return;
  }

  log("info", "function_call_succeeded", {
    callId: call.callId,
    name: call.name,
    durationMs: outcome.durationMs,
  });
  conversation.addFunctionResult({
    callId: call.callId,
    round,
    name: call.name,
    ok: true,
    value: outcome.value,
    content: outcome.content,
  });
}
