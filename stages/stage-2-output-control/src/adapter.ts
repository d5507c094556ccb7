/**
 * Provider Adapter: request snapshot -> gateway messages + tool declarations
 * -> one chat round-trip -> one Decision. No retry lives here; a backend
 * failure surfaces as ProviderCommunicationError.
 */

import type {
  Message,
  ToolCall,
  ToolDeclaration,
} from "../../stage-0-model-gateway/src/types.js";
import type {
  ConversationTurn,
  FunctionCallTurn,
  FunctionDescriptor,
  FunctionResultTurn,
} from "../../stage-1-context-engine/src/types.js";
import { toDecision } from "./decision.js";
import type {
  DecisionRequest,
  DecisionResult,
  ProviderAdapter,
  ProviderAdapterDeps,
} from "./types.js";
import { toParametersSchema } from "./validate.js";

export function toFunctionDeclarations(
  descriptors: readonly FunctionDescriptor[]
): ToolDeclaration[] {
  return descriptors.map((d) => ({
    name: d.name,
    description: d.returns
      ? `${d.description} Returns ${d.returns}.`
      : d.description,
    parameters: toParametersSchema(d),
  }));
}

function toToolCall(turn: FunctionCallTurn): ToolCall {
  return { id: turn.callId, name: turn.name, arguments: turn.arguments };
}

function toToolMessage(turn: FunctionResultTurn): Message {
  return {
    role: "tool",
    toolCallId: turn.callId,
    name: turn.name,
    content: turn.content,
    ...(turn.ok ? {} : { isError: true }),
  };
}

/**
 * Replay the turn log. All calls of one round become a single assistant
 * message, followed by their results in the same order.
 */
export function toGatewayMessages(
  system: string,
  turns: readonly ConversationTurn[]
): Message[] {
  const messages: Message[] = [{ role: "system", content: system }];

  let i = 0;
  while (i < turns.length) {
    const turn = turns[i];
    if (turn.kind === "user_message") {
      messages.push({ role: "user", content: turn.text });
      i++;
      continue;
    }
    if (turn.kind === "final_answer") {
      messages.push({ role: "assistant", content: turn.text });
      i++;
      continue;
    }

    const round = turn.round;
    const calls: FunctionCallTurn[] = [];
    const results: FunctionResultTurn[] = [];
    while (i < turns.length) {
      const next = turns[i];
      if (next.kind === "function_call" && next.round === round) {
        calls.push(next);
      } else if (next.kind === "function_result" && next.round === round) {
        results.push(next);
      } else {
        break;
      }
      i++;
    }
    messages.push({
      role: "assistant",
      content: "",
      toolCalls: calls.map(toToolCall),
    });
    messages.push(...results.map(toToolMessage));
  }

  return messages;
}

export function createProviderAdapter(deps: ProviderAdapterDeps): ProviderAdapter {
  return {
    async decide(request: DecisionRequest): Promise<DecisionResult> {
      const declaredNames = new Set(request.functions.map((f) => f.name));
      const result = await deps.chat({
        model: request.model,
        provider: request.provider,
        messages: toGatewayMessages(request.system, request.turns),
        tools: toFunctionDeclarations(request.functions),
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        timeoutMs: request.timeoutMs,
        abortSignal: request.abortSignal,
        requestId: request.requestId,
      });

      return {
        decision: toDecision(result, declaredNames),
        usage: result.usage,
        cost: result.cost,
      };
    },
  };
}
