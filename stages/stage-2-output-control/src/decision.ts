/**
 * Normalize a gateway ChatResult into exactly one Decision.
 * Backend-native call payloads stop here; nothing downstream sees them.
 */

import type { ChatResult } from "../../stage-0-model-gateway/src/types.js";
import { MalformedDecisionError } from "./errors.js";
import { isJsonObject, parseJsonObject } from "./parse.js";
import type { CallProposal, Decision } from "./types.js";

function toCallProposal(
  call: ChatResult["toolCalls"][number],
  index: number
): CallProposal {
  const callId = call.id || `call_${index}`;
  if (typeof call.arguments !== "string") {
    // Parsed by the provider from the wire, so the shape is unchecked.
    if (!isJsonObject(call.arguments)) {
      throw new MalformedDecisionError({
        reason: "invalid_arguments",
        message: `Arguments for ${call.name} (${callId}) are not a JSON object.`,
      });
    }
    return { callId, name: call.name, arguments: call.arguments };
  }

  const parsed = parseJsonObject(call.arguments);
  if (!parsed.success) {
    throw new MalformedDecisionError({
      reason: "invalid_arguments",
      message: `Arguments for ${call.name} (${callId}) are not a JSON object: ${parsed.errors.join("; ")}`,
    });
  }
  return { callId, name: call.name, arguments: parsed.data };
}

/**
 * Tool calls win over text: a response with both is a call proposal.
 * Calls keep the order the backend listed them in.
 */
export function toDecision(
  result: Pick<ChatResult, "content" | "toolCalls">,
  declaredNames: ReadonlySet<string>
): Decision {
  if (result.toolCalls.length === 0) {
    const text = result.content.trim();
    if (!text) {
      throw new MalformedDecisionError({
        reason: "empty_response",
        message: "Backend returned neither text nor a function call.",
      });
    }
    return { kind: "final_answer", text };
  }

  const calls = result.toolCalls.map(toCallProposal);
  const unknownNames = calls
    .map((c) => c.name)
    .filter((name) => !declaredNames.has(name));
  if (unknownNames.length > 0) {
    throw new MalformedDecisionError({
      reason: "unknown_function",
      message: `Backend proposed undeclared function(s): ${unknownNames.join(", ")}`,
      calls,
      unknownNames,
    });
  }

  return { kind: "function_calls", calls };
}
