/**
 * Conversation: the ordered, append-only turn log of one respond invocation.
 * Discarded when the invocation ends; nothing here outlives a request.
 */

import type {
  Conversation,
  ConversationOptions,
  ConversationTurn,
  FinalAnswerTurn,
  FunctionCallTurn,
  FunctionResultTurn,
} from "./types.js";

/** Turn appended out of order. Signals a bug in the caller, never a model error. */
export class ConversationStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConversationStateError";
  }
}

export function createConversation(
  request: string,
  options: ConversationOptions = {}
): Conversation {
  const turns: ConversationTurn[] = [];
  let pending: FunctionCallTurn | undefined;
  let complete = false;
  let callCount = 0;

  function append<T extends ConversationTurn>(turn: T): T {
    Object.freeze(turn);
    turns.push(turn);
    options.onTurn?.(turn);
    return turn;
  }

  function assertOpen(action: string): void {
    if (complete) {
      throw new ConversationStateError(
        `Cannot ${action}: conversation already has a final answer`
      );
    }
  }

  append({ kind: "user_message", text: request });

  return {
    request,

    turns(): readonly ConversationTurn[] {
      return [...turns];
    },

    addFunctionCall(call): FunctionCallTurn {
      assertOpen("add a function call");
      if (pending) {
        throw new ConversationStateError(
          `Cannot add call ${call.callId}: call ${pending.callId} has no result yet`
        );
      }
      const turn = append<FunctionCallTurn>({
        kind: "function_call",
        callId: call.callId,
        round: call.round,
        name: call.name,
        arguments: call.arguments,
      });
      pending = turn;
      callCount++;
      return turn;
    },

    addFunctionResult(result): FunctionResultTurn {
      assertOpen("add a function result");
      if (!pending) {
        throw new ConversationStateError(
          `Result for ${result.callId} has no preceding function call`
        );
      }
      if (pending.callId !== result.callId) {
        throw new ConversationStateError(
          `Result for ${result.callId} does not match pending call ${pending.callId}`
        );
      }
      const turn: FunctionResultTurn = result.ok
        ? { ...result, kind: "function_result" }
        : { ...result, kind: "function_result" };
      pending = undefined;
      return append(turn);
    },

    addFinalAnswer(text: string): FinalAnswerTurn {
      assertOpen("add a final answer");
      if (pending) {
        throw new ConversationStateError(
          `Cannot finish: call ${pending.callId} has no result yet`
        );
      }
      complete = true;
      return append<FinalAnswerTurn>({ kind: "final_answer", text });
    },

    pendingCall(): FunctionCallTurn | undefined {
      return pending;
    },

    isComplete(): boolean {
      return complete;
    },

    functionCallCount(): number {
      return callCount;
    },

    lastResults(limit?: number): FunctionResultTurn[] {
      const results = turns.filter(
        (t): t is FunctionResultTurn => t.kind === "function_result"
      );
      return limit === undefined ? results : results.slice(-limit);
    },
  };
}
