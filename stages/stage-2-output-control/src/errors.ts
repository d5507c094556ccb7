/**
 * Errors raised while turning untrusted model output into something usable.
 */

import type { FunctionErrorInfo } from "../../stage-1-context-engine/src/types.js";
import type { CallProposal } from "./types.js";

/** Base for argument problems; recoverable, so each carries a model-facing description. */
export abstract class ArgumentValidationError extends Error {
  readonly functionName: string;
  readonly parameter: string;
  /** Every ajv issue, formatted, for logs. */
  readonly issues: string[];

  protected constructor(
    message: string,
    functionName: string,
    parameter: string,
    issues: string[]
  ) {
    super(message);
    this.functionName = functionName;
    this.parameter = parameter;
    this.issues = issues;
  }

  abstract toErrorInfo(): FunctionErrorInfo;
}

export class MissingArgumentError extends ArgumentValidationError {
  /** All missing required parameters, in declaration order. */
  readonly missing: string[];

  constructor(functionName: string, missing: string[], issues: string[] = []) {
    const quoted = missing.map((name) => `"${name}"`).join(", ");
    super(
      missing.length === 1
        ? `Missing required argument ${quoted} for ${functionName}.`
        : `Missing required arguments ${quoted} for ${functionName}.`,
      functionName,
      missing[0] ?? "",
      issues
    );
    this.name = "MissingArgumentError";
    this.missing = missing;
  }

  toErrorInfo(): FunctionErrorInfo {
    return {
      type: "missing_argument",
      message: this.message,
      parameter: this.parameter,
    };
  }
}

export class TypeCoercionError extends ArgumentValidationError {
  readonly expected: string;
  readonly received: string;

  constructor(
    functionName: string,
    parameter: string,
    expected: string,
    received: string,
    issues: string[] = []
  ) {
    super(
      `Argument "${parameter}" for ${functionName} must be ${expected}, got ${received}.`,
      functionName,
      parameter,
      issues
    );
    this.name = "TypeCoercionError";
    this.expected = expected;
    this.received = received;
  }

  toErrorInfo(): FunctionErrorInfo {
    return {
      type: "type_coercion",
      message: this.message,
      parameter: this.parameter,
      expected: this.expected,
      received: this.received,
    };
  }
}

export type MalformedDecisionReason =
  | "empty_response"
  | "invalid_arguments"
  | "unknown_function";

/**
 * Backend response matched neither a final answer nor a usable call proposal.
 * Only `unknown_function` can be recovered by re-prompting; it keeps the
 * parsed calls so the loop can answer each of them.
 */
export class MalformedDecisionError extends Error {
  readonly reason: MalformedDecisionReason;
  readonly calls: CallProposal[];
  readonly unknownNames: string[];

  constructor(options: {
    reason: MalformedDecisionReason;
    message: string;
    calls?: CallProposal[];
    unknownNames?: string[];
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = "MalformedDecisionError";
    this.reason = options.reason;
    this.calls = options.calls ?? [];
    this.unknownNames = options.unknownNames ?? [];
  }

  get recoverable(): boolean {
    return this.reason === "unknown_function";
  }
}
