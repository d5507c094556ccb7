import type { FunctionErrorInfo } from "../../stage-1-context-engine/src/types.js";

export class FunctionNotFoundError extends Error {
  readonly functionName: string;

  constructor(functionName: string) {
    super(`Function not available: ${functionName}`);
    this.name = "FunctionNotFoundError";
    this.functionName = functionName;
  }

  toErrorInfo(): FunctionErrorInfo {
    return { type: "function_not_available", message: this.message };
  }
}

export class DuplicateRegistrationError extends Error {
  readonly functionName: string;

  constructor(functionName: string) {
    super(`Function already registered: ${functionName}`);
    this.name = "DuplicateRegistrationError";
    this.functionName = functionName;
  }
}

export class InvalidFunctionDescriptorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidFunctionDescriptorError";
  }
}

/** The handler threw or rejected. */
export class FunctionExecutionError extends Error {
  readonly functionName: string;

  constructor(functionName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${functionName} failed: ${detail}`, { cause });
    this.name = "FunctionExecutionError";
    this.functionName = functionName;
  }

  toErrorInfo(): FunctionErrorInfo {
    return { type: "execution_failed", message: this.message };
  }
}

export class FunctionTimeoutError extends Error {
  readonly functionName: string;
  readonly timeoutMs: number;

  constructor(functionName: string, timeoutMs: number) {
    super(`${functionName} did not finish within ${timeoutMs}ms`);
    this.name = "FunctionTimeoutError";
    this.functionName = functionName;
    this.timeoutMs = timeoutMs;
  }

  toErrorInfo(): FunctionErrorInfo {
    return { type: "timeout", message: this.message };
  }
}
