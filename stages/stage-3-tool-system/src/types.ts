/**
 * Stage 3 Tool System types.
 * A function is a frozen descriptor plus the handler bound to it.
 */

import type { JsonObject } from "../../stage-0-model-gateway/src/types.js";
import type {
  FunctionDescriptor,
  ParameterSpec,
} from "../../stage-1-context-engine/src/types.js";
import type { FunctionExecutionError, FunctionTimeoutError } from "./errors.js";

/** What a handler gets besides its validated arguments. */
export interface FunctionContext {
  callId: string;
  runId?: string;
  /** Aborted on timeout or when the surrounding request is cancelled. */
  signal: AbortSignal;
}

/** Receives validated, coerced arguments; may return a value or a promise. */
export type FunctionHandler = (
  args: JsonObject,
  context: FunctionContext
) => unknown;

/** Descriptor as written by the caller, before defineFunction freezes it. */
export interface FunctionDescriptorInput {
  name: string;
  description: string;
  parameters?: ParameterSpec[];
  returns?: string;
}

export interface RegisteredFunction {
  readonly descriptor: FunctionDescriptor;
  readonly handler: FunctionHandler;
}

export interface RegistrationHandle {
  readonly descriptor: FunctionDescriptor;
  /** Removes this registration; a no-op (false) once it has been replaced. */
  unregister(): boolean;
}

/** What happens when a name is registered twice. */
export type DuplicatePolicy = "replace" | "reject";

export type RegistryEvent =
  | { type: "registered"; name: string }
  | { type: "replaced"; name: string }
  | { type: "unregistered"; name: string };

export interface FunctionRegistryOptions {
  onDuplicate?: DuplicatePolicy;
  /** Observer for registry changes (logging). */
  onChange?: (event: RegistryEvent) => void;
}

export interface FunctionRegistry {
  readonly duplicatePolicy: DuplicatePolicy;
  /** Bind a handler to a descriptor. Plain inputs are declared via defineFunction first. */
  register(
    descriptor: FunctionDescriptor | FunctionDescriptorInput,
    handler: FunctionHandler
  ): RegistrationHandle;
  /** Throws FunctionNotFoundError. */
  resolve(name: string): RegisteredFunction;
  get(name: string): RegisteredFunction | undefined;
  has(name: string): boolean;
  /** Registration order; a replacement keeps the original slot. */
  list(): RegisteredFunction[];
  descriptors(): FunctionDescriptor[];
  unregister(name: string): boolean;
}

export interface ExecuteOptions {
  callId: string;
  runId?: string;
  timeoutMs?: number;
  abortSignal?: AbortSignal;
}

export type ExecutionOutcome =
  | { ok: true; value: unknown; content: string; durationMs: number }
  | {
      ok: false;
      error: FunctionExecutionError | FunctionTimeoutError;
      durationMs: number;
    };
