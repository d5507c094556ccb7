export { defineFunction, isDefinedFunction } from "./define.js";
export {
  DuplicateRegistrationError,
  FunctionExecutionError,
  FunctionNotFoundError,
  FunctionTimeoutError,
  InvalidFunctionDescriptorError,
} from "./errors.js";
export { createFunctionRegistry } from "./registry.js";
export { executeFunction, toModelContent } from "./runner.js";
export { toFunctionDeclarations } from "../../stage-2-output-control/src/adapter.js";
export {
  describeFunction,
  describeFunctions,
} from "../../stage-1-context-engine/src/prompt.js";
export type {
  DuplicatePolicy,
  ExecuteOptions,
  ExecutionOutcome,
  FunctionContext,
  FunctionDescriptorInput,
  FunctionHandler,
  FunctionRegistry,
  FunctionRegistryOptions,
  RegisteredFunction,
  RegistrationHandle,
  RegistryEvent,
} from "./types.js";
