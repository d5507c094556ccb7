/**
 * defineFunction: first half of the two-step registration (declare, then bind).
 * The schema is captured and frozen here, at declaration time.
 */

import type { JsonValue } from "../../stage-0-model-gateway/src/types.js";
import type {
  FunctionDescriptor,
  ParameterSpec,
  ParameterType,
} from "../../stage-1-context-engine/src/types.js";
import { InvalidFunctionDescriptorError } from "./errors.js";
import type { FunctionDescriptorInput } from "./types.js";

// Both OpenAI and Anthropic accept this shape for tool names.
const NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_-]{0,63}$/;

const PARAMETER_TYPES: readonly ParameterType[] = [
  "string",
  "integer",
  "number",
  "boolean",
  "object",
  "array",
];

const defined = new WeakSet<object>();

function deepFreeze<T extends JsonValue>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function freezeParameter(param: ParameterSpec, fnName: string): ParameterSpec {
  if (!param.name?.trim()) {
    throw new InvalidFunctionDescriptorError(
      `Parameter of ${fnName} has no name`
    );
  }
  if (!PARAMETER_TYPES.includes(param.type)) {
    throw new InvalidFunctionDescriptorError(
      `Parameter ${param.name} of ${fnName} has unknown type: ${String(param.type)}`
    );
  }

  const spec: ParameterSpec = { name: param.name.trim(), type: param.type };
  if (param.description) spec.description = param.description;
  if (param.required !== undefined) spec.required = param.required;
  if (param.default !== undefined) {
    spec.default = deepFreeze(structuredClone(param.default));
  }
  return Object.freeze(spec);
}

export function isDefinedFunction(
  descriptor: FunctionDescriptor | FunctionDescriptorInput
): descriptor is FunctionDescriptor {
  return defined.has(descriptor);
}

/** Validate and freeze a descriptor. Throws InvalidFunctionDescriptorError. */
export function defineFunction(
  input: FunctionDescriptorInput | FunctionDescriptor
): FunctionDescriptor {
  if (isDefinedFunction(input)) {
    return input;
  }

  const name = input.name?.trim() ?? "";
  if (!NAME_PATTERN.test(name)) {
    throw new InvalidFunctionDescriptorError(
      `Invalid function name "${input.name}": use letters, digits, _ or -, starting with a letter or _ (max 64)`
    );
  }

  const parameters = (input.parameters ?? []).map((p) =>
    freezeParameter(p, name)
  );
  const seen = new Set<string>();
  for (const param of parameters) {
    if (seen.has(param.name)) {
      throw new InvalidFunctionDescriptorError(
        `Duplicate parameter ${param.name} in ${name}`
      );
    }
    seen.add(param.name);
  }

  const descriptor: FunctionDescriptor = Object.freeze({
    name,
    description: input.description?.trim() || "No description provided",
    parameters: Object.freeze(parameters),
    ...(input.returns ? { returns: input.returns } : {}),
  });
  defined.add(descriptor);
  return descriptor;
}
