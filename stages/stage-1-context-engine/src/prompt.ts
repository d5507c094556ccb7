/**
 * System context: what the model is told about the agent before the history.
 */

import type {
  FunctionDescriptor,
  ParameterSpec,
  SystemContextInput,
} from "./types.js";

export function isParameterRequired(param: ParameterSpec): boolean {
  return param.default === undefined && param.required !== false;
}

function describeParameter(param: ParameterSpec): string {
  if (isParameterRequired(param)) {
    return `${param.name}: ${param.type} (required)`;
  }
  const fallback =
    param.default === undefined
      ? ""
      : `, default ${JSON.stringify(param.default)}`;
  return `${param.name}: ${param.type} (optional${fallback})`;
}

/** One human-readable line, e.g. `get_weather(location: string (required)): Get weather`. */
export function describeFunction(descriptor: FunctionDescriptor): string {
  const params = descriptor.parameters.map(describeParameter).join(", ");
  const returns = descriptor.returns ? ` Returns ${descriptor.returns}.` : "";
  return `${descriptor.name}(${params}): ${descriptor.description}${returns}`;
}

export function describeFunctions(
  descriptors: readonly FunctionDescriptor[]
): string[] {
  return descriptors.map(describeFunction);
}

export function buildSystemContext(input: SystemContextInput): string {
  const sections: string[] = [];

  if (input.capabilities.length > 0) {
    sections.push(
      `You are ${input.agentName}, an AI assistant with the following capabilities:\n\n` +
        input.capabilities.map((c) => `- ${c}`).join("\n")
    );
  } else {
    sections.push(
      `You are ${input.agentName}, an AI assistant. No specific capabilities have been declared.`
    );
  }

  if (input.functions.length > 0) {
    sections.push(
      "You can call the following functions:\n\n" +
        describeFunctions(input.functions)
          .map((line) => `- ${line}`)
          .join("\n")
    );
    sections.push(
      [
        "Call a function when it helps with the request, using the exact function name and arguments that match its parameters.",
        "If a function result reports an error, correct the arguments or choose another approach.",
        "Once you have what you need, or when no function is needed, answer the user directly in plain prose.",
      ].join("\n")
    );
  } else {
    sections.push("No functions are available. Answer the user directly.");
  }

  return sections.join("\n\n");
}
