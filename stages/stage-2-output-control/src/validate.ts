/**
 * Argument Validator/Coercer: checks a raw argument payload against a
 * function's declared parameters (using ajv) and returns typed arguments.
 * Never executes the function.
 */

import AjvImport, { type ErrorObject } from "ajv";

import type {
  JsonObject,
  JsonSchema,
  JsonValue,
} from "../../stage-0-model-gateway/src/types.js";
import { isParameterRequired } from "../../stage-1-context-engine/src/prompt.js";
import type {
  FunctionDescriptor,
  ParameterType,
} from "../../stage-1-context-engine/src/types.js";
import { MissingArgumentError, TypeCoercionError } from "./errors.js";
import { isJsonObject } from "./parse.js";
import type { ArgumentValidationResult } from "./types.js";

interface AjvOptions {
  allErrors?: boolean;
  coerceTypes?: boolean;
  useDefaults?: boolean;
}

interface ValidateFn {
  (data: unknown): boolean;
  errors?: ErrorObject[] | null;
}

interface AjvInstance {
  compile(schema: JsonSchema): ValidateFn;
}

const AjvConstructor = (
  typeof AjvImport === "function"
    ? AjvImport
    : (
        AjvImport as unknown as {
          default: new (opts?: AjvOptions) => AjvInstance;
        }
      ).default
) as new (opts?: AjvOptions) => AjvInstance;

// coerceTypes: numeric strings -> numbers, "true"/"false" -> booleans,
// numbers/booleans -> strings. useDefaults fills absent optional parameters.
const ajv = new AjvConstructor({
  allErrors: true,
  coerceTypes: true,
  useDefaults: true,
});

const compiled = new WeakMap<FunctionDescriptor, ValidateFn>();

/** JSON Schema for a descriptor's parameters (also what backends are sent). */
export function toParametersSchema(descriptor: FunctionDescriptor): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const param of descriptor.parameters) {
    const property: JsonSchema = { type: param.type };
    if (param.description) {
      property.description = param.description;
    }
    if (param.default !== undefined) {
      property.default = param.default;
    }
    properties[param.name] = property;
    if (isParameterRequired(param)) {
      required.push(param.name);
    }
  }

  const schema: JsonSchema = { type: "object", properties };
  if (required.length > 0) {
    schema.required = required;
  }
  return schema;
}

function getValidator(descriptor: FunctionDescriptor): ValidateFn {
  let validate = compiled.get(descriptor);
  if (!validate) {
    validate = ajv.compile(toParametersSchema(descriptor));
    compiled.set(descriptor, validate);
  }
  return validate;
}

function jsonTypeOf(value: JsonValue | undefined): string {
  if (value === undefined) return "nothing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "number";
  }
  return typeof value;
}

function formatAjvErrors(errors: ErrorObject[]): string[] {
  return errors.map(
    (e) =>
      `${e.instancePath || "/"} ${e.message ?? e.keyword}${
        e.params ? ` (${JSON.stringify(e.params)})` : ""
      }`
  );
}

/** Top-level parameter an ajv error points at ("/location/city" -> "location"). */
function parameterOf(error: ErrorObject): string | undefined {
  const segment = error.instancePath.split("/")[1];
  if (segment === undefined || segment === "") {
    return undefined;
  }
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

function missingPropertyOf(error: ErrorObject): string | undefined {
  const params: Record<string, unknown> = error.params;
  const missing = params.missingProperty;
  return typeof missing === "string" ? missing : undefined;
}

/**
 * Structured values sometimes arrive as JSON text; parse them before ajv
 * sees the payload. Anything unparseable is left for ajv to reject.
 */
function preCoerce(value: JsonValue, type: ParameterType): JsonValue {
  if (typeof value !== "string" || (type !== "object" && type !== "array")) {
    return value;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    if (type === "object" && isJsonObject(parsed)) {
      return parsed;
    }
    if (type === "array" && Array.isArray(parsed)) {
      const items: JsonValue[] = parsed;
      return items;
    }
  } catch {
    return value;
  }
  return value;
}

function ownValue(source: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(source, key) ? source[key] : undefined;
}

/**
 * Map each declared parameter to a value drawn from rawArguments.
 * Missing required -> MissingArgumentError; incompatible after coercion ->
 * TypeCoercionError. Unknown keys are dropped; null counts as absent.
 * The caller's object is never mutated.
 */
export function validateArguments(
  descriptor: FunctionDescriptor,
  rawArguments: JsonObject
): ArgumentValidationResult {
  // No prototype, so "constructor" or "toString" are plain keys.
  const data: JsonObject = Object.create(null);
  for (const param of descriptor.parameters) {
    const value = ownValue(rawArguments, param.name);
    if (value === undefined || value === null) {
      continue;
    }
    data[param.name] = preCoerce(structuredClone(value), param.type);
  }

  const validate = getValidator(descriptor);
  if (validate(data)) {
    return { success: true, data };
  }

  const errors = validate.errors ?? [];
  const issues = formatAjvErrors(errors);

  const missing = errors
    .filter((e) => e.keyword === "required")
    .map(missingPropertyOf)
    .filter((name): name is string => name !== undefined);
  if (missing.length > 0) {
    const ordered = descriptor.parameters
      .map((p) => p.name)
      .filter((name) => missing.includes(name));
    return {
      success: false,
      error: new MissingArgumentError(descriptor.name, ordered, issues),
    };
  }

  const first = errors.find((e) => parameterOf(e) !== undefined);
  const parameter = first ? parameterOf(first) : undefined;
  const spec = descriptor.parameters.find((p) => p.name === parameter);
  if (first && parameter !== undefined && spec) {
    return {
      success: false,
      error: new TypeCoercionError(
        descriptor.name,
        parameter,
        first.keyword === "type" ? spec.type : (first.message ?? spec.type),
        jsonTypeOf(ownValue(rawArguments, parameter)),
        issues
      ),
    };
  }

  return {
    success: false,
    error: new TypeCoercionError(
      descriptor.name,
      "(arguments)",
      "an object matching the declared parameters",
      jsonTypeOf(rawArguments),
      issues
    ),
  };
}
