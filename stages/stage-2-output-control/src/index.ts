export {
  createProviderAdapter,
  toFunctionDeclarations,
  toGatewayMessages,
} from "./adapter.js";
export { toDecision } from "./decision.js";
export {
  ArgumentValidationError,
  MalformedDecisionError,
  MissingArgumentError,
  TypeCoercionError,
  type MalformedDecisionReason,
} from "./errors.js";
export { extractJson, isJsonObject, parseJsonObject } from "./parse.js";
export { toParametersSchema, validateArguments } from "./validate.js";
export type {
  ArgumentValidationResult,
  CallProposal,
  Decision,
  DecisionRequest,
  DecisionResult,
  JsonSchema,
  ParseResult,
  ProviderAdapter,
  ProviderAdapterDeps,
} from "./types.js";
