export { createCapabilityRegistry } from "./capabilities.js";
export { ConversationStateError, createConversation } from "./conversation.js";
export {
  buildSystemContext,
  describeFunction,
  describeFunctions,
  isParameterRequired,
} from "./prompt.js";
export type {
  CapabilityRegistry,
  CapabilityStatement,
  Conversation,
  ConversationOptions,
  ConversationTurn,
  FinalAnswerTurn,
  FunctionCallTurn,
  FunctionDescriptor,
  FunctionErrorInfo,
  FunctionErrorTurn,
  FunctionErrorType,
  FunctionResultTurn,
  FunctionSuccessTurn,
  ParameterSpec,
  ParameterType,
  SystemContextInput,
  UserMessageTurn,
} from "./types.js";
