import type { ChatRequest, ProviderName, ProviderResult } from "../types.js";

export interface LLMProvider {
  name: ProviderName;
  chat(request: ChatRequest): Promise<ProviderResult>;
}

/**
 * Transport, auth or top-level response failure talking to a backend.
 * Fatal to the current respond call.
 */
export class ProviderCommunicationError extends Error {
  readonly provider: ProviderName;
  readonly status?: number;
  readonly code?: string;

  constructor(options: {
    provider: ProviderName;
    message: string;
    status?: number;
    code?: string;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = "ProviderCommunicationError";
    this.provider = options.provider;
    this.status = options.status;
    this.code = options.code;
  }
}

/** Error body shape shared by the OpenAI and Anthropic HTTP APIs. */
interface ErrorPayload {
  error?: { message?: string; code?: string | number; type?: string };
}

export async function parseErrorMessage(
  response: Response
): Promise<{ message: string; code?: string }> {
  const text = await response.text();
  try {
    const payload: ErrorPayload = JSON.parse(text);
    const error = payload?.error;
    if (error?.message) {
      const code = error.code ?? error.type;
      return {
        message: error.message,
        code: code === undefined ? undefined : String(code),
      };
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return { message: text || `Request failed with status ${response.status}` };
}

/** Read a 2xx body as JSON, mapping a non-JSON body to a communication error. */
export async function readJsonBody<T>(
  provider: ProviderName,
  response: Response
): Promise<T> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ProviderCommunicationError({
      provider,
      message: `Response body is not valid JSON: ${text.slice(0, 200)}`,
      status: response.status,
      cause: err,
    });
  }
}
