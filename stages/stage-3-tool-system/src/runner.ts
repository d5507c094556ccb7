/**
 * Execute one registered function. Every failure is caught and returned as an
 * outcome; nothing thrown by a handler escapes this module.
 */

import type { JsonObject } from "../../stage-0-model-gateway/src/types.js";
import { FunctionExecutionError, FunctionTimeoutError } from "./errors.js";
import type {
  ExecuteOptions,
  ExecutionOutcome,
  RegisteredFunction,
} from "./types.js";

/** Model-consumable text for a return value: strings as-is, everything else JSON. */
export function toModelContent(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === undefined) {
    return "null";
  }
  try {
    const json = JSON.stringify(value);
    return json === undefined ? String(value) : json;
  } catch {
    // circular structures, BigInt
    return String(value);
  }
}

export async function executeFunction(
  fn: RegisteredFunction,
  args: JsonObject,
  options: ExecuteOptions
): Promise<ExecutionOutcome> {
  const name = fn.descriptor.name;
  const started = Date.now();
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  options.abortSignal?.addEventListener("abort", onParentAbort, { once: true });
  let timeoutId: NodeJS.Timeout | undefined;

  try {
    const run = Promise.resolve().then(() =>
      fn.handler(args, {
        callId: options.callId,
        runId: options.runId,
        signal: controller.signal,
      })
    );

    const races: Array<Promise<unknown>> = [run];
    if (options.timeoutMs !== undefined && Number.isFinite(options.timeoutMs)) {
      const timeoutMs = options.timeoutMs;
      races.push(
        new Promise<never>((_, reject) => {
          timeoutId = setTimeout(() => {
            controller.abort();
            reject(new FunctionTimeoutError(name, timeoutMs));
          }, timeoutMs);
        })
      );
    }

    const value = await Promise.race(races);
    return {
      ok: true,
      value,
      content: toModelContent(value),
      durationMs: Date.now() - started,
    };
  } catch (err) {
    return {
      ok: false,
      error:
        err instanceof FunctionTimeoutError
          ? err
          : new FunctionExecutionError(name, err),
      durationMs: Date.now() - started,
    };
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    options.abortSignal?.removeEventListener("abort", onParentAbort);
  }
}
