/**
 * Function Registry: bind handlers to descriptors by name, resolve by name.
 * Registration is expected before concurrent respond calls; readers take a
 * fresh snapshot (list/descriptors) per model round-trip.
 */

import { defineFunction } from "./define.js";
import { DuplicateRegistrationError, FunctionNotFoundError } from "./errors.js";
import type {
  FunctionHandler,
  FunctionRegistry,
  FunctionRegistryOptions,
  RegisteredFunction,
} from "./types.js";

export function createFunctionRegistry(
  options: FunctionRegistryOptions = {}
): FunctionRegistry {
  const functions = new Map<string, RegisteredFunction>();
  const duplicatePolicy = options.onDuplicate ?? "replace";

  return {
    duplicatePolicy,

    register(input, handler: FunctionHandler) {
      if (typeof handler !== "function") {
        throw new TypeError(`Handler for ${input.name} must be a function`);
      }
      const descriptor = defineFunction(input);
      const existing = functions.has(descriptor.name);
      if (existing && duplicatePolicy === "reject") {
        throw new DuplicateRegistrationError(descriptor.name);
      }

      const entry: RegisteredFunction = Object.freeze({ descriptor, handler });
      functions.set(descriptor.name, entry);
      options.onChange?.({
        type: existing ? "replaced" : "registered",
        name: descriptor.name,
      });

      return {
        descriptor,
        unregister(): boolean {
          if (functions.get(descriptor.name) !== entry) {
            return false;
          }
          functions.delete(descriptor.name);
          options.onChange?.({ type: "unregistered", name: descriptor.name });
          return true;
        },
      };
    },

    resolve(name: string): RegisteredFunction {
      const fn = functions.get(name);
      if (!fn) {
        throw new FunctionNotFoundError(name);
      }
      return fn;
    },

    get(name: string): RegisteredFunction | undefined {
      return functions.get(name);
    },

    has(name: string): boolean {
      return functions.has(name);
    },

    list(): RegisteredFunction[] {
      return Array.from(functions.values());
    },

    descriptors() {
      return Array.from(functions.values(), (fn) => fn.descriptor);
    },

    unregister(name: string): boolean {
      const removed = functions.delete(name);
      if (removed) {
        options.onChange?.({ type: "unregistered", name });
      }
      return removed;
    },
  };
}
