import type { CapabilityRegistry, CapabilityStatement } from "./types.js";

export function createCapabilityRegistry(
  initial: readonly string[] = []
): CapabilityRegistry {
  const statements: CapabilityStatement[] = [];

  const registry: CapabilityRegistry = {
    learn(statement: string): boolean {
      const text = statement.trim();
      if (!text) {
        return false;
      }
      statements.push(text);
      return true;
    },

    list(): readonly CapabilityStatement[] {
      return [...statements];
    },

    size(): number {
      return statements.length;
    },
  };

  for (const statement of initial) {
    registry.learn(statement);
  }
  return registry;
}
