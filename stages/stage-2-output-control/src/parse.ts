/**
 * Extract JSON from raw model text (markdown fences, leading or trailing prose).
 */

import type { JsonObject } from "../../stage-0-model-gateway/src/types.js";
import type { ParseResult } from "./types.js";

export type ExtractResult =
  | { found: true; json: string }
  | { found: false; reason: string };

const CODE_BLOCK_REGEX = /^```(?:json)?\s*\n?([\s\S]*?)\n?```/;

/** Index of the bracket closing the one at startIndex; brackets inside strings are skipped. */
function findMatchingBracketEnd(
  str: string,
  startIndex: number,
  open: string,
  close: string
): number {
  let depth = 0;
  let inString = false;
  for (let i = startIndex; i < str.length; i++) {
    const c = str[i];
    if (inString) {
      if (c === "\\") {
        i++;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }
    if (c === '"') {
      inString = true;
    } else if (c === open) {
      depth++;
    } else if (c === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function stripMarkdownCodeBlock(content: string): string {
  const trimmed = content.trim();
  const match = trimmed.match(CODE_BLOCK_REGEX);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

function extractFirstJson(text: string): ExtractResult {
  const objIndex = text.indexOf("{");
  const arrIndex = text.indexOf("[");

  let startIndex: number;
  let endIndex: number;
  if (objIndex >= 0 && (arrIndex < 0 || objIndex <= arrIndex)) {
    startIndex = objIndex;
    endIndex = findMatchingBracketEnd(text, startIndex, "{", "}");
  } else if (arrIndex >= 0) {
    startIndex = arrIndex;
    endIndex = findMatchingBracketEnd(text, startIndex, "[", "]");
  } else {
    return { found: false, reason: "No JSON object or array found in content" };
  }

  if (endIndex < 0) {
    return { found: false, reason: "Unclosed JSON bracket" };
  }

  return { found: true, json: text.slice(startIndex, endIndex + 1) };
}

/**
 * Extract the first JSON object or array from raw content.
 * With stripMarkdown, a ```json ... ``` wrapper is removed first.
 */
export function extractJson(
  content: string,
  stripMarkdown: boolean = true
): ExtractResult {
  const text = stripMarkdown ? stripMarkdownCodeBlock(content) : content.trim();
  if (!text) {
    return { found: false, reason: "Empty content after strip" };
  }
  return extractFirstJson(text);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse an argument payload into a JSON object. Plain JSON is tried first;
 * on failure the first object found in the text (fenced or not) is used.
 */
export function parseJsonObject(content: string): ParseResult<JsonObject> {
  if (!content.trim()) {
    return { success: true, data: {} };
  }

  let candidate = content;
  try {
    const direct: unknown = JSON.parse(content);
    if (isJsonObject(direct)) {
      return { success: true, data: direct };
    }
    return {
      success: false,
      errors: ["Arguments must be a JSON object"],
      raw: content.slice(0, 500),
    };
  } catch {
    const extracted = extractJson(content, true);
    if (!extracted.found) {
      return {
        success: false,
        errors: [extracted.reason],
        raw: content.slice(0, 500),
      };
    }
    candidate = extracted.json;
  }

  try {
    const data: unknown = JSON.parse(candidate);
    if (isJsonObject(data)) {
      return { success: true, data };
    }
    return {
      success: false,
      errors: ["Arguments must be a JSON object"],
      raw: candidate.slice(0, 500),
    };
  } catch (err) {
    const msg = err instanceof Error ? err.message : "JSON parse failed";
    return { success: false, errors: [msg], raw: candidate.slice(0, 500) };
  }
}
