/**
 * JSON-only model output: strips markdown fences, extracts the first balanced
 * JSON value and validates it with zod.
 */

import type { z } from "zod";
import { ValidationError } from "../../errors.js";

export const JSON_ONLY_SYSTEM =
  "You must respond with ONLY valid JSON. No markdown, no code fences, no explanatory text before or after.";

const SNIPPET_MAX = 400;

export function snippet(text: string): string {
  const s = text.trim();
  if (s.length <= SNIPPET_MAX) return s;
  return s.slice(0, SNIPPET_MAX) + "...";
}

function stripMarkdownFences(text: string): string {
  const s = text.trim();
  const m = s.match(/^```(?:json)?\s*\n?([\s\S]*?)\n?```\s*$/);
  if (m) return m[1].trim();
  const open = s.indexOf("```");
  if (open >= 0) {
    const after = s.slice(open + 3).replace(/^json\s*/, "");
    const close = after.indexOf("```");
    return (close >= 0 ? after.slice(0, close) : after).trim();
  }
  return s;
}

function isWholeJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Returns the first complete JSON object or array in text. Tracks {} and []
 * depth and skips brackets inside double-quoted strings.
 */
export function extractFirstJsonValue(text: string): string {
  const stripped = stripMarkdownFences(text);
  if ((stripped.startsWith("{") || stripped.startsWith("[")) && isWholeJson(stripped)) {
    return stripped;
  }
  const objStart = stripped.indexOf("{");
  const arrStart = stripped.indexOf("[");
  if (objStart < 0 && arrStart < 0) {
    throw new ValidationError(`No JSON object or array found. Output: ${snippet(text)}`);
  }
  const start = arrStart < 0 || (objStart >= 0 && objStart < arrStart) ? objStart : arrStart;

  let depth = 0;
  let inString = false;
  let escape = false;
  for (let i = start; i < stripped.length; i++) {
    const c = stripped[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (inString) {
      if (c === "\\") escape = true;
      else if (c === '"') inString = false;
      continue;
    }
    if (c === '"') inString = true;
    else if (c === "{" || c === "[") depth++;
    else if (c === "}" || c === "]") {
      depth--;
      if (depth === 0) return stripped.slice(start, i + 1);
    }
  }
  throw new ValidationError(`Incomplete JSON (unbalanced braces). Output: ${snippet(text)}`);
}

export function parseJsonOutput<S extends z.ZodTypeAny>(text: string, schema: S): z.infer<S> {
  const extracted = extractFirstJsonValue(text);
  let parsed: unknown;
  try {
    parsed = JSON.parse(extracted);
  } catch (e) {
    throw new ValidationError(`JSON parse failed: ${e instanceof Error ? e.message : String(e)}. Output: ${snippet(text)}`);
  }
  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    const issues = validated.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ValidationError(`Schema validation failed: ${issues}. Output: ${snippet(text)}`);
  }
  return validated.data;
}
