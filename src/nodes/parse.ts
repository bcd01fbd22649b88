import { z } from "zod";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extracts the JSON object a model was asked to answer with. Reasoning blocks and
 * markdown fences around it are ignored; an answer with no parseable object
 * yields `{}`.
 */
export function parseJsonResponse(text: string): Record<string, unknown> {
  const cleaned = text
    .replace(/<thinking>[\s\S]*?<\/thinking>/g, "")
    .replace(/```json\s*/g, "")
    .replace(/```\s*/g, "");

  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return {};
  }
  try {
    const value: unknown = JSON.parse(cleaned.slice(start, end + 1));
    return isPlainObject(value) ? value : {};
  } catch {
    return {};
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Reads `FIELD: value` sections from a free-text answer. Keys come back in lower
 * case; a missing field maps to "".
 */
export function parseLabeledFields(text: string, fields: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const field of fields) {
    const match = new RegExp(`${escapeRegExp(field)}:\\s*([\\s\\S]+?)(?=\\n[A-Z_]+:|$)`, "i").exec(text);
    let value = match?.[1]?.trim() ?? "";
    if (value.startsWith("[") && value.endsWith("]")) {
      value = value.slice(1, -1);
    }
    result[field.toLowerCase()] = value;
  }
  return result;
}

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim().replace(/^["']|["']$/g, ""))
    .filter((item) => item.length > 0);
}

/** Lenient field readers for model output: a wrong or missing value takes the fallback. */
export const lenient = {
  text: (fallback = "") => z.string().catch(fallback),
  nullableText: () => z.string().nullable().catch(null),
  flag: (fallback = false) => z.boolean().catch(fallback),
  textList: () => z.array(z.string()).catch([]),
  score: (fallback: number) => z.coerce.number().min(0).max(1).catch(fallback)
};
