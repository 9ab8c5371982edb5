import { jsonrepair } from "jsonrepair";
import type { z } from "zod";

export function stripJsonFence(raw: string): string {
  return raw
    .replace(/^```json\s*/i, "")
    .replace(/```$/i, "")
    .trim();
}

/**
 * Extract and parse JSON from an LLM response with schema validation.
 *
 * - Strips code fences if present
 * - Grabs the first JSON object substring
 * - Repairs near-JSON (trailing commas, single quotes) before giving up
 * - Validates with the provided Zod schema
 */
export function parseJsonWithSchema<T>(
  text: string | undefined,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context?: string,
): T {
  if (!text) {
    throw new Error("No text returned from model");
  }

  const suffix = context ? ` (${context})` : "";
  const candidate = stripJsonFence(text.trim());

  const jsonMatch = candidate.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error(`No JSON object found in model response${suffix}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonMatch[0]);
  } catch {
    try {
      parsed = JSON.parse(jsonrepair(jsonMatch[0]));
    } catch (error) {
      throw new Error(
        `Failed to parse JSON response${suffix}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`JSON did not match schema${suffix}: ${result.error.message}`);
  }

  return result.data;
}
