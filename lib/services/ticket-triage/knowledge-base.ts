/**
 * Knowledge-base loading
 *
 * Reads the knowledge-base JSON file and validates it before it reaches the
 * similarity index.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { KnowledgeBaseFileSchema, type KnowledgeBaseRecord } from "./types";

export async function loadKnowledgeBaseFile(filePath: string): Promise<KnowledgeBaseRecord[]> {
  const resolved = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
  const raw = await readFile(resolved, "utf8");
  return parseKnowledgeBase(raw, resolved);
}

export function parseKnowledgeBase(raw: string, source = "knowledge base"): KnowledgeBaseRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = KnowledgeBaseFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Knowledge base ${source} did not match schema: ${result.error.message}`);
  }

  const seen = new Set<string>();
  for (const record of result.data) {
    if (seen.has(record.id)) {
      throw new Error(`Duplicate knowledge-base id ${record.id} in ${source}`);
    }
    seen.add(record.id);
  }

  return result.data;
}
