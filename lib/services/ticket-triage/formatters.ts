/**
 * Text renderings of knowledge-base matches, shared by the event stream and
 * the prompts sent to the reasoning service.
 */

import { NO_MATCHES_SUMMARY } from "./constants";
import type { KbMatch, TriageResponse, Classification } from "./types";

/**
 * Summary carried by the `kb_search_complete` event.
 */
export function formatKbSearchSummary(matches: readonly KbMatch[]): string {
  if (matches.length === 0) {
    return NO_MATCHES_SUMMARY;
  }

  const lines = ["Found related known issues:"];
  for (const match of matches) {
    lines.push(`- ID: ${match.id} | ${match.title} | Similarity: ${match.score.toFixed(2)}`);
    lines.push(`  Recommended action: ${match.recommendedAction}`);
  }
  return lines.join("\n");
}

/**
 * Compact context block for prompts.
 */
export function formatKbContext(matches: readonly KbMatch[]): string {
  if (matches.length === 0) {
    return NO_MATCHES_SUMMARY;
  }

  return [
    "Related known issues found:",
    ...matches.map(
      (match) =>
        `- ID: ${match.id} | ${match.title} | Category: ${match.category} | Similarity: ${match.score.toFixed(2)} | Recommended action: ${match.recommendedAction}`,
    ),
  ].join("\n");
}

export function toTriageResponse(
  classification: Classification,
  matches: readonly KbMatch[],
): TriageResponse {
  return {
    ...classification,
    related_issues: matches.map((match) => ({
      id: match.id,
      title: match.title,
      similarity_score: match.score,
    })),
  };
}
