/**
 * Similarity Index
 *
 * Holds knowledge-base entries with their embeddings and answers top-K
 * queries by cosine similarity. Entries are shared read-only by every request;
 * only a missing embedding is ever filled in after load.
 *
 * @module ticket-triage/similarity-index
 */

import { traceRetrieval } from "../../observability";
import { MAX_KB_MATCHES } from "./constants";
import type { ReasoningGateway } from "./reasoning-gateway";
import type { KbMatch, KnowledgeBaseEntry, KnowledgeBaseRecord } from "./types";

const QUERY_CACHE_LIMIT = 500;

export interface SimilarityIndexOptions {
  topK: number;
  /** Score at or above which a match counts as a known issue */
  similarityThreshold: number;
}

/**
 * Cosine similarity of two vectors. Zero when either vector has no magnitude
 * or the lengths differ.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function isKnownIssueScore(score: number, threshold: number): boolean {
  return score >= threshold;
}

/**
 * Text embedded for an entry: its title followed by its symptoms.
 */
export function buildEntryText(record: { title: string; symptoms: readonly string[] }): string {
  return [record.title, ...record.symptoms].join(" ").trim();
}

function toEntry(record: KnowledgeBaseRecord, embedding: readonly number[]): KnowledgeBaseEntry {
  return Object.freeze({
    id: record.id,
    title: record.title,
    category: record.category,
    symptoms: Object.freeze([...record.symptoms]),
    recommendedAction: record.recommended_action,
    embedding: Object.freeze([...embedding]),
  });
}

export class SimilarityIndex {
  private entries: KnowledgeBaseEntry[] = [];
  private loaded = false;
  private pendingEmbeds: Promise<void> | null = null;
  private readonly topK: number;
  private readonly queryCache = new Map<string, number[]>();
  private readonly tracedSearch: (query: string) => Promise<KbMatch[]>;

  constructor(
    private readonly gateway: ReasoningGateway,
    private readonly options: SimilarityIndexOptions,
  ) {
    this.topK = Math.min(options.topK, MAX_KB_MATCHES);
    this.tracedSearch = traceRetrieval((query: string) => this.runSearch(query), {
      name: "kb_search",
      topK: this.topK,
      source: "knowledge_base",
    });
  }

  /**
   * Load entries, embedding any record that does not carry a vector.
   * An entry whose embedding falls back is kept without a vector and embedded
   * again on the next search.
   */
  async load(records: readonly KnowledgeBaseRecord[]): Promise<void> {
    const entries: KnowledgeBaseEntry[] = [];

    for (const record of records) {
      const embedding = record.embedding ?? (await this.embedEntry(record.id, buildEntryText(record)));
      entries.push(toEntry(record, embedding ?? []));
    }

    this.entries = entries;
    this.loaded = true;

    const missing = this.missingEmbeddings();
    if (missing > 0) {
      console.warn(`[Similarity Index] Loaded ${entries.length} entries; ${missing} still need embeddings`);
    } else {
      console.log(`[Similarity Index] Loaded ${entries.length} knowledge-base entries`);
    }
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  /** Loaded, with a vector for every entry. */
  isReady(): boolean {
    return this.loaded && this.missingEmbeddings() === 0;
  }

  missingEmbeddings(): number {
    return this.entries.filter((entry) => entry.embedding.length === 0).length;
  }

  size(): number {
    return this.entries.length;
  }

  isKnownIssue(match: Pick<KbMatch, "score">): boolean {
    return isKnownIssueScore(match.score, this.options.similarityThreshold);
  }

  /**
   * Top-K entries (at most three) by descending similarity to `query`. Ties
   * keep load order. Entries without a vector are left out; the result is
   * empty when the query cannot be embedded.
   */
  search(query: string): Promise<KbMatch[]> {
    return this.tracedSearch(query);
  }

  private async runSearch(query: string): Promise<KbMatch[]> {
    await this.embedMissingEntries();

    const queryVector = await this.embedQuery(query);
    if (queryVector.length === 0) {
      return [];
    }

    const scored = this.entries
      .filter((entry) => entry.embedding.length > 0)
      .map((entry) => ({
        entry,
        score: cosineSimilarity(queryVector, entry.embedding),
      }));

    // Array.prototype.sort is stable, so equal scores keep insertion order.
    scored.sort((left, right) => right.score - left.score);

    return scored.slice(0, this.topK).map(({ entry, score }) => ({
      id: entry.id,
      title: entry.title,
      category: entry.category,
      score,
      recommendedAction: entry.recommendedAction,
    }));
  }

  /**
   * Retry entries left without a vector. Concurrent searches share one pass.
   */
  private embedMissingEntries(): Promise<void> {
    if (this.missingEmbeddings() === 0) {
      return Promise.resolve();
    }

    this.pendingEmbeds ??= this.retryMissingEmbeddings().finally(() => {
      this.pendingEmbeds = null;
    });
    return this.pendingEmbeds;
  }

  private async retryMissingEmbeddings(): Promise<void> {
    const updated: KnowledgeBaseEntry[] = [];
    for (const entry of this.entries) {
      if (entry.embedding.length > 0) {
        updated.push(entry);
        continue;
      }
      const embedding = await this.embedEntry(entry.id, buildEntryText(entry));
      updated.push(embedding ? Object.freeze({ ...entry, embedding: Object.freeze([...embedding]) }) : entry);
    }

    this.entries = updated;
    const missing = this.missingEmbeddings();
    console.log(
      missing === 0
        ? "[Similarity Index] All knowledge-base entries embedded"
        : `[Similarity Index] ${missing} entries still need embeddings`,
    );
  }

  private async embedEntry(id: string, text: string): Promise<number[] | null> {
    const result = await this.gateway.embed(text);
    if (result.fallback || result.value.length === 0) {
      console.warn(`[Similarity Index] Could not embed ${id}; retrying on the next search`);
      return null;
    }
    return result.value;
  }

  private async embedQuery(query: string): Promise<number[]> {
    const cached = this.queryCache.get(query);
    if (cached) {
      return cached;
    }

    const result = await this.gateway.embed(query);
    if (!result.fallback && result.value.length > 0) {
      if (this.queryCache.size >= QUERY_CACHE_LIMIT) {
        const oldest = this.queryCache.keys().next();
        if (!oldest.done) {
          this.queryCache.delete(oldest.value);
        }
      }
      this.queryCache.set(query, result.value);
    }
    return result.value;
  }
}
