/**
 * Ticket Triage Service
 *
 * Wires the similarity index, reasoning gateway, checkpoint store and workflow
 * engine together. HTTP handlers talk to this facade only.
 */

import { config, getCheckpointPolicy, getRetryPolicy, getTriageSettings, type TriageSettings } from "../../config";
import type { RetryPolicy } from "../smart-retry";
import { InMemoryCheckpointStore, type CheckpointStore } from "./checkpoint-store";
import { collectEvents, type EventStream } from "./event-stream";
import { toTriageResponse } from "./formatters";
import { loadKnowledgeBaseFile } from "./knowledge-base";
import { LlmReasoningProvider } from "./llm-reasoning-provider";
import {
  ReasoningGateway,
  type GatewayObservation,
  type ReasoningProvider,
} from "./reasoning-gateway";
import { SimilarityIndex } from "./similarity-index";
import type { KnowledgeBaseRecord, TicketState, TriageResponse } from "./types";
import { WorkflowEngine } from "./workflow-engine";

export interface TriageServiceOptions {
  provider: ReasoningProvider;
  /** Records to index, or a path to a knowledge-base JSON file */
  knowledgeBase?: readonly KnowledgeBaseRecord[] | string;
  checkpoints?: CheckpointStore;
  settings?: TriageSettings;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  observer?: (observation: GatewayObservation) => void;
  generateThreadId?: () => string;
}

export type TriageOutcome =
  | { status: "complete"; thread_id: string; result: TriageResponse }
  | { status: "needs_clarification"; thread_id: string; question: string }
  | { status: "failed"; thread_id: string; message: string };

export interface TriageHealth {
  status: "healthy" | "degraded";
  kb_loaded: boolean;
  kb_entries: number;
  checkpoints: number;
}

export class TriageService {
  private readonly index: SimilarityIndex;
  private readonly checkpoints: CheckpointStore;
  private readonly engine: WorkflowEngine;
  private readonly knowledgeBase: readonly KnowledgeBaseRecord[] | string;
  private initialization: Promise<void> | null = null;

  constructor(options: TriageServiceOptions) {
    const settings = options.settings ?? getTriageSettings();
    const gateway = new ReasoningGateway(options.provider, {
      retryPolicy: options.retryPolicy ?? getRetryPolicy(),
      timeoutMs: settings.llmTimeoutMs,
      sleep: options.sleep,
      observer: options.observer,
    });

    this.index = new SimilarityIndex(gateway, {
      topK: settings.topK,
      similarityThreshold: settings.similarityThreshold,
    });
    this.checkpoints = options.checkpoints ?? new InMemoryCheckpointStore(getCheckpointPolicy());
    this.knowledgeBase = options.knowledgeBase ?? config.kbPath;
    this.engine = new WorkflowEngine(
      { index: this.index, gateway, checkpoints: this.checkpoints },
      {
        maxDescriptionLength: settings.maxDescriptionLength,
        eventBufferSize: settings.eventBufferSize,
        generateThreadId: options.generateThreadId,
      },
    );
  }

  /**
   * Load and embed the knowledge base. Safe to call repeatedly; a failed load
   * is retried on the next call.
   */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.loadKnowledgeBase().catch((error: unknown) => {
        this.initialization = null;
        throw error;
      });
    }
    return this.initialization;
  }

  async startTriage(description: unknown): Promise<EventStream> {
    await this.initialize();
    return this.engine.start(description);
  }

  async resumeTriage(threadId: unknown, additionalDetails: unknown): Promise<EventStream> {
    await this.initialize();
    return this.engine.resume(threadId, additionalDetails);
  }

  /**
   * Run a ticket to its first stopping point and report the outcome as one
   * value instead of a stream.
   */
  async triageTicket(description: unknown): Promise<TriageOutcome> {
    await this.initialize();

    const run: { settled?: TicketState } = {};
    const stream = this.engine.start(description, {
      onSettled: (ticket) => {
        run.settled = ticket;
      },
    });
    const events = await collectEvents(stream);

    for (const event of events) {
      if (event.type === "classification_complete" && run.settled) {
        return {
          status: "complete",
          thread_id: run.settled.threadId,
          result: toTriageResponse(event.data, run.settled.kbMatches),
        };
      }
      if (event.type === "interrupt") {
        return { status: "needs_clarification", thread_id: event.thread_id, question: event.question };
      }
      if (event.type === "error") {
        return { status: "failed", thread_id: event.thread_id ?? "", message: event.message };
      }
    }

    throw new Error("Triage run ended without an outcome");
  }

  getHealth(): TriageHealth {
    const kbLoaded = this.index.isLoaded();
    return {
      // Entries still waiting for an embedding cannot match, so that is degraded too.
      status: this.index.isReady() ? "healthy" : "degraded",
      kb_loaded: kbLoaded,
      kb_entries: this.index.size(),
      checkpoints: this.checkpoints.size(),
    };
  }

  private async loadKnowledgeBase(): Promise<void> {
    const records =
      typeof this.knowledgeBase === "string"
        ? await loadKnowledgeBaseFile(this.knowledgeBase)
        : this.knowledgeBase;
    await this.index.load(records);
  }
}

let triageService: TriageService | null = null;

export function getTriageService(): TriageService {
  if (!triageService) {
    triageService = new TriageService({ provider: new LlmReasoningProvider() });
  }
  return triageService;
}

/**
 * Replace the shared service (for tests).
 */
export function __setTriageService(service: TriageService | null): void {
  triageService = service;
}

export { WorkflowEngine } from "./workflow-engine";
export { ReasoningGateway } from "./reasoning-gateway";
export { SimilarityIndex, cosineSimilarity } from "./similarity-index";
export { InMemoryCheckpointStore } from "./checkpoint-store";
export { EventStream, collectEvents, describeEvent, toNdjson } from "./event-stream";
export * from "./errors";
export type * from "./types";
