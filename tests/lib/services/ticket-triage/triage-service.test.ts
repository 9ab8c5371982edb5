import { describe, it, expect } from "vitest";
import { TriageService } from "../../../../lib/services/ticket-triage";
import { InMemoryCheckpointStore } from "../../../../lib/services/ticket-triage/checkpoint-store";
import { collectEvents } from "../../../../lib/services/ticket-triage/event-stream";
import {
  FakeReasoningProvider,
  VAGUE_TICKET_QUESTION,
  badRequestError,
  rateLimitError,
} from "../../../fixtures/triage-provider";
import { TEST_RETRY_POLICY, noSleep, record } from "./helpers";

const SETTINGS = {
  maxDescriptionLength: 5000,
  similarityThreshold: 0.5,
  topK: 3,
  eventBufferSize: 16,
  llmTimeoutMs: 1000,
};

function createService(provider = new FakeReasoningProvider(), knowledgeBase: string | ReturnType<typeof record>[] = "data/knowledge-base.json") {
  let counter = 0;
  return new TriageService({
    provider,
    knowledgeBase,
    settings: SETTINGS,
    retryPolicy: TEST_RETRY_POLICY,
    sleep: noSleep,
    checkpoints: new InMemoryCheckpointStore({ ttlMs: 60_000, maxEntries: 10 }),
    generateThreadId: () => `thread-${++counter}`,
  });
}

describe("TriageService", () => {
  it("reports a degraded status until the knowledge base is loaded", async () => {
    const service = createService();
    expect(service.getHealth()).toEqual({ status: "degraded", kb_loaded: false, kb_entries: 0, checkpoints: 0 });

    await service.initialize();

    expect(service.getHealth()).toEqual({ status: "healthy", kb_loaded: true, kb_entries: 6, checkpoints: 0 });
  });

  it("loads the knowledge base only once", async () => {
    const provider = new FakeReasoningProvider();
    const service = createService(provider);

    await Promise.all([service.initialize(), service.initialize()]);
    await service.initialize();

    expect(provider.calls.embed).toBe(6);
  });

  it("retries initialization after a failed load", async () => {
    const service = createService(new FakeReasoningProvider(), "data/missing-knowledge-base.json");

    await expect(service.initialize()).rejects.toThrow();
    await expect(service.initialize()).rejects.toThrow();
    expect(service.getHealth().kb_loaded).toBe(false);
  });

  it("recovers known issues after the embedding service was down during load", async () => {
    // Six entries, two attempts each.
    const provider = new FakeReasoningProvider({
      failures: { embed: Array.from({ length: 12 }, () => rateLimitError) },
    });
    const service = createService(provider);

    await service.initialize();
    expect(service.getHealth()).toEqual({ status: "degraded", kb_loaded: true, kb_entries: 6, checkpoints: 0 });

    const outcome = await service.triageTicket("Checkout keeps failing with error 500 on mobile");

    expect(outcome.status).toBe("complete");
    if (outcome.status === "complete") {
      expect(outcome.result.issue_type).toBe("known_issue");
      expect(outcome.result.related_issues[0]).toEqual({
        id: "ISSUE-101",
        title: "Checkout error 500 on mobile",
        similarity_score: 1,
      });
    }
    expect(service.getHealth().status).toBe("healthy");
  });

  it("returns the classification with related issues for a one-shot triage", async () => {
    const service = createService();

    const outcome = await service.triageTicket("Checkout keeps failing with error 500 on mobile");

    expect(outcome).toEqual({
      status: "complete",
      thread_id: "thread-1",
      result: {
        summary: "Checkout keeps failing with error 500 on mobile",
        category: "Bug",
        severity: "High",
        issue_type: "known_issue",
        next_action: "Escalate to Payments team; link to ISSUE-101",
        related_issues: [
          { id: "ISSUE-101", title: "Checkout error 500 on mobile", similarity_score: 1 },
          {
            id: "ISSUE-104",
            title: "Credit card update fails for subscription",
            similarity_score: expect.closeTo(1 / Math.sqrt(12), 10),
          },
          { id: "ISSUE-102", title: "Password reset email not received", similarity_score: 0 },
        ],
      },
    });
  });

  it("returns the clarifying question for a vague one-shot triage", async () => {
    const service = createService();

    const outcome = await service.triageTicket("it doesn't work");

    expect(outcome).toEqual({
      status: "needs_clarification",
      thread_id: "thread-1",
      question: VAGUE_TICKET_QUESTION,
    });
    expect(service.getHealth().checkpoints).toBe(1);
  });

  it("reports a failed one-shot triage", async () => {
    const service = createService(new FakeReasoningProvider({ alwaysFail: { classify: badRequestError } }));

    const outcome = await service.triageTicket("Checkout keeps failing with error 500 on mobile");

    expect(outcome).toEqual({
      status: "failed",
      thread_id: "thread-1",
      message: "AI service error: 400 invalid request",
    });
  });

  it("streams a run started and resumed through the facade", async () => {
    const service = createService(new FakeReasoningProvider(), [
      record("ISSUE-1", { title: "Checkout error", symptoms: ["500 on mobile"] }),
    ]);

    const started = await collectEvents(await service.startTriage("it doesn't work"));
    expect(started[started.length - 1].type).toBe("interrupt");

    const resumed = await collectEvents(await service.resumeTriage("thread-1", "checkout fails on mobile"));
    expect(resumed[resumed.length - 1]).toEqual({
      type: "status",
      message: "Triage complete",
      thread_id: "thread-1",
    });
  });
});
