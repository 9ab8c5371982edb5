import { describe, it, expect, beforeEach } from "vitest";
import {
  buildEntryText,
  cosineSimilarity,
  isKnownIssueScore,
} from "../../../../lib/services/ticket-triage/similarity-index";
import { FakeReasoningProvider, conceptVector, rateLimitError } from "../../../fixtures/triage-provider";
import { createGateway, createIndex, loadSampleKnowledgeBase, record } from "./helpers";

describe("cosineSimilarity", () => {
  it("scores a vector against itself as 1", () => {
    expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([0.3, -0.7], [0.3, -0.7])).toBeCloseTo(1, 10);
  });

  it("is symmetric", () => {
    const a = [0.2, 0.9, -0.4, 1.5];
    const b = [1.1, -0.3, 0.8, 0.05];
    expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
  });

  it("returns 0 for orthogonal vectors", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("returns 0 when either vector has zero magnitude", () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBe(0);
  });

  it("returns 0 for empty or mismatched vectors", () => {
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
  });
});

describe("isKnownIssueScore", () => {
  it("treats the threshold itself as a known issue", () => {
    expect(isKnownIssueScore(0.5, 0.5)).toBe(true);
    expect(isKnownIssueScore(0.4999, 0.5)).toBe(false);
    expect(isKnownIssueScore(0.93, 0.5)).toBe(true);
  });
});

describe("buildEntryText", () => {
  it("joins title and symptoms", () => {
    expect(buildEntryText({ title: "Login loop", symptoms: ["redirects", "blank page"] })).toBe(
      "Login loop redirects blank page",
    );
  });
});

describe("SimilarityIndex", () => {
  let provider: FakeReasoningProvider;

  beforeEach(() => {
    provider = new FakeReasoningProvider();
  });

  it("embeds every record that has no vector on load", async () => {
    const index = createIndex(createGateway(provider));
    await index.load([
      record("A", { title: "checkout broken" }),
      record("B", { embedding: conceptVector("password") }),
    ]);

    expect(index.isLoaded()).toBe(true);
    expect(index.size()).toBe(2);
    expect(provider.calls.embed).toBe(1);
  });

  it("returns at most three matches sorted by descending score", async () => {
    const index = createIndex(createGateway(provider));
    await index.load(await loadSampleKnowledgeBase());

    const matches = await index.search("Checkout keeps failing with error 500 on mobile");

    expect(matches.map((match) => match.id)).toEqual(["ISSUE-101", "ISSUE-104", "ISSUE-102"]);
    expect(matches[0].score).toBe(1);
    expect(matches[1].score).toBeCloseTo(1 / Math.sqrt(12), 10);
    expect(matches[2].score).toBe(0);
    for (let i = 1; i < matches.length; i++) {
      expect(matches[i - 1].score).toBeGreaterThanOrEqual(matches[i].score);
    }
    expect(index.isKnownIssue(matches[0])).toBe(true);
    expect(index.isKnownIssue(matches[1])).toBe(false);
  });

  it("carries the recommended action on each match", async () => {
    const index = createIndex(createGateway(provider));
    await index.load(await loadSampleKnowledgeBase());

    const [top] = await index.search("Credit card update fails for my subscription");

    expect(top).toMatchObject({
      id: "ISSUE-104",
      category: "Billing",
      recommendedAction: "Escalate to Billing team; link to ISSUE-104",
    });
  });

  it("keeps load order for equal scores", async () => {
    const index = createIndex(createGateway(provider), 2);
    const vector = conceptVector("checkout");
    await index.load([
      record("FIRST", { embedding: vector }),
      record("SECOND", { embedding: vector }),
      record("THIRD", { embedding: vector }),
    ]);

    const matches = await index.search("checkout");

    expect(matches.map((match) => match.id)).toEqual(["FIRST", "SECOND"]);
  });

  it("returns an empty list when the query cannot be embedded", async () => {
    const failing = new FakeReasoningProvider({ alwaysFail: { embed: rateLimitError } });
    const index = createIndex(createGateway(failing));
    await index.load([record("A", { embedding: conceptVector("checkout") })]);

    await expect(index.search("checkout")).resolves.toEqual([]);
    expect(failing.calls.embed).toBe(2);
  });

  it("never returns more than three matches, whatever topK is set to", async () => {
    const index = createIndex(createGateway(provider), 5);
    await index.load(["A", "B", "C", "D", "E"].map((id) => record(id, { embedding: conceptVector("checkout") })));

    const matches = await index.search("checkout");

    expect(matches.map((match) => match.id)).toEqual(["A", "B", "C"]);
  });

  it("embeds entries again on the next search after a failed load", async () => {
    const flaky = new FakeReasoningProvider({
      failures: { embed: [rateLimitError, rateLimitError, rateLimitError, rateLimitError] },
    });
    const index = createIndex(createGateway(flaky));
    await index.load([
      record("A", { title: "checkout broken" }),
      record("B", { embedding: conceptVector("checkout") }),
      record("C", { embedding: conceptVector("password") }),
    ]);

    expect(index.isLoaded()).toBe(true);
    expect(index.isReady()).toBe(false);
    expect(index.missingEmbeddings()).toBe(1);

    // A fails again here, so it is left out rather than scored as 0.
    const first = await index.search("checkout");
    expect(first.map((match) => match.id)).toEqual(["B", "C"]);

    const second = await index.search("checkout");
    expect(second.map((match) => match.id)).toEqual(["A", "B", "C"]);
    expect(second[0].score).toBe(1);
    expect(index.isReady()).toBe(true);
    expect(flaky.calls.embed).toBe(6);
  });

  it("returns an empty list while no entry has a vector", async () => {
    const flaky = new FakeReasoningProvider({
      failures: { embed: [rateLimitError, rateLimitError, rateLimitError, rateLimitError] },
    });
    const index = createIndex(createGateway(flaky));
    await index.load([record("A", { title: "checkout broken" })]);

    await expect(index.search("checkout")).resolves.toEqual([]);
  });

  it("reuses the embedding of a repeated query", async () => {
    const index = createIndex(createGateway(provider));
    await index.load([record("A", { embedding: conceptVector("checkout") })]);

    await index.search("checkout fails");
    await index.search("checkout fails");

    expect(provider.calls.embed).toBe(1);
  });
});
