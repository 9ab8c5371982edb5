import { InMemoryCheckpointStore } from "../../../../lib/services/ticket-triage/checkpoint-store";
import { loadKnowledgeBaseFile } from "../../../../lib/services/ticket-triage/knowledge-base";
import { ReasoningGateway, type GatewayObservation } from "../../../../lib/services/ticket-triage/reasoning-gateway";
import { SimilarityIndex } from "../../../../lib/services/ticket-triage/similarity-index";
import type { KnowledgeBaseRecord } from "../../../../lib/services/ticket-triage/types";
import { WorkflowEngine } from "../../../../lib/services/ticket-triage/workflow-engine";
import type { RetryPolicy } from "../../../../lib/services/smart-retry";
import { FakeReasoningProvider } from "../../../fixtures/triage-provider";

export const TEST_RETRY_POLICY: RetryPolicy = { maxRetries: 1, initialDelayMs: 10, backoffFactor: 2 };

export const noSleep = async (): Promise<void> => {};

export function createGateway(
  provider: FakeReasoningProvider = new FakeReasoningProvider(),
  observer?: (observation: GatewayObservation) => void,
): ReasoningGateway {
  return new ReasoningGateway(provider, {
    retryPolicy: TEST_RETRY_POLICY,
    timeoutMs: 1000,
    sleep: noSleep,
    observer,
  });
}

export function createIndex(gateway: ReasoningGateway, topK = 3): SimilarityIndex {
  return new SimilarityIndex(gateway, { topK, similarityThreshold: 0.5 });
}

export function loadSampleKnowledgeBase(): Promise<KnowledgeBaseRecord[]> {
  return loadKnowledgeBaseFile("data/knowledge-base.json");
}

export function record(
  id: string,
  overrides: Partial<KnowledgeBaseRecord> = {},
): KnowledgeBaseRecord {
  return {
    id,
    title: `Issue ${id}`,
    category: "Bug",
    symptoms: [],
    recommended_action: `Handle ${id}`,
    ...overrides,
  };
}

export async function createEngine(
  provider: FakeReasoningProvider = new FakeReasoningProvider(),
  options: { eventBufferSize?: number } = {},
) {
  const gateway = createGateway(provider);
  const index = createIndex(gateway);
  await index.load(await loadSampleKnowledgeBase());
  const checkpoints = new InMemoryCheckpointStore({ ttlMs: 24 * 60 * 60 * 1000, maxEntries: 1000 });
  let counter = 0;
  const engine = new WorkflowEngine(
    { index, gateway, checkpoints },
    {
      maxDescriptionLength: 5000,
      eventBufferSize: options.eventBufferSize ?? 16,
      generateThreadId: () => `thread-${++counter}`,
    },
  );
  return { engine, checkpoints, provider };
}
