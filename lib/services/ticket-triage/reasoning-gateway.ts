/**
 * Reasoning Gateway
 *
 * Every call to the external reasoning service (embeddings, sufficiency
 * analysis, classification) goes through here. Transient failures (rate limit,
 * timeout, connection) are retried with exponential backoff; once retries are
 * exhausted a deterministic fallback is returned instead of an error. Any other
 * failure is raised as `PermanentGatewayError` without retrying.
 *
 * @module ticket-triage/reasoning-gateway
 */

import { executeWithBackoff, type RetryPolicy } from "../smart-retry";
import { withTimeout } from "../../utils/timeout-wrapper";
import { traceEmbedding, traceLLMCall } from "../../observability";
import {
  FALLBACK_CATEGORY,
  FALLBACK_SEVERITY,
  FALLBACK_SUMMARY_LENGTH,
  MANUAL_REVIEW_ACTION,
} from "./constants";
import {
  PermanentGatewayError,
  classifyTransientError,
  type TransientReason,
} from "./errors";
import type {
  Classification,
  IssueType,
  KbMatch,
  SufficiencyVerdict,
} from "./types";

export interface AnalyzeInput {
  threadId: string;
  description: string;
  kbMatches: KbMatch[];
}

export interface ClassifyInput {
  threadId: string;
  description: string;
  kbMatches: KbMatch[];
  /** Issue type implied by the knowledge-base matches */
  issueType: IssueType;
  clarifyingQuestion?: string;
  additionalDetails?: string;
}

/**
 * The external service itself. Implementations throw on failure; the gateway
 * decides whether to retry.
 */
export interface ReasoningProvider {
  embed(text: string): Promise<number[]>;
  analyze(input: AnalyzeInput): Promise<SufficiencyVerdict>;
  classify(input: ClassifyInput): Promise<Classification>;
}

export interface EmbedRequest {
  kind: "embed";
  text: string;
}

export interface AnalyzeRequest {
  kind: "analyze";
  input: AnalyzeInput;
}

export interface ClassifyRequest {
  kind: "classify";
  input: ClassifyInput;
}

export type ReasoningRequest = EmbedRequest | AnalyzeRequest | ClassifyRequest;
export type ReasoningKind = ReasoningRequest["kind"];

export interface GatewayResult<T> {
  value: T;
  attempts: number;
  /** True when `value` is the fallback for an exhausted retry budget */
  fallback: boolean;
  reason?: TransientReason;
}

export type GatewayObservation =
  | { type: "retry"; kind: ReasoningKind; attempt: number; delayMs: number; reason: string }
  | { type: "success"; kind: ReasoningKind; attempts: number }
  | { type: "fallback"; kind: ReasoningKind; attempts: number; reason: string }
  | { type: "failure"; kind: ReasoningKind; attempts: number; message: string };

export interface ReasoningGatewayOptions {
  retryPolicy: RetryPolicy;
  /** Per-attempt timeout; exceeding it counts as a transient timeout */
  timeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
  observer?: (observation: GatewayObservation) => void;
}

/**
 * Fallback classification when the reasoning service stays unavailable.
 */
export function buildFallbackClassification(input: ClassifyInput): Classification {
  const description = input.description.trim();
  const summary =
    description.length > FALLBACK_SUMMARY_LENGTH
      ? `${description.slice(0, FALLBACK_SUMMARY_LENGTH - 3)}...`
      : description;

  return {
    summary,
    category: FALLBACK_CATEGORY,
    severity: FALLBACK_SEVERITY,
    issue_type: input.issueType,
    next_action: MANUAL_REVIEW_ACTION,
  };
}

/**
 * Analysis that cannot reach the service lets the workflow proceed to
 * classification rather than asking the requester an empty question.
 */
const FALLBACK_VERDICT: SufficiencyVerdict = {
  sufficient: true,
  reasoning: "Analysis unavailable; proceeding with the details provided.",
};

export class ReasoningGateway {
  private readonly embedCall: (text: string) => Promise<number[]>;
  private readonly analyzeCall: (input: AnalyzeInput) => Promise<SufficiencyVerdict>;
  private readonly classifyCall: (input: ClassifyInput) => Promise<Classification>;

  constructor(
    provider: ReasoningProvider,
    private readonly options: ReasoningGatewayOptions,
  ) {
    this.embedCall = traceEmbedding((text: string) => provider.embed(text), {
      name: "reasoning_embed",
    });
    this.analyzeCall = traceLLMCall((input: AnalyzeInput) => provider.analyze(input), {
      name: "reasoning_analyze",
    });
    this.classifyCall = traceLLMCall((input: ClassifyInput) => provider.classify(input), {
      name: "reasoning_classify",
    });
  }

  invoke(request: EmbedRequest): Promise<GatewayResult<number[]>>;
  invoke(request: AnalyzeRequest): Promise<GatewayResult<SufficiencyVerdict>>;
  invoke(request: ClassifyRequest): Promise<GatewayResult<Classification>>;
  invoke(
    request: ReasoningRequest,
  ): Promise<GatewayResult<number[] | SufficiencyVerdict | Classification>> {
    switch (request.kind) {
      case "embed":
        return this.run("embed", () => this.embedCall(request.text), () => []);
      case "analyze":
        return this.run("analyze", () => this.analyzeCall(request.input), () => ({ ...FALLBACK_VERDICT }));
      case "classify":
        return this.run(
          "classify",
          () => this.classifyCall(request.input),
          () => buildFallbackClassification(request.input),
        );
    }
  }

  embed(text: string): Promise<GatewayResult<number[]>> {
    return this.invoke({ kind: "embed", text });
  }

  analyze(input: AnalyzeInput): Promise<GatewayResult<SufficiencyVerdict>> {
    return this.invoke({ kind: "analyze", input });
  }

  classify(input: ClassifyInput): Promise<GatewayResult<Classification>> {
    return this.invoke({ kind: "classify", input });
  }

  private async run<T>(
    kind: ReasoningKind,
    call: () => Promise<T>,
    fallback: () => T,
  ): Promise<GatewayResult<T>> {
    const { retryPolicy, timeoutMs, sleep, observer } = this.options;
    let attempts = 0;

    try {
      const outcome = await executeWithBackoff(
        (attempt) => {
          attempts = attempt;
          return withTimeout(call(), timeoutMs);
        },
        {
          policy: retryPolicy,
          classifyError: classifyTransientError,
          sleep,
          label: `Reasoning ${kind}`,
          onRetry: ({ attempt, delayMs, reason }) =>
            observer?.({ type: "retry", kind, attempt, delayMs, reason }),
        },
      );

      if (outcome.success) {
        observer?.({ type: "success", kind, attempts: outcome.attempts });
        return { value: outcome.result, attempts: outcome.attempts, fallback: false };
      }

      console.warn(
        `[Reasoning Gateway] ${kind} exhausted ${outcome.attempts} attempts (${outcome.reason}), using fallback`,
      );
      observer?.({ type: "fallback", kind, attempts: outcome.attempts, reason: outcome.reason });
      return {
        value: fallback(),
        attempts: outcome.attempts,
        fallback: true,
        reason: classifyTransientError(outcome.error) ?? undefined,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Reasoning Gateway] ${kind} failed permanently:`, message);
      observer?.({ type: "failure", kind, attempts, message });
      throw error instanceof PermanentGatewayError
        ? error
        : new PermanentGatewayError(message, error);
    }
  }
}
