/**
 * Workflow Engine
 *
 * Drives one triage run: applies the effects produced by `transition`, runs
 * the step each `run_step` effect names, and feeds the resulting signal back
 * into the machine until the run is done, failed or suspended.
 *
 * Input validation and session lookup happen before a stream is returned, so
 * a rejected request never produces events.
 *
 * @module ticket-triage/workflow-engine
 */

import { randomUUID } from "node:crypto";
import type { ZodError } from "zod";
import type { ChannelControl } from "../../utils/bounded-channel";
import type { CheckpointStore } from "./checkpoint-store";
import { SessionNotFoundError, ValidationError, describeGatewayError } from "./errors";
import { EventStream, type EmitEvent } from "./event-stream";
import type { ReasoningGateway } from "./reasoning-gateway";
import type { SimilarityIndex } from "./similarity-index";
import {
  ResumeRequestSchema,
  createStartRequestSchema,
  type IssueType,
  type TicketState,
  type WorkflowNode,
} from "./types";
import { transition, type Transition, type WorkflowPhase, type WorkflowSignal } from "./workflow-machine";

export const DEFAULT_CLARIFYING_QUESTION =
  "Could you share more details about the problem, such as what you were doing, any error message you saw, and which device or browser you were using?";

export interface WorkflowEngineDeps {
  index: SimilarityIndex;
  gateway: ReasoningGateway;
  checkpoints: CheckpointStore;
}

export interface WorkflowEngineOptions {
  maxDescriptionLength: number;
  eventBufferSize: number;
  generateThreadId?: () => string;
}

export interface RunOptions {
  threadId?: string;
  /** Called once with the final ticket when the run stops */
  onSettled?: (ticket: TicketState, phase: WorkflowPhase) => void;
}

function toValidationError(error: ZodError): ValidationError {
  const issues: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.join(".") || "body";
    issues[key] ??= issue.message;
  }
  const first = error.issues[0]?.message ?? "Invalid request";
  return new ValidationError(first, issues);
}

export class WorkflowEngine {
  private readonly startSchema: ReturnType<typeof createStartRequestSchema>;
  private readonly generateThreadId: () => string;

  constructor(
    private readonly deps: WorkflowEngineDeps,
    private readonly options: WorkflowEngineOptions,
  ) {
    this.startSchema = createStartRequestSchema(options.maxDescriptionLength);
    this.generateThreadId = options.generateThreadId ?? randomUUID;
  }

  /**
   * Begin triage of a new ticket. Throws `ValidationError` for an empty or
   * oversized description.
   */
  start(description: unknown, options: RunOptions = {}): EventStream {
    const parsed = this.startSchema.safeParse({ description });
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }

    const ticket: TicketState = {
      description: parsed.data.description,
      threadId: options.threadId?.trim() || this.generateThreadId(),
      kbMatches: [],
      needsClarification: false,
    };

    console.log(`[Triage Engine] Starting thread ${ticket.threadId}`);
    const first = transition({ status: "init" }, ticket, { type: "start" });
    return new EventStream(
      (emit, control) => this.drive(first, emit, control, options.onSettled),
      this.options.eventBufferSize,
    );
  }

  /**
   * Continue a suspended run with the requester's answer. The checkpoint is
   * claimed before the stream is returned, so of two concurrent resumes of one
   * session only the first succeeds.
   */
  async resume(
    threadId: unknown,
    additionalDetails: unknown,
    options: Pick<RunOptions, "onSettled"> = {},
  ): Promise<EventStream> {
    const parsed = ResumeRequestSchema.safeParse({
      thread_id: threadId,
      additional_details: additionalDetails,
    });
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }

    const { thread_id, additional_details } = parsed.data;
    const snapshot = await this.deps.checkpoints.take(thread_id);
    if (!snapshot || !snapshot.needsClarification) {
      throw new SessionNotFoundError(thread_id);
    }

    console.log(`[Triage Engine] Resuming thread ${thread_id}`);
    const question = snapshot.clarifyingQuestion ?? DEFAULT_CLARIFYING_QUESTION;
    const first = transition({ status: "suspended", question }, snapshot, {
      type: "resume",
      additionalDetails: additional_details,
    });

    return new EventStream(
      (emit, control) => this.drive(first, emit, control, options.onSettled, snapshot),
      this.options.eventBufferSize,
    );
  }

  private async drive(
    initial: Transition,
    emit: EmitEvent,
    control: ChannelControl,
    onSettled?: RunOptions["onSettled"],
    resumedFrom?: TicketState,
  ): Promise<void> {
    let current = initial;

    for (;;) {
      let signal: WorkflowSignal | null = null;

      for (const effect of current.effects) {
        switch (effect.kind) {
          case "emit":
            await emit(effect.event);
            break;
          case "checkpoint":
            await this.deps.checkpoints.save(current.ticket.threadId, current.ticket);
            break;
          case "run_step":
            if (control.cancelled) {
              console.log(
                `[Triage Engine] Consumer left thread ${current.ticket.threadId}; stopping before ${effect.node}`,
              );
              if (resumedFrom) {
                await this.deps.checkpoints.save(resumedFrom.threadId, resumedFrom);
              }
              return;
            }
            signal = await this.runStep(effect.node, current.ticket);
            break;
        }
      }

      if (!signal) {
        this.logOutcome(current.phase, current.ticket.threadId);
        onSettled?.(current.ticket, current.phase);
        if (current.phase.status === "failed" && resumedFrom) {
          // Keep the session resumable after a failed resume.
          await this.deps.checkpoints.save(resumedFrom.threadId, resumedFrom);
        }
        return;
      }

      const previous = current.phase.status;
      current = transition(current.phase, current.ticket, signal);
      console.log(
        `[Triage Engine] Thread ${current.ticket.threadId}: ${previous} → ${current.phase.status}`,
      );
    }
  }

  private async runStep(node: WorkflowNode, ticket: TicketState): Promise<WorkflowSignal> {
    try {
      switch (node) {
        case "search_kb":
          return { type: "kb_searched", matches: await this.deps.index.search(ticket.description) };
        case "analyze":
          return await this.analyze(ticket);
        case "classify":
          return await this.classify(ticket);
      }
    } catch (error) {
      console.error(`[Triage Engine] Step ${node} failed for thread ${ticket.threadId}:`, error);
      return { type: "failed", message: describeGatewayError(error) };
    }
  }

  private async analyze(ticket: TicketState): Promise<WorkflowSignal> {
    const { value: verdict } = await this.deps.gateway.analyze({
      threadId: ticket.threadId,
      description: ticket.description,
      kbMatches: ticket.kbMatches,
    });

    if (verdict.sufficient) {
      return { type: "analysis_sufficient", reasoning: verdict.reasoning };
    }

    const question = verdict.clarifying_question?.trim() || DEFAULT_CLARIFYING_QUESTION;
    return { type: "analysis_insufficient", question, reasoning: verdict.reasoning };
  }

  private async classify(ticket: TicketState): Promise<WorkflowSignal> {
    const issueType = this.issueTypeFor(ticket);
    const result = await this.deps.gateway.classify({
      threadId: ticket.threadId,
      description: ticket.description,
      kbMatches: ticket.kbMatches,
      issueType,
      clarifyingQuestion: ticket.clarifyingQuestion,
      additionalDetails: ticket.additionalDetails,
    });

    if (result.value.issue_type !== issueType) {
      console.warn(
        `[Triage Engine] Model reported ${result.value.issue_type} for thread ${ticket.threadId}; knowledge base says ${issueType}`,
      );
    }

    return {
      type: "classified",
      classification: { ...result.value, issue_type: issueType },
      fromModel: !result.fallback,
    };
  }

  private issueTypeFor(ticket: TicketState): IssueType {
    const [top] = ticket.kbMatches;
    return top && this.deps.index.isKnownIssue(top) ? "known_issue" : "new_issue";
  }

  private logOutcome(phase: WorkflowPhase, threadId: string): void {
    switch (phase.status) {
      case "done":
        console.log(`[Triage Engine] Thread ${threadId} complete`);
        break;
      case "suspended":
        console.log(`[Triage Engine] Thread ${threadId} waiting for clarification`);
        break;
      case "failed":
        console.warn(`[Triage Engine] Thread ${threadId} failed: ${phase.message}`);
        break;
      default:
        break;
    }
  }
}
