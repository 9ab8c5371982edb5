/**
 * Triage workflow state machine.
 *
 * `transition` is pure: given the current phase, the ticket and a signal
 * produced by a step (or by the caller), it returns the next phase, the updated
 * ticket, and the effects the runner must apply in order. Only `run_step`
 * effects call out to the outside world.
 *
 *   init → searching_kb → analyzing → suspended ─resume→ classifying → done
 *                                   └────────────────→ classifying
 *   any non-terminal phase ─failed→ failed
 */

import {
  CLASSIFY_TOOL_NAME,
  NODE_ANALYZE,
  NODE_CLASSIFY,
  NODE_SEARCH_KB,
  STATUS_COMPLETE,
  STATUS_RESUMED,
  STATUS_STARTED,
} from "./constants";
import { TriageError } from "./errors";
import { formatKbSearchSummary } from "./formatters";
import type { Classification, KbMatch, StreamEvent, TicketState, WorkflowNode } from "./types";

export type WorkflowPhase =
  | { status: "init" }
  | { status: "searching_kb" }
  | { status: "analyzing" }
  | { status: "suspended"; question: string }
  | { status: "classifying" }
  | { status: "done" }
  | { status: "failed"; message: string };

export type WorkflowStatus = WorkflowPhase["status"];

export type WorkflowSignal =
  | { type: "start" }
  | { type: "kb_searched"; matches: KbMatch[] }
  | { type: "analysis_sufficient"; reasoning?: string }
  | { type: "analysis_insufficient"; question: string; reasoning?: string }
  | { type: "resume"; additionalDetails: string }
  | { type: "classified"; classification: Classification; fromModel: boolean }
  | { type: "failed"; message: string };

export type WorkflowEffect =
  | { kind: "emit"; event: StreamEvent }
  | { kind: "checkpoint" }
  | { kind: "run_step"; node: WorkflowNode };

export interface Transition {
  phase: WorkflowPhase;
  ticket: TicketState;
  effects: WorkflowEffect[];
}

export class InvalidTransitionError extends TriageError {
  constructor(
    public readonly from: WorkflowStatus,
    public readonly signal: WorkflowSignal["type"],
  ) {
    super(`Signal "${signal}" is not valid in phase "${from}"`, 409);
    this.name = "InvalidTransitionError";
  }
}

export function isTerminal(phase: WorkflowPhase): boolean {
  return phase.status === "done" || phase.status === "failed" || phase.status === "suspended";
}

function emit(event: StreamEvent): WorkflowEffect {
  return { kind: "emit", event };
}

function enterNode(node: WorkflowNode, threadId: string): WorkflowEffect[] {
  return [emit({ type: "node_start", node, thread_id: threadId }), { kind: "run_step", node }];
}

function mergeDetails(existing: string | undefined, added: string): string {
  return existing ? `${existing}\n${added}` : added;
}

export function transition(
  phase: WorkflowPhase,
  ticket: TicketState,
  signal: WorkflowSignal,
): Transition {
  const threadId = ticket.threadId;

  if (signal.type === "failed") {
    if (isTerminal(phase)) {
      throw new InvalidTransitionError(phase.status, signal.type);
    }
    return {
      phase: { status: "failed", message: signal.message },
      ticket,
      effects: [emit({ type: "error", message: signal.message, thread_id: threadId })],
    };
  }

  switch (phase.status) {
    case "init":
      if (signal.type !== "start") break;
      return {
        phase: { status: "searching_kb" },
        ticket,
        effects: [
          emit({ type: "status", message: STATUS_STARTED, thread_id: threadId }),
          ...enterNode(NODE_SEARCH_KB, threadId),
        ],
      };

    case "searching_kb":
      if (signal.type !== "kb_searched") break;
      return {
        phase: { status: "analyzing" },
        ticket: { ...ticket, kbMatches: signal.matches },
        effects: [
          emit({ type: "node_complete", node: NODE_SEARCH_KB, thread_id: threadId }),
          emit({ type: "kb_search_complete", data: formatKbSearchSummary(signal.matches), thread_id: threadId }),
          ...enterNode(NODE_ANALYZE, threadId),
        ],
      };

    case "analyzing": {
      if (signal.type !== "analysis_sufficient" && signal.type !== "analysis_insufficient") break;
      const reasoning = signal.reasoning
        ? [emit({ type: "message", content: signal.reasoning, thread_id: threadId })]
        : [];

      if (signal.type === "analysis_sufficient") {
        return {
          phase: { status: "classifying" },
          ticket,
          effects: [
            ...reasoning,
            emit({ type: "node_complete", node: NODE_ANALYZE, thread_id: threadId }),
            ...enterNode(NODE_CLASSIFY, threadId),
          ],
        };
      }

      return {
        phase: { status: "suspended", question: signal.question },
        ticket: { ...ticket, needsClarification: true, clarifyingQuestion: signal.question },
        effects: [
          ...reasoning,
          emit({ type: "node_complete", node: NODE_ANALYZE, thread_id: threadId }),
          { kind: "checkpoint" },
          emit({ type: "interrupt", question: signal.question, thread_id: threadId }),
        ],
      };
    }

    case "suspended":
      if (signal.type !== "resume") break;
      return {
        phase: { status: "classifying" },
        ticket: {
          ...ticket,
          needsClarification: false,
          additionalDetails: mergeDetails(ticket.additionalDetails, signal.additionalDetails),
        },
        effects: [
          emit({ type: "status", message: STATUS_RESUMED, thread_id: threadId }),
          ...enterNode(NODE_CLASSIFY, threadId),
        ],
      };

    case "classifying":
      if (signal.type !== "classified") break;
      return {
        phase: { status: "done" },
        ticket: { ...ticket, classification: signal.classification },
        effects: [
          ...(signal.fromModel
            ? [emit({ type: "tool_call", name: CLASSIFY_TOOL_NAME, args: { ...signal.classification }, thread_id: threadId })]
            : []),
          emit({ type: "node_complete", node: NODE_CLASSIFY, thread_id: threadId }),
          emit({ type: "classification_complete", data: signal.classification, thread_id: threadId }),
          emit({ type: "status", message: STATUS_COMPLETE, thread_id: threadId }),
        ],
      };

    case "done":
    case "failed":
      break;
  }

  throw new InvalidTransitionError(phase.status, signal.type);
}
