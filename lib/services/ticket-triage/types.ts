/**
 * Ticket Triage Types
 *
 * Schemas for knowledge-base data and model output are Zod schemas, because
 * both cross a trust boundary. Workflow state is plain TypeScript.
 */

import { z } from "zod";

export const TICKET_CATEGORIES = ["Bug", "Login", "Performance", "Billing", "Question/How-To"] as const;
export const SEVERITIES = ["Low", "Medium", "High", "Critical"] as const;
export const ISSUE_TYPES = ["known_issue", "new_issue"] as const;

export type TicketCategory = (typeof TICKET_CATEGORIES)[number];
export type Severity = (typeof SEVERITIES)[number];
export type IssueType = (typeof ISSUE_TYPES)[number];

export const KnowledgeBaseRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  category: z.enum(TICKET_CATEGORIES),
  symptoms: z.array(z.string()).default([]),
  recommended_action: z.string().default(""),
  embedding: z.array(z.number()).optional(),
});

export const KnowledgeBaseFileSchema = z.array(KnowledgeBaseRecordSchema);

export type KnowledgeBaseRecord = z.infer<typeof KnowledgeBaseRecordSchema>;

export interface KnowledgeBaseEntry {
  readonly id: string;
  readonly title: string;
  readonly category: TicketCategory;
  readonly symptoms: readonly string[];
  readonly recommendedAction: string;
  readonly embedding: readonly number[];
}

export interface KbMatch {
  id: string;
  title: string;
  category: TicketCategory;
  score: number;
  recommendedAction: string;
}

export const ClassificationSchema = z.object({
  summary: z.string().min(1),
  category: z.enum(TICKET_CATEGORIES),
  severity: z.enum(SEVERITIES),
  issue_type: z.enum(ISSUE_TYPES),
  next_action: z.string().min(1),
});

export type Classification = z.infer<typeof ClassificationSchema>;

export const SufficiencyVerdictSchema = z.object({
  sufficient: z.boolean(),
  clarifying_question: z.string().optional(),
  reasoning: z.string().optional(),
});

export type SufficiencyVerdict = z.infer<typeof SufficiencyVerdictSchema>;

export interface TicketState {
  description: string;
  threadId: string;
  kbMatches: KbMatch[];
  needsClarification: boolean;
  clarifyingQuestion?: string;
  additionalDetails?: string;
  classification?: Classification;
}

export type WorkflowNode = "search_kb" | "analyze" | "classify";

/**
 * Events reported to the caller, in wire format.
 * `thread_id` is present on every event once the session id is minted.
 */
export type StreamEvent =
  | { type: "status"; message: string; thread_id?: string }
  | { type: "node_start"; node: WorkflowNode; thread_id?: string }
  | { type: "node_complete"; node: WorkflowNode; thread_id?: string }
  | { type: "kb_search_complete"; data: string; thread_id?: string }
  | { type: "classification_complete"; data: Classification; thread_id?: string }
  | { type: "tool_call"; name: string; args: Record<string, unknown>; thread_id?: string }
  | { type: "message"; content: string; thread_id?: string }
  | { type: "interrupt"; question: string; thread_id: string }
  | { type: "error"; message: string; thread_id?: string };

export type StreamEventType = StreamEvent["type"];

export function createStartRequestSchema(maxDescriptionLength: number) {
  return z.object({
    description: z
      .string({ required_error: "description is required" })
      .trim()
      .min(1, "Description cannot be empty")
      .max(maxDescriptionLength, "Description too long"),
  });
}

export const ResumeRequestSchema = z.object({
  thread_id: z.string({ required_error: "thread_id is required" }).trim().min(1, "thread_id is required"),
  additional_details: z
    .string({ required_error: "additional_details is required" })
    .trim()
    .min(1, "additional_details cannot be empty"),
});

export type StartTriageRequest = z.infer<ReturnType<typeof createStartRequestSchema>>;
export type ResumeTriageRequest = z.infer<typeof ResumeRequestSchema>;

/**
 * One-shot response shape, matching the non-streaming triage endpoint.
 */
export interface TriageResponse {
  summary: string;
  category: TicketCategory;
  severity: Severity;
  issue_type: IssueType;
  related_issues: Array<{ id: string; title: string; similarity_score: number }>;
  next_action: string;
}
