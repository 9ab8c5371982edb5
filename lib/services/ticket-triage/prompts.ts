/**
 * Prompts and tool definitions for the reasoning service.
 */

import type { ToolDefinition } from "../anthropic-chat";
import { ASSESS_TOOL_NAME, CLASSIFY_TOOL_NAME } from "./constants";
import { formatKbContext } from "./formatters";
import type { AnalyzeInput, ClassifyInput } from "./reasoning-gateway";
import { ISSUE_TYPES, SEVERITIES, TICKET_CATEGORIES } from "./types";

export const CLASSIFY_TOOL: ToolDefinition = {
  name: CLASSIFY_TOOL_NAME,
  description: "Classify and triage a support ticket with all required fields. Call this exactly once.",
  inputSchema: {
    type: "object",
    properties: {
      summary: { type: "string", description: "1-2 line overall summary of the ticket" },
      category: { type: "string", enum: [...TICKET_CATEGORIES] },
      severity: { type: "string", enum: [...SEVERITIES] },
      issue_type: { type: "string", enum: [...ISSUE_TYPES] },
      next_action: { type: "string", description: "Suggested next step for handling this ticket" },
    },
    required: ["summary", "category", "severity", "issue_type", "next_action"],
    additionalProperties: false,
  },
};

export const ASSESS_TOOL: ToolDefinition = {
  name: ASSESS_TOOL_NAME,
  description:
    "Report whether the ticket has enough detail to classify. Call this exactly once.",
  inputSchema: {
    type: "object",
    properties: {
      sufficient: { type: "boolean" },
      clarifying_question: {
        type: "string",
        description: "One short question for the requester when the ticket is not sufficient",
      },
      reasoning: { type: "string", maxLength: 200 },
    },
    required: ["sufficient"],
    additionalProperties: false,
  },
};

export function buildAnalyzeSystemPrompt(): string {
  return `You are a support ticket triage assistant. Decide whether a ticket describes the problem well enough to classify it.

A ticket is sufficient when it names what the user was trying to do and what went wrong (an error, a symptom, or the affected feature). Vague tickets such as "it doesn't work" or "help" are not sufficient.

When the ticket is not sufficient, ask one specific clarifying question that would let you classify it.

Use the ${ASSESS_TOOL_NAME} tool to report your decision.`;
}

export function buildAnalyzeUserPrompt(input: AnalyzeInput): string {
  return `**Ticket:**\n${input.description}\n\n**Knowledge base:**\n${formatKbContext(input.kbMatches)}`;
}

export function buildClassifySystemPrompt(input: ClassifyInput): string {
  return `You are a support ticket triage assistant. Your job is to analyze support tickets and provide structured classification.

${formatKbContext(input.kbMatches)}

1. Summary: a concise 1-2 line summary of the core issue, related to any similar known issue above.

2. Category, one of:
- Billing: payment issues, invoices, subscriptions
- Login: authentication, password, 2FA problems
- Performance: slow loading, timeouts, database issues
- Bug: application errors, crashes, unexpected behavior
- Question/How-To: user asking how to do something

3. Severity:
- Critical: service completely down, affects many users
- High: major functionality broken, affects workflow
- Medium: feature not working but workarounds exist
- Low: minor issues, cosmetic problems, general questions

4. Issue type: ${input.issueType === "known_issue" ? "known_issue (a matching known issue was found)" : "new_issue (no matching known issue was found)"}.

5. Next action, for example:
- "Attach KB article [ID] and respond to user"
- "Escalate to [team] team; link to [ID]"
- "Escalate to [team] team" or "Ask customer for logs/screenshots"

Use the ${CLASSIFY_TOOL_NAME} tool to provide your structured analysis.`;
}

export function buildClassifyUserPrompt(input: ClassifyInput): string {
  const sections = [`**Ticket:**\n${input.description}`];
  if (input.clarifyingQuestion && input.additionalDetails) {
    sections.push(`**We asked:** ${input.clarifyingQuestion}`);
  }
  if (input.additionalDetails) {
    sections.push(`**Additional details from the requester:**\n${input.additionalDetails}`);
  }
  return sections.join("\n\n");
}
