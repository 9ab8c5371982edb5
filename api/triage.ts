/**
 * Triage (one-shot)
 *
 * POST /api/triage
 * Body: { "description": string }
 *
 * Runs the workflow to its first stopping point and returns either the
 * classification with related issues, or the clarifying question and the
 * thread id to resume with.
 */

import { getTriageService } from "../lib/services/ticket-triage";
import { errorResponse, jsonResponse, readJsonBody } from "../lib/services/ticket-triage/http";

export async function POST(request: Request): Promise<Response> {
  try {
    const body = await readJsonBody(request);
    const outcome = await getTriageService().triageTicket(body.description);

    switch (outcome.status) {
      case "complete":
        return jsonResponse(outcome.result);
      case "needs_clarification":
        return jsonResponse(outcome);
      case "failed":
        return jsonResponse({ error: "Triage failed", detail: outcome.message, thread_id: outcome.thread_id }, 502);
    }
  } catch (error) {
    return errorResponse(error);
  }
}
