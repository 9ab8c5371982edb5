/**
 * Health Check Endpoint
 *
 * GET /api/health
 *
 * Reports whether the knowledge base is loaded and how many sessions are
 * waiting for clarification.
 */

import { getTriageService } from "../lib/services/ticket-triage";
import { jsonResponse } from "../lib/services/ticket-triage/http";

export const dynamic = "force-dynamic";

export async function GET(): Promise<Response> {
  try {
    const health = getTriageService().getHealth();
    return jsonResponse({ ...health, timestamp: new Date().toISOString() });
  } catch (error) {
    console.error("[Health] Triage service unavailable:", error);
    return jsonResponse(
      {
        status: "unhealthy",
        kb_loaded: false,
        kb_entries: 0,
        checkpoints: 0,
        error: error instanceof Error ? error.message : "Unknown error",
        timestamp: new Date().toISOString(),
      },
      503,
    );
  }
}
