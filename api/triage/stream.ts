/**
 * Start Triage (streaming)
 *
 * POST /api/triage/stream
 * Body: { "description": string }
 *
 * Responds with newline-delimited JSON events. Validation errors are returned
 * as JSON 400 before any event is sent.
 */

import { getTriageService } from "../../lib/services/ticket-triage";
import { errorResponse, ndjsonResponse, readJsonBody } from "../../lib/services/ticket-triage/http";

export async function POST(request: Request): Promise<Response> {
  try {
    const body = await readJsonBody(request);
    const stream = await getTriageService().startTriage(body.description);
    return ndjsonResponse(stream);
  } catch (error) {
    return errorResponse(error);
  }
}
