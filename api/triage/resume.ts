/**
 * Resume Triage (streaming)
 *
 * POST /api/triage/resume
 * Body: { "thread_id": string, "additional_details": string }
 *
 * Continues a session suspended by an `interrupt` event. Unknown or already
 * resumed sessions return 404.
 */

import { getTriageService } from "../../lib/services/ticket-triage";
import { errorResponse, ndjsonResponse, readJsonBody } from "../../lib/services/ticket-triage/http";

export async function POST(request: Request): Promise<Response> {
  try {
    const body = await readJsonBody(request);
    const stream = await getTriageService().resumeTriage(body.thread_id, body.additional_details);
    return ndjsonResponse(stream);
  } catch (error) {
    return errorResponse(error);
  }
}
