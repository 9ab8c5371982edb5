/**
 * Service info
 *
 * GET /api
 */

import { jsonResponse } from "../lib/services/ticket-triage/http";

export const SERVICE_NAME = "Ticket Triage API";

export async function GET(): Promise<Response> {
  return jsonResponse({ name: SERVICE_NAME, status: "running" });
}
