/**
 * Response helpers shared by the triage HTTP handlers.
 */

import { toNdjson } from "./event-stream";
import { SessionNotFoundError, TriageError, ValidationError } from "./errors";
import type { StreamEvent } from "./types";

export const NDJSON_CONTENT_TYPE = "application/x-ndjson";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "content-type": "application/json",
      "cache-control": "no-store",
    },
  });
}

export function ndjsonResponse(stream: AsyncIterable<StreamEvent>): Response {
  return new Response(toNdjson(stream), {
    status: 200,
    headers: {
      "content-type": NDJSON_CONTENT_TYPE,
      "cache-control": "no-store",
    },
  });
}

/**
 * Parse a JSON request body. A missing or malformed body is a validation error.
 */
export async function readJsonBody(request: Request): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }

  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new ValidationError("Request body must be a JSON object");
  }

  return { ...body };
}

export function errorResponse(error: unknown): Response {
  if (error instanceof ValidationError) {
    return jsonResponse({ error: "Invalid request", detail: error.message, issues: error.issues }, 400);
  }
  if (error instanceof SessionNotFoundError) {
    return jsonResponse({ error: "Session not found", detail: error.message }, 404);
  }
  if (error instanceof TriageError) {
    return jsonResponse({ error: error.name, detail: error.message }, error.statusCode ?? 500);
  }

  console.error("[Triage API] Unexpected error:", error);
  return jsonResponse(
    {
      error: "Internal server error",
      detail: error instanceof Error ? error.message : "Unknown error",
    },
    500,
  );
}
