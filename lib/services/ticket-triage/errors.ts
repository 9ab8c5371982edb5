/**
 * Ticket Triage Error Types
 */

import { isTimeoutError } from "../../utils/timeout-wrapper";

/**
 * Base error class for all triage errors
 */
export class TriageError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "TriageError";

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TriageError);
    }
  }
}

export type TransientReason = "rate_limit" | "timeout" | "connection";

/**
 * Reasoning service failure worth retrying. Never escapes the gateway.
 */
export class TransientGatewayError extends TriageError {
  constructor(
    message: string,
    public readonly reason: TransientReason,
    cause?: unknown,
  ) {
    super(message, 503, cause);
    this.name = "TransientGatewayError";
  }
}

/**
 * Reasoning service failure that retrying will not fix. Aborts the workflow.
 */
export class PermanentGatewayError extends TriageError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, cause);
    this.name = "PermanentGatewayError";
  }
}

export class SessionNotFoundError extends TriageError {
  constructor(public readonly threadId: string) {
    super(`Session not found: ${threadId}`, 404);
    this.name = "SessionNotFoundError";
  }
}

export class ValidationError extends TriageError {
  constructor(
    message: string,
    public readonly issues: Record<string, string> = {},
  ) {
    super(message, 400);
    this.name = "ValidationError";
  }
}

interface ErrorWithStatus {
  status?: unknown;
  name?: unknown;
  code?: unknown;
}

function readErrorFields(error: unknown): ErrorWithStatus {
  if (typeof error !== "object" || error === null) {
    return {};
  }
  return {
    status: "status" in error ? error.status : undefined,
    name: "name" in error ? error.name : undefined,
    code: "code" in error ? error.code : undefined,
  };
}

const CONNECTION_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN", "EPIPE"]);

/**
 * Map an error thrown by a provider SDK to a transient reason, or null when it
 * is permanent.
 *
 * Both the Anthropic and OpenAI SDKs raise `RateLimitError` (status 429),
 * `APIConnectionTimeoutError` and `APIConnectionError`; matching on the error
 * name covers either client.
 */
export function classifyTransientError(error: unknown): TransientReason | null {
  if (error instanceof TransientGatewayError) {
    return error.reason;
  }
  if (error instanceof TriageError) {
    return null;
  }
  if (isTimeoutError(error)) {
    return "timeout";
  }

  const { status, name, code } = readErrorFields(error);

  if (status === 429 || name === "RateLimitError") {
    return "rate_limit";
  }
  if (status === 408 || name === "APIConnectionTimeoutError") {
    return "timeout";
  }
  if (name === "APIConnectionError" || (typeof code === "string" && CONNECTION_CODES.has(code))) {
    return "connection";
  }
  return null;
}

/**
 * User-facing message for a failure surfaced on the event stream.
 */
export function describeGatewayError(error: unknown): string {
  if (error instanceof PermanentGatewayError) {
    return `AI service error: ${error.message}`;
  }
  if (error instanceof TriageError) {
    return error.message;
  }

  switch (classifyTransientError(error)) {
    case "rate_limit":
      return "API rate limit exceeded. Please try again in a moment.";
    case "timeout":
      return "Request timed out. Please try again.";
    case "connection":
      return "Unable to connect to AI service. Please check your internet connection.";
    default:
      return "An unexpected error occurred. Please try again.";
  }
}
