import { z } from "zod";

import { ERROR_CODES, GithubApiError } from "../github/errors.js";
import type { StructuredLogger } from "../logger.js";

/**
 * Error envelope returned by tool handlers. The text block carries the JSON
 * payload so clients without structured output support can still parse the
 * code, hint and details.
 */
export interface ToolErrorResponse {
  [key: string]: unknown;
  isError: true;
  content: Array<{ type: "text"; text: string }>;
  structuredContent: ToolErrorPayload;
}

export type ToolErrorPayload = {
  ok: false;
  error: string;
  tool: string;
  message: string;
  hint?: string;
  details?: unknown;
};

/** Machine readable view of a thrown error. */
export interface NormalisedToolError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/**
 * Maps anything a handler may throw onto a stable code. GitHub failures keep
 * their own code and hint, zod failures become validation errors, and any
 * other value falls back to the unexpected code with its message preserved.
 */
export function normaliseToolError(error: unknown): NormalisedToolError {
  if (error instanceof GithubApiError) {
    return {
      code: error.code,
      message: error.message,
      hint: error.hint,
      ...(error.details !== undefined ? { details: error.details } : {}),
    };
  }
  if (error instanceof z.ZodError) {
    return {
      code: ERROR_CODES.validation,
      message: "Invalid tool input.",
      hint: "invalid_input",
      details: { issues: error.issues },
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    code: ERROR_CODES.unexpected,
    message: message.trim().length > 0 ? message : "Unexpected failure.",
    hint: "report_issue",
  };
}

/** Logs the failure as `<tool>_failed` and wraps it into an MCP error result. */
export function githubToolError(
  logger: StructuredLogger,
  toolName: string,
  error: unknown,
  context: Record<string, unknown> = {},
): ToolErrorResponse {
  const normalised = normaliseToolError(error);
  logger.error(`${toolName}_failed`, {
    ...context,
    message: normalised.message,
    code: normalised.code,
    ...(error instanceof GithubApiError ? { status: error.status, attempts: error.attempts } : {}),
    details: normalised.details,
  });

  const payload: ToolErrorPayload = {
    ok: false,
    error: normalised.code,
    tool: toolName,
    message: normalised.message,
  };
  if (normalised.hint) {
    payload.hint = normalised.hint;
  }
  if (normalised.details !== undefined) {
    payload.details = normalised.details;
  }

  return {
    isError: true,
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    structuredContent: payload,
  };
}
