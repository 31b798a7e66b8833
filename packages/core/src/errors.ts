/**
 * Error taxonomy for the mission planning core.
 *
 * Every error raised on purpose carries a stable code from
 * {@link ErrorCodeSchema} so callers can branch without parsing messages.
 */

import { z } from "zod";

// ─── Error Codes ────────────────────────────────────────────────────────────

export const ErrorCodeSchema = z.enum([
  "CONFIGURATION_ERROR",
  "GEOMETRY_INPUT_ERROR",
  "COVERAGE_DATA_ERROR",
  "TIMELINE_COMPUTATION_ERROR",
  "INTERNAL_ERROR",
]);

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

export const ErrorResponseSchema = z.object({
  error: z.object({
    code: ErrorCodeSchema,
    message: z.string(),
  }),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// ─── Error Classes ──────────────────────────────────────────────────────────

export class MissionPlanningError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Mission window cannot be derived, or configuration failed validation. */
export class ConfigurationError extends MissionPlanningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION_ERROR", message, options);
  }
}

/** Non-finite coordinates, altitude or satellite longitude. */
export class GeometryInputError extends MissionPlanningError {
  constructor(message: string) {
    super("GEOMETRY_INPUT_ERROR", message);
  }
}

/** Coverage dataset could not be read as footprints. */
export class CoverageDataError extends MissionPlanningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("COVERAGE_DATA_ERROR", message, options);
  }
}

/** A timeline build failed; nothing from it should be kept. */
export class TimelineComputationError extends MissionPlanningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TIMELINE_COMPUTATION_ERROR", message, options);
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

export function isMissionPlanningError(
  error: unknown,
): error is MissionPlanningError {
  return error instanceof MissionPlanningError;
}

/** Map any thrown value to the shared error response envelope. */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (isMissionPlanningError(error)) {
    return { error: { code: error.code, message: error.message } };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { error: { code: "INTERNAL_ERROR", message } };
}

/** Flatten zod issues into a single readable line. */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
