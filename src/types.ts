/**
 * Error codes and helpers shared by every module. Keeping the catalogue in one
 * place means the CLI, the logs and the tests agree on the same identifiers.
 */
import { z } from "zod";

export const ERROR_CATALOG = {
  CATALOG: {
    SOURCE: "E-CATALOG-SOURCE",
    DECODE: "E-CATALOG-DECODE",
    INTEGRITY: "E-CATALOG-INTEGRITY",
  },
  FILTER: {
    UNRECOGNIZED: "E-FILTER-UNRECOGNIZED",
    INVALID: "E-FILTER-INVALID",
  },
  LIST: {
    SOURCE: "E-LIST-SOURCE",
  },
  REGION: {
    TABLE: "E-REGION-TABLE",
  },
  PROBE: {
    PERMISSION: "E-PROBE-PERMISSION",
    UNAVAILABLE: "E-PROBE-UNAVAILABLE",
    FAILED: "E-PROBE-FAILED",
    TIMEOUT: "E-PROBE-TIMEOUT",
    CANCELLED: "E-PROBE-CANCELLED",
  },
  RANK: {
    MISSING_LATENCY: "E-RANK-MISSING-LATENCY",
  },
  CONFIG: {
    INVALID: "E-CONFIG-INVALID",
  },
  UNEXPECTED: "E-UNEXPECTED",
} as const;

/** Flattened view of a thrown value, suitable for logs and CLI output. */
export interface NormalisedError {
  code: string;
  message: string;
  details?: unknown;
}

/** Shape shared by the typed errors of this package. */
interface CodedError extends Error {
  code: string;
  details?: unknown;
}

function isCodedError(error: unknown): error is CodedError {
  return error instanceof Error && typeof (error as { code?: unknown }).code === "string";
}

/**
 * Normalises any thrown value. Typed errors keep their code and details, zod
 * issues are reported under {@link fallbackZodCode}, everything else becomes
 * {@link ERROR_CATALOG.UNEXPECTED}.
 */
export function normaliseError(
  error: unknown,
  fallbackZodCode: string = ERROR_CATALOG.CONFIG.INVALID,
): NormalisedError {
  if (error instanceof z.ZodError) {
    return {
      code: fallbackZodCode,
      message: error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; "),
      details: { issues: error.issues },
    };
  }
  if (isCodedError(error)) {
    return {
      code: error.code,
      message: error.message,
      ...(error.details !== undefined ? { details: error.details } : {}),
    };
  }
  return {
    code: ERROR_CATALOG.UNEXPECTED,
    message: error instanceof Error ? error.message : String(error),
  };
}
