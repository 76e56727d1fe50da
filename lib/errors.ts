// lib/errors.ts
// Stable error codes shared by the core, the detector and the route handlers.
// Routes turn any EstimatorError into { error, error_code } with its status.

export const ERR = {
  NO_IMAGE: "E_NO_IMAGE",
  BAD_URL: "E_BAD_URL",
  TOO_LARGE: "E_TOO_LARGE",
  INVALID_INPUT: "E_INVALID_INPUT",
  DETECTION_UNAVAILABLE: "E_DETECTION_UNAVAILABLE",
  NOT_FOUND: "E_NOT_FOUND",
  RATE_LIMIT: "E_RATE_LIMIT",
  CONFIG: "E_CONFIG",
  SERVER: "E_SERVER",
} as const;

export type ErrorCode = (typeof ERR)[keyof typeof ERR];

export class EstimatorError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(message: string, code: ErrorCode, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Malformed request or precondition violation; nothing was computed. */
export class InvalidInputError extends EstimatorError {
  constructor(message: string, code: ErrorCode = ERR.INVALID_INPUT) {
    super(message, code, 400);
  }
}

/** The hosted detection model could not be reached or answered garbage. */
export class DetectionUnavailableError extends EstimatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ERR.DETECTION_UNAVAILABLE, 503, options);
  }
}

export class ConfigError extends EstimatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`[config] ${message}`, ERR.CONFIG, 500, options);
  }
}

export class NotFoundError extends EstimatorError {
  constructor(message: string) {
    super(message, ERR.NOT_FOUND, 404);
  }
}

export function errorMessage(e: unknown, fallback = "Server error"): string {
  return e instanceof Error ? e.message : fallback;
}
