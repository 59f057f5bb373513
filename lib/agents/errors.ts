/**
 * Pipeline error taxonomy.
 *
 * Every error raised by the pipeline carries a machine-readable code, a
 * severity and free-form context so that it can be logged as structured data
 * and attached to a DocumentResult.
 */

export enum ProcessingErrorSeverity { LOW, MEDIUM, HIGH, CRITICAL }

export const ERROR_CODES = {
  EXTRACTION_FAILED: "EXTRACTION_FAILED",
  RETRIEVAL_FAILED: "RETRIEVAL_FAILED",
  SELECTION_FAILED: "SELECTION_FAILED",
  CONFIGURATION_INVALID: "CONFIGURATION_INVALID",
  LLM_REQUEST_FAILED: "LLM_REQUEST_FAILED",
  LLM_RESPONSE_INVALID: "LLM_RESPONSE_INVALID",
  EMBEDDING_REQUEST_FAILED: "EMBEDDING_REQUEST_FAILED",
  TIMEOUT_EXCEEDED: "TIMEOUT_EXCEEDED",
  INVALID_STATE_TRANSITION: "INVALID_STATE_TRANSITION",
  CANCELLED: "CANCELLED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const DEFAULT_TIMEOUTS = {
  LLM_REQUEST: 60000, // 60 seconds
  EMBEDDING_REQUEST: 60000,
} as const;

export interface ProcessingError {
  code: ErrorCode;
  message: string;
  severity: ProcessingErrorSeverity;
  timestamp: Date;
  context?: Record<string, unknown>;
}

export class PipelineError extends Error implements ProcessingError {
  public readonly code: ErrorCode;
  public readonly severity: ProcessingErrorSeverity;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    severity: ProcessingErrorSeverity = ProcessingErrorSeverity.MEDIUM,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
    this.severity = severity;
    this.timestamp = new Date();
    this.context = context;
  }
}

/** The LLM extraction output could not be obtained or did not match the schema. Fatal to the document. */
export class ExtractionError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(ERROR_CODES.EXTRACTION_FAILED, message, ProcessingErrorSeverity.HIGH, context, { cause });
    this.name = "ExtractionError";
  }
}

/** Embedding or index lookup failed. Recovered as an empty candidate list. */
export class RetrievalError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(ERROR_CODES.RETRIEVAL_FAILED, message, ProcessingErrorSeverity.MEDIUM, context, { cause });
    this.name = "RetrievalError";
  }
}

/** The selection response was unusable. Recovered as "no mapping" for the term. */
export class SelectionError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(ERROR_CODES.SELECTION_FAILED, message, ProcessingErrorSeverity.LOW, context, { cause });
    this.name = "SelectionError";
  }
}

/** Missing credentials or artifacts. Raised before any document is processed. */
export class ConfigurationError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(ERROR_CODES.CONFIGURATION_INVALID, message, ProcessingErrorSeverity.CRITICAL, context, { cause });
    this.name = "ConfigurationError";
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
