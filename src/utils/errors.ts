export type PipelineErrorCode =
  | 'UNSUPPORTED_MEDIA'
  | 'EXTRACTION_ERROR'
  | 'REASONING_PARSE_ERROR'
  | 'REASONING_BACKEND_ERROR'
  | 'TIMEOUT';

/** Stage-level failures that the assembler turns into a failed record. */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  constructor(message: string, public details?: unknown) {
    super(message);
  }
}

export class UnsupportedMediaError extends PipelineError {
  readonly code = 'UNSUPPORTED_MEDIA';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'UnsupportedMediaError';
  }
}

export class ExtractionError extends PipelineError {
  readonly code = 'EXTRACTION_ERROR';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'ExtractionError';
  }
}

export class ReasoningParseError extends PipelineError {
  readonly code = 'REASONING_PARSE_ERROR';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'ReasoningParseError';
  }
}

export class ReasoningBackendError extends PipelineError {
  readonly code = 'REASONING_BACKEND_ERROR';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'ReasoningBackendError';
  }
}

export class PipelineTimeoutError extends PipelineError {
  readonly code = 'TIMEOUT';
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'PipelineTimeoutError';
  }
}

/**
 * Raised by model clients for failures worth one more attempt: call timeouts,
 * refused connections, rate limiting and 5xx responses.
 */
export class ModelUnavailableError extends Error {
  code = 'MODEL_UNAVAILABLE';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ModelUnavailableError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public issues: Array<{ field: string; message: string }> = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ContractViolationError extends Error {
  code = 'CONTRACT_VIOLATION';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
