/**
 * Error Classes for the migration pipeline
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_MISSING = "E1001",

  // Graph store errors (2xxx)
  STORE_UNAVAILABLE = "E2000",
  STORE_TIMEOUT = "E2001",
  STORE_CONSTRAINT_VIOLATION = "E2002",
  STORE_NOT_INITIALIZED = "E2003",
  STORE_MISSING_ENDPOINT = "E2004",
  STORE_CROSS_PROJECT_EDGE = "E2005",

  // Parsing errors (3xxx)
  PARSE_SYNTAX_ERROR = "E3000",
  PARSE_UNSUPPORTED_LANGUAGE = "E3001",
  PARSE_BINARY_CONTENT = "E3002",

  // Inference errors (4xxx)
  INFERENCE_FAILED = "E4000",
  INFERENCE_TIMEOUT = "E4001",
  INFERENCE_INVALID_RESPONSE = "E4002",
  INFERENCE_UNAVAILABLE = "E4003",

  // Planning errors (5xxx)
  UNMAPPABLE_CONSTRUCT = "E5000",

  // Pipeline errors (6xxx)
  PROJECT_NOT_FOUND = "E6000",
  INVALID_TRANSITION = "E6001",
  PROJECT_CANCELLED = "E6002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all pipeline errors
 */
export class MigrationError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  /** Whether the orchestrator may retry the stage that raised this error */
  public readonly retryable: boolean = false;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN_ERROR, context?: Record<string, unknown>) {
    super(message);
    this.name = "MigrationError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging and Report details
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Graph store connection or timeout failure. Retryable.
 */
export class TransientStoreError extends MigrationError {
  public override readonly retryable = true;

  constructor(message: string, code: ErrorCode = ErrorCode.STORE_UNAVAILABLE, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "TransientStoreError";
  }
}

/**
 * Schema or invariant breach in the graph store. Never retried.
 */
export class ConstraintViolationError extends MigrationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORE_CONSTRAINT_VIOLATION,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ConstraintViolationError";
  }
}

/**
 * Inference capability failed, timed out or answered with something that
 * does not validate. The inference service has already retried timeouts and
 * client failures by the time this reaches a caller, so stages never retry
 * it: callers skip the field and record Feedback.
 */
export class TransientInferenceError extends MigrationError {
  public readonly model?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INFERENCE_FAILED,
    context?: Record<string, unknown> & { model?: string }
  ) {
    super(message, code, context);
    this.name = "TransientInferenceError";
    this.model = context?.model;
  }
}

/**
 * A single file could not be parsed. Confined to that file.
 */
export class MalformedInputError extends MigrationError {
  public readonly filePath?: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_SYNTAX_ERROR,
    context?: Record<string, unknown> & { filePath?: string; line?: number; column?: number }
  ) {
    super(message, code, context);
    this.name = "MalformedInputError";
    this.filePath = context?.filePath;
    this.line = context?.line;
    this.column = context?.column;
  }

  override toString(): string {
    let location = "";
    if (this.filePath) {
      location = ` at ${this.filePath}`;
      if (this.line !== undefined) {
        location += `:${this.line}`;
        if (this.column !== undefined) {
          location += `:${this.column}`;
        }
      }
    }
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * A legacy construct with no derivable target mapping
 */
export class UnmappableConstructError extends MigrationError {
  public readonly construct: string;

  constructor(message: string, construct: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.UNMAPPABLE_CONSTRUCT, { ...context, construct });
    this.name = "UnmappableConstructError";
    this.construct = construct;
  }
}

export class ConfigurationError extends MigrationError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFIG_INVALID, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Raised by the orchestrator for unknown projects and for transitions out
 * of a terminal state
 */
export class PipelineError extends MigrationError {
  public readonly projectId?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_TRANSITION,
    context?: Record<string, unknown> & { projectId?: string }
  ) {
    super(message, code, context);
    this.name = "PipelineError";
    this.projectId = context?.projectId;
  }
}

/**
 * Advancing a project that already reached done or failed
 */
export class InvalidTransitionError extends PipelineError {
  public readonly from: string;

  constructor(projectId: string, from: string) {
    super(`Project ${projectId} is ${from} and cannot advance`, ErrorCode.INVALID_TRANSITION, { projectId, from });
    this.name = "InvalidTransitionError";
    this.from = from;
  }
}

export function isMigrationError(error: unknown): error is MigrationError {
  return error instanceof MigrationError;
}

export function isRetryableError(error: unknown): boolean {
  return isMigrationError(error) && error.retryable;
}

/**
 * Wrap an unknown error in a MigrationError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): MigrationError {
  if (isMigrationError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new MigrationError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new MigrationError(typeof error === "string" ? error : defaultMessage, code);
}
