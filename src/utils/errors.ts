/**
 * Error kinds that can appear in an outcome's error payload
 */
export type ErrorKind =
  | 'UnsupportedOperation'
  | 'ValidationError'
  | 'NoUsablePreview'
  | 'ExternalToolFailure'
  | 'InternalError';

/**
 * Base application error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Structured details for the error payload (none by default)
   */
  details(): unknown {
    return undefined;
  }
}

/**
 * Operation name not present in the registry
 */
export class UnsupportedOperationError extends AppError {
  public readonly operation: string;
  public readonly available: string[];

  constructor(operation: string, available: string[]) {
    super(`Unsupported operation: ${operation}`, 404, 'UnsupportedOperation');
    this.operation = operation;
    this.available = available;
  }

  override details(): unknown {
    return { operation: this.operation, available: this.available };
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Request payload violated the operation's input schema
 */
export class ValidationError extends AppError {
  public readonly field: string;
  public readonly issues: ValidationIssue[];

  constructor(message = 'Validation failed', field = '', issues: ValidationIssue[] = []) {
    super(message, 400, 'ValidationError');
    this.field = field;
    this.issues = issues;
  }

  override details(): unknown {
    return { field: this.field, issues: this.issues };
  }
}

export interface TierAttemptSummary {
  tier: string;
  status: 'success' | 'declined' | 'failed';
  reason?: string;
}

/**
 * Every extraction tier declined or failed
 */
export class NoUsablePreviewError extends AppError {
  public readonly path: string;
  public readonly attempts: TierAttemptSummary[];

  constructor(path: string, attempts: TierAttemptSummary[]) {
    const tried = attempts.map((a) => `${a.tier}: ${a.reason ?? a.status}`).join('; ');
    super(`No usable preview for ${path} (${tried})`, 422, 'NoUsablePreview');
    this.path = path;
    this.attempts = attempts;
  }

  override details(): unknown {
    return { path: this.path, attempts: this.attempts };
  }
}

/**
 * An acceleration backend could not be initialised.
 * Only the backend selector sees this; callers never do.
 */
export class BackendInitializationError extends AppError {
  public readonly backend: string;

  constructor(backend: string, message: string) {
    super(`${backend}: ${message}`, 500, 'BackendInitializationFailure');
    this.backend = backend;
  }
}

/**
 * External tool (dcraw, ffmpeg, exiftool, ...) failed
 */
export class ExternalToolError extends AppError {
  public readonly tool: string;
  public readonly exitCode: number | null;
  public readonly diagnostic: string;

  constructor(tool: string, message: string, exitCode: number | null = null, diagnostic = '') {
    super(`${tool}: ${message}`, 502, 'ExternalToolFailure');
    this.tool = tool;
    this.exitCode = exitCode;
    this.diagnostic = diagnostic;
  }

  override details(): unknown {
    return {
      tool: this.tool,
      exit_code: this.exitCode,
      ...(this.diagnostic ? { diagnostic: this.diagnostic } : {}),
    };
  }
}

/**
 * RAW decoder failure; corruptSource marks input the decoder could not parse
 */
export class RawDecodeError extends ExternalToolError {
  public readonly corruptSource: boolean;

  constructor(
    tool: string,
    message: string,
    options: { exitCode?: number | null; diagnostic?: string; corruptSource?: boolean } = {}
  ) {
    super(tool, message, options.exitCode ?? null, options.diagnostic ?? '');
    this.corruptSource = options.corruptSource ?? false;
  }
}

/**
 * 500 Internal Server Error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal error', code = 'InternalError') {
    super(message, 500, code, false);
  }
}

const PAYLOAD_KINDS: ReadonlySet<string> = new Set<ErrorKind>([
  'UnsupportedOperation',
  'ValidationError',
  'NoUsablePreview',
  'ExternalToolFailure',
  'InternalError',
]);

function isErrorKind(code: string): code is ErrorKind {
  return PAYLOAD_KINDS.has(code);
}

/**
 * Error payload carried by a failed outcome
 */
export interface ErrorPayload {
  error: ErrorKind;
  message: string;
  details?: unknown;
}

/**
 * Convert any thrown value into an error payload.
 * AppErrors keep their kind; anything else becomes InternalError.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof AppError && isErrorKind(error.code)) {
    const details = error.details();
    return {
      error: error.code,
      message: error.message,
      ...(details === undefined ? {} : { details }),
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { error: 'InternalError', message };
}

/**
 * Extract a message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
