/**
 * Domain Error Base Class
 * Provides structured error handling with error codes, retry capability
 * information and serializable context.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type ErrorCode =
  // Container Errors (1xxx)
  | 'PARSE_001' // Container could not be opened or decoded
  | 'PARSE_005' // Failure while processing an opened container
  // Date Errors (2xxx)
  | 'DATE_001' // No usable timestamp
  | 'DATE_002' // Timestamp could not be parsed
  // Attachment Errors (3xxx)
  | 'FILE_001' // Container file failed validation
  | 'FILE_005' // Attachment could not be processed
  | 'IMAGE_001' // Image could not be decoded or re-encoded
  // Member Errors (4xxx)
  | 'MEMBER_001' // Sender address missing
  | 'MEMBER_002' // No active member
  | 'MEMBER_003' // Several members, none active
  // Persistence Errors (5xxx)
  | 'PERSIST_001' // Database connection error
  | 'PERSIST_002' // Unique constraint violation
  | 'PERSIST_004' // Transaction failed
  // Generic Errors
  | 'UNKNOWN';

// ============================================================================
// Base Domain Error
// ============================================================================

export interface DomainErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** File path if applicable */
  filePath?: string;
  /** Additional context */
  [key: string]: unknown;
}

export abstract class DomainError extends Error {
  /** Unique error code for categorization */
  abstract readonly code: ErrorCode;
  /** Whether the operation can be retried */
  readonly isRetryable: boolean;
  /** Additional context about the error */
  readonly context: DomainErrorContext;
  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    message: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to a JSON-serializable object for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      isRetryable: this.isRetryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  /**
   * Create a user-friendly error message (without sensitive details).
   */
  toUserMessage(): string {
    return `Error ${this.code}: ${this.message}`;
  }
}

// ============================================================================
// Container Errors
// ============================================================================

export class ContainerOpenError extends DomainError {
  readonly code: ErrorCode = 'PARSE_001';

  constructor(message: string, filePath: string, context: DomainErrorContext = {}) {
    super(message, { ...context, filePath }, false);
  }

  static fromCause(filePath: string, cause: unknown): ContainerOpenError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ContainerOpenError(detail, filePath, {
      cause: cause instanceof Error ? cause : undefined,
    });
  }

  static notAMessage(filePath: string, detail?: string): ContainerOpenError {
    return new ContainerOpenError(
      `Not an Outlook message container${detail ? ': ' + detail : ''}`,
      filePath
    );
  }
}

/**
 * A file refused before decoding: wrong type, empty, too large, or not
 * carrying the container signature.
 */
export class ContainerValidationError extends ContainerOpenError {
  readonly code: ErrorCode = 'FILE_001';
}

export class EmailProcessingError extends DomainError {
  readonly code: ErrorCode = 'PARSE_005';

  constructor(message: string, filePath: string, context: DomainErrorContext = {}) {
    super(message, { ...context, filePath }, false);
  }
}

// ============================================================================
// Date Errors
// ============================================================================

export class DateResolutionError extends DomainError {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode = 'DATE_001', context: DomainErrorContext = {}) {
    super(message, context, false);
    this.code = code;
  }

  static noSource(): DateResolutionError {
    return new DateResolutionError('No valid date property found in message container');
  }

  static unparseable(value: string): DateResolutionError {
    return new DateResolutionError(`Could not parse timestamp: ${value}`, 'DATE_002', { value });
  }
}

// ============================================================================
// Attachment Errors
// ============================================================================

export class AttachmentError extends DomainError {
  readonly code: ErrorCode = 'FILE_005';

  constructor(
    message: string,
    public readonly filename: string,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, filename }, true);
  }

  static fromCause(filename: string, cause: unknown): AttachmentError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new AttachmentError(`Error extracting attachment ${filename}: ${detail}`, filename, {
      cause: cause instanceof Error ? cause : undefined,
    });
  }
}

export class ImageResizeError extends DomainError {
  readonly code: ErrorCode = 'IMAGE_001';

  constructor(message: string, context: DomainErrorContext = {}) {
    super(message, context, false);
  }
}

// ============================================================================
// Member Errors
// ============================================================================

export class MemberLookupError extends DomainError {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, context: DomainErrorContext = {}) {
    super(message, context, false);
    this.code = code;
  }

  static missingSender(): MemberLookupError {
    return new MemberLookupError(
      'Could not extract sender email address from email',
      'MEMBER_001'
    );
  }

  static noActiveMember(email: string): MemberLookupError {
    return new MemberLookupError(
      `No active member found with email address: ${email}`,
      'MEMBER_002',
      { email }
    );
  }

  static noneActive(email: string): MemberLookupError {
    return new MemberLookupError(
      `Multiple members found with email address: ${email}, but none are active`,
      'MEMBER_003',
      { email }
    );
  }
}

// ============================================================================
// Persistence Errors
// ============================================================================

export class PersistenceError extends DomainError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    code: ErrorCode,
    public readonly operation: 'insert' | 'update' | 'query',
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message, { ...context, operation }, isRetryable);
    this.code = code;
  }

  static connectionError(details?: string): PersistenceError {
    return new PersistenceError(
      `Database connection error${details ? ': ' + details : ''}`,
      'PERSIST_001',
      'query',
      {},
      true // Connection errors are retryable
    );
  }

  static uniqueViolation(entityType: string, field: string, value?: string): PersistenceError {
    return new PersistenceError(
      `Duplicate ${entityType}: ${field} already exists`,
      'PERSIST_002',
      'insert',
      { entityType, field, value }
    );
  }

  static transactionFailed(operation: string, cause?: Error): PersistenceError {
    return new PersistenceError(
      `Transaction failed during ${operation}`,
      'PERSIST_004',
      'query',
      { cause },
      true
    );
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Check if an error is a DomainError.
 */
export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

/**
 * Wrap an unknown error in a DomainError if it isn't one already.
 */
export function wrapError(error: unknown, defaultMessage = 'An unexpected error occurred'): DomainError {
  if (isDomainError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : defaultMessage;
  const cause = error instanceof Error ? error : undefined;

  return new (class UnknownError extends DomainError {
    readonly code: ErrorCode = 'UNKNOWN';
  })(message, { cause });
}

/**
 * Map a PostgreSQL driver error onto a PersistenceError.
 */
export function parsePgError(error: Error & { code?: unknown }): PersistenceError {
  const pgCode = typeof error.code === 'string' ? error.code : undefined;

  if (pgCode === '23505') {
    return PersistenceError.uniqueViolation('entity', 'unknown');
  }
  if (pgCode?.startsWith('08')) {
    return PersistenceError.connectionError(error.message);
  }

  return new PersistenceError(
    error.message,
    'PERSIST_001',
    'query',
    { cause: error, pgCode },
    pgCode?.startsWith('57') ?? false // Operator intervention
  );
}

/**
 * Message text of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
