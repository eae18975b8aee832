/**
 * Error Module
 * Exports all domain error types and utilities.
 */

export {
  DomainError,
  DomainErrorContext,
  ErrorCode,
  ContainerOpenError,
  ContainerValidationError,
  EmailProcessingError,
  DateResolutionError,
  AttachmentError,
  ImageResizeError,
  MemberLookupError,
  PersistenceError,
  isDomainError,
  wrapError,
  parsePgError,
  errorMessage,
} from './DomainError';
