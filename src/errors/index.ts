/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors
export {
  MalformedSidecarError,
} from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  CatalogRequestError,
  CatalogConnectionError,
} from './ApplicationError.js';

// Permanent errors
export {
  PermanentError,
  ConfigurationError,
  InvalidStateError,
  UserQuitError,
} from './ApplicationError.js';
