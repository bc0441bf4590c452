/**
 * Error System Export
 *
 * All application errors should be imported from this file.
 */

export {
  ApplicationError,
  ErrorCode,
  ValidationError,
  ProviderError,
  ProviderUnavailableError,
  ConfigurationError,
} from './ApplicationError.js';

export type { ErrorContext } from './ApplicationError.js';
