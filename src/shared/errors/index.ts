/**
 * Shared Errors Module
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  ERROR_EXIT_CODE,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  InputClosedError,
  GameNotActiveError,
  // Utilities
  isGameError,
  wrapError,
} from './GameDomainErrors';
