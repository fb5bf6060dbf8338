/**
 * Error system exports for pdu-cycle
 * Re-export all error-related types and utilities
 */

export { ErrorCode, type ErrorCodeType, ExitCode, type ExitCodeType } from './codes.js';
export {
  exitCodeFor,
  type PowerCycleError,
  type PowerCycleErrorKind,
  PowerCycleErrors
} from './power-cycle-error.js';
