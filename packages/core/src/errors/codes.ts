/**
 * Error codes and exit statuses for pdu-cycle
 */

/**
 * Stable error codes, one per failure kind
 */
export const ErrorCode = {
  // Input errors
  E_INPUT_SHAPE_MISMATCH: 'E_INPUT_SHAPE_MISMATCH',
  E_INPUT_INVALID_ARGUMENT: 'E_INPUT_INVALID_ARGUMENT',

  // Configuration errors
  E_CONFIG_INVALID: 'E_CONFIG_INVALID',

  // Capability errors
  E_VENDOR_UNSUPPORTED: 'E_VENDOR_UNSUPPORTED',
  E_AUTH_UNSUPPORTED_SCHEME: 'E_AUTH_UNSUPPORTED_SCHEME',

  // Device errors
  E_OUTLET_INVALID_NUMBER: 'E_OUTLET_INVALID_NUMBER',
  E_PROTOCOL_FAILURE: 'E_PROTOCOL_FAILURE',

  // Power sequence errors
  E_POWER_OFF_TIMEOUT: 'E_POWER_OFF_TIMEOUT',
  E_POWER_STILL_REACHABLE: 'E_POWER_STILL_REACHABLE',
  E_POWER_ON_TIMEOUT: 'E_POWER_ON_TIMEOUT',
  E_POWER_UNREACHABLE: 'E_POWER_UNREACHABLE',

  // Delegated vendor errors
  E_DELEGATED_SCRIPT_FAILED: 'E_DELEGATED_SCRIPT_FAILED'
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Process exit statuses
 */
export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  UNSUPPORTED_VENDOR: 6
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];
