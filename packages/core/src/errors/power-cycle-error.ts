/**
 * Error values for pdu-cycle
 *
 * Failures travel as plain values through Result types and are only
 * turned into output and an exit status at the CLI boundary.
 */

import { ErrorCode, ExitCode, type ExitCodeType } from './codes.js';

/**
 * Discriminated union of every failure a run can end with
 */
export type PowerCycleError =
  | {
      kind: 'input_shape_mismatch';
      code: typeof ErrorCode.E_INPUT_SHAPE_MISMATCH;
      message: string;
      lengths: { pdus: number; vendors: number; outlets: number };
    }
  | {
      kind: 'invalid_argument';
      code: typeof ErrorCode.E_INPUT_INVALID_ARGUMENT;
      message: string;
      argument: string;
      value: string;
    }
  | {
      kind: 'config';
      code: typeof ErrorCode.E_CONFIG_INVALID;
      message: string;
      path?: string;
    }
  | {
      kind: 'unsupported_vendor';
      code: typeof ErrorCode.E_VENDOR_UNSUPPORTED;
      message: string;
      vendor: string;
    }
  | {
      kind: 'unsupported_auth_scheme';
      code: typeof ErrorCode.E_AUTH_UNSUPPORTED_SCHEME;
      message: string;
      scheme: string;
    }
  | {
      kind: 'invalid_outlet_number';
      code: typeof ErrorCode.E_OUTLET_INVALID_NUMBER;
      message: string;
      pduHost: string;
      outlet: number;
      outletCount: number;
    }
  | {
      kind: 'protocol';
      code: typeof ErrorCode.E_PROTOCOL_FAILURE;
      message: string;
      pduHost: string;
      operation: string;
      cause?: unknown;
    }
  | {
      kind: 'power_off_timeout';
      code: typeof ErrorCode.E_POWER_OFF_TIMEOUT;
      message: string;
      pduHost: string;
      outlet: number;
      timeoutSeconds: number;
    }
  | {
      kind: 'unexpectedly_reachable';
      code: typeof ErrorCode.E_POWER_STILL_REACHABLE;
      message: string;
      pduHost: string;
      system: string;
    }
  | {
      kind: 'power_on_timeout';
      code: typeof ErrorCode.E_POWER_ON_TIMEOUT;
      message: string;
      pduHost: string;
      outlet: number;
      timeoutSeconds: number;
    }
  | {
      kind: 'unreachable_after_power_on';
      code: typeof ErrorCode.E_POWER_UNREACHABLE;
      message: string;
      pduHost: string;
      system: string;
      timeoutSeconds: number;
    }
  | {
      kind: 'delegated_script_failed';
      code: typeof ErrorCode.E_DELEGATED_SCRIPT_FAILED;
      message: string;
      pduHost: string;
      script: string;
      exitCode: number | null;
      cause?: unknown;
    };

export type PowerCycleErrorKind = PowerCycleError['kind'];

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Constructors for each error kind
 */
export const PowerCycleErrors = {
  inputShapeMismatch: (pdus: number, vendors: number, outlets: number): PowerCycleError => ({
    kind: 'input_shape_mismatch',
    code: ErrorCode.E_INPUT_SHAPE_MISMATCH,
    message: `PDU hosts (${pdus}), vendors (${vendors}) and outlet lists (${outlets}) must have the same length`,
    lengths: { pdus, vendors, outlets }
  }),

  invalidArgument: (argument: string, value: string, reason: string): PowerCycleError => ({
    kind: 'invalid_argument',
    code: ErrorCode.E_INPUT_INVALID_ARGUMENT,
    message: `Invalid ${argument} "${value}": ${reason}`,
    argument,
    value
  }),

  config: (message: string, path?: string): PowerCycleError => ({
    kind: 'config',
    code: ErrorCode.E_CONFIG_INVALID,
    message: path ? `${path}: ${message}` : message,
    path
  }),

  unsupportedVendor: (vendor: string): PowerCycleError => ({
    kind: 'unsupported_vendor',
    code: ErrorCode.E_VENDOR_UNSUPPORTED,
    message: `Unsupported PDU vendor: ${vendor}`,
    vendor
  }),

  unsupportedAuthScheme: (scheme: string): PowerCycleError => ({
    kind: 'unsupported_auth_scheme',
    code: ErrorCode.E_AUTH_UNSUPPORTED_SCHEME,
    message: `Unsupported authentication scheme: ${scheme} (only community-based v1 and v2c are supported)`,
    scheme
  }),

  invalidOutletNumber: (pduHost: string, outlet: number, outletCount: number): PowerCycleError => ({
    kind: 'invalid_outlet_number',
    code: ErrorCode.E_OUTLET_INVALID_NUMBER,
    message: `Invalid outlet number ${outlet} on ${pduHost}: valid outlets are 1-${outletCount}`,
    pduHost,
    outlet,
    outletCount
  }),

  protocol: (pduHost: string, operation: string, cause?: unknown): PowerCycleError => ({
    kind: 'protocol',
    code: ErrorCode.E_PROTOCOL_FAILURE,
    message:
      cause === undefined
        ? `${operation} failed on ${pduHost}`
        : `${operation} failed on ${pduHost}: ${describeCause(cause)}`,
    pduHost,
    operation,
    cause
  }),

  powerOffTimeout: (pduHost: string, outlet: number, timeoutSeconds: number): PowerCycleError => ({
    kind: 'power_off_timeout',
    code: ErrorCode.E_POWER_OFF_TIMEOUT,
    message: `Outlet ${outlet} on ${pduHost} did not report OFF within ${timeoutSeconds}s`,
    pduHost,
    outlet,
    timeoutSeconds
  }),

  unexpectedlyReachable: (pduHost: string, system: string): PowerCycleError => ({
    kind: 'unexpectedly_reachable',
    code: ErrorCode.E_POWER_STILL_REACHABLE,
    message: `${system} is still reachable after powering off its outlets on ${pduHost}`,
    pduHost,
    system
  }),

  powerOnTimeout: (pduHost: string, outlet: number, timeoutSeconds: number): PowerCycleError => ({
    kind: 'power_on_timeout',
    code: ErrorCode.E_POWER_ON_TIMEOUT,
    message: `Outlet ${outlet} on ${pduHost} did not report ON within ${timeoutSeconds}s`,
    pduHost,
    outlet,
    timeoutSeconds
  }),

  unreachableAfterPowerOn: (
    pduHost: string,
    system: string,
    timeoutSeconds: number
  ): PowerCycleError => ({
    kind: 'unreachable_after_power_on',
    code: ErrorCode.E_POWER_UNREACHABLE,
    message: `${system} did not become reachable within ${timeoutSeconds}s after powering on its outlets on ${pduHost}`,
    pduHost,
    system,
    timeoutSeconds
  }),

  delegatedScriptFailed: (
    pduHost: string,
    script: string,
    exitCode: number | null,
    cause?: unknown
  ): PowerCycleError => ({
    kind: 'delegated_script_failed',
    code: ErrorCode.E_DELEGATED_SCRIPT_FAILED,
    message:
      cause === undefined
        ? `${script} exited with status ${exitCode ?? 'unknown'} for ${pduHost}`
        : `${script} could not be run for ${pduHost}: ${describeCause(cause)}`,
    pduHost,
    script,
    exitCode,
    cause
  })
};

/**
 * Process exit status for an error
 */
export function exitCodeFor(error: PowerCycleError): ExitCodeType {
  return error.kind === 'unsupported_vendor' ? ExitCode.UNSUPPORTED_VENDOR : ExitCode.FAILURE;
}
