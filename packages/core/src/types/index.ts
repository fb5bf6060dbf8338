/**
 * Type exports for pdu-cycle core
 * Re-export all type definitions
 */

export type {
  DelegatedRunner,
  DelegatedRunResult,
  PduSession,
  ProtocolClient,
  ReachabilityProbe,
  SessionOptions,
  Sleep
} from './capabilities.js';
export {
  type AuthScheme,
  isSupportedAuthScheme,
  OutletState,
  type PduEntry,
  type SupportedAuthScheme,
  VENDOR_FAMILIES,
  type VendorFamily
} from './pdu.js';
export {
  type PduReport,
  type PowerCycleReport,
  type PowerCycleRequest,
  PowerCycleState,
  type StateTransitionEvent
} from './request.js';
