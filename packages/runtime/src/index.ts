/**
 * @pdu-cycle/runtime - Power-cycle orchestration for pdu-cycle
 *
 * This package provides:
 * - Request construction and vendor resolution
 * - Outlet validation against the live outlet count
 * - Bounded polling
 * - The per-PDU state machine and vendor dispatch
 *
 * Device access, reachability probes and sleeping are injected, so nothing
 * here performs I/O on its own.
 *
 * Dependency direction: core → runtime → transport → cli
 */

// Request construction
export {
  createPowerCycleRequest,
  parseOutletList,
  resolveVendorFamily,
  type PowerCycleInput
} from './request.js';

// Outlet validation
export { isValidOutletIndex, validateOutlet } from './outlet-validator.js';

// Polling
export {
  pollWithTimeout,
  type PollFailure,
  type PollOptions,
  type PollStats
} from './poll/poll-with-timeout.js';

// State machine
export { PowerCycleStateMachine, type StateMachineEvent } from './state-machine.js';

// Orchestration
export { cycle, runPowerCycle, VENDOR_HANDLERS } from './orchestrator/dispatch.js';
export { cycleDelegatedPdu } from './orchestrator/delegated-cycle.js';
export { cycleNativePdu } from './orchestrator/native-cycle.js';
export type {
  PowerCycleContext,
  PowerCycleDeps,
  VendorHandler
} from './orchestrator/types.js';

// Result helpers
export * from './utils/result.js';
