/**
 * Power-cycle request and report types
 */

import type { PduEntry, VendorFamily } from './pdu.js';

/**
 * A validated request: one target system fed by one or more PDUs.
 * Built once from caller input and consumed by a single run.
 */
export interface PowerCycleRequest {
  readonly system: string;
  readonly entries: readonly PduEntry[];
}

/**
 * Phases of a single PDU's power cycle
 */
export enum PowerCycleState {
  VALIDATING = 'validating',
  POWERING_OFF = 'powering_off',
  VERIFYING_OFFLINE = 'verifying_offline',
  POWERING_ON = 'powering_on',
  VERIFYING_ONLINE = 'verifying_online',
  DONE = 'done',
  FAILED = 'failed'
}

/**
 * State transition event
 */
export type StateTransitionEvent = {
  pduHost: string;
  from: PowerCycleState;
  to: PowerCycleState;
  reason?: string;
  timestamp: string;
};

/**
 * Outcome of one PDU entry
 */
export type PduReport = {
  host: string;
  vendorName: string;
  family: VendorFamily;
  outlets: number[];
  /** Transition history; empty for delegated entries */
  transitions: StateTransitionEvent[];
};

/**
 * Outcome of a successful run
 */
export type PowerCycleReport = {
  system: string;
  pdus: PduReport[];
  startedAt: string;
  finishedAt: string;
};
