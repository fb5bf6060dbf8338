/**
 * Capability contracts consumed by the orchestrator.
 * Concrete implementations live in @pdu-cycle/transport; tests provide fakes.
 */

import type { OutletState, SupportedAuthScheme } from './pdu.js';

/**
 * Options used to open a protocol session with a PDU
 */
export type SessionOptions = {
  authScheme: SupportedAuthScheme;
  community: string;
  port: number;
  timeoutMs: number;
  retries: number;
};

/**
 * An open session with one PDU.
 * Owned by the routine that opened it and closed when that routine returns.
 * Every method rejects on transport or protocol failure.
 */
export interface PduSession {
  readonly host: string;
  getOutletCount(): Promise<number>;
  getOutletState(outlet: number): Promise<OutletState>;
  setOutletState(outlet: number, state: OutletState): Promise<void>;
  close(): void;
}

/**
 * Device-management protocol client
 */
export interface ProtocolClient {
  openSession(host: string, options: SessionOptions): Promise<PduSession>;
}

/**
 * Single best-effort liveness check of a host
 */
export interface ReachabilityProbe {
  probe(host: string, deadlineSeconds: number): Promise<boolean>;
}

/**
 * Result of running the delegated executable
 */
export type DelegatedRunResult = {
  exitCode: number | null;
  signal: string | null;
};

/**
 * Hands a PDU host and outlet list to an external executable
 */
export interface DelegatedRunner {
  run(script: string, pduHost: string, outlets: string): Promise<DelegatedRunResult>;
}

/**
 * Suspends the flow for the given number of seconds
 */
export type Sleep = (seconds: number) => Promise<void>;
