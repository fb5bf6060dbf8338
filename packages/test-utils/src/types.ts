import type { OutletState } from '@pdu-cycle/core';

export type ProtocolCall = {
  host: string;
  op: 'open' | 'count' | 'get' | 'set' | 'close';
  outlet?: number;
  state?: OutletState;
};

export type FakePduOptions = {
  host: string;
  outletCount: number;
  /** Outlet states before the run; outlets not listed start ON */
  initialStates?: Record<number, OutletState>;
  /** Reads that still return the old state after a change was requested */
  settleReads?: number;
  /** Outlets that ignore state changes */
  stuckOutlets?: number[];
  failOn?: { op: ProtocolCall['op']; outlet?: number; message?: string };
};

export type ProbeCall = {
  host: string;
  deadlineSeconds: number;
};

export type DelegatedCall = {
  script: string;
  pduHost: string;
  outlets: string;
};
