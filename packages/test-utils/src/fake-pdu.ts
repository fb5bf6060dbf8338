import {
  OutletState,
  type PduSession,
  type ProtocolClient,
  type SessionOptions
} from '@pdu-cycle/core';
import type { FakePduOptions, ProtocolCall } from './types.js';

type FakePduState = {
  options: FakePduOptions;
  states: Map<number, OutletState>;
  /** Reads left before a requested change becomes visible */
  pending: Map<number, { state: OutletState; readsLeft: number }>;
};

export type FakeProtocolClient = ProtocolClient & {
  /** Every call in the order it was made, across all PDUs */
  calls: ProtocolCall[];
  /** Current outlet state of a fake PDU */
  stateOf(host: string, outlet: number): OutletState | undefined;
};

/**
 * In-process stand-in for the device protocol.
 * Each host behaves like a PDU with the given outlet count; state changes become
 * visible after `settleReads` reads, or never for outlets listed as stuck.
 */
export function createFakeProtocolClient(pdus: FakePduOptions[]): FakeProtocolClient {
  const calls: ProtocolCall[] = [];
  const devices = new Map<string, FakePduState>();

  for (const options of pdus) {
    const states = new Map<number, OutletState>();
    for (let outlet = 1; outlet <= options.outletCount; outlet++) {
      states.set(outlet, options.initialStates?.[outlet] ?? OutletState.ON);
    }
    devices.set(options.host, { options, states, pending: new Map() });
  }

  const maybeFail = (device: FakePduState, op: ProtocolCall['op'], outlet?: number): void => {
    const failure = device.options.failOn;
    const matches = failure?.outlet === undefined || failure.outlet === outlet;
    if (failure && failure.op === op && matches) {
      throw new Error(failure.message ?? `injected ${op} failure`);
    }
  };

  const createSession = (host: string, device: FakePduState): PduSession => ({
    host,
    async getOutletCount() {
      calls.push({ host, op: 'count' });
      maybeFail(device, 'count');
      return device.options.outletCount;
    },
    async getOutletState(outlet: number) {
      calls.push({ host, op: 'get', outlet });
      maybeFail(device, 'get', outlet);
      const change = device.pending.get(outlet);
      if (change) {
        if (change.readsLeft <= 0) {
          device.states.set(outlet, change.state);
          device.pending.delete(outlet);
        } else {
          change.readsLeft--;
        }
      }
      const state = device.states.get(outlet);
      if (state === undefined) {
        throw new Error(`no such outlet: ${outlet}`);
      }
      return state;
    },
    async setOutletState(outlet: number, state: OutletState) {
      calls.push({ host, op: 'set', outlet, state });
      maybeFail(device, 'set', outlet);
      if (device.options.stuckOutlets?.includes(outlet)) {
        return;
      }
      device.pending.set(outlet, { state, readsLeft: device.options.settleReads ?? 0 });
    },
    close() {
      calls.push({ host, op: 'close' });
    }
  });

  return {
    calls,
    async openSession(host: string, _options: SessionOptions) {
      calls.push({ host, op: 'open' });
      const device = devices.get(host);
      if (!device) {
        throw new Error(`unknown PDU: ${host}`);
      }
      maybeFail(device, 'open');
      return createSession(host, device);
    },
    stateOf(host: string, outlet: number) {
      return devices.get(host)?.states.get(outlet);
    }
  };
}
