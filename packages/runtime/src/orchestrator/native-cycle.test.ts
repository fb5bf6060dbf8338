import {
  createSilentLogger,
  freezeConfig,
  OutletState,
  type PduEntry,
  type PowerCycleConfigInput,
  PowerCycleConfigSchema
} from '@pdu-cycle/core';
import {
  createFakeDelegatedRunner,
  createFakeProtocolClient,
  createRecordingSleep,
  createScriptedProbe,
  type FakePduOptions
} from '@pdu-cycle/test-utils';
import { describe, expect, it } from 'vitest';
import { cycleNativePdu } from './native-cycle.js';
import type { PowerCycleContext } from './types.js';

const entry = (outlets: number[]): PduEntry => ({
  host: 'pdu-a',
  vendorName: 'ibm',
  family: 'native',
  outlets
});

const setup = (
  pdu: Omit<FakePduOptions, 'host'>,
  answers: boolean[],
  config: PowerCycleConfigInput = {}
) => {
  const protocol = createFakeProtocolClient([{ host: 'pdu-a', ...pdu }]);
  const probe = createScriptedProbe(answers);
  const sleep = createRecordingSleep();
  const context: PowerCycleContext = {
    system: 'node-01',
    config: freezeConfig(PowerCycleConfigSchema.parse(config)),
    deps: {
      protocol,
      probe,
      delegated: createFakeDelegatedRunner(),
      sleep: sleep.sleep,
      logger: createSilentLogger(),
      now: () => new Date('2026-05-04T10:00:00Z')
    }
  };
  return { protocol, probe, sleep, context };
};

describe('cycleNativePdu', () => {
  it('cycles outlets that are already off without polling delays', async () => {
    const { protocol, probe, sleep, context } = setup(
      { outletCount: 8, initialStates: { 3: OutletState.OFF, 4: OutletState.OFF } },
      [false, true]
    );

    const result = await cycleNativePdu(entry([3, 4]), context);

    expect(result.ok).toBe(true);
    expect(sleep.calls).toEqual([5]);
    expect(probe.calls).toEqual([
      { host: 'node-01', deadlineSeconds: 1 },
      { host: 'node-01', deadlineSeconds: 1 }
    ]);
    expect(protocol.calls).toEqual([
      { host: 'pdu-a', op: 'open' },
      { host: 'pdu-a', op: 'count' },
      { host: 'pdu-a', op: 'set', outlet: 3, state: OutletState.OFF },
      { host: 'pdu-a', op: 'get', outlet: 3 },
      { host: 'pdu-a', op: 'count' },
      { host: 'pdu-a', op: 'set', outlet: 4, state: OutletState.OFF },
      { host: 'pdu-a', op: 'get', outlet: 4 },
      { host: 'pdu-a', op: 'set', outlet: 3, state: OutletState.ON },
      { host: 'pdu-a', op: 'get', outlet: 3 },
      { host: 'pdu-a', op: 'set', outlet: 4, state: OutletState.ON },
      { host: 'pdu-a', op: 'get', outlet: 4 },
      { host: 'pdu-a', op: 'close' }
    ]);
    expect(protocol.stateOf('pdu-a', 3)).toBe(OutletState.ON);
    expect(protocol.stateOf('pdu-a', 4)).toBe(OutletState.ON);
  });

  it('reports every state transition', async () => {
    const { context } = setup({ outletCount: 8 }, [false, true]);

    const result = await cycleNativePdu(entry([3, 4]), context);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.host).toBe('pdu-a');
      expect(result.value.outlets).toEqual([3, 4]);
      expect(
        result.value.transitions.map(({ from, to, reason }) => ({ from, to, reason }))
      ).toEqual([
        { from: 'validating', to: 'powering_off', reason: 'outlet 3' },
        { from: 'powering_off', to: 'validating', reason: 'outlet 4' },
        { from: 'validating', to: 'powering_off', reason: 'outlet 4' },
        { from: 'powering_off', to: 'verifying_offline', reason: undefined },
        { from: 'verifying_offline', to: 'powering_on', reason: undefined },
        { from: 'powering_on', to: 'verifying_online', reason: undefined },
        { from: 'verifying_online', to: 'done', reason: undefined }
      ]);
      expect(result.value.transitions[0].timestamp).toBe('2026-05-04T10:00:00.000Z');
    }
  });

  it('polls an outlet at the fixed interval until it settles', async () => {
    const { sleep, context } = setup({ outletCount: 8, settleReads: 1 }, [false, true]);

    const result = await cycleNativePdu(entry([3]), context);

    expect(result.ok).toBe(true);
    expect(sleep.calls).toEqual([5, 5, 5]);
  });

  it('fails when an outlet never reports OFF', async () => {
    const { protocol, probe, sleep, context } = setup(
      { outletCount: 8, stuckOutlets: [3] },
      [false],
      { powerOffTimeout: 10 }
    );

    const result = await cycleNativePdu(entry([3]), context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('power_off_timeout');
      expect(result.error.message).toBe('Outlet 3 on pdu-a did not report OFF within 10s');
    }
    expect(sleep.calls).toEqual([5, 5]);
    expect(protocol.calls.filter((call) => call.op === 'get')).toHaveLength(3);
    expect(protocol.calls.at(-1)).toEqual({ host: 'pdu-a', op: 'close' });
    expect(probe.calls).toHaveLength(0);
  });

  it('fails when an outlet never reports ON', async () => {
    const { sleep, context } = setup(
      { outletCount: 8, initialStates: { 3: OutletState.OFF }, stuckOutlets: [3] },
      [false],
      { powerOnTimeout: 10 }
    );

    const result = await cycleNativePdu(entry([3]), context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('power_on_timeout');
      expect(result.error.message).toBe('Outlet 3 on pdu-a did not report ON within 10s');
    }
    expect(sleep.calls).toEqual([5, 5, 5]);
  });

  it('never powers on while the system still answers', async () => {
    const { protocol, context } = setup({ outletCount: 8 }, [true]);

    const result = await cycleNativePdu(entry([3, 4]), context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('unexpectedly_reachable');
      expect(result.error.message).toBe(
        'node-01 is still reachable after powering off its outlets on pdu-a'
      );
    }
    expect(
      protocol.calls.filter((call) => call.op === 'set' && call.state === OutletState.ON)
    ).toEqual([]);
    expect(protocol.stateOf('pdu-a', 3)).toBe(OutletState.OFF);
    expect(protocol.stateOf('pdu-a', 4)).toBe(OutletState.OFF);
  });

  it('fails when the system does not come back', async () => {
    const { probe, sleep, context } = setup(
      { outletCount: 8, initialStates: { 3: OutletState.OFF } },
      [false],
      { pingTimeout: 4 }
    );

    const result = await cycleNativePdu(entry([3]), context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('unreachable_after_power_on');
      expect(result.error.message).toBe(
        'node-01 did not become reachable within 4s after powering on its outlets on pdu-a'
      );
    }
    expect(probe.calls).toHaveLength(4);
    expect(sleep.calls).toEqual([5, 2, 2]);
  });

  it('validates each outlet right before switching it off', async () => {
    const { protocol, context } = setup({ outletCount: 8 }, [false, true]);

    const result = await cycleNativePdu(entry([3, 9]), context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('invalid_outlet_number');
      expect(result.error.message).toBe(
        'Invalid outlet number 9 on pdu-a: valid outlets are 1-8'
      );
    }
    expect(protocol.stateOf('pdu-a', 3)).toBe(OutletState.OFF);
    expect(protocol.calls.some((call) => call.outlet === 9)).toBe(false);
  });

  it('maps a failed write to a protocol error', async () => {
    const { context } = setup(
      { outletCount: 8, failOn: { op: 'set', outlet: 3, message: 'no response' } },
      [false, true]
    );

    const result = await cycleNativePdu(entry([3]), context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('protocol');
      expect(result.error.message).toBe('setOutletState(3, OFF) failed on pdu-a: no response');
    }
  });

  it('maps a failed session open to a protocol error', async () => {
    const { protocol, context } = setup({ outletCount: 8, failOn: { op: 'open' } }, [false]);

    const result = await cycleNativePdu(entry([3]), context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('openSession failed on pdu-a: injected open failure');
    }
    expect(protocol.calls).toEqual([{ host: 'pdu-a', op: 'open' }]);
  });

  it('refuses the v3 authentication scheme before opening a session', async () => {
    const { protocol, context } = setup({ outletCount: 8 }, [false], { authScheme: 'v3' });

    const result = await cycleNativePdu(entry([3]), context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('unsupported_auth_scheme');
    }
    expect(protocol.calls).toEqual([]);
  });
});
