/**
 * Tests for ScriptRunner
 */

import { spawn } from 'node:child_process';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ScriptRunner } from './script-runner.js';

type ChildOutcome =
  | { event: 'close'; exitCode: number | null; signal: string | null }
  | { event: 'error'; error: Error };

const child = vi.hoisted(() => {
  const current: { outcome: ChildOutcome } = {
    outcome: { event: 'close', exitCode: 0, signal: null }
  };
  return current;
});

vi.mock('node:child_process', async () => {
  const { EventEmitter } = await import('node:events');
  return {
    spawn: vi.fn(() => {
      const emitter = new EventEmitter();
      const { outcome } = child;
      setImmediate(() => {
        if (outcome.event === 'error') {
          emitter.emit('error', outcome.error);
        } else {
          emitter.emit('close', outcome.exitCode, outcome.signal);
        }
      });
      return emitter;
    })
  };
});

describe('ScriptRunner', () => {
  afterEach(() => {
    child.outcome = { event: 'close', exitCode: 0, signal: null };
    vi.clearAllMocks();
  });

  it('passes the PDU and outlet list to the script', async () => {
    await new ScriptRunner().run('eaton_power_cycle', 'pdu-e', '1,2');

    expect(spawn).toHaveBeenCalledWith(
      'eaton_power_cycle',
      ['--pdu', 'pdu-e', '--outlets', '1,2'],
      { stdio: 'inherit' }
    );
  });

  it('resolves with the exit status', async () => {
    child.outcome = { event: 'close', exitCode: 4, signal: null };

    await expect(new ScriptRunner().run('eaton_power_cycle', 'pdu-e', '1')).resolves.toEqual({
      exitCode: 4,
      signal: null
    });
  });

  it('resolves with the signal of a killed script', async () => {
    child.outcome = { event: 'close', exitCode: null, signal: 'SIGTERM' };

    await expect(new ScriptRunner().run('eaton_power_cycle', 'pdu-e', '1')).resolves.toEqual({
      exitCode: null,
      signal: 'SIGTERM'
    });
  });

  it('rejects when the script cannot be started', async () => {
    child.outcome = { event: 'error', error: new Error('spawn eaton_power_cycle ENOENT') };

    await expect(new ScriptRunner().run('eaton_power_cycle', 'pdu-e', '1')).rejects.toThrow(
      'spawn eaton_power_cycle ENOENT'
    );
  });
});
