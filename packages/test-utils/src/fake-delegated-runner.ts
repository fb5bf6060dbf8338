import type { DelegatedRunner, DelegatedRunResult } from '@pdu-cycle/core';
import type { DelegatedCall } from './types.js';

export type FakeDelegatedRunner = DelegatedRunner & { calls: DelegatedCall[] };

/**
 * Delegated runner that records invocations and answers with a fixed outcome
 */
export function createFakeDelegatedRunner(
  outcome: DelegatedRunResult | Error = { exitCode: 0, signal: null }
): FakeDelegatedRunner {
  const calls: DelegatedCall[] = [];

  return {
    calls,
    async run(script: string, pduHost: string, outlets: string) {
      calls.push({ script, pduHost, outlets });
      if (outcome instanceof Error) {
        throw outcome;
      }
      return outcome;
    }
  };
}
