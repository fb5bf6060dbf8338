import type { ReachabilityProbe } from '@pdu-cycle/core';
import type { ProbeCall } from './types.js';

export type ScriptedProbe = ReachabilityProbe & { calls: ProbeCall[] };

/**
 * Reachability probe answering from a script.
 * The last answer repeats once the script is exhausted.
 */
export function createScriptedProbe(answers: boolean[]): ScriptedProbe {
  const calls: ProbeCall[] = [];

  return {
    calls,
    async probe(host: string, deadlineSeconds: number) {
      calls.push({ host, deadlineSeconds });
      const index = Math.min(calls.length - 1, answers.length - 1);
      return index >= 0 ? answers[index] : false;
    }
  };
}
