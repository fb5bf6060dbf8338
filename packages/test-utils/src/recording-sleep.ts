import type { Sleep } from '@pdu-cycle/core';

export type RecordingSleep = {
  sleep: Sleep;
  /** Requested durations in seconds, in call order */
  calls: number[];
  total(): number;
};

/**
 * Sleep that returns immediately and remembers what was asked for
 */
export function createRecordingSleep(onSleep?: (seconds: number) => void): RecordingSleep {
  const calls: number[] = [];

  return {
    calls,
    sleep: async (seconds: number) => {
      calls.push(seconds);
      onSleep?.(seconds);
    },
    total: () => calls.reduce((sum, seconds) => sum + seconds, 0)
  };
}
