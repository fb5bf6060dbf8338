/**
 * ICMP reachability via the system ping command
 */

import { execFile } from 'node:child_process';
import type { Logger, ReachabilityProbe } from '@pdu-cycle/core';

/**
 * Sends a single echo request; exit status 0 means reachable.
 * Any other outcome, including a missing ping binary, counts as unreachable.
 */
export class PingProbe implements ReachabilityProbe {
  constructor(
    private readonly logger?: Logger,
    private readonly command = 'ping'
  ) {}

  probe(host: string, deadlineSeconds: number): Promise<boolean> {
    const args = ['-c', '1', '-W', String(deadlineSeconds), host];

    return new Promise((resolve) => {
      execFile(this.command, args, { timeout: (deadlineSeconds + 1) * 1000 }, (error) => {
        if (error) {
          this.logger?.trace({ host, error: error.message }, `${host} did not answer`);
          resolve(false);
          return;
        }
        resolve(true);
      });
    });
  }
}
