/**
 * Runs a vendor's power-cycle script as a child process
 */

import { spawn } from 'node:child_process';
import type { DelegatedRunner, DelegatedRunResult, Logger } from '@pdu-cycle/core';

export class ScriptRunner implements DelegatedRunner {
  constructor(private readonly logger?: Logger) {}

  /**
   * Spawn `<script> --pdu <host> --outlets <list>` with inherited stdio and
   * resolve once it exits. Rejects if the script cannot be started.
   */
  run(script: string, pduHost: string, outlets: string): Promise<DelegatedRunResult> {
    const args = ['--pdu', pduHost, '--outlets', outlets];
    this.logger?.debug({ script, args }, `running ${script}`);

    return new Promise((resolve, reject) => {
      const child = spawn(script, args, { stdio: 'inherit' });

      child.once('error', reject);
      child.once('close', (exitCode, signal) => {
        resolve({ exitCode, signal });
      });
    });
  }
}
