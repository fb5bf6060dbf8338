#!/usr/bin/env node

/**
 * pdu-cycle CLI - power-cycle systems through their PDU outlets
 */

import { PDU_CYCLE_VERSION } from '@pdu-cycle/core';
import { Command } from 'commander';
import { setupCycleCommand } from './commands/cycle.js';

const program = new Command();

program
  .name('pdu-cycle')
  .description('Power-cycle a system by switching its PDU outlets off and back on')
  .version(PDU_CYCLE_VERSION);

setupCycleCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
