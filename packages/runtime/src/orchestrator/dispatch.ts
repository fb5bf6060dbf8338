/**
 * Vendor dispatch
 *
 * PDUs are cycled one at a time in request order. The first failure ends
 * the run and later PDUs are never touched.
 */

import type {
  PduReport,
  PowerCycleConfig,
  PowerCycleReport,
  PowerCycleRequest,
  VendorFamily
} from '@pdu-cycle/core';
import { createPowerCycleRequest, type PowerCycleInput } from '../request.js';
import { err, ok, type Result } from '../utils/result.js';
import { cycleDelegatedPdu } from './delegated-cycle.js';
import { cycleNativePdu } from './native-cycle.js';
import type { PowerCycleDeps, VendorHandler } from './types.js';

export const VENDOR_HANDLERS: Record<VendorFamily, VendorHandler> = {
  native: cycleNativePdu,
  delegated: cycleDelegatedPdu
};

/**
 * Run a validated request
 */
export async function runPowerCycle(
  request: PowerCycleRequest,
  config: PowerCycleConfig,
  deps: PowerCycleDeps
): Promise<Result<PowerCycleReport>> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const context = { system: request.system, config, deps };
  const pdus: PduReport[] = [];

  deps.logger.info(
    { pdus: request.entries.map((entry) => entry.host) },
    `power-cycling ${request.system}`
  );

  for (const entry of request.entries) {
    const result = await VENDOR_HANDLERS[entry.family](entry, context);
    if (!result.ok) {
      deps.logger.error({ pdu: entry.host, code: result.error.code }, result.error.message);
      return err(result.error);
    }
    pdus.push(result.value);
  }

  deps.logger.info(`power cycle of ${request.system} complete`);
  return ok({ system: request.system, pdus, startedAt, finishedAt: now().toISOString() });
}

/**
 * Validate caller input and run it
 */
export async function cycle(
  input: PowerCycleInput,
  config: PowerCycleConfig,
  deps: PowerCycleDeps
): Promise<Result<PowerCycleReport>> {
  const request = createPowerCycleRequest(input);
  if (!request.ok) {
    return request;
  }
  return runPowerCycle(request.value, config, deps);
}
