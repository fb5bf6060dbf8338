/**
 * Outlet number validation against the live outlet count of a PDU
 */

import { type PduSession, PowerCycleErrors } from '@pdu-cycle/core';
import { err, ok, type Result, tryCatchAsync } from './utils/result.js';

/**
 * Range rule: outlets are numbered 1..outletCount
 */
export function isValidOutletIndex(outlet: number, outletCount: number): boolean {
  return Number.isInteger(outlet) && outlet >= 1 && outlet <= outletCount;
}

/**
 * Read the outlet count from the PDU and check one outlet against it.
 * Resolves to the outlet count on success.
 */
export async function validateOutlet(session: PduSession, outlet: number): Promise<Result<number>> {
  const count = await tryCatchAsync(
    () => session.getOutletCount(),
    (error) => PowerCycleErrors.protocol(session.host, 'getOutletCount', error)
  );
  if (!count.ok) {
    return count;
  }

  if (!isValidOutletIndex(outlet, count.value)) {
    return err(PowerCycleErrors.invalidOutletNumber(session.host, outlet, count.value));
  }
  return ok(count.value);
}
