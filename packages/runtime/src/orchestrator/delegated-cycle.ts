import { type PduEntry, type PduReport, PowerCycleErrors } from '@pdu-cycle/core';
import { err, ok, type Result, tryCatchAsync } from '../utils/result.js';
import type { PowerCycleContext } from './types.js';

/**
 * Hand a PDU entry to the vendor's external script.
 * The script owns the whole sequence; only its exit status is checked.
 */
export async function cycleDelegatedPdu(
  entry: PduEntry,
  context: PowerCycleContext
): Promise<Result<PduReport>> {
  const { config, deps } = context;
  const logger = deps.logger.child(entry.host);
  const script = config.delegatedScript;
  const outlets = entry.outlets.join(',');

  logger.info({ script, outlets }, `delegating power cycle to ${script}`);
  const run = await tryCatchAsync(
    () => deps.delegated.run(script, entry.host, outlets),
    (error) => PowerCycleErrors.delegatedScriptFailed(entry.host, script, null, error)
  );
  if (!run.ok) {
    return run;
  }

  const { exitCode, signal } = run.value;
  if (exitCode !== 0) {
    logger.error({ exitCode, signal }, `${script} failed`);
    return err(PowerCycleErrors.delegatedScriptFailed(entry.host, script, exitCode));
  }

  logger.info(`${script} finished`);
  return ok({
    host: entry.host,
    vendorName: entry.vendorName,
    family: entry.family,
    outlets: [...entry.outlets],
    transitions: []
  });
}
