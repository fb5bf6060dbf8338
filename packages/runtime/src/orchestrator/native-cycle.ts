/**
 * Native vendor power cycle
 *
 * Validate and switch off every outlet, confirm the system went dark,
 * switch every outlet back on, then wait for the system to answer again.
 * The first failure ends the cycle; outlets already switched are left as they are.
 */

import {
  isSupportedAuthScheme,
  type Logger,
  OUTLET_POLL_INTERVAL_SECONDS,
  OutletState,
  type PduEntry,
  type PduReport,
  type PduSession,
  PING_POLL_INTERVAL_SECONDS,
  POWER_OFF_GRACE_SECONDS,
  type PowerCycleError,
  PowerCycleErrors,
  PowerCycleState
} from '@pdu-cycle/core';
import { validateOutlet } from '../outlet-validator.js';
import { pollWithTimeout } from '../poll/poll-with-timeout.js';
import { PowerCycleStateMachine } from '../state-machine.js';
import { err, ok, type Result, tryCatchAsync } from '../utils/result.js';
import type { PowerCycleContext } from './types.js';

const stateName = (state: OutletState): string => (state === OutletState.ON ? 'ON' : 'OFF');

async function setOutlet(
  session: PduSession,
  outlet: number,
  state: OutletState
): Promise<Result<void>> {
  return tryCatchAsync(
    () => session.setOutletState(outlet, state),
    (error) =>
      PowerCycleErrors.protocol(
        session.host,
        `setOutletState(${outlet}, ${stateName(state)})`,
        error
      )
  );
}

/**
 * Poll one outlet until it reports the target state
 */
async function waitForOutlet(
  session: PduSession,
  outlet: number,
  target: OutletState,
  timeout: number,
  context: PowerCycleContext,
  logger: Logger
): Promise<Result<void>> {
  const polled = await pollWithTimeout<OutletState, PowerCycleError>({
    probe: () =>
      tryCatchAsync(
        () => session.getOutletState(outlet),
        (error) => PowerCycleErrors.protocol(session.host, `getOutletState(${outlet})`, error)
      ),
    target,
    interval: OUTLET_POLL_INTERVAL_SECONDS,
    timeout,
    sleep: context.deps.sleep,
    onMiss: (value, remaining) =>
      logger.debug(
        { outlet, state: stateName(value), remaining },
        `outlet ${outlet} not ${stateName(target)} yet`
      )
  });

  if (polled.ok) {
    return ok(undefined);
  }
  if (polled.error.reason === 'probe') {
    return err(polled.error.error);
  }
  return err(
    target === OutletState.OFF
      ? PowerCycleErrors.powerOffTimeout(session.host, outlet, timeout)
      : PowerCycleErrors.powerOnTimeout(session.host, outlet, timeout)
  );
}

async function powerOff(
  session: PduSession,
  entry: PduEntry,
  machine: PowerCycleStateMachine,
  context: PowerCycleContext,
  logger: Logger
): Promise<Result<void>> {
  for (const [index, outlet] of entry.outlets.entries()) {
    if (index > 0) {
      machine.transition(PowerCycleState.VALIDATING, `outlet ${outlet}`);
    }
    const valid = await validateOutlet(session, outlet);
    if (!valid.ok) {
      return valid;
    }

    machine.transition(PowerCycleState.POWERING_OFF, `outlet ${outlet}`);
    logger.info(`powering off outlet ${outlet}`);
    const set = await setOutlet(session, outlet, OutletState.OFF);
    if (!set.ok) {
      return set;
    }
    const off = await waitForOutlet(
      session,
      outlet,
      OutletState.OFF,
      context.config.powerOffTimeout,
      context,
      logger
    );
    if (!off.ok) {
      return off;
    }
    logger.info(`outlet ${outlet} is OFF`);
  }
  return ok(undefined);
}

async function verifyOffline(
  entry: PduEntry,
  machine: PowerCycleStateMachine,
  context: PowerCycleContext,
  logger: Logger
): Promise<Result<void>> {
  const { system, config, deps } = context;
  machine.transition(PowerCycleState.VERIFYING_OFFLINE);

  await deps.sleep(POWER_OFF_GRACE_SECONDS);
  const reachable = await deps.probe.probe(system, config.pingDeadline);
  if (reachable) {
    return err(PowerCycleErrors.unexpectedlyReachable(entry.host, system));
  }
  logger.info(`${system} is unreachable`);
  return ok(undefined);
}

async function powerOn(
  session: PduSession,
  entry: PduEntry,
  machine: PowerCycleStateMachine,
  context: PowerCycleContext,
  logger: Logger
): Promise<Result<void>> {
  machine.transition(PowerCycleState.POWERING_ON);

  for (const outlet of entry.outlets) {
    logger.info(`powering on outlet ${outlet}`);
    const set = await setOutlet(session, outlet, OutletState.ON);
    if (!set.ok) {
      return set;
    }
    const on = await waitForOutlet(
      session,
      outlet,
      OutletState.ON,
      context.config.powerOnTimeout,
      context,
      logger
    );
    if (!on.ok) {
      return on;
    }
    logger.info(`outlet ${outlet} is ON`);
  }
  return ok(undefined);
}

async function verifyOnline(
  entry: PduEntry,
  machine: PowerCycleStateMachine,
  context: PowerCycleContext,
  logger: Logger
): Promise<Result<void>> {
  const { system, config, deps } = context;
  machine.transition(PowerCycleState.VERIFYING_ONLINE);

  const polled = await pollWithTimeout<boolean, never>({
    probe: async () => ok(await deps.probe.probe(system, config.pingDeadline)),
    target: true,
    interval: PING_POLL_INTERVAL_SECONDS,
    timeout: config.pingTimeout,
    sleep: deps.sleep
  });
  if (!polled.ok) {
    return err(PowerCycleErrors.unreachableAfterPowerOn(entry.host, system, config.pingTimeout));
  }
  logger.info(`${system} is reachable again`);
  return ok(undefined);
}

async function runSequence(
  session: PduSession,
  entry: PduEntry,
  machine: PowerCycleStateMachine,
  context: PowerCycleContext,
  logger: Logger
): Promise<Result<void>> {
  const off = await powerOff(session, entry, machine, context, logger);
  if (!off.ok) return off;

  const offline = await verifyOffline(entry, machine, context, logger);
  if (!offline.ok) return offline;

  const on = await powerOn(session, entry, machine, context, logger);
  if (!on.ok) return on;

  return verifyOnline(entry, machine, context, logger);
}

/**
 * Power-cycle the outlets of one native PDU
 */
export async function cycleNativePdu(
  entry: PduEntry,
  context: PowerCycleContext
): Promise<Result<PduReport>> {
  const { config, deps } = context;
  const logger = deps.logger.child(entry.host);
  const machine = new PowerCycleStateMachine(entry.host, logger, deps.now);

  const fail = (error: PowerCycleError): Result<PduReport> => {
    machine.fail(error.message);
    return err(error);
  };

  if (!isSupportedAuthScheme(config.authScheme)) {
    return fail(PowerCycleErrors.unsupportedAuthScheme(config.authScheme));
  }
  const authScheme = config.authScheme;

  const opened = await tryCatchAsync(
    () =>
      deps.protocol.openSession(entry.host, {
        authScheme,
        community: config.community,
        port: config.snmpPort,
        timeoutMs: config.snmpTimeoutMs,
        retries: config.snmpRetries
      }),
    (error) => PowerCycleErrors.protocol(entry.host, 'openSession', error)
  );
  if (!opened.ok) {
    return fail(opened.error);
  }

  const session = opened.value;
  try {
    const result = await runSequence(session, entry, machine, context, logger);
    if (!result.ok) {
      return fail(result.error);
    }
  } finally {
    session.close();
  }

  machine.transition(PowerCycleState.DONE);
  return ok({
    host: entry.host,
    vendorName: entry.vendorName,
    family: entry.family,
    outlets: [...entry.outlets],
    transitions: machine.getHistory()
  });
}
