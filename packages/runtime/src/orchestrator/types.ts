import type {
  DelegatedRunner,
  Logger,
  PduEntry,
  PduReport,
  PowerCycleConfig,
  ProtocolClient,
  ReachabilityProbe,
  Sleep
} from '@pdu-cycle/core';
import type { Result } from '../utils/result.js';

/**
 * Collaborators of a run, constructed once by the caller
 */
export type PowerCycleDeps = {
  protocol: ProtocolClient;
  probe: ReachabilityProbe;
  delegated: DelegatedRunner;
  sleep: Sleep;
  logger: Logger;
  now?: () => Date;
};

/**
 * Everything a vendor handler needs besides its PDU entry
 */
export type PowerCycleContext = {
  system: string;
  config: PowerCycleConfig;
  deps: PowerCycleDeps;
};

/**
 * Power-cycles one PDU entry
 */
export type VendorHandler = (
  entry: PduEntry,
  context: PowerCycleContext
) => Promise<Result<PduReport>>;
