import type { DelegatedRunner, Logger, ProtocolClient, ReachabilityProbe } from '@pdu-cycle/core';
import { PingProbe } from './ping-probe.js';
import { ScriptRunner } from './script-runner.js';
import { SnmpProtocolClient } from './snmp/snmp-protocol-client.js';

export type NodeCapabilities = {
  protocol: ProtocolClient;
  probe: ReachabilityProbe;
  delegated: DelegatedRunner;
};

/**
 * Real device, network and process access for a Node.js host
 */
export function createNodeCapabilities(logger?: Logger): NodeCapabilities {
  return {
    protocol: new SnmpProtocolClient(undefined, logger?.child('snmp')),
    probe: new PingProbe(logger?.child('ping')),
    delegated: new ScriptRunner(logger?.child('script'))
  };
}
