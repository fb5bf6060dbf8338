/**
 * @pdu-cycle/transport - Device, network and process access for pdu-cycle
 *
 * This package provides the concrete capabilities the runtime is given:
 * - SNMP protocol client (net-snmp)
 * - ICMP reachability probe (system ping)
 * - Delegated vendor script runner
 */

export { createNodeCapabilities, type NodeCapabilities } from './capabilities.js';
export { PingProbe } from './ping-probe.js';
export { ScriptRunner } from './script-runner.js';
export {
  createNetSnmpSession,
  type SnmpSession,
  type SnmpSessionFactory,
  type SnmpVarbind
} from './snmp/net-snmp-session.js';
export {
  outletStateOid,
  SnmpPduSession,
  SnmpProtocolClient
} from './snmp/snmp-protocol-client.js';
