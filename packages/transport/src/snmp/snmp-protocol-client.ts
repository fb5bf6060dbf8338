/**
 * PDU access over SNMP
 */

import {
  type Logger,
  OUTLET_COUNT_OID,
  OUTLET_STATE_OID_PREFIX,
  OutletState,
  type PduSession,
  type ProtocolClient,
  type SessionOptions
} from '@pdu-cycle/core';
import {
  createNetSnmpSession,
  type SnmpSession,
  type SnmpSessionFactory
} from './net-snmp-session.js';

export const outletStateOid = (outlet: number): string => `${OUTLET_STATE_OID_PREFIX}.${outlet}`;

/**
 * One open session to a PDU. Values that are not the expected integers are
 * reported as errors.
 */
export class SnmpPduSession implements PduSession {
  constructor(
    readonly host: string,
    private readonly session: SnmpSession
  ) {}

  async getOutletCount(): Promise<number> {
    const count = await this.getInteger(OUTLET_COUNT_OID);
    if (count < 0) {
      throw new Error(`Malformed outlet count from ${this.host}: ${count}`);
    }
    return count;
  }

  async getOutletState(outlet: number): Promise<OutletState> {
    const value = await this.getInteger(outletStateOid(outlet));
    switch (value) {
      case OutletState.OFF:
        return OutletState.OFF;
      case OutletState.ON:
        return OutletState.ON;
      default:
        throw new Error(`Malformed state for outlet ${outlet} on ${this.host}: ${value}`);
    }
  }

  async setOutletState(outlet: number, state: OutletState): Promise<void> {
    await this.session.setInteger(outletStateOid(outlet), state);
  }

  close(): void {
    this.session.close();
  }

  private async getInteger(oid: string): Promise<number> {
    const varbinds = await this.session.get([oid]);
    const value = varbinds.find((varbind) => varbind.oid === oid)?.value;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new Error(`Malformed value for ${oid} from ${this.host}: ${String(value)}`);
    }
    return value;
  }
}

/**
 * Protocol client opening SNMP sessions
 */
export class SnmpProtocolClient implements ProtocolClient {
  constructor(
    private readonly createSession: SnmpSessionFactory = createNetSnmpSession,
    private readonly logger?: Logger
  ) {}

  async openSession(host: string, options: SessionOptions): Promise<PduSession> {
    this.logger?.debug(
      { host, version: options.authScheme, port: options.port },
      `opening SNMP session to ${host}`
    );
    return new SnmpPduSession(host, this.createSession(host, options));
  }
}
