/**
 * Promise wrapper around a net-snmp session
 */

import type { SessionOptions } from '@pdu-cycle/core';
import * as snmp from 'net-snmp';

export type SnmpVarbind = {
  oid: string;
  value?: unknown;
};

/**
 * The subset of SNMP used to drive a PDU
 */
export interface SnmpSession {
  get(oids: string[]): Promise<SnmpVarbind[]>;
  setInteger(oid: string, value: number): Promise<void>;
  close(): void;
}

export type SnmpSessionFactory = (host: string, options: SessionOptions) => SnmpSession;

type NetSnmpVarbind = Parameters<typeof snmp.isVarbindError>[0];

function checkVarbinds(varbinds: NetSnmpVarbind[]): SnmpVarbind[] {
  for (const varbind of varbinds) {
    if (snmp.isVarbindError(varbind)) {
      throw new Error(snmp.varbindError(varbind));
    }
  }
  return varbinds.map(({ oid, value }) => ({ oid, value }));
}

/**
 * Open a community-based (v1 or v2c) session with net-snmp
 */
export const createNetSnmpSession: SnmpSessionFactory = (host, options) => {
  const session = snmp.createSession(host, options.community, {
    port: options.port,
    timeout: options.timeoutMs,
    retries: options.retries,
    version: options.authScheme === 'v2c' ? snmp.Version2c : snmp.Version1
  });

  // An undecodable datagram is reported as a session error; it fails every
  // outstanding request and every request made after it.
  const pending = new Set<(error: Error) => void>();
  let failure: Error | undefined;
  session.on('error', (error: Error) => {
    failure = error;
    for (const fail of pending) {
      fail(error);
    }
    pending.clear();
  });

  const request = <T>(
    send: (resolve: (value: T) => void, reject: (error: unknown) => void) => void
  ): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      if (failure) {
        reject(failure);
        return;
      }
      const fail = (error: Error): void => reject(error);
      pending.add(fail);
      send(
        (value) => {
          pending.delete(fail);
          resolve(value);
        },
        (error) => {
          pending.delete(fail);
          reject(error);
        }
      );
    });

  return {
    get: (oids) =>
      request<SnmpVarbind[]>((resolve, reject) => {
        session.get(oids, (error, varbinds) => {
          if (error) {
            reject(error);
            return;
          }
          try {
            resolve(checkVarbinds(varbinds ?? []));
          } catch (varbindError) {
            reject(varbindError);
          }
        });
      }),

    setInteger: (oid, value) =>
      request<void>((resolve, reject) => {
        session.set([{ oid, type: snmp.ObjectType.Integer, value }], (error, varbinds) => {
          if (error) {
            reject(error);
            return;
          }
          try {
            checkVarbinds(varbinds ?? []);
            resolve();
          } catch (varbindError) {
            reject(varbindError);
          }
        });
      }),

    close: () => session.close()
  };
};
