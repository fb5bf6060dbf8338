/**
 * Power-cycle request construction
 *
 * Everything that can be checked without talking to a PDU is checked here,
 * so a rejected request never opens a session.
 */

import {
  type AuthScheme,
  isSupportedAuthScheme,
  type PduEntry,
  type PowerCycleRequest,
  PowerCycleErrors,
  VENDOR_FAMILIES,
  type VendorFamily
} from '@pdu-cycle/core';
import { err, ok, type Result } from './utils/result.js';

/**
 * Caller input: parallel lists, one element per PDU
 */
export type PowerCycleInput = {
  system: string;
  pduHosts: readonly string[];
  vendors: readonly string[];
  /** Outlet lists, either parsed or comma-separated */
  outlets: ReadonlyArray<string | readonly number[]>;
  authScheme: AuthScheme;
};

const OUTLET_TOKEN = /^\d+$/;

/**
 * Parse a comma-separated outlet list such as "3,4".
 * Range checks happen later against the live outlet count.
 */
export function parseOutletList(raw: string): Result<number[]> {
  const outlets: number[] = [];
  for (const token of raw.split(',').map((part) => part.trim())) {
    if (!OUTLET_TOKEN.test(token)) {
      return err(
        PowerCycleErrors.invalidArgument(
          'outlet list',
          raw,
          'expected comma-separated outlet numbers'
        )
      );
    }
    const outlet = Number(token);
    if (!outlets.includes(outlet)) {
      outlets.push(outlet);
    }
  }
  return ok(outlets);
}

/**
 * Map a vendor name onto the family that handles it (case-insensitive)
 */
export function resolveVendorFamily(vendor: string): Result<VendorFamily> {
  const key = vendor.trim().toLowerCase();
  const family = Object.hasOwn(VENDOR_FAMILIES, key) ? VENDOR_FAMILIES[key] : undefined;
  return family ? ok(family) : err(PowerCycleErrors.unsupportedVendor(vendor));
}

function normalizeOutlets(raw: string | readonly number[]): Result<number[]> {
  if (typeof raw === 'string') {
    return parseOutletList(raw);
  }
  const outlets: number[] = [];
  for (const outlet of raw) {
    if (!Number.isInteger(outlet)) {
      return err(
        PowerCycleErrors.invalidArgument('outlet number', String(outlet), 'expected an integer')
      );
    }
    if (!outlets.includes(outlet)) {
      outlets.push(outlet);
    }
  }
  return ok(outlets);
}

/**
 * Build a request from caller input.
 * Checks run in this order: list lengths, authentication scheme, every vendor,
 * then outlet lists.
 */
export function createPowerCycleRequest(input: PowerCycleInput): Result<PowerCycleRequest> {
  const { pduHosts, vendors, outlets } = input;
  if (pduHosts.length !== vendors.length || pduHosts.length !== outlets.length) {
    return err(
      PowerCycleErrors.inputShapeMismatch(pduHosts.length, vendors.length, outlets.length)
    );
  }

  const system = input.system.trim();
  if (!system) {
    return err(
      PowerCycleErrors.invalidArgument('system', input.system, 'a host name or address is required')
    );
  }

  if (!isSupportedAuthScheme(input.authScheme)) {
    return err(PowerCycleErrors.unsupportedAuthScheme(input.authScheme));
  }

  const families: VendorFamily[] = [];
  for (const vendor of vendors) {
    const family = resolveVendorFamily(vendor);
    if (!family.ok) {
      return family;
    }
    families.push(family.value);
  }

  const entries: PduEntry[] = [];
  for (const [index, host] of pduHosts.entries()) {
    const pduHost = host.trim();
    if (!pduHost) {
      return err(
        PowerCycleErrors.invalidArgument('PDU host', host, 'a host name or address is required')
      );
    }
    const parsed = normalizeOutlets(outlets[index]);
    if (!parsed.ok) {
      return parsed;
    }
    if (parsed.value.length === 0) {
      return err(
        PowerCycleErrors.invalidArgument('outlet list', '', `no outlets given for ${pduHost}`)
      );
    }
    entries.push({
      host: pduHost,
      vendorName: vendors[index],
      family: families[index],
      outlets: parsed.value
    });
  }

  if (entries.length === 0) {
    return err(PowerCycleErrors.invalidArgument('PDU list', '', 'at least one PDU is required'));
  }

  return ok({ system, entries });
}
