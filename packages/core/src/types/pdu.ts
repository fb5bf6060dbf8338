/**
 * PDU and outlet type definitions
 * Pure types with no side effects
 */

/**
 * Outlet power state as encoded on the wire
 */
export enum OutletState {
  OFF = 0,
  ON = 1
}

/**
 * Vendor families the orchestrator knows how to drive
 * - native: driven step by step over the device protocol
 * - delegated: handed to an external executable
 */
export type VendorFamily = 'native' | 'delegated';

/**
 * Known vendor names (lower-case) and the family handling them
 */
export const VENDOR_FAMILIES: Readonly<Record<string, VendorFamily>> = Object.freeze({
  ibm: 'native',
  eaton: 'delegated'
});

/**
 * Device-protocol authentication schemes.
 * Only the community-string versions are supported; v3 is rejected.
 */
export type AuthScheme = 'v1' | 'v2c' | 'v3';

export type SupportedAuthScheme = Exclude<AuthScheme, 'v3'>;

export function isSupportedAuthScheme(scheme: AuthScheme): scheme is SupportedAuthScheme {
  return scheme === 'v1' || scheme === 'v2c';
}

/**
 * One PDU of a power-cycle request together with the outlets feeding the system
 */
export interface PduEntry {
  readonly host: string;
  /** Vendor name as given by the caller */
  readonly vendorName: string;
  readonly family: VendorFamily;
  /** Outlet indices in the order they are acted upon */
  readonly outlets: readonly number[];
}
