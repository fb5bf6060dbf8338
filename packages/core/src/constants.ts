/**
 * Global constants for pdu-cycle
 * Keep values environment-agnostic and dependency-free.
 */

/** Product name used in CLI output */
export const PDU_CYCLE_NAME = 'pdu-cycle' as const;

/**
 * pdu-cycle version string.
 * NOTE: This should be updated by release tooling.
 */
export const PDU_CYCLE_VERSION = '0.1.0' as const;

/** Enterprise branch of the IBM PDU MIB */
export const IBM_PDU_ENTERPRISE_OID = '1.3.6.1.4.1.2.6.223' as const;

/** Scalar holding the number of switched outlets */
export const OUTLET_COUNT_OID = `${IBM_PDU_ENTERPRISE_OID}.8.2.1.0` as const;

/** Outlet state column; the outlet index is appended as the last component */
export const OUTLET_STATE_OID_PREFIX = `${IBM_PDU_ENTERPRISE_OID}.8.2.2.1.11` as const;

/** Seconds between outlet-state reads while waiting for a change */
export const OUTLET_POLL_INTERVAL_SECONDS = 5;

/** Seconds between reachability probes while waiting for the system to come back */
export const PING_POLL_INTERVAL_SECONDS = 2;

/** Pause after the last outlet reports OFF, before the offline check */
export const POWER_OFF_GRACE_SECONDS = 5;

export const DEFAULT_POWER_OFF_TIMEOUT_SECONDS = 40;
export const DEFAULT_POWER_ON_TIMEOUT_SECONDS = 40;
export const DEFAULT_PING_TIMEOUT_SECONDS = 300;
export const DEFAULT_PING_DEADLINE_SECONDS = 1;

export const DEFAULT_SNMP_PORT = 161;
export const DEFAULT_SNMP_TIMEOUT_MS = 5000;
export const DEFAULT_SNMP_RETRIES = 1;
export const DEFAULT_COMMUNITY = 'private';

/** Executable handed the outlet list for delegated vendors */
export const DEFAULT_DELEGATED_SCRIPT = 'eaton_power_cycle';

/** Environment variable overriding the configured log level */
export const LOG_LEVEL_ENV = 'PDU_CYCLE_LOG_LEVEL';
