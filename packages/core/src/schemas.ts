/**
 * Configuration schemas for pdu-cycle
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';
import {
  DEFAULT_COMMUNITY,
  DEFAULT_DELEGATED_SCRIPT,
  DEFAULT_PING_DEADLINE_SECONDS,
  DEFAULT_PING_TIMEOUT_SECONDS,
  DEFAULT_POWER_OFF_TIMEOUT_SECONDS,
  DEFAULT_POWER_ON_TIMEOUT_SECONDS,
  DEFAULT_SNMP_PORT,
  DEFAULT_SNMP_RETRIES,
  DEFAULT_SNMP_TIMEOUT_MS
} from './constants.js';

// Upper bound for any wait, in seconds
export const MAX_TIMEOUT_SECONDS = 3600;

const timeoutSeconds = (defaultValue: number, description: string) =>
  z.number().min(0).max(MAX_TIMEOUT_SECONDS).default(defaultValue).describe(description);

/**
 * Device-protocol settings
 */
const ProtocolConfigShape = {
  authScheme: z
    .enum(['v1', 'v2c', 'v3'])
    .default('v1')
    .describe('SNMP version; only the community-based v1 and v2c are supported'),
  community: z.string().min(1).default(DEFAULT_COMMUNITY).describe('SNMP community string'),
  snmpPort: z.number().int().min(1).max(65535).default(DEFAULT_SNMP_PORT).describe('SNMP port'),
  snmpTimeoutMs: z
    .number()
    .int()
    .min(100)
    .max(60000)
    .default(DEFAULT_SNMP_TIMEOUT_MS)
    .describe('Per-request SNMP timeout in milliseconds'),
  snmpRetries: z
    .number()
    .int()
    .min(0)
    .max(5)
    .default(DEFAULT_SNMP_RETRIES)
    .describe('SNMP request retransmissions handled by the SNMP engine')
};

/**
 * Power sequence settings
 */
const SequenceConfigShape = {
  powerOffTimeout: timeoutSeconds(
    DEFAULT_POWER_OFF_TIMEOUT_SECONDS,
    'Seconds to wait for each outlet to report OFF'
  ),
  powerOnTimeout: timeoutSeconds(
    DEFAULT_POWER_ON_TIMEOUT_SECONDS,
    'Seconds to wait for each outlet to report ON'
  ),
  pingTimeout: timeoutSeconds(
    DEFAULT_PING_TIMEOUT_SECONDS,
    'Seconds to wait for the system to answer pings after power-on'
  ),
  pingDeadline: z
    .number()
    .int()
    .min(1)
    .max(60)
    .default(DEFAULT_PING_DEADLINE_SECONDS)
    .describe('Deadline of a single ping in seconds'),
  delegatedScript: z
    .string()
    .min(1)
    .default(DEFAULT_DELEGATED_SCRIPT)
    .describe('Executable run for delegated vendors')
};

/**
 * Logging settings
 */
const LoggingConfigShape = {
  logLevel: z
    .enum(['silent', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info')
    .describe('Log level'),
  logFormat: z.enum(['text', 'json']).default('text').describe('Log line format')
};

/**
 * Complete run configuration
 */
export const PowerCycleConfigSchema = z
  .object({
    ...ProtocolConfigShape,
    ...SequenceConfigShape,
    ...LoggingConfigShape
  })
  .strict();

/**
 * Configuration file: every key optional, unknown keys rejected
 */
export const ConfigFileSchema = PowerCycleConfigSchema.partial();

export type PowerCycleConfigInput = z.input<typeof PowerCycleConfigSchema>;
export type PowerCycleConfig = Readonly<z.output<typeof PowerCycleConfigSchema>>;
export type ConfigFile = z.output<typeof ConfigFileSchema>;

/**
 * Safe parse a configuration object
 */
export function safeParseConfig(config: unknown) {
  return PowerCycleConfigSchema.safeParse(config);
}

/**
 * Safe parse the contents of a configuration file
 */
export function safeParseConfigFile(config: unknown) {
  return ConfigFileSchema.safeParse(config);
}

/**
 * Freeze a parsed configuration so it can be shared without copies
 */
export function freezeConfig(config: z.output<typeof PowerCycleConfigSchema>): PowerCycleConfig {
  return Object.freeze({ ...config });
}

/**
 * Format Zod error messages for human readability
 * @param error ZodError instance
 * @returns Formatted error message
 */
export function formatConfigError(error: z.ZodError): string {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
  return `Configuration validation failed:\n${messages.join('\n')}`;
}
