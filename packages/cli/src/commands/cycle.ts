/**
 * Cycle command - power-cycle a system through its PDU outlets
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  type AuthScheme,
  type ConfigFile,
  createLogger,
  ExitCode,
  type ExitCodeType,
  exitCodeFor,
  isLogLevel,
  LOG_LEVEL_ENV,
  type Logger,
  type LogLevel,
  type PowerCycleError,
  PowerCycleErrors,
  type PowerCycleReport,
  resolveLogLevel,
  type Sleep
} from '@pdu-cycle/core';
import { cycle, err, ok, type PowerCycleDeps, type Result } from '@pdu-cycle/runtime';
import { createNodeCapabilities, type NodeCapabilities } from '@pdu-cycle/transport';
import chalk from 'chalk';
import type { Command } from 'commander';
import { loadConfigFile, resolveConfig } from '../config-loader.js';

export interface CycleOptions {
  system: string;
  pdu: string[];
  vendor: string[];
  outlets: string[];
  snmpVersion?: string;
  community?: string;
  snmpPort?: string;
  powerOffTimeout?: string;
  powerOnTimeout?: string;
  pingTimeout?: string;
  script?: string;
  config?: string;
  logLevel?: string;
  json?: boolean;
}

export type CycleCommandDeps = {
  capabilities: (logger: Logger) => NodeCapabilities;
  sleep: Sleep;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: Record<string, string | undefined>;
  now?: () => Date;
};

const defaultDeps: CycleCommandDeps = {
  capabilities: createNodeCapabilities,
  sleep: (seconds) => delay(seconds * 1000),
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env
};

const SNMP_VERSIONS: Record<string, AuthScheme> = {
  '1': 'v1',
  '2c': 'v2c',
  '3': 'v3'
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

function parseNumber(flag: string, value: string | undefined): Result<number | undefined> {
  if (value === undefined) {
    return ok(undefined);
  }
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    return err(PowerCycleErrors.invalidArgument(flag, value, 'expected a number'));
  }
  return ok(parsed);
}

/**
 * Turn command-line flags into configuration overrides.
 * Range checks are left to the configuration schema.
 */
export function flagsToConfig(options: CycleOptions): Result<ConfigFile> {
  let authScheme: AuthScheme | undefined;
  if (options.snmpVersion !== undefined) {
    if (!Object.hasOwn(SNMP_VERSIONS, options.snmpVersion)) {
      return err(
        PowerCycleErrors.invalidArgument(
          '--snmp-version',
          options.snmpVersion,
          'expected 1, 2c or 3'
        )
      );
    }
    authScheme = SNMP_VERSIONS[options.snmpVersion];
  }

  let logLevel: LogLevel | undefined;
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      return err(
        PowerCycleErrors.invalidArgument(
          '--log-level',
          options.logLevel,
          'expected silent, error, warn, info, debug or trace'
        )
      );
    }
    logLevel = options.logLevel;
  }

  const snmpPort = parseNumber('--snmp-port', options.snmpPort);
  if (!snmpPort.ok) return snmpPort;
  const powerOffTimeout = parseNumber('--power-off-timeout', options.powerOffTimeout);
  if (!powerOffTimeout.ok) return powerOffTimeout;
  const powerOnTimeout = parseNumber('--power-on-timeout', options.powerOnTimeout);
  if (!powerOnTimeout.ok) return powerOnTimeout;
  const pingTimeout = parseNumber('--ping-timeout', options.pingTimeout);
  if (!pingTimeout.ok) return pingTimeout;

  return ok({
    authScheme,
    community: options.community,
    snmpPort: snmpPort.value,
    powerOffTimeout: powerOffTimeout.value,
    powerOnTimeout: powerOnTimeout.value,
    pingTimeout: pingTimeout.value,
    delegatedScript: options.script,
    logLevel
  });
}

function formatReport(report: PowerCycleReport): string[] {
  const lines = [chalk.green(`✓ Power-cycled ${report.system}`)];
  for (const pdu of report.pdus) {
    const how = pdu.family === 'native' ? 'SNMP' : 'vendor script';
    const details = chalk.gray(`(${pdu.vendorName}, ${how})`);
    lines.push(`  ${chalk.bold(pdu.host)} ${details} outlets ${pdu.outlets.join(',')}`);
  }
  return lines;
}

function reportError(error: PowerCycleError, json: boolean, deps: CycleCommandDeps): void {
  if (json) {
    const { kind, code, message } = error;
    deps.stdout(JSON.stringify({ ok: false, error: { kind, code, message } }, null, 2));
    return;
  }
  deps.stderr(`${chalk.red('Error:')} ${error.message}`);
}

/**
 * Run one power cycle and return the process exit status
 */
export async function runCycleCommand(
  options: CycleOptions,
  deps: CycleCommandDeps = defaultDeps
): Promise<ExitCodeType> {
  const json = options.json ?? false;
  const fail = (error: PowerCycleError): ExitCodeType => {
    reportError(error, json, deps);
    return exitCodeFor(error);
  };

  const overrides = flagsToConfig(options);
  if (!overrides.ok) {
    return fail(overrides.error);
  }

  let file: ConfigFile = {};
  if (options.config) {
    const loaded = await loadConfigFile(options.config);
    if (!loaded.ok) {
      return fail(loaded.error);
    }
    file = loaded.value;
  }

  const config = resolveConfig(file, overrides.value);
  if (!config.ok) {
    return fail(config.error);
  }

  const logger = createLogger({
    level: resolveLogLevel(config.value.logLevel, deps.env[LOG_LEVEL_ENV]),
    json: config.value.logFormat === 'json',
    output: deps.stderr,
    now: deps.now
  });
  const runDeps: PowerCycleDeps = {
    ...deps.capabilities(logger),
    sleep: deps.sleep,
    logger,
    now: deps.now
  };

  const result = await cycle(
    {
      system: options.system,
      pduHosts: options.pdu,
      vendors: options.vendor,
      outlets: options.outlets,
      authScheme: config.value.authScheme
    },
    config.value,
    runDeps
  );
  if (!result.ok) {
    return fail(result.error);
  }

  if (json) {
    deps.stdout(JSON.stringify({ ok: true, report: result.value }, null, 2));
  } else {
    for (const line of formatReport(result.value)) {
      deps.stdout(line);
    }
  }
  return ExitCode.SUCCESS;
}

export function setupCycleCommand(program: Command, deps: CycleCommandDeps = defaultDeps): void {
  program
    .command('cycle')
    .description('Power-cycle a system by switching its PDU outlets off and on')
    .requiredOption('--system <host>', 'host name or address of the system to power-cycle')
    .option('--pdu <host>', 'PDU host (repeatable)', collect, [])
    .option('--vendor <name>', 'PDU vendor, one per --pdu (repeatable)', collect, [])
    .option(
      '--outlets <list>',
      'comma-separated outlets, one list per --pdu (repeatable)',
      collect,
      []
    )
    .option('--snmp-version <version>', 'SNMP version: 1, 2c or 3')
    .option('--community <community>', 'SNMP community string')
    .option('--snmp-port <port>', 'SNMP port')
    .option('--power-off-timeout <seconds>', 'seconds to wait for each outlet to report OFF')
    .option('--power-on-timeout <seconds>', 'seconds to wait for each outlet to report ON')
    .option('--ping-timeout <seconds>', 'seconds to wait for the system to answer after power-on')
    .option('--script <path>', 'script run for delegated vendors')
    .option('-c, --config <path>', 'path to a JSON configuration file')
    .option('--log-level <level>', 'log level (silent, error, warn, info, debug, trace)')
    .option('--json', 'print the result as JSON')
    .action(async (options: CycleOptions) => {
      process.exitCode = await runCycleCommand(options, deps);
    });
}
