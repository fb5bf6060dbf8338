/**
 * Configuration loading: file values first, command-line flags on top
 */

import { readFile } from 'node:fs/promises';
import {
  type ConfigFile,
  formatConfigError,
  freezeConfig,
  type PowerCycleConfig,
  PowerCycleErrors,
  safeParseConfig,
  safeParseConfigFile
} from '@pdu-cycle/core';
import { err, ok, type Result, tryCatchAsync } from '@pdu-cycle/runtime';

/**
 * Read and validate a JSON configuration file
 */
export async function loadConfigFile(path: string): Promise<Result<ConfigFile>> {
  const content = await tryCatchAsync(
    () => readFile(path, 'utf-8'),
    (error) =>
      PowerCycleErrors.config(
        `cannot read file: ${error instanceof Error ? error.message : String(error)}`,
        path
      )
  );
  if (!content.ok) {
    return content;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content.value);
  } catch (error) {
    return err(
      PowerCycleErrors.config(
        `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        path
      )
    );
  }

  const parsed = safeParseConfigFile(raw);
  if (!parsed.success) {
    return err(PowerCycleErrors.config(formatConfigError(parsed.error), path));
  }
  return ok(parsed.data);
}

/**
 * Merge file values and flag overrides, apply defaults and freeze the result
 */
export function resolveConfig(
  file: ConfigFile,
  overrides: ConfigFile
): Result<PowerCycleConfig> {
  const merged: Record<string, unknown> = { ...file };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const parsed = safeParseConfig(merged);
  if (!parsed.success) {
    return err(PowerCycleErrors.config(formatConfigError(parsed.error)));
  }
  return ok(freezeConfig(parsed.data));
}
