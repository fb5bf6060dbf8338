import { withTempFile } from '@pdu-cycle/test-utils';
import { describe, expect, it } from 'vitest';
import { loadConfigFile, resolveConfig } from './config-loader.js';

describe('loadConfigFile', () => {
  it('reads a partial configuration', async () => {
    const result = await withTempFile(
      'pdu-cycle.json',
      JSON.stringify({ community: 'test-secret', pingTimeout: 60 }),
      loadConfigFile
    );

    expect(result).toEqual({ ok: true, value: { community: 'test-secret', pingTimeout: 60 } });
  });

  it('reports a missing file', async () => {
    const result = await loadConfigFile('/nonexistent/pdu-cycle.json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('config');
      expect(result.error.message).toContain('/nonexistent/pdu-cycle.json: cannot read file:');
    }
  });

  it('reports malformed JSON', async () => {
    const result = await withTempFile('pdu-cycle.json', '{ "community": ', loadConfigFile);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain('invalid JSON');
    }
  });

  it('rejects unknown keys', async () => {
    const result = await withTempFile('pdu-cycle.json', '{ "bogus": 1 }', loadConfigFile);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain("Unrecognized key(s) in object: 'bogus'");
    }
  });
});

describe('resolveConfig', () => {
  it('applies defaults to an empty configuration', () => {
    const result = resolveConfig({}, {});

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toMatchObject({
        authScheme: 'v1',
        community: 'private',
        snmpPort: 161,
        powerOffTimeout: 40,
        powerOnTimeout: 40,
        pingTimeout: 300,
        pingDeadline: 1,
        delegatedScript: 'eaton_power_cycle',
        logLevel: 'info'
      });
      expect(Object.isFrozen(result.value)).toBe(true);
    }
  });

  it('lets flags override file values', () => {
    const result = resolveConfig(
      { community: 'test-secret', powerOffTimeout: 10 },
      { powerOffTimeout: 5, community: undefined }
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.community).toBe('test-secret');
      expect(result.value.powerOffTimeout).toBe(5);
    }
  });

  it('reports values out of range', () => {
    const result = resolveConfig({}, { powerOffTimeout: 7200 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        'Configuration validation failed:\npowerOffTimeout: Number must be less than or equal to 3600'
      );
    }
  });
});
