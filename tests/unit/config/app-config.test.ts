import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../../src/config/app-config.js';
import { formatAppError } from '../../../src/errors/formatter.js';
import { expectOk, expectErr } from '../../helpers/result-helpers.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = expectOk(loadConfig({ env: {} }), 'empty env');

    expect(config).toEqual({
      logging: { level: 'silent' },
      unroll: { maxSteps: 10_000 },
      paths: {},
    });
  });

  it('reads every variable', () => {
    const config = expectOk(
      loadConfig({
        env: {
          CYCLER_PROTOCOL_LOG_LEVEL: 'DEBUG',
          CYCLER_PROTOCOL_MAX_UNROLL_STEPS: '250000',
          CYCLER_PROTOCOL_OUTPUT_DIR: '/tmp/exports',
        },
      }),
      'full env'
    );

    expect(config.logging.level).toBe('debug');
    expect(config.unroll.maxSteps).toBe(250_000);
    expect(config.paths.outputDir).toBe('/tmp/exports');
  });

  it('ignores unrelated variables', () => {
    expect(expectOk(loadConfig({ env: { HOME: '/home/test', PATH: '/bin' } }), 'unrelated').unroll.maxSteps).toBe(10_000);
  });

  it('reports every invalid variable', () => {
    const error = expectErr(
      loadConfig({
        env: {
          CYCLER_PROTOCOL_LOG_LEVEL: 'loud',
          CYCLER_PROTOCOL_MAX_UNROLL_STEPS: '0',
        },
      }),
      'invalid env'
    );

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues.map((i) => i.path)).toEqual(['CYCLER_PROTOCOL_LOG_LEVEL', 'CYCLER_PROTOCOL_MAX_UNROLL_STEPS']);
    expect(error.issues[1]).toEqual({
      path: 'CYCLER_PROTOCOL_MAX_UNROLL_STEPS',
      message: 'CYCLER_PROTOCOL_MAX_UNROLL_STEPS must be at least 1',
    });
  });

  it('rejects a fractional or non-numeric ceiling', () => {
    const fractional = expectErr(loadConfig({ env: { CYCLER_PROTOCOL_MAX_UNROLL_STEPS: '1.5' } }), 'fractional');
    expect(fractional.issues).toEqual([
      { path: 'CYCLER_PROTOCOL_MAX_UNROLL_STEPS', message: 'CYCLER_PROTOCOL_MAX_UNROLL_STEPS must be a whole number' },
    ]);

    expect(expectErr(loadConfig({ env: { CYCLER_PROTOCOL_MAX_UNROLL_STEPS: 'lots' } }), 'nan').issues).toHaveLength(1);
  });

  it('formats config errors as a list of issues', () => {
    const error = expectErr(loadConfig({ env: { CYCLER_PROTOCOL_MAX_UNROLL_STEPS: '20000000' } }), 'too large');

    expect(formatAppError(error)).toBe(
      'Invalid configuration\n\n  - CYCLER_PROTOCOL_MAX_UNROLL_STEPS: CYCLER_PROTOCOL_MAX_UNROLL_STEPS cannot exceed 10000000'
    );
  });
});
