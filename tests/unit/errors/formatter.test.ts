import { describe, it, expect } from 'vitest';
import { formatAppError, formatProtocolError, safeToString } from '../../../src/errors/formatter.js';
import { Err as AppErr } from '../../../src/errors/factories.js';
import { Err } from '../../../src/domain/protocol/error.js';

describe('formatAppError', () => {
  it('includes the phase and cause of a startup failure', () => {
    const error = AppErr.startupFailed('service registration', 'Could not register services', new TypeError('boom'));

    expect(formatAppError(error)).toBe(
      'Startup failed during service registration: Could not register services\nCause: TypeError: boom'
    );
  });

  it('leaves the cause out when there is none', () => {
    expect(formatAppError(AppErr.startupFailed('cli', 'No command'))).toBe('Startup failed during cli: No command');
  });

  it('says so when a config error has no issues', () => {
    expect(formatAppError(AppErr.configInvalid([]))).toBe('Invalid configuration\n\n  - (no details)');
  });

  it('serializes non-error causes', () => {
    expect(formatAppError(AppErr.unexpected('Something broke', { code: 7 }))).toBe('Something broke\nCause: {"code":7}');
  });
});

describe('formatProtocolError', () => {
  it('lists schema issues as details', () => {
    const formatted = formatProtocolError(
      Err.schemaInvalid([
        { path: 'method.0', message: 'Either rateC or currentMa must be set and non-zero.' },
        { path: 'record.timeS', message: 'Required' },
      ])
    );

    expect(formatted.message).toBe('Protocol does not match the schema');
    expect(formatted.details).toEqual([
      'method.0: Either rateC or currentMa must be set and non-zero.',
      'record.timeS: Required',
    ]);
  });

  it('keeps the error message as headline for other errors', () => {
    const formatted = formatProtocolError(Err.missingTag('warmup', 4));

    expect(formatted).toEqual({
      message: "Tag 'warmup' is missing.",
      details: [],
      suggestions: ["Add a tag step named 'warmup' before the loop"],
    });
  });

  it('points runaway expansion at the config variable', () => {
    expect(formatProtocolError(Err.runawayExpansion(10, 11)).suggestions).toContain(
      'Raise CYCLER_PROTOCOL_MAX_UNROLL_STEPS if the protocol really is this long'
    );
  });
});

describe('safeToString', () => {
  it('falls back to String for values JSON cannot handle', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;

    expect(safeToString(cyclic)).toBe('[object Object]');
  });
});
