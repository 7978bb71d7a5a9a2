import { describe, it, expect } from 'vitest';
import { createLoadProtocolFileUseCase, type LoadProtocolFileDeps } from '../../../src/application/use-cases/load-protocol-file.js';

const validJson = JSON.stringify({ record: { timeS: 1 }, method: [{ kind: 'rest', untilTimeS: 5 }] });

function deps(overrides: Partial<LoadProtocolFileDeps> = {}): LoadProtocolFileDeps {
  return {
    resolvePath: (p) => `/abs/${p}`,
    existsSync: () => true,
    readFileSyncUtf8: () => validJson,
    parseJson: (content) => JSON.parse(content),
    ...overrides,
  };
}

describe('loadProtocolFile', () => {
  it('loads a valid protocol', () => {
    const result = createLoadProtocolFileUseCase(deps())('p.json');

    expect(result.kind).toBe('valid');
    if (result.kind !== 'valid') return;
    expect(result.protocol.method).toEqual([{ kind: 'rest', untilTimeS: 5 }]);
  });

  it('reports a missing file by the path the user gave', () => {
    const seen: string[] = [];
    const load = createLoadProtocolFileUseCase(
      deps({
        existsSync: (p) => {
          seen.push(p);
          return false;
        },
      })
    );

    expect(load('missing.json')).toEqual({ kind: 'file_not_found', filePath: 'missing.json' });
    expect(seen).toEqual(['/abs/missing.json']);
  });

  it('keeps the error code of a failed read', () => {
    const load = createLoadProtocolFileUseCase(
      deps({
        readFileSyncUtf8: () => {
          throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
        },
      })
    );

    expect(load('locked.json')).toEqual({
      kind: 'read_error',
      filePath: 'locked.json',
      message: 'EACCES: permission denied',
      code: 'EACCES',
    });
  });

  it('reports malformed JSON', () => {
    const load = createLoadProtocolFileUseCase(
      deps({
        parseJson: () => {
          throw new SyntaxError('Unexpected token');
        },
      })
    );

    expect(load('broken.json')).toEqual({ kind: 'json_parse_error', filePath: 'broken.json', message: 'Unexpected token' });
  });

  it('returns the protocol error for an invalid protocol', () => {
    const load = createLoadProtocolFileUseCase(
      deps({ readFileSyncUtf8: () => JSON.stringify({ record: { timeS: 1 }, method: [{ kind: 'tag', name: 'a' }] }) })
    );

    const result = load('tags-only.json');

    expect(result).toMatchObject({ kind: 'invalid', filePath: 'tags-only.json', error: { _tag: 'EmptyMethod' } });
  });
});
