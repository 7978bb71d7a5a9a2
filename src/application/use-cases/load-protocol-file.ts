import type { Protocol } from '../../domain/protocol/steps.js';
import type { ProtocolError } from '../../domain/protocol/error.js';
import { parseProtocol } from '../../domain/protocol/protocol.js';

export type LoadProtocolFileResult =
  | { kind: 'file_not_found'; filePath: string }
  | { kind: 'read_error'; filePath: string; message: string; code?: string }
  | { kind: 'json_parse_error'; filePath: string; message: string }
  | { kind: 'invalid'; filePath: string; error: ProtocolError }
  | { kind: 'valid'; filePath: string; protocol: Protocol };

export interface LoadProtocolFileDeps {
  readonly resolvePath: (filePath: string) => string;
  readonly existsSync: (resolvedPath: string) => boolean;
  readonly readFileSyncUtf8: (resolvedPath: string) => string;
  readonly parseJson: (content: string) => unknown;
}

export function createLoadProtocolFileUseCase(deps: LoadProtocolFileDeps) {
  return function loadProtocolFile(filePath: string): LoadProtocolFileResult {
    const resolvedPath = deps.resolvePath(filePath);

    if (!deps.existsSync(resolvedPath)) {
      return { kind: 'file_not_found', filePath };
    }

    let content: string;
    try {
      content = deps.readFileSyncUtf8(resolvedPath);
    } catch (error: unknown) {
      return { kind: 'read_error', filePath, message: errorMessage(error), code: errorCode(error) };
    }

    let parsed: unknown;
    try {
      parsed = deps.parseJson(content);
    } catch (error: unknown) {
      return { kind: 'json_parse_error', filePath, message: errorMessage(error) };
    }

    return parseProtocol(parsed).match(
      (protocol): LoadProtocolFileResult => ({ kind: 'valid', filePath, protocol }),
      (error): LoadProtocolFileResult => ({ kind: 'invalid', filePath, error })
    );
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}
