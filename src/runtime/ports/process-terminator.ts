/**
 * Port for ending the current process.
 * Only the CLI composition root calls it; commands return results instead.
 */
export type TerminationCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: TerminationCode): never;
}
