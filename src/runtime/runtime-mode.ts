/**
 * Runtime mode of the current process.
 * Decided once at the composition root and injected; services never sniff env vars for it.
 */
export type RuntimeMode =
  | { kind: 'production' }
  | { kind: 'test' }
  | { kind: 'cli' };
