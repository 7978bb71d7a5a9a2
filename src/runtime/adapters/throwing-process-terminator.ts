import type { TerminationCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process, throws instead so a test sees
 * which code the command would have ended with.
 */
export class ProcessTerminationRequested extends Error {
  constructor(readonly code: TerminationCode) {
    super(`[ProcessTerminator] terminate(${code.kind})`);
    this.name = 'ProcessTerminationRequested';
  }
}

export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: TerminationCode): never {
    throw new ProcessTerminationRequested(code);
  }
}
