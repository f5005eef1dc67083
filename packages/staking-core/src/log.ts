// packages/staking-core/src/log.ts
import type { ProgramLog } from './di.js';

export const NOOP_PROGRAM_LOG: ProgramLog = { msg: () => {} };

/** Sink that keeps lines in order; the host prints or records them after the call. */
export function collectProgramLog(): ProgramLog & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    msg(line: string) {
      lines.push(line);
    },
  };
}
