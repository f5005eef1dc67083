// packages/cli/src/host/events.ts
import fs from 'node:fs';
import path from 'node:path';

import type { StakingErrorJSON } from '@epoch-stake/staking-core';

export type LedgerEvent = {
  ts: string;
  op: string;
  ok: boolean;
  signers: string[];
  accounts: string[];
  logs: string[];
  args?: Record<string, string>;
  error?: StakingErrorJSON;
};

/** One JSON object per line. A null file disables the log. */
export function appendEvent(logFile: string | null, event: LedgerEvent): void {
  if (!logFile) return;
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  fs.appendFileSync(logFile, JSON.stringify(event) + '\n', 'utf8');
}

export function readEvents(logFile: string): LedgerEvent[] {
  if (!fs.existsSync(logFile)) return [];
  const out: LedgerEvent[] = [];
  for (const line of fs.readFileSync(logFile, 'utf8').split('\n')) {
    if (!line.trim()) continue;
    const parsed: unknown = JSON.parse(line);
    if (isLedgerEvent(parsed)) out.push(parsed);
  }
  return out;
}

function isLedgerEvent(v: unknown): v is LedgerEvent {
  return (
    v !== null &&
    typeof v === 'object' &&
    'op' in v &&
    typeof v.op === 'string' &&
    'ok' in v &&
    typeof v.ok === 'boolean' &&
    'logs' in v &&
    Array.isArray(v.logs)
  );
}
