// packages/cli/src/host/context.ts
import type { AccountStore } from '@epoch-stake/account-store';

import type { Deployment } from '../deployment.js';

export type HostContext = {
  store: AccountStore;
  deployment: Deployment;
  /** events.ndjson; null disables the events log */
  logFile: string | null;
  now?: () => Date;
};

/** Owner tag of plain wallet accounts, which carry no data. */
export const SYSTEM_OWNER = new Uint8Array(32);

export function nowIso(ctx: HostContext): string {
  return (ctx.now ? ctx.now() : new Date()).toISOString();
}
