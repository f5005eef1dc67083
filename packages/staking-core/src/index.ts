// packages/staking-core/src/index.ts

// Records + codecs
export * from './records.js';
export * from './instruction.js';

// Errors
export * from './errors.js';

// Collaborator seams + logging
export * from './di.js';
export * from './log.js';

// Address conventions
export * from './address.js';

// Pure math
export { calculateReward, eligibleStake, previewClaimableReward } from './reward.js';
export { checkedAddU64, checkedSubU64 } from './math.js';

// Dispatcher (public entrypoint). Handlers are reached only through it.
export { processInstruction } from './processor.js';
export type { ProcessInstructionArgs, ProcessInstructionResult } from './processor.js';
