// packages/account-store/src/index.ts
export * from './types.js';
export { getPath, setPath, deletePath, isRecord } from './keys.js';
export * from './filestore.js';
export * from './memstore.js';
export * from './ledger.js';
