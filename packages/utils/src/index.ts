// packages/utils/src/index.ts
export * from './bytes.js';
export * from './hash.js';
export * from './keys.js';
