// packages/staking-core/src/math.ts
import { U16_MAX, isU64 } from '@epoch-stake/utils';

import { ArithmeticError } from './errors.js';

export function requireU64(n: bigint, label: string): bigint {
  if (!isU64(n)) {
    throw new ArithmeticError('Overflow', `${label} does not fit in u64: ${n}`, { details: { value: n.toString() } });
  }
  return n;
}

export function checkedAddU64(a: bigint, b: bigint, label: string): bigint {
  const sum = a + b;
  if (!isU64(sum)) {
    throw new ArithmeticError('Overflow', `${label} overflows u64 (${a} + ${b})`, {
      details: { left: a.toString(), right: b.toString() },
    });
  }
  return sum;
}

export function checkedSubU64(a: bigint, b: bigint, label: string): bigint {
  const diff = a - b;
  if (diff < 0n) {
    throw new ArithmeticError('Underflow', `${label} underflows u64 (${a} - ${b})`, {
      details: { left: a.toString(), right: b.toString() },
    });
  }
  return diff;
}

export function checkedIncrementU16(n: number, label: string): number {
  if (n >= U16_MAX) throw new ArithmeticError('Overflow', `${label} overflows u16`);
  return n + 1;
}
