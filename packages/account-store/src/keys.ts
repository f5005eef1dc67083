// packages/account-store/src/keys.ts
export function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v);
}

function splitKey(path: string): string[] {
  return path.split('.').filter(Boolean);
}

export function getPath(obj: Record<string, unknown>, path: string): unknown {
  let cur: unknown = obj;
  for (const p of splitKey(path)) {
    if (!isRecord(cur)) return undefined;
    cur = cur[p];
  }
  return cur;
}

export function setPath(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = splitKey(path);
  const last = parts.pop();
  if (last === undefined) throw new Error('setPath: empty key');

  let cur = obj;
  for (const p of parts) {
    const next = cur[p];
    if (isRecord(next)) {
      cur = next;
    } else {
      const fresh: Record<string, unknown> = {};
      cur[p] = fresh;
      cur = fresh;
    }
  }
  cur[last] = value;
}

export function deletePath(obj: Record<string, unknown>, path: string): void {
  const parts = splitKey(path);
  const last = parts.pop();
  if (last === undefined) return;

  let cur: unknown = obj;
  for (const p of parts) {
    if (!isRecord(cur)) return;
    cur = cur[p];
  }
  if (isRecord(cur)) delete cur[last];
}
