export type PayloadRecord = Record<string, unknown>;

export function asRecord(value: unknown): PayloadRecord | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * 按路径取值，数组用数字下标
 */
export function readPath(source: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = source;
  for (const key of path) {
    if (typeof key === 'number') {
      if (!Array.isArray(current) || key >= current.length) return undefined;
      current = current[key];
    } else {
      const record = asRecord(current);
      if (!record) return undefined;
      current = record[key];
    }
  }
  return current;
}

export function readString(source: unknown, path: ReadonlyArray<string | number>): string | null {
  const value = readPath(source, path);
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

/**
 * 字段可能是 id 字符串，也可能是展开后的对象
 */
export function readId(source: unknown, path: ReadonlyArray<string | number>): string | null {
  return readString(source, path) ?? readString(source, [...path, 'id']);
}

export function readPositiveInt(source: unknown, path: ReadonlyArray<string | number>): number | null {
  const value = readPath(source, path);
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
}

export function readNumber(source: unknown, path: ReadonlyArray<string | number>): number | null {
  const value = readPath(source, path);
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function readUnixTime(source: unknown, path: ReadonlyArray<string | number>): Date | null {
  const value = readPath(source, path);
  return typeof value === 'number' && value > 0 ? new Date(value * 1000) : null;
}

export function firstOf<T>(...values: Array<T | null>): T | null {
  for (const value of values) {
    if (value !== null) return value;
  }
  return null;
}
