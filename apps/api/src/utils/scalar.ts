import type { Scalar } from '../types/table';

const FALSE_WORDS = /^(false|no)$/i;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isBytes = (value: unknown): value is Uint8Array => value instanceof Uint8Array;

export const toScalar = (value: unknown): Scalar => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (value instanceof Date) return Number.isNaN(value.valueOf()) ? null : value.toISOString();
  if (isBytes(value)) return Buffer.from(value).toString('utf-8');
  return JSON.stringify(value);
};

export const isNull = (value: Scalar | undefined) => value === null || value === undefined;

/** Truthiness of a cell in the "valid" column. */
export const isTruthy = (value: Scalar | undefined): boolean => {
  if (value === null || value === undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  const trimmed = value.trim();
  if (!trimmed) return false;
  const asNumber = Number(trimmed);
  if (!Number.isNaN(asNumber)) return asNumber !== 0;
  return !FALSE_WORDS.test(trimmed);
};

export const uniqueNames = (names: string[]) => {
  const seen = new Map<string, number>();
  return names.map((raw, index) => {
    const base = raw === '' ? `column_${index + 1}` : raw;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    if (!count) return base;
    let candidate = `${base}_${count}`;
    let next = count;
    while (seen.has(candidate)) {
      next += 1;
      candidate = `${base}_${next}`;
    }
    seen.set(candidate, 1);
    return candidate;
  });
};
