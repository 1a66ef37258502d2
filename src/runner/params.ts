import { z } from 'zod';
import type { ParamBag } from '../types/index.js';

export type ParamKind = 'string' | 'int' | 'number' | 'boolean';

interface ParamKindMap {
  string: string;
  int: number;
  number: number;
  boolean: boolean;
}

function toNumber(value: unknown): unknown {
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return value;
}

function toBoolean(value: unknown): unknown {
  if (typeof value === 'number') return value !== 0;
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return value;
}

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

const PARAM_SCHEMAS: { [K in ParamKind]: z.ZodType<ParamKindMap[K], z.ZodTypeDef, unknown> } = {
  string: z.union([z.string(), z.number().finite(), z.boolean(), z.bigint()]).transform(String),
  int: z.preprocess(toNumber, z.number().int().min(INT32_MIN).max(INT32_MAX)),
  number: z.preprocess(toNumber, z.number().finite()),
  boolean: z.preprocess(toBoolean, z.boolean()),
};

/**
 * Unwrap a decoded-document node to its scalar. Handles nodes exposing
 * `toJSON()` (YAML scalars, dates) and plain `{ value }` wrappers.
 */
export function unwrapParam(value: unknown): unknown {
  let current = value;
  for (let depth = 0; depth < 4; depth++) {
    if (current === null || typeof current !== 'object') return current;
    if ('toJSON' in current && typeof current.toJSON === 'function') {
      current = current.toJSON();
    } else if ('value' in current) {
      current = current.value;
    } else {
      return current;
    }
  }
  return current;
}

export function hasParam(bag: ParamBag | undefined, key: string): boolean {
  const value = bag?.[key];
  return value !== undefined && value !== null;
}

/**
 * Read `key` from a loosely-typed parameter bag, coerced to `kind`.
 * Returns `fallback` when the key is absent or the value does not coerce.
 */
export function getParam<K extends ParamKind>(
  bag: ParamBag | undefined,
  key: string,
  kind: K,
  fallback: ParamKindMap[K],
): ParamKindMap[K] {
  if (!hasParam(bag, key)) return fallback;
  try {
    const result = PARAM_SCHEMAS[kind].safeParse(unwrapParam(bag?.[key]));
    return result.success ? result.data : fallback;
  } catch {
    // toJSON() on a foreign node may throw
    return fallback;
  }
}

/** Case-insensitive match against a closed set of string values. */
export function getEnumParam<T extends string>(
  bag: ParamBag | undefined,
  key: string,
  values: readonly T[],
  fallback: T,
): T {
  const raw = getParam(bag, key, 'string', '').trim().toLowerCase();
  return values.find((v) => v.toLowerCase() === raw) ?? fallback;
}
