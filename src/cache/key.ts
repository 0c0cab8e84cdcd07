import { createHash } from 'node:crypto';
import type { CacheArg } from './types';

type TaggedArg = ['s', string] | ['n', string] | ['b', boolean];

function tagArg(arg: CacheArg): TaggedArg {
  if (typeof arg === 'string') {
    return ['s', arg];
  }
  if (typeof arg === 'number') {
    // JSON writes NaN and ±Infinity as null and -0 as 0
    return ['n', Object.is(arg, -0) ? '-0' : String(arg)];
  }
  return ['b', arg];
}

/**
 * Digest of an ordered argument tuple. Each argument is tagged with its type
 * and JSON-encoded as an array before hashing, so `('a|b', 'c')` and
 * `('a', 'b|c')` never share a key, `1` differs from `'1'` and every number,
 * including `NaN`, `-0` and the infinities, keeps its own key.
 */
export function buildCacheKey(namespace: string, args: readonly CacheArg[]): string {
  const material = JSON.stringify([namespace, ...args.map(tagArg)]);
  return createHash('sha256').update(material, 'utf8').digest('hex');
}

/**
 * Argument as recorded in the backing file. Numbers JSON cannot carry are kept
 * in their text form.
 */
export function storableArg(arg: CacheArg): CacheArg {
  if (typeof arg === 'number' && (!Number.isFinite(arg) || Object.is(arg, -0))) {
    return Object.is(arg, -0) ? '-0' : String(arg);
  }
  return arg;
}
