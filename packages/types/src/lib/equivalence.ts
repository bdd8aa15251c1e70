/**
 * @fileoverview Value equality and hashing used by Cell
 *
 * `sameValueZero` is the comparison Map and Set use for keys; `hashValue`
 * agrees with it (equal values hash equally). Objects compare and hash by
 * identity.
 *
 * @module @absential/types/equivalence
 */

export type Equivalence<T> = (left: T, right: T) => boolean;

export type Hasher<T> = (value: T) => number;

/**
 * SameValueZero: like `===`, except NaN equals NaN
 */
export function sameValueZero(left: unknown, right: unknown): boolean {
  return left === right || (Number.isNaN(left) && Number.isNaN(right));
}

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

function identityHash(value: object): number {
  let identity = identities.get(value);
  if (identity === undefined) {
    identity = nextIdentity++;
    identities.set(value, identity);
  }
  return identity;
}

/**
 * 32-bit string hash (31-multiplier polynomial)
 */
export function hashString(text: string): number {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(31, hash) + text.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * Hashes primitives by value and objects by identity
 */
export function hashValue(value: unknown): number {
  switch (typeof value) {
    case 'object':
      return value === null ? hashString('null') : identityHash(value);
    case 'function':
      return identityHash(value);
    case 'symbol':
      return hashString(`symbol:${value.description ?? ''}`);
    default:
      // String(-0) is '0', matching sameValueZero
      return hashString(`${typeof value}:${String(value)}`);
  }
}
