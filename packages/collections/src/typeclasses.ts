/**
 * Identity Typeclasses
 *
 * Non-HKT typeclasses describing how values of a type are compared, hashed,
 * ordered and displayed. Collections and graph algorithms take these as
 * explicit parameters instead of relying on reference equality.
 *
 * Hierarchy:
 *   Eq<A>
 *     └── Ord<A>
 *   Hash<A>
 *   Show<A>
 *   Keyed<A> = Eq<A> & Hash<A> & Show<A>
 */

// ============================================================================
// Eq — equality
// ============================================================================

/**
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

/** Create an Eq instance from a custom equality function. */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

/** Eq using strict equality (===). */
export function eqStrict<A>(): Eq<A> {
  return makeEq((a, b) => a === b);
}

/** Create an Eq instance by mapping to a comparable value. */
export function eqBy<A, B>(f: (a: A) => B, E: Eq<B> = eqStrict()): Eq<A> {
  return makeEq((a, b) => E.equals(f(a), f(b)));
}

export const eqString: Eq<string> = eqStrict();
export const eqNumber: Eq<number> = eqStrict();

// ============================================================================
// Hash — must agree with Eq: `equals(a, b) => hash(a) === hash(b)`
// ============================================================================

export interface Hash<A> {
  hash(a: A): number;
}

export const hashString: Hash<string> = {
  hash: (a) => {
    // djb2
    let hash = 5381;
    for (let i = 0; i < a.length; i++) {
      hash = ((hash << 5) + hash) ^ a.charCodeAt(i);
    }
    return hash >>> 0;
  },
};

export const hashNumber: Hash<number> = {
  hash: (a) => {
    if (Number.isNaN(a)) return 0x7fc00000;
    if (Number.isInteger(a) && Math.abs(a) < 2 ** 31) return a | 0;
    return hashString.hash(String(a));
  },
};

/** Create a Hash instance by mapping to a hashable value. */
export function hashBy<A, B>(f: (a: A) => B, H: Hash<B>): Hash<A> {
  return { hash: (a) => H.hash(f(a)) };
}

/** Combine the hashes of several parts, order-sensitive. */
export function combineHashes(hashes: ReadonlyArray<number>): number {
  let hash = hashes.length;
  for (const h of hashes) {
    hash = ((hash << 5) + hash) ^ h;
  }
  return hash >>> 0;
}

// ============================================================================
// Ord — total ordering
// ============================================================================

export type Ordering = -1 | 0 | 1;

export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
}

function compareNative<A extends string | number>(a: A, b: A): Ordering {
  return a < b ? -1 : a > b ? 1 : 0;
}

export const ordString: Ord<string> = {
  ...eqString,
  compare: compareNative,
};

export const ordNumber: Ord<number> = {
  ...eqNumber,
  compare: compareNative,
};

/** Create an Ord instance by mapping to an ordered value. */
export function ordBy<A, B>(f: (a: A) => B, O: Ord<B>): Ord<A> {
  return {
    ...eqBy(f, O),
    compare: (a, b) => O.compare(f(a), f(b)),
  };
}

// ============================================================================
// Show — display text
// ============================================================================

export interface Show<A> {
  show(a: A): string;
}

/** Shows strings verbatim (no quotes), since they end up as diagram identifiers. */
export const showString: Show<string> = { show: (a) => a };

export const showNumber: Show<number> = { show: (a) => String(a) };

export function showBy<A, B>(f: (a: A) => B, S: Show<B>): Show<A> {
  return { show: (a) => S.show(f(a)) };
}

// ============================================================================
// Keyed — the bundle graph nodes and labels are parameterized by
// ============================================================================

export interface Keyed<A> extends Eq<A>, Hash<A>, Show<A> {}

export function keyed<A>(eq: Eq<A>, hash: Hash<A>, show: Show<A>): Keyed<A> {
  return {
    equals: eq.equals,
    notEquals: eq.notEquals,
    hash: hash.hash,
    show: show.show,
  };
}

export const stringKey: Keyed<string> = keyed(eqString, hashString, showString);
export const numberKey: Keyed<number> = keyed(eqNumber, hashNumber, showNumber);

/** Project a Keyed instance through `f`. */
export function keyedBy<A, B>(f: (a: A) => B, K: Keyed<B>): Keyed<A> {
  return keyed(eqBy(f, K), hashBy(f, K), showBy(f, K));
}

const ABSENT_HASH = 0x9e3779b9;

/**
 * Lift a Keyed instance to optional values. `undefined` equals only itself,
 * hashes to a fixed constant and shows as an empty string.
 */
export function optional<A>(K: Keyed<A>): Keyed<A | undefined> {
  return keyed<A | undefined>(
    makeEq((a, b) => {
      if (a === undefined || b === undefined) return a === b;
      return K.equals(a, b);
    }),
    { hash: (a) => (a === undefined ? ABSENT_HASH : K.hash(a)) },
    { show: (a) => (a === undefined ? "" : K.show(a)) }
  );
}
